import { DAGBuildError } from 'dag-build-error'
import { Dag, describeTask, isExcludedFromRun, Report, Task, TaskParams } from 'dag-protocol'
import { Logger, RunLogSink } from 'logger'
import { formatTrace } from 'misc'

import { BuildProgress } from './build-progress'
import { ForkedProcessIsolation } from './forked-process-isolation'
import { IsolationStrategy } from './isolation'
import { MessageCollector } from './message-collector'
import { SerialExecutorConfig, SerialExecutorConfigInput } from './serial-executor-config'
import { TaskBuilder } from './task-builder'

/**
 * Runs a DAG one task at a time, in the order of `dag.tasks`.
 *
 * Tries to build as many tasks as possible: a failing task does not stop the run. Failures are collected and, once
 * every task was attempted, reported together in a single `DAGBuildError` that lists each failing task next to its
 * trace. Whether downstream tasks of a failing one still run is not decided here: the DAG builder marks them as
 * SKIPPED/ABORTED before the run starts.
 *
 * With `buildInSubprocess` on, each in-memory callable is built in its own short-lived worker process.
 */
export class SerialExecutor {
  private readonly config: SerialExecutorConfig
  private readonly isolation: IsolationStrategy

  /**
   * @param logger
   * @param config
   * @param isolation the isolation strategy to use when `buildInSubprocess` is on. Defaults to a fresh forked Node.js
   * process per build.
   */
  constructor(private readonly logger: Logger, config: SerialExecutorConfigInput = {}, isolation?: IsolationStrategy) {
    this.config = SerialExecutorConfig.parse(config)
    this.isolation = isolation ?? new ForkedProcessIsolation(logger)
  }

  /**
   * Re-creates an executor from a configuration obtained by `toConfig()`. The logger is never part of the
   * configuration and is injected here.
   */
  static fromConfig(config: SerialExecutorConfig, logger: Logger, isolation?: IsolationStrategy) {
    return new SerialExecutor(logger, config, isolation)
  }

  toConfig(): SerialExecutorConfig {
    return { ...this.config }
  }

  /**
   * @param dag the tasks to run (in order) and the clients they share
   * @param showProgress whether to print a line before each build
   * @param taskParams passed, as-is, to the build operation of every task
   * @returns the reports of the tasks that were built, in build order
   * @throws Error if `taskParams` is not a record of JSON values (checked before any task is built)
   * @throws DAGBuildError if at least one task failed. In that case the run-scoped log file is not detached and the
   * clients are not closed.
   */
  async run(dag: Dag, showProgress: boolean, taskParams: TaskParams): Promise<Report[]> {
    const parsedParams = TaskParams.safeParse(taskParams)
    if (!parsedParams.success) {
      throw new Error(`Bad task parameters for ${dag.name}: ${parsedParams.error.message}`)
    }

    const sink = this.config.loggingDirectory
      ? await RunLogSink.open(dag.name, this.config.loggingDirectory, this.config.loggingLevel)
      : undefined
    const logger = sink ? sink.attach(this.logger) : this.logger
    if (sink) {
      logger.info(`logging run of ${dag.name} to ${sink.file}`)
    }

    const builder = new TaskBuilder(logger, this.config.buildInSubprocess ? this.isolation : undefined)
    const exceptions = new MessageCollector()
    const progress = showProgress ? new BuildProgress(logger, dag.tasks.size) : undefined
    const taskReports: Report[] = []

    for (const t of dag.tasks.values()) {
      progress?.visit()
      if (isExcludedFromRun(t.execStatus)) {
        logger.debug(`not building ${t.name} (status=${t.execStatus})`)
        continue
      }

      progress?.building(t.name)
      let report: Report
      try {
        report = await builder.build(t, taskParams)
      } catch (e) {
        logger.error(`task ${t.name} failed`, e)
        exceptions.append(formatTrace(e), describeTask(t))
        this.changeStatus(t, 'ERRORED', exceptions, logger)
        continue
      }

      this.changeStatus(t, 'EXECUTED', exceptions, logger)
      taskReports.push(report)
    }

    if (!exceptions.isEmpty) {
      throw new DAGBuildError(
        'DAG build failed, the following tasks crashed (corresponding downstream tasks aborted execution):\n' +
          exceptions.render(),
        exceptions.failures,
      )
    }

    if (sink) {
      await sink.detach()
      this.logger.debug(`detached the run log ${sink.file}`)
    }

    // Clients are only closed when tasks are built in this process. Isolated builds have their own copies, which go
    // away with the worker.
    if (!this.config.buildInSubprocess) {
      for (const [name, client] of dag.clients) {
        logger.debug(`closing client ${name}`)
        await client.close()
      }
    }

    return taskReports
  }

  private changeStatus(t: Task, status: 'EXECUTED' | 'ERRORED', exceptions: MessageCollector, logger: Logger) {
    try {
      t.execStatus = status
    } catch (e) {
      logger.error(`could not set the status of ${t.name} to ${status}`, e)
      exceptions.append(formatTrace(e), describeTask(t))
    }
  }
}
