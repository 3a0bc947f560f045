import { DAGBuildError } from 'dag-build-error'
import { Report, TaskParams } from 'dag-protocol'
import * as fse from 'fs-extra'
import { createDefaultLogger, Criticality, Level, LEVELS, Logger } from 'logger'
import * as path from 'path'
import { SerialExecutor, SerialExecutorConfigInput } from 'serial-executor'
import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'

import { loadPipeline } from './load-pipeline'
import { parseParams } from './parse-params'

export interface RunOptions {
  pipelineFile: string
  params: TaskParams
  showProgress: boolean
  executor: SerialExecutorConfigInput
}

/**
 * Loads a pipeline file and runs its DAG.
 */
export async function runPipeline(options: RunOptions, logger: Logger): Promise<Report[]> {
  const dag = loadPipeline(options.pipelineFile)
  logger.info(`loaded DAG ${dag.name} (${dag.tasks.size} tasks) from ${options.pipelineFile}`)
  const executor = new SerialExecutor(logger, options.executor)
  logger.info(`executor config: ${JSON.stringify(executor.toConfig())}`)
  return await executor.run(dag, options.showProgress, options.params)
}

export async function main() {
  await yargs(hideBin(process.argv))
    .option('param', {
      alias: 'p',
      describe: 'a parameter for the tasks, as key=value. The value is parsed as JSON when possible. Repeatable.',
      type: 'string',
      array: true,
      default: [],
    })
    .option('show-progress', {
      describe: 'whether to print a line before building each task',
      type: 'boolean',
      default: false,
    })
    .option('logging-directory', {
      describe: 'a directory in which a log file dedicated to the run is written',
      type: 'string',
    })
    .option('logging-level', {
      describe: 'the level of the run log file',
      choices: LEVELS,
      default: 'info' as const,
    })
    .option('build-in-subprocess', {
      describe: 'whether to build each in-memory callable task in its own worker process',
      type: 'boolean',
      default: true,
    })
    .options('loudness', {
      describe: `how detailed should the terminal output be. Values are T-shirt sizes:
          s - just critical details/errors are printed
          m - print progress lines
          l - print everything`,
      choices: ['s', 'm', 'l'],
      default: 'm',
    })
    .command(
      'build <pipeline>',
      'run the tasks of a pipeline file',
      yargs =>
        yargs.positional('pipeline', {
          describe: 'path to a pipeline file',
          type: 'string',
          demandOption: true,
        }),
      async argv => {
        const pipelineFile = path.resolve(argv.pipeline)
        const logDir = path.join(path.dirname(pipelineFile), '.dagrun')
        await fse.ensureDir(logDir)
        const logFile = path.join(logDir, 'main.log')
        const logger = createDefaultLogger(logFile, stringToLoudness(argv.loudness))
        logger.print(`logging to ${logFile}`, 'low')

        try {
          const reports = await runPipeline(
            {
              pipelineFile,
              params: parseParams(argv.param),
              showProgress: argv['show-progress'],
              executor: {
                loggingDirectory: argv['logging-directory'],
                loggingLevel: toLevel(argv['logging-level']),
                buildInSubprocess: argv['build-in-subprocess'],
              },
            },
            logger,
          )
          logger.info(`reports: ${JSON.stringify(reports)}`)
          logger.print(`Built ${reports.length} task(s)`, 'high')
        } catch (e) {
          if (!(e instanceof DAGBuildError)) {
            throw e
          }
          logger.print(e.message, 'high')
          process.exitCode = 1
        }
      },
    )
    .demandCommand(1)
    .strict()
    .parseAsync()
}

function toLevel(s: string): Level {
  const ret = LEVELS.find(at => at === s)
  if (!ret) {
    throw new Error(`illegal logging level: "${s}"`)
  }
  return ret
}

export function stringToLoudness(s: string): Criticality {
  if (s === 's') {
    return 'high'
  }

  if (s === 'm') {
    return 'moderate'
  }

  if (s === 'l') {
    return 'low'
  }

  throw new Error(`illegal loudness value: "${s}"`)
}
