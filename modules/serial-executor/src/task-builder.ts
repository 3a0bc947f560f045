import { Report, Task, TaskParams } from 'dag-protocol'
import { Logger } from 'logger'

import { IsolationStrategy, runIsolated } from './isolation'

/**
 * Decides, per task, whether its build runs in the current process or through the isolation strategy, and runs it.
 */
export class TaskBuilder {
  /**
   * @param isolation used for in-memory callables. Undefined means every build runs in the current process.
   */
  constructor(private readonly logger: Logger, private readonly isolation: IsolationStrategy | undefined) {}

  async build(task: Task, params: TaskParams): Promise<Report> {
    const source = task.source
    if (this.isolation && source.kind === 'IN_MEMORY_CALLABLE') {
      this.logger.debug(`building ${task.name} in an isolated worker`)
      return await runIsolated(this.isolation, source.entryPoint, params)
    }

    this.logger.debug(`building ${task.name} in-process`)
    return await task.build(params)
  }
}
