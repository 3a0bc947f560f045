import { TaskName } from 'task-name'

import { AbstractTask, TaskOptions } from './abstract-task'
import { invokeEntryPoint } from './entry-point'
import { Report, TaskParams } from './task'
import { EntryPoint, TaskSource } from './task-source'

/**
 * A task whose logic is a function exported by a module.
 */
export class CallableTask extends AbstractTask {
  readonly entryPoint: EntryPoint
  readonly source: TaskSource

  constructor(name: TaskName, entryPoint: EntryPoint, options?: TaskOptions) {
    super(name, options)
    this.entryPoint = EntryPoint.parse(entryPoint)
    this.source = { kind: 'IN_MEMORY_CALLABLE', entryPoint: this.entryPoint }
  }

  async build(params: TaskParams): Promise<Report> {
    return await invokeEntryPoint(this.entryPoint, params)
  }
}
