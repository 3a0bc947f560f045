import { AbstractTask, EntryPoint, Report, TaskHooks, TaskParams, TaskSource, TaskStatus } from 'dag-protocol'
import { TaskName } from 'task-name'

export interface FakeTaskOptions {
  status?: TaskStatus
  /**
   * What build() resolves to. Ignored if `error` is set.
   */
  report?: Report
  /**
   * What build() rejects with.
   */
  error?: Error
  /**
   * Makes the task an in-memory callable with this entry point. The entry point is used only by isolation; build()
   * itself keeps behaving as configured by `report`/`error`.
   */
  entryPoint?: EntryPoint
  hooks?: TaskHooks
}

/**
 * A task with scripted behavior that remembers how it was built.
 */
export class FakeTask extends AbstractTask {
  readonly source: TaskSource
  readonly builds: TaskParams[] = []

  constructor(name: string, private readonly options: FakeTaskOptions = {}) {
    super(TaskName(name), { initialStatus: options.status, hooks: options.hooks })
    this.source = options.entryPoint
      ? { kind: 'IN_MEMORY_CALLABLE', entryPoint: options.entryPoint }
      : { kind: 'EXTERNAL_DELEGATE', description: `fake ${name}` }
  }

  get numBuilds() {
    return this.builds.length
  }

  async build(params: TaskParams): Promise<Report> {
    this.builds.push(params)
    if (this.options.error) {
      throw this.options.error
    }
    return this.options.report ?? { built: this.name }
  }
}
