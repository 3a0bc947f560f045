import { TaskName } from 'task-name'

import { Report, Task, TaskParams } from './task'
import { TaskSource } from './task-source'
import { InvalidStatusTransitionError, isLegalTransition, TaskStatus } from './task-status'

export interface TaskHooks {
  /**
   * Called when the task's status becomes EXECUTED. A throwing hook makes the status assignment throw (the status
   * itself has already changed by then).
   */
  onFinish?: (taskName: TaskName) => void
  /**
   * Called when the task's status becomes ERRORED. Same failure semantics as `onFinish`.
   */
  onFailure?: (taskName: TaskName) => void
}

export interface TaskOptions {
  initialStatus?: TaskStatus
  hooks?: TaskHooks
}

/**
 * Status bookkeeping shared by all task kinds: transitions are validated and hooks run on EXECUTED/ERRORED.
 */
export abstract class AbstractTask implements Task {
  private status: TaskStatus
  private readonly hooks: TaskHooks

  constructor(readonly name: TaskName, options: TaskOptions = {}) {
    this.status = options.initialStatus ?? 'WAITING'
    this.hooks = options.hooks ?? {}
  }

  abstract readonly source: TaskSource

  abstract build(params: TaskParams): Promise<Report>

  get execStatus(): TaskStatus {
    return this.status
  }

  set execStatus(next: TaskStatus) {
    if (!isLegalTransition(this.status, next)) {
      throw new InvalidStatusTransitionError(this.name, this.status, next)
    }
    this.status = next
    if (next === 'EXECUTED') {
      this.hooks.onFinish?.(this.name)
    } else if (next === 'ERRORED') {
      this.hooks.onFailure?.(this.name)
    }
  }
}
