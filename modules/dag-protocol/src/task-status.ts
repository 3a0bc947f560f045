import { z } from 'zod'

export const TaskStatus = z.enum(['WAITING', 'SKIPPED', 'ABORTED', 'EXECUTED', 'ERRORED'])
export type TaskStatus = z.infer<typeof TaskStatus>

/**
 * Statuses that the DAG builder assigns before a run starts and that exclude the task from the run.
 */
export function isExcludedFromRun(status: TaskStatus): boolean {
  return status === 'SKIPPED' || status === 'ABORTED'
}

/**
 * Within a run, a WAITING task may move to any other status. Any status may go back to WAITING, which is how a task is
 * reset before the next run. Everything else is illegal.
 */
export function isLegalTransition(from: TaskStatus, to: TaskStatus): boolean {
  return from === 'WAITING' || to === 'WAITING'
}

export class InvalidStatusTransitionError extends Error {
  constructor(readonly taskName: string, readonly from: TaskStatus, readonly to: TaskStatus) {
    super(`Task "${taskName}" cannot change its status from ${from} to ${to}`)

    Object.setPrototypeOf(this, InvalidStatusTransitionError.prototype)
  }
}
