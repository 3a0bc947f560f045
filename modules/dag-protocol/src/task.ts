import { Jsonable, shouldNeverHappen } from 'misc'
import { TaskName } from 'task-name'
import { z } from 'zod'

import { TaskSource } from './task-source'
import { TaskStatus } from './task-status'

/**
 * Parameters handed, unmodified, to the build operation of every task in a run.
 */
export const TaskParams = z.record(Jsonable)
export type TaskParams = Readonly<Record<string, Jsonable>>

/**
 * The outcome of a successful build. The executor collects reports without looking inside them. Reports can cross a
 * process boundary, so they are JSON values.
 */
export type Report = Jsonable

export interface Task {
  readonly name: TaskName
  /**
   * Reading is always safe. Assigning may throw (an illegal transition, or a hook that failed).
   */
  execStatus: TaskStatus
  readonly source: TaskSource
  build(params: TaskParams): Promise<Report>
}

/**
 * A one-line, human-readable identity of a task, used in failure reports.
 */
export function describeTask(task: Pick<Task, 'name' | 'source'>): string {
  const source = task.source
  if (source.kind === 'IN_MEMORY_CALLABLE') {
    return `InMemoryCallable: ${task.name} -> ${source.entryPoint.exportName} (${source.entryPoint.modulePath})`
  }
  if (source.kind === 'EXTERNAL_DELEGATE') {
    return `ExternalDelegate: ${task.name} -> ${source.description}`
  }
  shouldNeverHappen(source)
}
