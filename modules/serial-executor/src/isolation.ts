import { EntryPoint, Report, TaskParams } from 'dag-protocol'

/**
 * A disposable execution context. Exactly one call is submitted to it before it is released.
 */
export interface IsolatedContext {
  submit(entryPoint: EntryPoint, params: TaskParams): Promise<Report>
  /**
   * Tears the context down. Called whether or not the submitted call succeeded.
   */
  release(): Promise<void>
}

export interface IsolationStrategy {
  acquire(): Promise<IsolatedContext>
}

/**
 * Runs one call in a fresh context taken from `strategy`, and releases the context before returning (or rethrowing).
 */
export async function runIsolated(
  strategy: IsolationStrategy,
  entryPoint: EntryPoint,
  params: TaskParams,
): Promise<Report> {
  const context = await strategy.acquire()
  try {
    return await context.submit(entryPoint, params)
  } finally {
    await context.release()
  }
}
