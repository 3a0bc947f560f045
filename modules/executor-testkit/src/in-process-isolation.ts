import { EntryPoint, invokeEntryPoint, Report, TaskParams } from 'dag-protocol'
import { IsolatedContext, IsolationStrategy } from 'serial-executor'

/**
 * An isolation strategy that runs the entry point in the current process while recording the lifecycle of every
 * context: `acquire`, `submit:<exportName>`, `release`.
 */
export class InProcessIsolation implements IsolationStrategy {
  readonly events: string[] = []

  async acquire(): Promise<IsolatedContext> {
    this.events.push('acquire')
    return {
      submit: async (entryPoint: EntryPoint, params: TaskParams): Promise<Report> => {
        this.events.push(`submit:${entryPoint.exportName}`)
        return await invokeEntryPoint(entryPoint, params)
      },
      release: async () => {
        this.events.push('release')
      },
    }
  }
}
