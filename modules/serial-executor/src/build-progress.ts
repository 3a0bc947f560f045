import { Logger } from 'logger'
import { TaskName } from 'task-name'

/**
 * Prints a line for every task that is about to be built: `[<visited>/<total>] Building task "<name>"`. Tasks that
 * were visited but not built (skipped, aborted) count towards `<visited>`.
 */
export class BuildProgress {
  private numVisited = 0

  constructor(private readonly logger: Logger, private readonly total: number) {}

  visit() {
    ++this.numVisited
  }

  building(taskName: TaskName) {
    this.logger.print(`[${this.numVisited}/${this.total}] Building task "${taskName}"`, 'high')
  }
}
