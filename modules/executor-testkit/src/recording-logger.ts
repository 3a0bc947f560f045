import { Criticality, Logger } from 'logger'

export interface LogEntry {
  level: 'print' | 'info' | 'debug' | 'error'
  message: string
}

/**
 * A logger that keeps everything in memory, for assertions.
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = []

  get printed(): string[] {
    return this.entries.filter(at => at.level === 'print').map(at => at.message)
  }

  print(message: string, _criticality?: Criticality) {
    this.entries.push({ level: 'print', message })
  }

  info(message: string, ..._rest: unknown[]) {
    this.entries.push({ level: 'info', message })
  }

  debug(message: string, ..._rest: unknown[]) {
    this.entries.push({ level: 'debug', message })
  }

  error(message: string, _err: unknown, ..._rest: unknown[]) {
    this.entries.push({ level: 'error', message })
  }
}
