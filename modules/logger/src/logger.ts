import * as fs from 'fs'
import * as path from 'path'
import * as winston from 'winston'

import { fileLineFormat, Level, levelValues, uiLineFormat } from './formats'

const criticalityLegend: Record<Criticality, number> = {
  high: 0,
  moderate: 100,
  low: 200,
}

export type Criticality = 'high' | 'moderate' | 'low'

export interface Logger {
  /**
   * Prints a message to the UI stream (and to the log) if its criticality passes the logger's pickiness.
   */
  print(message: string, criticality?: Criticality): void
  info(message: string, ...rest: unknown[]): void
  debug(message: string, ...rest: unknown[]): void
  error(message: string, err: unknown, ...rest: unknown[]): void
}

/**
 * Creates a logger that writes to `logFile` (whose previous content, if any, is discarded) and prints UI messages to
 * `uiStream`.
 */
export function createDefaultLogger(
  logFile: string,
  pickiness: Criticality,
  logLevel?: Level,
  uiStream?: NodeJS.WritableStream,
): Logger {
  const stat = fs.statSync(logFile, { throwIfNoEntry: false })
  if (stat && stat.size > 0) {
    fs.rmSync(logFile, { force: true })
  }
  return new FileLogger(logFile, pickiness, logLevel, uiStream)
}

class FileLogger implements Logger {
  private readonly logger: winston.Logger
  private readonly pickiness: number

  constructor(
    logFile: string,
    pickiness: Criticality,
    logLevel: Level = 'info',
    uiStream: NodeJS.WritableStream = process.stdout,
  ) {
    if (!path.isAbsolute(logFile)) {
      throw new Error(`logFile must be absolute: ${logFile}`)
    }
    this.pickiness = criticalityLegend[pickiness]
    this.logger = winston.createLogger({
      level: 'debug',
      levels: levelValues,
      transports: [
        new winston.transports.File({ filename: logFile, level: logLevel, format: fileLineFormat }),
        new winston.transports.Stream({ stream: uiStream, level: 'info', format: uiLineFormat }),
      ],
    })
  }

  print(message: string, messageCriticality: Criticality = 'moderate') {
    if (criticalityLegend[messageCriticality] <= this.pickiness) {
      this.logger.info(message, { ui: true })
    }
  }

  info(message: string, ...rest: unknown[]) {
    this.logger.info(message, ...rest)
  }

  debug(message: string, ...rest: unknown[]) {
    this.logger.debug(message, ...rest)
  }

  error(message: string, err: unknown, ...rest: unknown[]) {
    this.logger.error(message, err, ...rest, { ui: true })
  }
}
