import * as fse from 'fs-extra'
import { toReasonableFileName } from 'misc'
import * as path from 'path'
import * as winston from 'winston'

import { fileLineFormat, Level, levelValues } from './formats'
import { Criticality, Logger } from './logger'

/**
 * A log file dedicated to a single run of a DAG: `<directory>/<dag name>.log`. Messages reach it through the logger
 * returned by `attach()`, and only while the sink is attached.
 */
export class RunLogSink {
  private attached = true

  private constructor(readonly file: string, private readonly logger: winston.Logger) {}

  static async open(dagName: string, directory: string, level: Level): Promise<RunLogSink> {
    const dir = path.resolve(directory)
    await fse.ensureDir(dir)
    const file = path.join(dir, `${toReasonableFileName(dagName)}.log`)
    const logger = winston.createLogger({
      level,
      levels: levelValues,
      transports: [new winston.transports.File({ filename: file, format: fileLineFormat })],
    })
    return new RunLogSink(file, logger)
  }

  /**
   * @returns a logger that writes to both `base` and this sink.
   */
  attach(base: Logger): Logger {
    return new TeeLogger(base, this)
  }

  write(level: Level, message: string, rest: unknown[]) {
    if (!this.attached) {
      return
    }
    this.logger.log(level, message, ...rest)
  }

  /**
   * Stops writing to the file and releases it. Resolves once winston has finished with it.
   */
  async detach(): Promise<void> {
    if (!this.attached) {
      return
    }
    this.attached = false
    await new Promise<void>(resolve => {
      this.logger.on('finish', () => resolve())
      this.logger.end()
    })
  }
}

class TeeLogger implements Logger {
  constructor(private readonly base: Logger, private readonly sink: RunLogSink) {}

  print(message: string, criticality?: Criticality) {
    this.base.print(message, criticality)
    this.sink.write('info', message, [])
  }

  info(message: string, ...rest: unknown[]) {
    this.base.info(message, ...rest)
    this.sink.write('info', message, rest)
  }

  debug(message: string, ...rest: unknown[]) {
    this.base.debug(message, ...rest)
    this.sink.write('debug', message, rest)
  }

  error(message: string, err: unknown, ...rest: unknown[]) {
    this.base.error(message, err, ...rest)
    this.sink.write('error', message, [err, ...rest])
  }
}
