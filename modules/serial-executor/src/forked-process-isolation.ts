import { EntryPoint, Report, TaskParams } from 'dag-protocol'
import execa from 'execa'
import { Logger } from 'logger'
import * as path from 'path'

import { IsolatedContext, IsolationStrategy } from './isolation'
import { IsolatedTaskError, WorkerReply, WorkerRequest } from './worker-protocol'

export interface ForkedProcessIsolationOptions {
  /**
   * The script that the worker process runs. Defaults to the isolated-worker module that sits next to this file.
   */
  workerScript?: string
  /**
   * Node.js options for the worker process. Defaults to none when running compiled code, and to loading tsx when
   * running from TypeScript sources.
   */
  nodeOptions?: string[]
}

/**
 * Isolates each call in a freshly forked Node.js process that is killed once the call is over, so whatever memory the
 * call retained is given back to the operating system.
 */
export class ForkedProcessIsolation implements IsolationStrategy {
  private readonly workerScript: string
  private readonly nodeOptions: string[]

  constructor(private readonly logger: Logger, options: ForkedProcessIsolationOptions = {}) {
    const ext = path.extname(__filename)
    this.workerScript = options.workerScript ?? path.join(__dirname, `isolated-worker${ext}`)
    this.nodeOptions = options.nodeOptions ?? (ext === '.ts' ? ['--import', 'tsx'] : [])
  }

  async acquire(): Promise<IsolatedContext> {
    const child = execa.node(this.workerScript, [], {
      nodeOptions: this.nodeOptions,
      stdio: 'inherit',
      reject: false,
    })
    this.logger.debug(`forked an isolated worker (pid=${child.pid})`)
    return new ForkedProcessContext(child, this.logger)
  }
}

class ForkedProcessContext implements IsolatedContext {
  constructor(private readonly child: execa.ExecaChildProcess, private readonly logger: Logger) {}

  async submit(entryPoint: EntryPoint, params: TaskParams): Promise<Report> {
    const reply = await this.exchange({ entryPoint, params: { ...params } })
    if (reply.outcome === 'OK') {
      return reply.report
    }

    throw new IsolatedTaskError(reply.error)
  }

  private exchange(request: WorkerRequest): Promise<WorkerReply> {
    return new Promise<WorkerReply>((resolve, reject) => {
      this.child.once('message', (raw: unknown) => {
        const parsed = WorkerReply.safeParse(raw)
        if (parsed.success) {
          resolve(parsed.data)
        } else {
          reject(new Error(`Malformed reply from isolated worker (pid=${this.child.pid}): ${parsed.error.message}`))
        }
      })
      // Messages and disconnection travel over the same channel, so a reply is always seen before this fires.
      this.child.once('disconnect', () => {
        reject(new Error(`Isolated worker (pid=${this.child.pid}) exited before replying`))
      })
      this.child.once('error', reject)
      this.child.send(request)
    })
  }

  async release(): Promise<void> {
    if (this.child.exitCode === null) {
      this.child.kill()
    }
    const { exitCode, signal } = await this.child
    this.logger.debug(`isolated worker (pid=${this.child.pid}) is gone`, { exitCode, signal })
  }
}
