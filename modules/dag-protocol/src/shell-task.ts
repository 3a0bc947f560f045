import execa from 'execa'
import { TaskName } from 'task-name'

import { AbstractTask, TaskOptions } from './abstract-task'
import { Report, TaskParams } from './task'
import { TaskSource } from './task-source'

/**
 * A task that delegates its work to a shell command. The command's output goes to the current process's stdout/stderr.
 * Build parameters are exposed to the command as `DAG_PARAM_<NAME>` environment variables (JSON-encoded unless they are
 * strings).
 */
export class ShellTask extends AbstractTask {
  readonly source: TaskSource

  constructor(name: TaskName, readonly command: string, private readonly cwd?: string, options?: TaskOptions) {
    super(name, options)
    this.source = { kind: 'EXTERNAL_DELEGATE', description: command }
  }

  async build(params: TaskParams): Promise<Report> {
    const t0 = Date.now()
    const p = await execa.command(this.command, {
      cwd: this.cwd,
      shell: true,
      reject: false,
      stdio: 'inherit',
      env: toEnv(params),
    })
    if (p.exitCode !== 0) {
      throw new Error(`Command of task ${this.name} exited with status=${p.exitCode} (command: ${this.command})`)
    }

    return { taskName: this.name, command: this.command, exitCode: p.exitCode, durationMillis: Date.now() - t0 }
  }
}

export function toEnv(params: TaskParams): Record<string, string> {
  const ret: Record<string, string> = {}
  for (const [k, v] of Object.entries(params)) {
    const name = `DAG_PARAM_${k.toUpperCase().replace(/[^A-Z0-9_]/g, '_')}`
    ret[name] = typeof v === 'string' ? v : JSON.stringify(v)
  }
  return ret
}
