import { CallableTask, OrderedDag, ShellTask, Task } from 'dag-protocol'
import { shouldNeverHappen } from 'misc'
import * as path from 'path'
import { TaskName } from 'task-name'

import { PipelineTask, readPipelineFile } from './pipeline-file'

/**
 * Builds a DAG from a pipeline file. Tasks keep the order in which the file lists them.
 */
export function loadPipeline(pipelineFile: string): OrderedDag {
  const file = path.resolve(pipelineFile)
  const dir = path.dirname(file)
  const pipeline = readPipelineFile(file)

  const dag = new OrderedDag(pipeline.name)
  for (const t of pipeline.tasks) {
    dag.addTask(toTask(t, dir))
  }
  return dag
}

function toTask(t: PipelineTask, dir: string): Task {
  const name = TaskName(t.name)
  const options = { initialStatus: t.status }
  const source = t.source
  if (source.kind === 'callable') {
    return new CallableTask(name, { modulePath: resolveModule(source.module, dir), exportName: source.export }, options)
  }
  if (source.kind === 'shell') {
    return new ShellTask(name, source.command, path.resolve(dir, source.cwd ?? '.'), options)
  }
  shouldNeverHappen(source)
}

// Bare specifiers ("some-package/lib/steps") are left for the module resolver.
function resolveModule(specifier: string, dir: string) {
  return specifier.startsWith('.') || path.isAbsolute(specifier) ? path.resolve(dir, specifier) : specifier
}
