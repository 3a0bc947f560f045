import { RecordingLogger } from 'executor-testkit'
import { TaskName } from 'task-name'

import { BuildProgress } from '../src/build-progress'

describe('BuildProgress', () => {
  test('prints the number of visited tasks, the total and the task name', () => {
    const logger = new RecordingLogger()
    const progress = new BuildProgress(logger, 4)
    progress.visit()
    progress.visit()
    progress.building(TaskName('clean'))
    expect(logger.printed).toEqual(['[2/4] Building task "clean"'])
  })
})
