export * from './fake-task'
export * from './in-process-isolation'
export * from './recording-client'
export * from './recording-logger'
export * from './testkit'
