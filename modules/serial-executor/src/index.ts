export * from './forked-process-isolation'
export * from './isolation'
export * from './message-collector'
export * from './serial-executor'
export * from './serial-executor-config'
export { IsolatedTaskError } from './worker-protocol'
