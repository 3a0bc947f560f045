export * from './abstract-task'
export * from './callable-task'
export * from './dag'
export * from './entry-point'
export * from './shell-task'
export * from './task'
export * from './task-source'
export * from './task-status'
