export * from './task-name'
