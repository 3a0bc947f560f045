export * from './dagrun-cli'
export * from './load-pipeline'
export * from './parse-params'
export * from './pipeline-file'
