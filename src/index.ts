export * from './types'
export * from './engine'
export * from './solvers'
export * from './harness'
export * from './bandit'
export * from './datasets'
export { Conf } from './conf/config'
export { BASE_CONFIG, RunConfigSchema, validateRunConfig, type RunConfig } from './conf/run-config'
export * from './utils/errors'
export { Random } from './utils/random'
