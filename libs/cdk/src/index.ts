export * from './common/errors'
export * from './common/logger'
export * from './common/utils'
export * from './entities/config'
export * from './entities/helmValues'
export * from './entities/kubectl'
export * from './entities/rds'
