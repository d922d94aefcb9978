export * from './awsRdsDatabase'
export * from './k8sApp'
export * from './k8sChart'
export * from './k8sConstruct'
export * from './k8sHelm'
export * from './k8sHooks'
export * from './k8sLookup'
