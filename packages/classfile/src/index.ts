export * from './attributes'
export * from './class-file'
export * from './config'
export * from './constant-pool'
export * from './cursor'
export * from './modified-utf8'
export * from './writer'
