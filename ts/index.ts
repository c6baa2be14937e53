export * from './const'
export * from './error'
export * from './type'
export * from './platform'
export * from './download'
export * from './release'
export * from './workdir'
export * from './tool'
export * from './env'
export * from './run'
export * from './install/system'
export * from './install/zig'
export * from './install/zls'
