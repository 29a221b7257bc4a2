export * from './common-errors'
export * from './otp-errors'
export * from './otp'
export * from './passgate-server-config'
