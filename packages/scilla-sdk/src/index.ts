export * from './amount'
export * from './denyReason'
export * from './errors'
export * from './execute'
export * from './instructions'
export * from './orchestrators'
export * from './rpc'
export * from './utils'
export * from './validation'
export * from './web3.js'
