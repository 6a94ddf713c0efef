export * from './services'
export * from './utils'
export * from './hooks'
export {
  CallScreenController,
  type CallScreenDependencies,
  type CallScreenListener,
  type AudioSourceAction
} from './controller/CallScreenController'
export {
  DEFAULT_CALL_SCREEN_CONFIG,
  resolveCallScreenConfig,
  type CallScreenConfig
} from './config/callScreenConfig'
export type * from '../types'
