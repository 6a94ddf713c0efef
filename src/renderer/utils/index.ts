export {
  logger,
  Logger,
  CallLog,
  AudioLog,
  VideoLog,
  DismissLog,
  UILog,
  type LogLevel,
  type LogEntry,
  type ModuleLogger
} from './Logger'
export { i18n, I18n, t, type Language, type TranslateFn } from './i18n'
export { CallScreenPreconditionError, assertPrecondition } from './precondition'
