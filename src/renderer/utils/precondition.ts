import type { ModuleLogger } from './Logger'

/**
 * A programmer error: a required collaborator or lifecycle step is missing.
 * There is no valid continuation, so it is never caught inside the engine.
 */
export class CallScreenPreconditionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CallScreenPreconditionError'
  }
}

export function assertPrecondition(
  condition: boolean,
  log: ModuleLogger,
  message: string,
  data?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    log.error(`Precondition failed: ${message}`, data)
    throw new CallScreenPreconditionError(message)
  }
}
