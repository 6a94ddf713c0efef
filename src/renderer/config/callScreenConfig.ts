import type { LogLevel } from '../utils/Logger'
import { UILog } from '../utils/Logger'
import { assertPrecondition } from '../utils/precondition'

export interface CallScreenConfig {
  /** Delay before a remote-initiated end of call tears the screen down */
  dismissDelayMs: number
  /** How long a fleeting settings nag stays up */
  nagAutoResolveMs: number
  /** Refresh period of the connected-call duration */
  durationTickMs: number
  /** Applied to the shared logger only when given */
  logLevel?: LogLevel
  now: () => number
}

export const DEFAULT_CALL_SCREEN_CONFIG: CallScreenConfig = {
  dismissDelayMs: 1500,
  nagAutoResolveMs: 5000,
  durationTickMs: 50,
  now: () => Date.now()
}

const TIMING_KEYS = ['dismissDelayMs', 'nagAutoResolveMs', 'durationTickMs'] as const

export function resolveCallScreenConfig(overrides: Partial<CallScreenConfig> = {}): CallScreenConfig {
  const config: CallScreenConfig = { ...DEFAULT_CALL_SCREEN_CONFIG, ...overrides }

  for (const key of TIMING_KEYS) {
    const value = config[key]
    assertPrecondition(
      Number.isFinite(value) && value > 0,
      UILog,
      `${key} must be a positive number`,
      { [key]: value }
    )
  }

  return config
}
