import { DismissLog } from '../utils/Logger'
import {
  hasExplicitNagChoice,
  resolveNagVariant,
  shouldShowSettingsNag
} from './settingsNag'
import type {
  CallDirection,
  CallIntegrationPreferences,
  CallScreenHandle,
  CallState,
  DismissalState,
  PlatformCapabilities,
  SettingsNagVariant,
  WindowManager
} from '@/types'

export type DismissalPhase = 'active' | 'nagPending' | 'dismissed'

export interface DismissRequest {
  delayed: boolean
  ignoreNag?: boolean
  completion?: () => void
}

export interface DismissalPolicyOptions {
  screen: CallScreenHandle
  windowManager: WindowManager
  preferences: CallIntegrationPreferences
  platform: PlatformCapabilities
  getDirection: () => CallDirection
  dismissDelayMs: number
  nagAutoResolveMs: number
  /** Fired on every request, before the nag or the latch is considered */
  onDismissRequested?: () => void
  /** Nag shown or latch set; the owner should re-project */
  onStateChange?: () => void
  /** Fired once, when the latch is set */
  onDismissed?: () => void
}

/**
 * Dismissal request a call state should trigger, if any. Only terminal states
 * tear the screen down; every other state is steady.
 */
export function getDismissRequestForState(state: CallState): DismissRequest | null {
  switch (state) {
    case 'remoteHangup':
    case 'remoteBusy':
    case 'localFailure':
      return { delayed: true }
    case 'localHangup':
      return { delayed: false }
    default:
      return null
  }
}

/**
 * End-of-call teardown: active -> nagPending -> dismissed.
 *
 * `dismissed` absorbs every later request, so at most one endCall reaches the
 * window manager. Scheduled callbacks carry the generation they were created
 * in and do nothing once dispose() has moved it on.
 */
export class DismissalPolicy {
  private phase: DismissalPhase = 'active'
  private nagVariant: SettingsNagVariant | null = null
  private generation = 0
  private timers = new Set<ReturnType<typeof setTimeout>>()

  constructor(private readonly options: DismissalPolicyOptions) {}

  getPhase(): DismissalPhase {
    return this.phase
  }

  getState(): DismissalState {
    return {
      hasDismissed: this.phase === 'dismissed',
      isShowingNag: this.phase === 'nagPending',
      nagVariant: this.phase === 'nagPending' ? this.nagVariant : null
    }
  }

  requestDismiss(request: DismissRequest): void {
    const { delayed, ignoreNag = false, completion } = request

    this.options.onDismissRequested?.()

    if (this.phase === 'dismissed') {
      DismissLog.debug('Dismissal already latched, ignoring request', { delayed, ignoreNag })
      return
    }

    if (!ignoreNag && shouldShowSettingsNag({
      direction: this.options.getDirection(),
      platform: this.options.platform,
      preferences: this.options.preferences
    })) {
      this.enterNag()
      return
    }

    this.phase = 'dismissed'
    this.nagVariant = null
    DismissLog.info('Dismissal latched', { delayed })
    this.options.onDismissed?.()
    this.options.onStateChange?.()

    if (delayed) {
      this.schedule(this.options.dismissDelayMs, () => this.finish(completion))
    } else {
      this.finish(completion)
    }
  }

  /**
   * Invalidate every pending callback. Called when the owner is torn down.
   */
  dispose(): void {
    this.generation += 1
    this.timers.forEach(timer => clearTimeout(timer))
    this.timers.clear()
  }

  private enterNag(): void {
    if (this.phase === 'nagPending') {
      return
    }

    const { preferences } = this.options
    this.phase = 'nagPending'
    this.nagVariant = resolveNagVariant(preferences)

    const fleeting = hasExplicitNagChoice(preferences)
    DismissLog.info('Showing settings nag', { variant: this.nagVariant, fleeting })
    this.options.onStateChange?.()

    if (fleeting) {
      this.schedule(this.options.nagAutoResolveMs, () => {
        this.requestDismiss({ delayed: false, ignoreNag: true })
      })
    }
  }

  private finish(completion?: () => void): void {
    DismissLog.info('Ending call screen', { screenId: this.options.screen.screenId })
    this.options.windowManager.endCall(this.options.screen)
    completion?.()
  }

  private schedule(delayMs: number, callback: () => void): void {
    const generation = this.generation
    const timer = setTimeout(() => {
      this.timers.delete(timer)
      if (generation !== this.generation) {
        return
      }
      callback()
    }, delayMs)
    this.timers.add(timer)
  }
}
