/**
 * CallScreenController
 * Receives call, audio and video events, keeps the call screen entities current
 * and republishes the projected UI state. Terminal call states are routed
 * through the dismissal policy to the window manager.
 */

import { CallLog, AudioLog, UILog, logger } from '../utils/Logger'
import { i18n as defaultI18n, type I18n, type TranslateFn } from '../utils/i18n'
import { assertPrecondition } from '../utils/precondition'
import { resolveCallScreenConfig, type CallScreenConfig } from '../config/callScreenConfig'
import { AudioRouteCoordinator } from '../services/audioRouteCoordinator'
import { VideoTrackBinder } from '../services/videoTrackBinder'
import { DismissalPolicy, getDismissRequestForState } from '../services/dismissalPolicy'
import { DurationTicker } from '../services/durationTicker'
import { markSettingsNagAsComplete } from '../services/settingsNag'
import { isSameUiState, projectUiState } from '../services/uiStateProjector'
import type {
  AudioService,
  AudioServiceDelegate,
  AudioSource,
  AudioSourcePickerEntry,
  CallActions,
  CallIntegrationPreferences,
  CallObserver,
  CallScreenHandle,
  CallSession,
  CallSnapshot,
  DismissalState,
  PlatformCapabilities,
  SettingsNavigator,
  UIStateSnapshot,
  VideoSurface,
  VideoTrack,
  WindowManager
} from '@/types'

export interface CallScreenDependencies {
  call: CallSession
  actions: CallActions
  audioService: AudioService
  windowManager: WindowManager
  preferences: CallIntegrationPreferences
  platform: PlatformCapabilities
  settingsNavigator: SettingsNavigator
  localSurface: VideoSurface
  remoteSurface: VideoSurface
  i18n?: I18n
  config?: Partial<CallScreenConfig>
  screenId?: string
}

export type CallScreenListener = (state: UIStateSnapshot) => void

export type AudioSourceAction =
  | { type: 'picker'; entries: AudioSourcePickerEntry[] }
  | { type: 'speakerphone'; enabled: boolean }

type Lifecycle = 'created' | 'started' | 'stopped'

let screenCounter = 0

export class CallScreenController implements CallObserver, AudioServiceDelegate, CallScreenHandle {
  readonly screenId: string

  private readonly deps: CallScreenDependencies
  private readonly config: CallScreenConfig
  private readonly i18n: I18n
  private readonly t: TranslateFn
  private readonly audioRoutes: AudioRouteCoordinator
  private readonly videoBinder: VideoTrackBinder
  private readonly dismissal: DismissalPolicy
  private readonly ticker: DurationTicker
  private readonly listeners = new Set<CallScreenListener>()

  private lifecycle: Lifecycle = 'created'
  private snapshot: CallSnapshot
  private controlsHiddenByUser = false
  /** Requested speakerphone state until the audio service confirms it */
  private speakerphonePending: boolean | null = null
  private uiState: UIStateSnapshot
  private unsubscribeLanguage: (() => void) | null = null

  constructor(deps: CallScreenDependencies) {
    this.deps = deps
    this.config = resolveCallScreenConfig(deps.config)
    if (this.config.logLevel !== undefined) {
      logger.setLogLevel(this.config.logLevel)
    }

    screenCounter += 1
    this.screenId = deps.screenId ?? `call-screen-${screenCounter}`
    this.i18n = deps.i18n ?? defaultI18n
    this.t = (key, params) => this.i18n.t(key, params)
    this.snapshot = deps.call.getSnapshot()

    this.audioRoutes = new AudioRouteCoordinator(deps.audioService)
    this.audioRoutes.observe(deps.audioService.availableInputs())

    this.videoBinder = new VideoTrackBinder({
      localSurface: deps.localSurface,
      remoteSurface: deps.remoteSurface,
      // A fresh remote stream must not inherit a stale hidden-controls toggle
      onRemoteTrackChanged: () => {
        this.controlsHiddenByUser = false
      }
    })

    this.dismissal = new DismissalPolicy({
      screen: this,
      windowManager: deps.windowManager,
      preferences: deps.preferences,
      platform: deps.platform,
      getDirection: () => this.snapshot.direction,
      dismissDelayMs: this.config.dismissDelayMs,
      nagAutoResolveMs: this.config.nagAutoResolveMs,
      // A screen on its way out, nag or not, frees the slot for the next call
      onDismissRequested: () => this.releaseAudioDelegate(),
      onStateChange: () => this.refresh(),
      onDismissed: () => this.handleDismissed()
    })

    this.ticker = new DurationTicker(this.config.durationTickMs, () => this.refresh())
    this.uiState = this.project()
  }

  // ============================================
  // Lifecycle
  // ============================================

  start(): void {
    assertPrecondition(this.lifecycle === 'created', UILog, 'call screen started twice', {
      screenId: this.screenId,
      lifecycle: this.lifecycle
    })
    assertPrecondition(this.deps.audioService.delegate === null, AudioLog, 'audio service already has a delegate', {
      screenId: this.screenId
    })

    this.lifecycle = 'started'
    this.deps.call.addObserver(this)
    this.deps.audioService.delegate = this
    this.unsubscribeLanguage = this.i18n.subscribe(() => this.refresh())

    UILog.info('Call screen started', { screenId: this.screenId, state: this.snapshot.state })

    this.syncTicker()
    this.refresh()
    this.routeDismissal()
  }

  stop(): void {
    if (this.lifecycle === 'stopped') {
      return
    }
    this.lifecycle = 'stopped'

    this.deps.call.removeObserver(this)
    this.releaseAudioDelegate()
    this.unsubscribeLanguage?.()
    this.unsubscribeLanguage = null
    this.ticker.stop()
    this.videoBinder.release()
    this.dismissal.dispose()

    UILog.info('Call screen stopped', { screenId: this.screenId })
  }

  getState(): UIStateSnapshot {
    return this.uiState
  }

  getDismissalState(): DismissalState {
    return this.dismissal.getState()
  }

  isDurationTickRunning(): boolean {
    return this.ticker.isRunning
  }

  subscribe(listener: CallScreenListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ============================================
  // CallObserver
  // ============================================

  stateDidChange(snapshot: CallSnapshot): void {
    this.assertStarted('stateDidChange')
    CallLog.info('Call state changed', { from: this.snapshot.state, to: snapshot.state })
    this.snapshot = snapshot
    this.syncTicker()
    this.refresh()
    this.routeDismissal()
  }

  muteDidChange(snapshot: CallSnapshot): void {
    this.assertStarted('muteDidChange')
    this.snapshot = snapshot
    this.refresh()
  }

  hasLocalVideoDidChange(snapshot: CallSnapshot): void {
    this.assertStarted('hasLocalVideoDidChange')
    this.snapshot = snapshot
    this.refresh()
  }

  holdDidChange(snapshot: CallSnapshot): void {
    this.assertStarted('holdDidChange')
    this.snapshot = snapshot
    this.refresh()
  }

  audioSourceDidChange(snapshot: CallSnapshot, source: AudioSource | null): void {
    this.assertStarted('audioSourceDidChange')
    AudioLog.info('Audio source changed', { descriptor: source?.descriptor ?? null })
    this.snapshot = snapshot
    this.refresh()
  }

  // ============================================
  // AudioServiceDelegate
  // ============================================

  didChangeAudioSession(): void {
    this.assertStarted('didChangeAudioSession')
    this.audioRoutes.observe(this.deps.audioService.availableInputs())
    this.refresh()
  }

  didUpdateSpeakerphone(isEnabled: boolean): void {
    this.assertStarted('didUpdateSpeakerphone')
    AudioLog.debug('Speakerphone updated', { isEnabled, requested: this.speakerphonePending })
    this.speakerphonePending = null
    this.refresh()
  }

  // ============================================
  // Video
  // ============================================

  didUpdateVideoTracks(localTrack: VideoTrack | null, remoteTrack: VideoTrack | null): void {
    this.assertStarted('didUpdateVideoTracks')
    const localChanged = this.videoBinder.bindLocal(localTrack)
    const remoteChanged = this.videoBinder.bindRemote(remoteTrack)
    if (localChanged || remoteChanged) {
      this.refresh()
    }
  }

  // ============================================
  // App and gesture inputs
  // ============================================

  didBecomeActive(): void {
    this.assertStarted('didBecomeActive')
    this.controlsHiddenByUser = false
    this.refresh()
  }

  handleRootTap(): void {
    this.assertStarted('handleRootTap')
    if (this.videoBinder.getVisibility().hasRemoteVideoVisible) {
      this.controlsHiddenByUser = !this.controlsHiddenByUser
      this.refresh()
    }
    this.deps.windowManager.leaveCallView()
  }

  handleLeaveCallViewTap(): void {
    this.assertStarted('handleLeaveCallViewTap')
    this.deps.windowManager.leaveCallView()
  }

  // ============================================
  // User actions
  // ============================================

  /**
   * Ends a connected call. Not to be confused with pressDecline.
   */
  pressHangup(): void {
    this.assertStarted('pressHangup')
    UILog.info('Hangup pressed')
    this.deps.actions.localHangupCall()
    this.dismissal.requestDismiss({ delayed: false })
  }

  pressMute(): void {
    this.assertStarted('pressMute')
    this.deps.actions.setIsMuted(!this.snapshot.isMuted)
  }

  pressVideo(): void {
    this.assertStarted('pressVideo')
    this.deps.actions.setHasLocalVideo(!this.snapshot.hasLocalVideo)
  }

  pressAnswer(): void {
    this.assertStarted('pressAnswer')
    UILog.info('Answer pressed')
    this.deps.actions.answerCall()
  }

  /**
   * Rejects an incoming call that has not connected yet.
   */
  pressDecline(): void {
    this.assertStarted('pressDecline')
    UILog.info('Decline pressed')
    this.deps.actions.declineCall()
    this.dismissal.requestDismiss({ delayed: false })
  }

  pressAudioSource(): AudioSourceAction {
    this.assertStarted('pressAudioSource')

    if (this.audioRoutes.hasAlternateSources()) {
      return { type: 'picker', entries: this.getAudioSourcePickerEntries() }
    }

    const enabled = !this.isSpeakerphoneEnabled()
    AudioLog.info('Requesting speakerphone', { enabled })
    // The service switches routes asynchronously; show the request right away
    this.speakerphonePending = enabled
    this.deps.audioService.requestSpeakerphone(enabled)
    this.refresh()
    return { type: 'speakerphone', enabled }
  }

  getAudioSourcePickerEntries(): AudioSourcePickerEntry[] {
    return this.audioRoutes.buildPickerEntries(
      this.snapshot.hasLocalVideo,
      this.deps.audioService.currentAudioSource(),
      this.t
    )
  }

  selectAudioSource(source: AudioSource): void {
    this.assertStarted('selectAudioSource')
    this.audioRoutes.select(source)
  }

  pressTextMessage(): void {
    this.assertStarted('pressTextMessage')
    this.dismissal.requestDismiss({ delayed: false })
  }

  pressShowCallSettings(): void {
    this.assertStarted('pressShowCallSettings')
    markSettingsNagAsComplete(this.deps.preferences)
    this.dismissal.requestDismiss({
      delayed: false,
      ignoreNag: true,
      completion: () => this.deps.settingsNavigator.showPrivacySettings()
    })
  }

  pressDismissNag(): void {
    this.assertStarted('pressDismissNag')
    markSettingsNagAsComplete(this.deps.preferences)
    this.dismissal.requestDismiss({ delayed: false, ignoreNag: true })
  }

  // ============================================
  // Internals
  // ============================================

  private project(): UIStateSnapshot {
    return projectUiState({
      call: this.snapshot,
      dismissal: this.dismissal.getState(),
      video: this.videoBinder.getVisibility(),
      hasAlternateSources: this.audioRoutes.hasAlternateSources(),
      isSpeakerphoneEnabled: this.isSpeakerphoneEnabled(),
      controlsHiddenByUser: this.controlsHiddenByUser,
      now: this.config.now(),
      t: this.t
    })
  }

  private isSpeakerphoneEnabled(): boolean {
    return this.speakerphonePending ?? this.deps.audioService.isSpeakerphoneEnabled()
  }

  private refresh(): void {
    const next = this.project()
    const changed = !isSameUiState(this.uiState, next)
    this.uiState = next
    if (changed) {
      this.listeners.forEach(listener => listener(next))
    }
  }

  private syncTicker(): void {
    if (this.snapshot.state === 'connected' && !this.dismissal.getState().hasDismissed) {
      this.ticker.start()
    } else {
      this.ticker.stop()
    }
  }

  private routeDismissal(): void {
    const request = getDismissRequestForState(this.snapshot.state)
    if (!request) {
      return
    }
    CallLog.debug('Terminal call state, requesting dismissal', {
      state: this.snapshot.state,
      delayed: request.delayed
    })
    this.dismissal.requestDismiss(request)
  }

  private handleDismissed(): void {
    this.ticker.stop()
    this.releaseAudioDelegate()
  }

  private releaseAudioDelegate(): void {
    if (this.deps.audioService.delegate === this) {
      this.deps.audioService.delegate = null
    }
  }

  private assertStarted(operation: string): void {
    assertPrecondition(this.lifecycle === 'started', UILog, `${operation} called on a call screen that is not running`, {
      screenId: this.screenId,
      lifecycle: this.lifecycle
    })
  }
}
