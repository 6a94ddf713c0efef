/**
 * Global type declarations
 */

/**
 * Call lifecycle states, supplied by the call model
 */
export type CallState =
  | 'idle'
  | 'dialing'
  | 'localRinging'
  | 'remoteRinging'
  | 'answering'
  | 'connected'
  | 'remoteBusy'
  | 'localFailure'
  | 'remoteHangup'
  | 'localHangup'

export type CallDirection = 'incoming' | 'outgoing'

export type CallErrorKind = 'timeout' | 'failure'

export interface CallError {
  kind: CallErrorKind
  description?: string
}

/**
 * One observation of the call. Replaced wholesale on every notification.
 */
export interface CallSnapshot {
  readonly state: CallState
  readonly isMuted: boolean
  readonly hasLocalVideo: boolean
  readonly isOnHold: boolean
  readonly direction: CallDirection
  readonly connectedAt: number | null // epoch ms
  readonly lastError: CallError | null
}

/**
 * Audio input/output route
 */
export type AudioSourceKind = 'builtInMic' | 'builtInSpeaker' | 'externalDevice'

export interface AudioSource {
  kind: AudioSourceKind
  descriptor: string
  displayName: string
}

export interface AudioSourcePickerEntry {
  source: AudioSource
  label: string
  checked: boolean
}

/**
 * Video track handle. Compared by reference.
 */
export interface VideoTrack {
  readonly id: string
}

export interface VideoSurface {
  attach(track: VideoTrack): void
  detach(track: VideoTrack): void
  clear(): void
}

export interface VideoVisibility {
  hasLocalVideoVisible: boolean
  hasRemoteVideoVisible: boolean
}

export type SettingsNagVariant = 'all' | 'privacy'

export interface DismissalState {
  hasDismissed: boolean
  isShowingNag: boolean
  nagVariant: SettingsNagVariant | null
}

export type AudioSourceIcon = 'speaker' | 'bluetoothAudioMode' | 'bluetoothVideoMode'

export interface AudioSourceButtonState {
  visible: boolean
  selected: boolean
  icon: AudioSourceIcon
}

/**
 * Derived visibility/enablement for every control group
 */
export interface UIStateSnapshot {
  statusText: string
  showIncomingControls: boolean
  showOngoingControls: boolean
  showSettingsNag: boolean
  settingsNagText: string | null
  contactAvatarHidden: boolean
  contactNameMarqueeEnabled: boolean
  muteButtonsSelected: boolean
  videoModeButtonsSelected: boolean
  audioModeControlsHidden: boolean
  videoModeControlsHidden: boolean
  remoteControlsHidden: boolean
  localVideoHidden: boolean
  remoteVideoHidden: boolean
  audioSourceButton: AudioSourceButtonState
}

// ============================================
// Collaborators
// ============================================

export interface CallObserver {
  stateDidChange(snapshot: CallSnapshot): void
  muteDidChange(snapshot: CallSnapshot): void
  hasLocalVideoDidChange(snapshot: CallSnapshot): void
  holdDidChange(snapshot: CallSnapshot): void
  audioSourceDidChange(snapshot: CallSnapshot, source: AudioSource | null): void
}

export interface CallSession {
  getSnapshot(): CallSnapshot
  addObserver(observer: CallObserver): void
  removeObserver(observer: CallObserver): void
}

export interface CallActions {
  answerCall(): void
  declineCall(): void
  localHangupCall(): void
  setIsMuted(isMuted: boolean): void
  setHasLocalVideo(hasLocalVideo: boolean): void
}

export interface AudioServiceDelegate {
  didChangeAudioSession(): void
  didUpdateSpeakerphone(isEnabled: boolean): void
}

export interface AudioService {
  delegate: AudioServiceDelegate | null
  availableInputs(): AudioSource[]
  currentAudioSource(): AudioSource | null
  isSpeakerphoneEnabled(): boolean
  requestSpeakerphone(isEnabled: boolean): void
  setAudioSource(source: AudioSource | null): void
}

/**
 * Opaque handle the window manager uses to identify the screen being torn down
 */
export interface CallScreenHandle {
  readonly screenId: string
}

export interface WindowManager {
  endCall(screen: CallScreenHandle): void
  leaveCallView(): void
}

export interface CallIntegrationPreferences {
  isCallIntegrationEnabled(): boolean
  setCallIntegrationEnabled(value: boolean): void
  isCallIntegrationEnabledSet(): boolean
  isCallIntegrationPrivacyEnabled(): boolean
  setCallIntegrationPrivacyEnabled(value: boolean): void
  isCallIntegrationPrivacySet(): boolean
}

export interface PlatformCapabilities {
  supportsCallIntegrationNag: boolean
}

export interface SettingsNavigator {
  showPrivacySettings(): void
}
