import type { TranslateFn } from '../utils/i18n'
import { getCallStatusText } from './callStatusText'
import type {
  AudioSourceButtonState,
  CallSnapshot,
  DismissalState,
  SettingsNagVariant,
  UIStateSnapshot,
  VideoVisibility
} from '@/types'

export interface ProjectorInput {
  call: CallSnapshot
  dismissal: DismissalState
  video: VideoVisibility
  hasAlternateSources: boolean
  isSpeakerphoneEnabled: boolean
  /** Set by a tap on the screen while remote video plays */
  controlsHiddenByUser: boolean
  now: number
  t: TranslateFn
}

const NAG_TEXT_KEYS: Record<SettingsNagVariant, string> = {
  all: 'call.nag.descriptionAll',
  privacy: 'call.nag.descriptionPrivacy'
}

function projectAudioSourceButton(input: ProjectorInput): AudioSourceButtonState {
  const { hasLocalVideoVisible } = input.video

  if (input.hasAlternateSources) {
    // Opens a picker, so it never stays selected
    return {
      visible: true,
      selected: false,
      icon: hasLocalVideoVisible ? 'bluetoothVideoMode' : 'bluetoothAudioMode'
    }
  }

  // Video calls always use the speaker; the button would only take up room
  return {
    visible: !hasLocalVideoVisible,
    selected: input.isSpeakerphoneEnabled && !input.call.hasLocalVideo,
    icon: 'speaker'
  }
}

/**
 * Derives the whole call screen state. Pure: safe to call after every single
 * field change.
 */
export function projectUiState(input: ProjectorInput): UIStateSnapshot {
  const { call, dismissal, video, t } = input
  const isShowingNag = dismissal.isShowingNag

  const isRinging = call.state === 'localRinging'

  return {
    statusText: getCallStatusText(call, input.now, t),
    showIncomingControls: !isShowingNag && isRinging,
    showOngoingControls: !isShowingNag && !isRinging,
    showSettingsNag: isShowingNag,
    settingsNagText: isShowingNag && dismissal.nagVariant ? t(NAG_TEXT_KEYS[dismissal.nagVariant]) : null,
    contactAvatarHidden: isShowingNag || video.hasRemoteVideoVisible,
    contactNameMarqueeEnabled: !call.hasLocalVideo,
    muteButtonsSelected: call.isMuted,
    videoModeButtonsSelected: call.hasLocalVideo,
    audioModeControlsHidden: video.hasLocalVideoVisible,
    videoModeControlsHidden: !video.hasLocalVideoVisible,
    remoteControlsHidden: video.hasRemoteVideoVisible && input.controlsHiddenByUser,
    localVideoHidden: !video.hasLocalVideoVisible,
    remoteVideoHidden: !video.hasRemoteVideoVisible,
    audioSourceButton: projectAudioSourceButton(input)
  }
}

function isShallowEqual(a: object, b: object): boolean {
  const entriesA = Object.entries(a)
  const valuesB = new Map(Object.entries(b))
  return entriesA.length === valuesB.size &&
    entriesA.every(([key, value]) => valuesB.has(key) && Object.is(valuesB.get(key), value))
}

/**
 * Field-wise comparison over the snapshot's keys, one level into the audio
 * source button.
 */
export function isSameUiState(a: UIStateSnapshot, b: UIStateSnapshot): boolean {
  const { audioSourceButton: buttonA, ...restA } = a
  const { audioSourceButton: buttonB, ...restB } = b
  return isShallowEqual(restA, restB) && isShallowEqual(buttonA, buttonB)
}
