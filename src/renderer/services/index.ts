export { AudioRouteCoordinator, isSourceAppropriateForVideo, getAudioSourceLabel } from './audioRouteCoordinator'
export { VideoTrackBinder } from './videoTrackBinder'
export { formatDuration, getElapsedSeconds, getCallStatusText } from './callStatusText'
export { projectUiState, isSameUiState, type ProjectorInput } from './uiStateProjector'
export {
  shouldShowSettingsNag,
  resolveNagVariant,
  hasExplicitNagChoice,
  markSettingsNagAsComplete
} from './settingsNag'
export {
  DismissalPolicy,
  getDismissRequestForState,
  type DismissalPhase,
  type DismissRequest,
  type DismissalPolicyOptions
} from './dismissalPolicy'
export { DurationTicker } from './durationTicker'
