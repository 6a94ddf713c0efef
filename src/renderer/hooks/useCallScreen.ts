/**
 * useCallScreen Hook
 * Binds a CallScreenController to React rendering. Re-renders whenever the
 * projected call screen state changes.
 */

import { useState, useEffect, useCallback } from 'react'
import type { AudioSourceAction, CallScreenController } from '../controller/CallScreenController'
import type { AudioSource, UIStateSnapshot } from '@/types'

export interface UseCallScreenResult {
  uiState: UIStateSnapshot
  hangup: () => void
  toggleMute: () => void
  toggleVideo: () => void
  answer: () => void
  decline: () => void
  pressAudioSource: () => AudioSourceAction
  selectAudioSource: (source: AudioSource) => void
  showCallSettings: () => void
  dismissNag: () => void
  tapRoot: () => void
}

export function useCallScreen(controller: CallScreenController): UseCallScreenResult {
  const [uiState, setUiState] = useState<UIStateSnapshot>(() => controller.getState())

  useEffect(() => {
    // The controller may have moved on between render and subscription
    setUiState(controller.getState())
    return controller.subscribe(setUiState)
  }, [controller])

  const hangup = useCallback(() => controller.pressHangup(), [controller])
  const toggleMute = useCallback(() => controller.pressMute(), [controller])
  const toggleVideo = useCallback(() => controller.pressVideo(), [controller])
  const answer = useCallback(() => controller.pressAnswer(), [controller])
  const decline = useCallback(() => controller.pressDecline(), [controller])
  const pressAudioSource = useCallback(() => controller.pressAudioSource(), [controller])
  const selectAudioSource = useCallback((source: AudioSource) => {
    controller.selectAudioSource(source)
  }, [controller])
  const showCallSettings = useCallback(() => controller.pressShowCallSettings(), [controller])
  const dismissNag = useCallback(() => controller.pressDismissNag(), [controller])
  const tapRoot = useCallback(() => controller.handleRootTap(), [controller])

  return {
    uiState,
    hangup,
    toggleMute,
    toggleVideo,
    answer,
    decline,
    pressAudioSource,
    selectAudioSource,
    showCallSettings,
    dismissNag,
    tapRoot
  }
}
