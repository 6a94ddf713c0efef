import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CallScreenController } from '../renderer/controller/CallScreenController'
import { logger } from '../renderer/utils/Logger'
import { CallScreenPreconditionError } from '../renderer/utils/precondition'
import {
  FakeCallSession,
  FakePreferences,
  HEADSET,
  MIC,
  SPEAKER,
  createCallActions,
  createCallScreenHarness,
  createSettingsNavigator,
  createSurface,
  makeSnapshot,
  makeTrack
} from './helpers/callScreenTestUtils'

const START = new Date('2024-03-01T10:00:00.000Z').getTime()

describe('CallScreenController', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(START)
  })

  afterEach(() => {
    vi.clearAllTimers()
    vi.useRealTimers()
  })

  describe('lifecycle', () => {
    it('projects a complete state before start', () => {
      const { controller } = createCallScreenHarness({ snapshot: { state: 'dialing' } })

      expect(controller.getState().statusText).toBe('Connecting…')
      expect(controller.getState().showOngoingControls).toBe(true)
    })

    it('subscribes to the call and the audio service on start', () => {
      const { controller, call, audioService } = createCallScreenHarness()

      controller.start()

      expect(call.observers.has(controller)).toBe(true)
      expect(audioService.delegate).toBe(controller)
    })

    it('refuses to start twice', () => {
      const { controller } = createCallScreenHarness()
      controller.start()

      expect(() => controller.start()).toThrow(CallScreenPreconditionError)
    })

    it('refuses to start while another screen owns the audio delegate', () => {
      const { controller, audioService } = createCallScreenHarness()
      audioService.delegate = { didChangeAudioSession: vi.fn(), didUpdateSpeakerphone: vi.fn() }

      expect(() => controller.start()).toThrow('audio service already has a delegate')
    })

    it('rejects user actions before start and after stop', () => {
      const { controller, actions } = createCallScreenHarness()

      expect(() => controller.pressMute()).toThrow(CallScreenPreconditionError)

      controller.start()
      controller.stop()

      expect(() => controller.pressAnswer()).toThrow('pressAnswer called on a call screen that is not running')
      expect(actions.answerCall).not.toHaveBeenCalled()
    })

    it('leaves the shared log level alone unless one is configured', () => {
      logger.setLogLevel('warn')

      createCallScreenHarness()
      expect(logger.getLogLevel()).toBe('warn')

      createCallScreenHarness({ config: { logLevel: 'error' } })
      expect(logger.getLogLevel()).toBe('error')
    })

    it('releases every subscription and binding on stop', () => {
      const { controller, call, audioService, localSurface, i18n } = createCallScreenHarness({
        snapshot: { state: 'connected', connectedAt: START }
      })
      const listener = vi.fn()
      controller.start()
      controller.subscribe(listener)
      const local = makeTrack('local-1')
      controller.didUpdateVideoTracks(local, null)
      listener.mockClear()

      controller.stop()
      i18n.setLanguage('zh-CN')
      vi.advanceTimersByTime(5000)

      expect(call.observers.size).toBe(0)
      expect(audioService.delegate).toBeNull()
      expect(controller.isDurationTickRunning()).toBe(false)
      expect(localSurface.detach).toHaveBeenCalledWith(local)
      expect(listener).not.toHaveBeenCalled()
    })
  })

  describe('call events', () => {
    it('re-projects on mute and local video changes', () => {
      const { controller, call } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()

      call.setMuted(true)
      expect(controller.getState().muteButtonsSelected).toBe(true)

      call.setHasLocalVideo(true)
      expect(controller.getState().videoModeButtonsSelected).toBe(true)
      expect(controller.getState().contactNameMarqueeEnabled).toBe(false)
    })

    it('switches to incoming controls while ringing locally', () => {
      const { controller, call } = createCallScreenHarness({ snapshot: { direction: 'incoming' } })
      controller.start()

      call.transition({ state: 'localRinging' })
      expect(controller.getState().showIncomingControls).toBe(true)
      expect(controller.getState().showOngoingControls).toBe(false)

      call.transition({ state: 'answering' })
      expect(controller.getState().showIncomingControls).toBe(false)
      expect(controller.getState().statusText).toBe('Securing…')
    })

    it('ticks the duration while connected and notifies once per displayed second', () => {
      const { controller, call } = createCallScreenHarness({ snapshot: { state: 'answering' } })
      const listener = vi.fn()
      controller.start()
      controller.subscribe(listener)

      call.transition({ state: 'connected', connectedAt: START })
      expect(controller.isDurationTickRunning()).toBe(true)
      expect(controller.getState().statusText).toBe('0:00')
      listener.mockClear()

      vi.advanceTimersByTime(45_000)

      expect(controller.getState().statusText).toBe('0:45')
      expect(listener).toHaveBeenCalledTimes(45)
      expect(listener).toHaveBeenLastCalledWith(expect.objectContaining({ statusText: '0:45' }))
    })

    it('stops the duration tick when the call leaves the connected state', () => {
      const { controller, call } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()
      expect(controller.isDurationTickRunning()).toBe(true)

      call.transition({ state: 'remoteHangup' })

      expect(controller.isDurationTickRunning()).toBe(false)
      expect(controller.getState().statusText).toBe('Call ended')
    })

    it('takes the snapshot from hold and audio source notifications', () => {
      const { controller, call } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()

      controller.holdDidChange({ ...call.snapshot, isOnHold: true, isMuted: true })
      expect(controller.getState().muteButtonsSelected).toBe(true)

      controller.audioSourceDidChange({ ...call.snapshot, hasLocalVideo: true }, SPEAKER)
      expect(controller.getState().muteButtonsSelected).toBe(false)
      expect(controller.getState().videoModeButtonsSelected).toBe(true)
    })

    it('re-projects when the language changes', () => {
      const { controller, i18n } = createCallScreenHarness({ snapshot: { state: 'remoteBusy' } })
      controller.start()

      i18n.setLanguage('zh-CN')

      expect(controller.getState().statusText).toBe('对方忙')
    })
  })

  describe('dismissal', () => {
    it('dismisses after the delay when the remote side hangs up', () => {
      const { controller, call, windowManager } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()

      call.transition({ state: 'remoteHangup' })
      expect(controller.getDismissalState().hasDismissed).toBe(true)
      expect(windowManager.endCall).not.toHaveBeenCalled()

      vi.advanceTimersByTime(100)
      controller.pressHangup()
      expect(windowManager.endCall).not.toHaveBeenCalled()

      vi.advanceTimersByTime(1400)
      expect(windowManager.endCall).toHaveBeenCalledTimes(1)
      expect(windowManager.endCall).toHaveBeenCalledWith(controller)
    })

    it('dismisses immediately on a local hangup', () => {
      const { controller, call, windowManager } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()

      call.transition({ state: 'localHangup' })

      expect(windowManager.endCall).toHaveBeenCalledTimes(1)
    })

    it('calls endCall once when hangup is pressed and the hangup state follows', () => {
      const { controller, call, actions, windowManager, audioService } = createCallScreenHarness({
        snapshot: { state: 'connected', connectedAt: START }
      })
      controller.start()

      controller.pressHangup()
      call.transition({ state: 'localHangup' })

      expect(actions.localHangupCall).toHaveBeenCalledTimes(1)
      expect(windowManager.endCall).toHaveBeenCalledTimes(1)
      expect(audioService.delegate).toBeNull()
      expect(controller.isDurationTickRunning()).toBe(false)
    })

    it('dismisses a screen that starts in a terminal state', () => {
      const { controller, windowManager } = createCallScreenHarness({ snapshot: { state: 'localHangup' } })

      controller.start()

      expect(windowManager.endCall).toHaveBeenCalledTimes(1)
    })

    it('never revives a screen stopped during the dismissal delay', () => {
      const { controller, call, windowManager } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()

      call.transition({ state: 'remoteBusy' })
      controller.stop()
      vi.advanceTimersByTime(2000)

      expect(windowManager.endCall).not.toHaveBeenCalled()
    })

    it('dismisses on decline and on text message', () => {
      const declined = createCallScreenHarness({ snapshot: { state: 'localRinging', direction: 'outgoing' } })
      declined.controller.start()
      declined.controller.pressDecline()
      expect(declined.actions.declineCall).toHaveBeenCalledTimes(1)
      expect(declined.windowManager.endCall).toHaveBeenCalledTimes(1)

      const texted = createCallScreenHarness({ snapshot: { state: 'localRinging', direction: 'outgoing' } })
      texted.controller.start()
      texted.controller.pressTextMessage()
      expect(texted.windowManager.endCall).toHaveBeenCalledTimes(1)
    })
  })

  describe('settings nag', () => {
    function createNagHarness(preferences: FakePreferences) {
      return createCallScreenHarness({
        snapshot: { state: 'connected', direction: 'incoming', connectedAt: START },
        preferences
      })
    }

    it('shows the nag instead of ending a first-time incoming call', () => {
      const { controller, call, windowManager } = createNagHarness(new FakePreferences({ enabled: false }))
      controller.start()

      call.transition({ state: 'localHangup' })

      const state = controller.getState()
      expect(windowManager.endCall).not.toHaveBeenCalled()
      expect(state.showSettingsNag).toBe(true)
      expect(state.showOngoingControls).toBe(false)
      expect(state.showIncomingControls).toBe(false)
      expect(state.contactAvatarHidden).toBe(true)
      expect(state.settingsNagText).toBe(
        'You can enable call integration and show caller names in your privacy settings.'
      )
    })

    it('frees the audio delegate while the nag is up so the next screen can start', () => {
      const { controller, call, audioService, windowManager } = createNagHarness(new FakePreferences({ enabled: false }))
      controller.start()

      call.transition({ state: 'localHangup' })
      expect(controller.getState().showSettingsNag).toBe(true)
      expect(audioService.delegate).toBeNull()

      const next = new CallScreenController({
        call: new FakeCallSession(makeSnapshot({ state: 'localRinging', direction: 'incoming' })),
        actions: createCallActions(),
        audioService,
        windowManager,
        preferences: new FakePreferences(),
        platform: { supportsCallIntegrationNag: true },
        settingsNavigator: createSettingsNavigator(),
        localSurface: createSurface(),
        remoteSurface: createSurface(),
        screenId: 'next-screen'
      })

      expect(() => next.start()).not.toThrow()
      expect(audioService.delegate).toBe(next)

      controller.pressDismissNag()
      expect(audioService.delegate).toBe(next)
      expect(windowManager.endCall).toHaveBeenCalledWith(controller)
      next.stop()
    })

    it('ends the call after the user dismisses the nag', () => {
      const preferences = new FakePreferences({ enabled: false })
      const { controller, call, windowManager } = createNagHarness(preferences)
      controller.start()
      call.transition({ state: 'localHangup' })

      controller.pressDismissNag()

      expect(preferences.isCallIntegrationEnabledSet()).toBe(true)
      expect(preferences.isCallIntegrationPrivacySet()).toBe(true)
      expect(windowManager.endCall).toHaveBeenCalledTimes(1)
      expect(controller.getState().showSettingsNag).toBe(false)
    })

    it('opens privacy settings after the screen is gone', () => {
      const { controller, call, windowManager, settingsNavigator } = createNagHarness(new FakePreferences({ enabled: false }))
      const order: string[] = []
      windowManager.endCall.mockImplementation(() => { order.push('endCall') })
      settingsNavigator.showPrivacySettings.mockImplementation(() => { order.push('showPrivacySettings') })
      controller.start()
      call.transition({ state: 'remoteHangup' })

      controller.pressShowCallSettings()

      expect(order).toEqual(['endCall', 'showPrivacySettings'])
    })

    it('lets a fleeting nag resolve itself', () => {
      const { controller, call, windowManager } = createNagHarness(
        new FakePreferences({ enabled: true, privacy: true, enabledSet: true })
      )
      controller.start()
      call.transition({ state: 'remoteHangup' })
      expect(controller.getState().settingsNagText).toBe(
        'You can show the name and number of incoming calls in your privacy settings.'
      )

      vi.advanceTimersByTime(5000)

      expect(windowManager.endCall).toHaveBeenCalledTimes(1)
    })

    it('does not nag on platforms without the integration', () => {
      const { controller, call, windowManager } = createCallScreenHarness({
        snapshot: { state: 'connected', direction: 'incoming', connectedAt: START },
        preferences: new FakePreferences({ enabled: false }),
        supportsCallIntegrationNag: false
      })
      controller.start()

      call.transition({ state: 'localHangup' })

      expect(windowManager.endCall).toHaveBeenCalledTimes(1)
    })
  })

  describe('audio routing', () => {
    it('toggles speakerphone when only built-in routes exist', () => {
      const { controller, audioService } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()

      expect(controller.pressAudioSource()).toEqual({ type: 'speakerphone', enabled: true })
      expect(audioService.requestSpeakerphone).toHaveBeenCalledWith(true)

      controller.didUpdateSpeakerphone(true)
      expect(controller.getState().audioSourceButton).toEqual({ visible: true, selected: true, icon: 'speaker' })
    })

    it('shows a requested speakerphone change before the audio service confirms it', () => {
      const { controller, audioService } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      audioService.requestSpeakerphone.mockImplementation(() => {})
      const listener = vi.fn()
      controller.start()
      controller.subscribe(listener)

      expect(controller.pressAudioSource()).toEqual({ type: 'speakerphone', enabled: true })
      expect(controller.getState().audioSourceButton.selected).toBe(true)
      expect(listener).toHaveBeenCalledTimes(1)

      expect(controller.pressAudioSource()).toEqual({ type: 'speakerphone', enabled: false })
      expect(audioService.requestSpeakerphone).toHaveBeenLastCalledWith(false)
      expect(controller.getState().audioSourceButton.selected).toBe(false)

      controller.pressAudioSource()
      expect(controller.getState().audioSourceButton.selected).toBe(true)
      controller.didUpdateSpeakerphone(false)
      expect(controller.getState().audioSourceButton.selected).toBe(false)
    })

    it('opens the picker once a headset has been seen', () => {
      const { controller, audioService } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()

      audioService.inputs = [MIC, SPEAKER, HEADSET]
      controller.didChangeAudioSession()
      audioService.current = SPEAKER

      expect(controller.getState().audioSourceButton).toEqual({ visible: true, selected: false, icon: 'bluetoothAudioMode' })
      expect(controller.pressAudioSource()).toEqual({
        type: 'picker',
        entries: [
          { source: MIC, label: 'Phone', checked: false },
          { source: SPEAKER, label: 'Speaker', checked: true },
          { source: HEADSET, label: 'Test Headset', checked: false }
        ]
      })
      expect(audioService.requestSpeakerphone).not.toHaveBeenCalled()
    })

    it('keeps a headset listed after the session stops reporting it', () => {
      const { controller, audioService } = createCallScreenHarness({
        snapshot: { state: 'connected', connectedAt: START },
        inputs: [MIC, SPEAKER, HEADSET]
      })
      controller.start()

      audioService.inputs = [MIC, SPEAKER]
      controller.didChangeAudioSession()

      expect(controller.getAudioSourcePickerEntries().map(entry => entry.source)).toEqual([MIC, SPEAKER, HEADSET])
    })

    it('offers only video-capable routes during a video call', () => {
      const { controller, call } = createCallScreenHarness({
        snapshot: { state: 'connected', connectedAt: START },
        inputs: [MIC, SPEAKER, HEADSET]
      })
      controller.start()
      call.setHasLocalVideo(true)

      expect(controller.getAudioSourcePickerEntries().map(entry => entry.source)).toEqual([SPEAKER, HEADSET])
    })

    it('routes the chosen source through the audio service', () => {
      const { controller, audioService } = createCallScreenHarness({ inputs: [MIC, SPEAKER, HEADSET] })
      controller.start()

      controller.selectAudioSource(HEADSET)

      expect(audioService.setAudioSource).toHaveBeenCalledWith(HEADSET)
    })
  })

  describe('video and gestures', () => {
    it('binds video tracks and swaps control groups', () => {
      const { controller, localSurface } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()
      const local = makeTrack('local-1')

      controller.didUpdateVideoTracks(local, null)
      controller.didUpdateVideoTracks(local, null)

      expect(localSurface.attach).toHaveBeenCalledTimes(1)
      expect(controller.getState().audioModeControlsHidden).toBe(true)
      expect(controller.getState().videoModeControlsHidden).toBe(false)
      expect(controller.getState().localVideoHidden).toBe(false)
    })

    it('toggles hidden controls on a root tap only while remote video plays', () => {
      const { controller, windowManager } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()

      controller.handleRootTap()
      expect(controller.getState().remoteControlsHidden).toBe(false)
      expect(windowManager.leaveCallView).toHaveBeenCalledTimes(1)

      controller.didUpdateVideoTracks(null, makeTrack('remote-1'))
      controller.handleRootTap()
      expect(controller.getState().remoteControlsHidden).toBe(true)

      controller.handleRootTap()
      expect(controller.getState().remoteControlsHidden).toBe(false)
      expect(windowManager.leaveCallView).toHaveBeenCalledTimes(3)
    })

    it('shows controls again when a new remote track arrives', () => {
      const { controller } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()
      controller.didUpdateVideoTracks(null, makeTrack('remote-1'))
      controller.handleRootTap()
      expect(controller.getState().remoteControlsHidden).toBe(true)

      controller.didUpdateVideoTracks(null, makeTrack('remote-2'))

      expect(controller.getState().remoteControlsHidden).toBe(false)
    })

    it('shows controls again when the app becomes active', () => {
      const { controller } = createCallScreenHarness({ snapshot: { state: 'connected', connectedAt: START } })
      controller.start()
      controller.didUpdateVideoTracks(null, makeTrack('remote-1'))
      controller.handleRootTap()

      controller.didBecomeActive()

      expect(controller.getState().remoteControlsHidden).toBe(false)
    })

    it('leaves the call view on the dedicated tap', () => {
      const { controller, windowManager } = createCallScreenHarness()
      controller.start()

      controller.handleLeaveCallViewTap()

      expect(windowManager.leaveCallView).toHaveBeenCalledTimes(1)
    })
  })

  describe('call actions', () => {
    it('forwards toggles from the current snapshot', () => {
      const { controller, actions } = createCallScreenHarness({
        snapshot: { state: 'connected', connectedAt: START, isMuted: true, hasLocalVideo: false }
      })
      controller.start()

      controller.pressMute()
      controller.pressVideo()
      controller.pressAnswer()

      expect(actions.setIsMuted).toHaveBeenCalledWith(false)
      expect(actions.setHasLocalVideo).toHaveBeenCalledWith(true)
      expect(actions.answerCall).toHaveBeenCalledTimes(1)
    })
  })
})
