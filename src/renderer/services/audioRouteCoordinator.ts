import { AudioLog } from '../utils/Logger'
import type { TranslateFn } from '../utils/i18n'
import type { AudioService, AudioSource, AudioSourcePickerEntry } from '@/types'

/**
 * Built-in mic and speaker are always reported; any further source is an
 * attached device such as a bluetooth headset.
 */
const BUILT_IN_SOURCE_COUNT = 2

export function isSourceAppropriateForVideo(source: AudioSource): boolean {
  // The receiver (built-in mic route) is unusable while the camera is on
  return source.kind === 'builtInSpeaker' || source.kind === 'externalDevice'
}

export function getAudioSourceLabel(source: AudioSource, t: TranslateFn): string {
  switch (source.kind) {
    case 'builtInMic': return t('call.audioSource.builtInMic')
    case 'builtInSpeaker': return t('call.audioSource.builtInSpeaker')
    case 'externalDevice': return source.displayName
  }
}

/**
 * Accumulates every audio source seen during one call screen's lifetime.
 *
 * Sources are never removed: availability arrives asynchronously and a transient
 * session reconfiguration may briefly report fewer devices. A device unpaired
 * mid-call therefore stays listed until the next call.
 */
export class AudioRouteCoordinator {
  private readonly pool = new Map<string, AudioSource>()

  constructor(private readonly audioService: AudioService) {}

  get size(): number {
    return this.pool.size
  }

  observe(availableSources: Iterable<AudioSource>): void {
    const before = this.pool.size
    for (const source of availableSources) {
      if (!this.pool.has(source.descriptor)) {
        this.pool.set(source.descriptor, source)
      }
    }

    if (this.pool.size !== before) {
      AudioLog.info('Audio source pool grew', {
        added: this.pool.size - before,
        sources: Array.from(this.pool.keys())
      })
    }
  }

  allSources(): AudioSource[] {
    return Array.from(this.pool.values())
  }

  appropriateSources(hasLocalVideo: boolean): AudioSource[] {
    const sources = this.allSources()
    return hasLocalVideo ? sources.filter(isSourceAppropriateForVideo) : sources
  }

  hasAlternateSources(): boolean {
    return this.pool.size > BUILT_IN_SOURCE_COUNT
  }

  select(source: AudioSource | null): void {
    AudioLog.info('Selecting audio source', { descriptor: source?.descriptor ?? null })
    this.audioService.setAudioSource(source)
  }

  buildPickerEntries(
    hasLocalVideo: boolean,
    current: AudioSource | null,
    t: TranslateFn
  ): AudioSourcePickerEntry[] {
    return this.appropriateSources(hasLocalVideo).map((source) => ({
      source,
      label: getAudioSourceLabel(source, t),
      checked: current !== null && current.descriptor === source.descriptor
    }))
  }
}
