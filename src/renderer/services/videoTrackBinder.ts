import { VideoLog } from '../utils/Logger'
import type { VideoSurface, VideoTrack, VideoVisibility } from '@/types'

type TrackSlot = 'local' | 'remote'

interface VideoTrackBinderOptions {
  localSurface: VideoSurface
  remoteSurface: VideoSurface
  onRemoteTrackChanged?: (track: VideoTrack | null) => void
}

/**
 * Binds at most one local and one remote track to their render surfaces.
 * Rebinding the track that is already bound does nothing.
 */
export class VideoTrackBinder {
  private localTrack: VideoTrack | null = null
  private remoteTrack: VideoTrack | null = null

  constructor(private readonly options: VideoTrackBinderOptions) {}

  getVisibility(): VideoVisibility {
    return {
      hasLocalVideoVisible: this.localTrack !== null,
      hasRemoteVideoVisible: this.remoteTrack !== null
    }
  }

  bindLocal(track: VideoTrack | null): boolean {
    if (track === this.localTrack) {
      return false
    }
    this.swap('local', this.options.localSurface, this.localTrack, track)
    this.localTrack = track
    return true
  }

  bindRemote(track: VideoTrack | null): boolean {
    if (track === this.remoteTrack) {
      return false
    }
    this.swap('remote', this.options.remoteSurface, this.remoteTrack, track)
    this.remoteTrack = track
    this.options.onRemoteTrackChanged?.(track)
    return true
  }

  release(): void {
    this.bindLocal(null)
    this.bindRemote(null)
  }

  private swap(
    slot: TrackSlot,
    surface: VideoSurface,
    previous: VideoTrack | null,
    next: VideoTrack | null
  ): void {
    if (previous) {
      surface.detach(previous)
    }
    surface.clear()
    if (next) {
      surface.attach(next)
    }

    VideoLog.info('Video track rebound', {
      slot,
      previousTrackId: previous?.id ?? null,
      trackId: next?.id ?? null
    })
  }
}
