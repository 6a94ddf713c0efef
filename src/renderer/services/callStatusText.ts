import type { TranslateFn } from '../utils/i18n'
import type { CallSnapshot } from '@/types'

export function formatDuration(seconds: number): string {
  const h = Math.floor(seconds / 3600)
  const m = Math.floor((seconds % 3600) / 60)
  const s = seconds % 60

  if (h > 0) {
    return `${h}:${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')}`
  }
  return `${m}:${s.toString().padStart(2, '0')}`
}

export function getElapsedSeconds(connectedAt: number | null, now: number): number {
  if (connectedAt === null) {
    return 0
  }
  return Math.max(0, Math.floor((now - connectedAt) / 1000))
}

export function getCallStatusText(call: CallSnapshot, now: number, t: TranslateFn): string {
  switch (call.state) {
    case 'idle':
    case 'remoteHangup':
    case 'localHangup':
      return t('call.status.terminated')
    case 'dialing':
      return t('call.status.connecting')
    case 'remoteRinging':
    case 'localRinging':
      return t('call.status.ringing')
    case 'answering':
      return t('call.status.securing')
    case 'connected':
      return formatDuration(getElapsedSeconds(call.connectedAt, now))
    case 'remoteBusy':
      return t('call.status.busy')
    case 'localFailure':
      if (call.lastError?.kind === 'timeout' && call.direction === 'outgoing') {
        return t('call.status.noAnswer')
      }
      return t('call.status.failed')
  }
}
