import { UILog } from '../utils/Logger'

/**
 * Periodic refresh of the connected-call duration. Only one interval is ever live.
 */
export class DurationTicker {
  private interval: ReturnType<typeof setInterval> | null = null

  constructor(
    private readonly intervalMs: number,
    private readonly onTick: () => void
  ) {}

  get isRunning(): boolean {
    return this.interval !== null
  }

  start(): void {
    if (this.interval !== null) {
      return
    }
    UILog.debug('Duration ticker started', { intervalMs: this.intervalMs })
    this.interval = setInterval(this.onTick, this.intervalMs)
  }

  stop(): void {
    if (this.interval === null) {
      return
    }
    clearInterval(this.interval)
    this.interval = null
    UILog.debug('Duration ticker stopped')
  }
}
