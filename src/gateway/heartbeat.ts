/**
 * Heartbeat scheduler for one gateway connection.
 *
 * Dormant until the gateway's `hello` announces an interval. Once started it
 * fires every interval: the first fire sends a heartbeat and marks it
 * pending; if the next fire finds the previous heartbeat still unacknowledged
 * the connection is considered dead and `onMissed` runs once, after which the
 * scheduler stops itself.
 */
export class HeartbeatScheduler {
  private timer: ReturnType<typeof setInterval> | null = null
  private ackPending = false
  private intervalMs: number | null = null

  constructor(
    private readonly onBeat: () => void,
    private readonly onMissed: (intervalMs: number) => void,
  ) {}

  /** Activate with the announced interval. Restarting resets liveness state. */
  start(intervalMs: number): void {
    this.stop()
    this.intervalMs = intervalMs
    this.ackPending = false
    this.timer = setInterval(() => this.fire(), intervalMs)
  }

  /** Clear the pending flag (heartbeat_ack received). */
  acknowledge(): void {
    this.ackPending = false
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  get isActive(): boolean {
    return this.timer !== null
  }

  get isAckPending(): boolean {
    return this.ackPending
  }

  private fire(): void {
    if (this.ackPending) {
      const intervalMs = this.intervalMs ?? 0
      this.stop()
      this.onMissed(intervalMs)
      return
    }
    this.ackPending = true
    this.onBeat()
  }
}
