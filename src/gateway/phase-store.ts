/**
 * Latest-value cell for the externally visible session phase.
 *
 * Single writer (the session loop), any number of readers. Publishing
 * overwrites the current value; subscribers are notified synchronously but
 * must not rely on seeing every intermediate phase.
 */

import { EventEmitter } from 'node:events'
import type { SessionPhase } from '../types/session.js'

export class PhaseStore extends EventEmitter {
  private current: SessionPhase = { status: 'loading' }

  /** Read the latest published phase */
  get(): SessionPhase {
    return this.current
  }

  /** Overwrite the current phase and notify subscribers */
  publish(phase: SessionPhase): void {
    this.current = phase
    this.emit('phase', phase)
  }

  /**
   * Subscribe to phase changes.
   *
   * @returns a function that removes the subscription
   */
  onPhase(handler: (phase: SessionPhase) => void): () => void {
    this.on('phase', handler)
    return () => {
      this.off('phase', handler)
    }
  }
}
