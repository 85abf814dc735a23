import { logger } from '@tenantune/logger';
import { TransportError, describeError, isCancellation } from '../errors.js';
import type { MetricsSink } from '../services/metrics.js';
import type { VoiceSession } from '../types.js';
import { systemClock, type Clock } from './clock.js';

export type StreamOutcome = 'completed' | 'cancelled';

export interface FrameStreamerOptions {
  frameDurationMs?: number;
  /** How far behind schedule the streamer may fall before re-basing. */
  maxLagMs?: number;
  clock?: Clock;
  metrics?: MetricsSink;
}

/**
 * Writes encoded frames to a voice session at real-time cadence.
 *
 * Frame i is due at `start + i * frameDurationMs`, so sleep jitter never
 * accumulates over a long song. Frames that arrive early wait for their slot.
 * When the streamer falls more than `maxLagMs` behind (slow producer, stalled
 * event loop) the schedule is moved forward instead of bursting the backlog.
 */
export class FrameStreamer {
  readonly frameDurationMs: number;
  private readonly maxLagMs: number;
  private readonly clock: Clock;
  private readonly metrics?: MetricsSink;
  private readonly log = logger.child({ component: 'frame-streamer' });

  constructor(options: FrameStreamerOptions = {}) {
    this.frameDurationMs = options.frameDurationMs ?? 20;
    this.maxLagMs = options.maxLagMs ?? 200;
    this.clock = options.clock ?? systemClock;
    this.metrics = options.metrics;

    if (!(this.frameDurationMs > 0)) {
      throw new RangeError('frameDurationMs must be positive');
    }
  }

  async stream(
    frames: AsyncIterable<Buffer>,
    session: VoiceSession,
    signal: AbortSignal,
    tenantId?: string,
  ): Promise<StreamOutcome> {
    const iterator = frames[Symbol.asyncIterator]();
    let start = this.clock.now();
    let index = 0;
    let rebases = 0;
    let underruns = 0;

    try {
      for (;;) {
        if (signal.aborted) return 'cancelled';

        const requestedAt = this.clock.now();
        const result = await iterator.next();
        if (result.done) break;

        const now = this.clock.now();
        if (now - requestedAt > this.frameDurationMs) {
          underruns++;
          this.log.debug({ tenantId, frame: index, waitedMs: now - requestedAt }, 'Frame underrun');
        }

        let due = start + index * this.frameDurationMs;
        if (now - due > this.maxLagMs) {
          start = now - index * this.frameDurationMs;
          due = now;
          rebases++;
          this.metrics?.streamRebased();
          this.log.debug({ tenantId, frame: index }, 'Frame schedule re-based');
        }

        if (due > now) {
          await this.clock.sleep(due - now, signal);
        }
        if (signal.aborted) return 'cancelled';

        try {
          await session.sendFrame(result.value);
        } catch (error) {
          throw new TransportError(`Voice session ${session.channelId} rejected frame ${index}`, tenantId, { cause: error });
        }
        index++;
      }
    } catch (error) {
      if (signal.aborted && isCancellation(error)) return 'cancelled';
      throw error;
    } finally {
      await iterator.return?.();
      try {
        await session.idle();
      } catch (error) {
        this.log.debug({ tenantId, error: describeError(error) }, 'Voice session did not go idle');
      }
      this.log.debug({ tenantId, framesSent: index, rebases, underruns }, 'Stream finished');
    }

    return 'completed';
  }
}
