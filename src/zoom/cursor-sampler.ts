/**
 * @file    zoom/cursor-sampler.ts
 * @purpose Cursor sampler that serves the most recently pushed position.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts
 *
 * An input hook (or any other producer) pushes positions whenever it likes;
 * the tick loop pulls once per frame. Each push stores a new frozen sample, so
 * the reader never sees an x from one reading and a y from another.
 */

import { CursorSample, CursorSampler, OriginConvention } from '../shared/types/zoom';

export class LatestCursorSampler implements CursorSampler {
  private latest: CursorSample;

  constructor(
    private readonly originConvention: OriginConvention = OriginConvention.TopLeftDown,
    initial: { x: number; y: number } = { x: 0, y: 0 },
  ) {
    this.latest = Object.freeze({
      rawX: initial.x,
      rawY: initial.y,
      timestampMs: Date.now(),
      originConvention,
    });
  }

  /** Producer side */
  push(x: number, y: number, timestampMs: number = Date.now()): void {
    this.latest = Object.freeze({
      rawX: x,
      rawY: y,
      timestampMs,
      originConvention: this.originConvention,
    });
  }

  /** Consumer side */
  sample(): CursorSample {
    return this.latest;
  }
}
