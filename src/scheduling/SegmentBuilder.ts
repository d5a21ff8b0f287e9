/**
 * Timeline segment builder
 *
 * Tracks one open segment `(owner, start)`. Its end stays implicit until a
 * different owner is dispatched or the run finishes, so drivers may step
 * in sub-burst increments without splitting a segment.
 */

import type { Segment, SegmentOwner } from '../types/scheduling.js';

interface MutableSegment {
  owner: SegmentOwner;
  start: number;
  end: number;
}

export class SegmentBuilder {
  private readonly closed: MutableSegment[] = [];
  private openOwner: SegmentOwner | null = null;
  private openStart = 0;

  /**
   * Give the CPU to `owner` from `clock` on.
   *
   * Same owner: no-op. Otherwise the open segment is closed at `clock`
   * and a new one is opened.
   */
  dispatch(owner: SegmentOwner, clock: number): void {
    if (this.openOwner === owner) {
      return;
    }

    this.close(clock);
    this.openOwner = owner;
    this.openStart = clock;
  }

  /**
   * Close the open segment at `clock` and return the timeline
   */
  finish(clock: number): Segment[] {
    this.close(clock);
    this.openOwner = null;
    return this.closed.map((segment) => ({ ...segment }));
  }

  private close(clock: number): void {
    if (this.openOwner === null || clock <= this.openStart) {
      return;
    }

    const last = this.closed[this.closed.length - 1];
    if (last && last.owner === this.openOwner && last.end === this.openStart) {
      last.end = clock;
      return;
    }

    this.closed.push({ owner: this.openOwner, start: this.openStart, end: clock });
  }
}
