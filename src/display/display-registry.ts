/**
 * @file    display/display-registry.ts
 * @purpose Hold the known displays and answer point-containment lookups.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts, display/coordinate-classifier.ts
 *
 * Records are only ever replaced whole. A reader holding a record keeps a
 * consistent view even if the display is re-classified in the meantime.
 */

import { DisplayId, DisplayRecord, Point } from '../shared/types/zoom';
import { isValidSize } from './coordinate-classifier';

export class DisplayRegistry {
  private records: Map<DisplayId, DisplayRecord> = new Map();

  constructor(records: DisplayRecord[] = []) {
    for (const record of records) {
      this.upsert(record);
    }
  }

  /**
   * Insert or replace a record by id.
   * Returns false (and keeps any prior record) for degenerate geometry.
   */
  upsert(record: DisplayRecord): boolean {
    if (!isUsable(record)) {
      return false;
    }
    this.records.set(record.id, record);
    return true;
  }

  /** Swap the whole display set, e.g. after a display-change notification */
  replaceAll(records: DisplayRecord[]): DisplayId[] {
    const next = new Map<DisplayId, DisplayRecord>();
    const rejected: DisplayId[] = [];

    for (const record of records) {
      if (isUsable(record)) {
        next.set(record.id, record);
      } else {
        rejected.push(record.id);
        const prior = this.records.get(record.id);
        if (prior) next.set(prior.id, prior);
      }
    }

    this.records = next;
    return rejected;
  }

  remove(id: DisplayId): boolean {
    return this.records.delete(id);
  }

  get(id: DisplayId): DisplayRecord | undefined {
    return this.records.get(id);
  }

  list(): DisplayRecord[] {
    return Array.from(this.records.values());
  }

  get size(): number {
    return this.records.size;
  }

  /** Flagged primary display, else the first one registered */
  primary(): DisplayRecord | undefined {
    let first: DisplayRecord | undefined;
    for (const record of this.records.values()) {
      if (record.isPrimary) return record;
      if (!first) first = record;
    }
    return first;
  }

  /**
   * Display whose [origin, origin + logicalSize) contains the point.
   * Overlapping (mirrored) layouts resolve to the smallest display.
   */
  findContaining(point: Point): DisplayRecord | undefined {
    let best: DisplayRecord | undefined;
    let bestArea = Infinity;

    for (const record of this.records.values()) {
      const { origin, logicalSize } = record;
      if (
        point.x >= origin.x &&
        point.x < origin.x + logicalSize.width &&
        point.y >= origin.y &&
        point.y < origin.y + logicalSize.height
      ) {
        const area = logicalSize.width * logicalSize.height;
        if (area < bestArea) {
          best = record;
          bestArea = area;
        }
      }
    }

    return best;
  }
}

function isUsable(record: DisplayRecord): boolean {
  return (
    isValidSize(record.logicalSize) &&
    isValidSize(record.pixelSize) &&
    Number.isFinite(record.scale.sx) &&
    Number.isFinite(record.scale.sy) &&
    record.scale.sx > 0 &&
    record.scale.sy > 0
  );
}
