/**
 * @file    zoom/command-queue.ts
 * @purpose Bounded FIFO of zoom commands, drained at tick start.
 * @owner   Cursor Zoom Core
 * @depends shared/types/zoom.ts
 *
 * Producers (hotkeys, remote control) enqueue at any time; the tick loop is
 * the only consumer, so a command never lands in the middle of advance().
 */

import { QueuedCommand, ZoomCommand } from '../shared/types/zoom';

export const DEFAULT_COMMAND_QUEUE_CAPACITY = 64;

export class CommandQueue {
  private readonly capacity: number;
  private items: QueuedCommand[] = [];
  private sequence: number = 0;

  constructor(capacity: number = DEFAULT_COMMAND_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Command queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Tag and append; returns null when the queue is full */
  enqueue(command: ZoomCommand, receivedAtMs: number = Date.now()): QueuedCommand | null {
    if (this.items.length >= this.capacity) {
      return null;
    }
    const queued: QueuedCommand = {
      command,
      sequence: ++this.sequence,
      receivedAtMs,
    };
    this.items.push(queued);
    return queued;
  }

  /** Remove and return everything, oldest first */
  drain(): QueuedCommand[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get length(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
