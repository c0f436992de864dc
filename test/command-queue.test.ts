import { CommandQueue } from '../src/zoom/command-queue';
import { ZoomCommandType } from '../src/shared/types/zoom';

describe('CommandQueue', () => {
  it('should drain commands in arrival order with increasing sequence numbers', () => {
    const queue = new CommandQueue(4);
    queue.enqueue({ type: ZoomCommandType.ToggleZoom }, 10);
    queue.enqueue({ type: ZoomCommandType.SetProfile, name: 'quick' }, 11);
    queue.enqueue({ type: ZoomCommandType.ToggleFollow }, 12);

    const drained = queue.drain();

    expect(drained.map((q) => q.command.type)).toEqual([
      ZoomCommandType.ToggleZoom,
      ZoomCommandType.SetProfile,
      ZoomCommandType.ToggleFollow,
    ]);
    expect(drained.map((q) => q.sequence)).toEqual([1, 2, 3]);
    expect(drained.map((q) => q.receivedAtMs)).toEqual([10, 11, 12]);
    expect(queue.length).toBe(0);
  });

  it('should reject commands once full', () => {
    const queue = new CommandQueue(2);
    expect(queue.enqueue({ type: ZoomCommandType.ToggleZoom })).not.toBeNull();
    expect(queue.enqueue({ type: ZoomCommandType.ToggleZoom })).not.toBeNull();
    expect(queue.enqueue({ type: ZoomCommandType.ToggleZoom })).toBeNull();
    expect(queue.length).toBe(2);
  });

  it('should accept commands again after draining', () => {
    const queue = new CommandQueue(1);
    queue.enqueue({ type: ZoomCommandType.ToggleZoom });
    queue.drain();

    const queued = queue.enqueue({ type: ZoomCommandType.ClearMouseOverride });
    expect(queued?.sequence).toBe(2);
  });

  it('should discard everything on clear', () => {
    const queue = new CommandQueue();
    queue.enqueue({ type: ZoomCommandType.SetMouseOverride, x: 1, y: 2 });
    queue.clear();
    expect(queue.drain()).toEqual([]);
  });

  it('should refuse a non-positive capacity', () => {
    expect(() => new CommandQueue(0)).toThrow('Command queue capacity must be a positive integer, got 0');
    expect(() => new CommandQueue(1.5)).toThrow();
  });
});
