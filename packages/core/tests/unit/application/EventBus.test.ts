import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { RunStartedEvent, BatchCompletedEvent } from '../../../src/domain/events/DomainEvents.js';

function runStarted(): RunStartedEvent {
  return {
    type: 'run:started',
    runId: 'test-run',
    totalItems: 100,
    totalBatches: 10,
    timestamp: Date.now(),
  };
}

function batchCompleted(): BatchCompletedEvent {
  return {
    type: 'batch:completed',
    runId: 'test-run',
    batchIndex: 0,
    succeeded: 9,
    failed: 1,
    timestamp: Date.now(),
  };
}

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('run:started', handler);

    const event = runStarted();
    bus.emit(event);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('run:started', handler);
    bus.emit(batchCompleted());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('run:started', handler1);
    bus.on('run:started', handler2);
    bus.emit(runStarted());

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('run:started', handler);
    bus.off('run:started', handler);
    bus.emit(runStarted());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should continue calling other handlers when one throws', () => {
    const bus = new EventBus();
    const handler1 = vi.fn(() => {
      throw new Error('first handler fails');
    });
    const handler2 = vi.fn();

    bus.on('run:started', handler1);
    bus.on('run:started', handler2);

    expect(() => {
      bus.emit(runStarted());
    }).not.toThrow();
    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should call onAny handlers for every event type', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);

    const startEvent = runStarted();
    const batchEvent = batchCompleted();
    bus.emit(startEvent);
    bus.emit(batchEvent);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenNthCalledWith(1, startEvent);
    expect(handler).toHaveBeenNthCalledWith(2, batchEvent);
  });

  it('should remove onAny handlers with offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.offAny(handler);
    bus.emit(runStarted());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should not propagate errors from throwing onAny handlers', () => {
    const bus = new EventBus();
    const good = vi.fn();

    bus.onAny(() => {
      throw new Error('wildcard exploded');
    });
    bus.onAny(good);

    expect(() => {
      bus.emit(runStarted());
    }).not.toThrow();
    expect(good).toHaveBeenCalledOnce();
  });
});
