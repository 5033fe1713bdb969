import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { RunReplacedEvent, RunStartedEvent } from '../../../src/domain/events/DomainEvents.js';

const started: RunStartedEvent = {
  type: 'run:started',
  runId: 'run-1',
  source: { fileName: 'fixture.csv' },
  columns: ['regiao', 'uf'],
  batchSize: 2,
  timestamp: 0,
};

const replaced: RunReplacedEvent = { type: 'run:replaced', runId: 'run-1', timestamp: 0 };

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('run:started', handler);
    bus.emit(started);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(started);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('run:started', handler);
    bus.emit(replaced);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('run:started', handler1);
    bus.on('run:started', handler2);
    bus.emit(started);

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('run:started', handler);
    bus.off('run:started', handler);
    bus.emit(started);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should hand handler errors to onHandlerError and keep going', () => {
    const onHandlerError = vi.fn();
    const bus = new EventBus(onHandlerError);
    const failure = new Error('handler exploded');
    const next = vi.fn();

    bus.on('run:started', () => {
      throw failure;
    });
    bus.on('run:started', next);

    expect(() => {
      bus.emit(started);
    }).not.toThrow();
    expect(onHandlerError).toHaveBeenCalledWith(failure, started);
    expect(next).toHaveBeenCalledOnce();
  });

  it('should emit a process warning for handler errors by default', () => {
    const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    const bus = new EventBus();

    bus.onAny(() => {
      throw new Error('wildcard exploded');
    });
    bus.emit(replaced);

    expect(warn).toHaveBeenCalledWith("Handler for 'run:replaced' threw: wildcard exploded", 'EventHandlerWarning');
    warn.mockRestore();
  });

  it('should call onAny handlers for every event type', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.emit(started);
    bus.emit(replaced);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenNthCalledWith(1, started);
    expect(handler).toHaveBeenNthCalledWith(2, replaced);
  });

  it('should remove onAny handlers with offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.offAny(handler);
    bus.emit(started);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should call typed handlers before wildcard handlers', () => {
    const bus = new EventBus();
    const calls: string[] = [];

    bus.onAny(() => calls.push('wildcard'));
    bus.on('run:started', () => calls.push('typed'));
    bus.emit(started);

    expect(calls).toEqual(['typed', 'wildcard']);
  });
});
