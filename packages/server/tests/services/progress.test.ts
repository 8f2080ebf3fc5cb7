import { describe, it, expect, vi } from 'vitest';
import { CancelledError } from '@pierre/core';
import { NotificationBus } from '../../src/services/notification-bus.js';
import { CancellationToken, ProgressManager, ProgressReporter } from '../../src/services/progress.js';

describe('CancellationToken', () => {
  it('should abort its signal with a CancelledError carrying the reason', () => {
    const token = new CancellationToken();
    token.cancel('client went away');

    expect(token.isCancelled()).toBe(true);
    expect(token.signal.aborted).toBe(true);
    expect(() => token.throwIfCancelled()).toThrow(CancelledError);
    expect(() => token.throwIfCancelled()).toThrow('client went away');
  });

  it('should keep the first reason when cancelled twice', () => {
    const token = new CancellationToken();
    token.cancel('first');
    token.cancel('second');

    expect(() => token.throwIfCancelled()).toThrow('first');
  });

  it('should not throw before cancellation', () => {
    expect(() => new CancellationToken().throwIfCancelled()).not.toThrow();
  });
});

describe('ProgressManager', () => {
  it('should cancel a registered call', () => {
    const manager = new ProgressManager();
    const token = manager.register('req-1', 'u-1');

    expect(manager.cancel('req-1', 'u-1')).toBe(true);
    expect(token.isCancelled()).toBe(true);
    expect(manager.isCancelled('req-1', 'u-1')).toBe(true);
  });

  it('should refuse to cancel another user\'s call', () => {
    const manager = new ProgressManager();
    const token = manager.register('req-1', 'u-1');

    expect(manager.cancel('req-1', 'u-2')).toBe(false);
    expect(token.isCancelled()).toBe(false);
  });

  it('should return false for unknown tokens and after cleanup', () => {
    const manager = new ProgressManager();
    manager.register('req-1', 'u-1');
    manager.cleanup('req-1', 'u-1');

    expect(manager.cancel('req-1', 'u-1')).toBe(false);
    expect(manager.cancel('missing', 'u-1')).toBe(false);
    expect(manager.activeTokens()).toEqual([]);
  });

  it('should keep calls of different users apart when they share a progress token', () => {
    const manager = new ProgressManager();
    const first = manager.register('1', 'u-1');
    const other = manager.register('1', 'u-2');
    const again = manager.register('1', 'u-1');

    manager.cleanup('1', 'u-1', first);
    expect(manager.activeTokens('u-1')).toEqual(['1']);

    manager.cleanup('1', 'u-1', again);
    expect(manager.cancel('1', 'u-2')).toBe(true);
    expect([first.isCancelled(), other.isCancelled(), again.isCancelled()]).toEqual([false, true, false]);
    expect(manager.activeTokens()).toEqual(['1']);
  });

  it('should cancel only that user\'s running calls on cancelAllForUser', () => {
    const manager = new ProgressManager();
    const a = manager.register('a', 'u-1');
    const b = manager.register('b', 'u-1');
    const c = manager.register('c', 'u-2');

    expect(manager.cancelAllForUser('u-1')).toBe(2);
    expect([a.isCancelled(), b.isCancelled(), c.isCancelled()]).toEqual([true, true, false]);
    expect(manager.activeTokens()).toEqual(['a', 'b', 'c']);
    expect(manager.activeTokens('u-2')).toEqual(['c']);
  });
});

describe('ProgressReporter', () => {
  it('should publish progress events for its user', () => {
    const bus = new NotificationBus();
    const listener = vi.fn();
    bus.subscribe('progress', listener);
    const reporter = new ProgressReporter(bus, 'tok-1', 'u-1', new CancellationToken());

    reporter.report(2, 5, 'page 2');
    reporter.report(3);

    expect(listener.mock.calls.map((call) => call[0])).toEqual([
      { type: 'progress', token: 'tok-1', current: 2, total: 5, message: 'page 2', user_id: 'u-1' },
      { type: 'progress', token: 'tok-1', current: 3, user_id: 'u-1' },
    ]);
  });

  it('should go quiet once the call is cancelled', () => {
    const bus = new NotificationBus();
    const listener = vi.fn();
    bus.subscribe('progress', listener);
    const cancellation = new CancellationToken();
    const reporter = new ProgressReporter(bus, 'tok-1', 'u-1', cancellation);

    cancellation.cancel();
    reporter.report(1, 2);

    expect(listener).not.toHaveBeenCalled();
  });
});
