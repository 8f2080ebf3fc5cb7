import { describe, it, expect, vi } from 'vitest';
import { NotificationBus } from '../../src/services/notification-bus.js';

const completed = (userId: string) => ({
  type: 'oauth_completed' as const,
  provider: 'strava',
  success: true,
  message: 'Strava connected',
  user_id: userId,
});

describe('NotificationBus', () => {
  it('should drop events nobody listens to', () => {
    const bus = new NotificationBus();
    expect(bus.publish(completed('u-1'))).toBe(0);
  });

  it('should deliver an event only to listeners of its kind', () => {
    const bus = new NotificationBus();
    const onCompleted = vi.fn();
    const onProgress = vi.fn();
    bus.subscribe('oauth_completed', onCompleted);
    bus.subscribe('progress', onProgress);

    expect(bus.publish(completed('u-1'))).toBe(1);
    expect(onCompleted).toHaveBeenCalledWith(completed('u-1'));
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', () => {
    const bus = new NotificationBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe('oauth_completed', listener);

    unsubscribe();

    expect(bus.publish(completed('u-1'))).toBe(0);
    expect(bus.subscriberCount('oauth_completed')).toBe(0);
    expect(listener).not.toHaveBeenCalled();
  });

  it('should keep delivering when one listener throws', () => {
    const bus = new NotificationBus();
    const healthy = vi.fn();
    bus.subscribe('oauth_completed', () => {
      throw new Error('listener broke');
    });
    bus.subscribe('oauth_completed', healthy);

    expect(bus.publish(completed('u-1'))).toBe(1);
    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it('should filter every kind by user on subscribeUser', () => {
    const bus = new NotificationBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribeUser('u-1', listener);

    bus.publish(completed('u-2'));
    bus.publish(completed('u-1'));
    bus.publish({ type: 'progress', token: 't-1', current: 1, total: 2, user_id: 'u-1' });

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls[1]?.[0]).toEqual({ type: 'progress', token: 't-1', current: 1, total: 2, user_id: 'u-1' });

    unsubscribe();
    expect(bus.subscriberCount('oauth_completed')).toBe(0);
    expect(bus.subscriberCount('progress')).toBe(0);
  });
});
