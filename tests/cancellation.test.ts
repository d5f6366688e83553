// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CancellationFlag, bindSignal } from '../src/pipeline/cancellation.js';

describe('CancellationFlag', () => {
  it('starts unset', () => {
    const flag = new CancellationFlag();
    expect(flag.isRequested()).toBe(false);
    expect(flag.getReason()).toBeNull();
  });

  it('stays set with the first reason', () => {
    const flag = new CancellationFlag();
    flag.request('User pressed stop');
    flag.request('second');

    expect(flag.isRequested()).toBe(true);
    expect(flag.getReason()).toBe('User pressed stop');
  });

  it('defaults the reason to Stopped by user', () => {
    const flag = new CancellationFlag();
    flag.request();
    expect(flag.getReason()).toBe('Stopped by user');
  });

  it('fires callbacks once', () => {
    const flag = new CancellationFlag();
    const callback = vi.fn();
    flag.onRequested(callback);

    flag.request('stop');
    flag.request('stop again');

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith('stop');
  });

  it('does not fire unsubscribed callbacks', () => {
    const flag = new CancellationFlag();
    const callback = vi.fn();
    const unsubscribe = flag.onRequested(callback);

    unsubscribe();
    flag.request();

    expect(callback).not.toHaveBeenCalled();
  });

  it('runs remaining callbacks when one throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const flag = new CancellationFlag();
    const second = vi.fn();
    flag.onRequested(() => {
      throw new Error('bad callback');
    });
    flag.onRequested(second);

    flag.request();

    expect(second).toHaveBeenCalledTimes(1);
    vi.restoreAllMocks();
  });
});

describe('bindSignal', () => {
  const detachers: Array<() => void> = [];

  afterEach(() => {
    while (detachers.length > 0) {
      detachers.pop()?.();
    }
  });

  it('requests cancellation on the first signal and forces on the second', () => {
    const flag = new CancellationFlag();
    const onForce = vi.fn();
    detachers.push(bindSignal(flag, 'SIGUSR2', onForce));

    process.emit('SIGUSR2', 'SIGUSR2');
    expect(flag.isRequested()).toBe(true);
    expect(onForce).not.toHaveBeenCalled();

    process.emit('SIGUSR2', 'SIGUSR2');
    expect(onForce).toHaveBeenCalledTimes(1);
  });

  it('stops listening once detached', () => {
    const flag = new CancellationFlag();
    const listenersBefore = process.listenerCount('SIGUSR2');
    const detach = bindSignal(flag, 'SIGUSR2', vi.fn());

    expect(process.listenerCount('SIGUSR2')).toBe(listenersBefore + 1);
    detach();
    expect(process.listenerCount('SIGUSR2')).toBe(listenersBefore);
  });
});
