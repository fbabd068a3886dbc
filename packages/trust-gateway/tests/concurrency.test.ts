// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../src/concurrency/keyed-mutex.js';
import { callCollaborator, withDeadline } from '../src/concurrency/deadline.js';
import { DeadlineExceededError, PersistenceError, ValidationError } from '../src/errors.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedMutex', () => {
  it('runs tasks for the same key one at a time in submission order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('sensor-1', async () => {
        order.push('a:start');
        await delay(20);
        order.push('a:end');
      }),
      mutex.runExclusive('sensor-1', async () => {
        order.push('b:start');
        order.push('b:end');
      }),
    ]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('lets different keys run without waiting on each other', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('sensor-1', async () => {
        order.push('slow:start');
        await delay(20);
        order.push('slow:end');
      }),
      mutex.runExclusive('sensor-2', async () => {
        order.push('fast');
      }),
    ]);

    expect(order).toEqual(['slow:start', 'fast', 'slow:end']);
  });

  it('returns the task result', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('sensor-1', () => 42)).resolves.toBe(42);
  });

  it('keeps the chain usable after a task rejects', async () => {
    const mutex = new KeyedMutex();
    const failing = mutex.runExclusive('sensor-1', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('sensor-1', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('reports a key as locked only while work is queued', async () => {
    const mutex = new KeyedMutex();
    const pending = mutex.runExclusive('sensor-1', () => delay(10));
    expect(mutex.isLocked('sensor-1')).toBe(true);
    await pending;
    expect(mutex.isLocked('sensor-1')).toBe(false);
  });
});

describe('withDeadline', () => {
  it('resolves with the result when work finishes in time', async () => {
    await expect(withDeadline('fast', 100, async () => 'done')).resolves.toBe('done');
  });

  it('rejects with DeadlineExceededError when work outlives the deadline', async () => {
    const promise = withDeadline('slow', 10, () => delay(200));
    await expect(promise).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(promise).rejects.toMatchObject({
      code: 'DEADLINE_EXCEEDED',
      operation: 'slow',
      timeoutMs: 10,
      transient: true,
    });
  });
});

describe('callCollaborator', () => {
  it('wraps foreign errors in PersistenceError and keeps the cause', async () => {
    const cause = new Error('connection reset');
    const promise = callCollaborator('appendReading', 100, async () => {
      throw cause;
    });

    await expect(promise).rejects.toBeInstanceOf(PersistenceError);
    await expect(promise).rejects.toMatchObject({
      code: 'PERSISTENCE_FAILED',
      operation: 'appendReading',
      message: 'Operation "appendReading" failed: connection reset',
      cause,
    });
  });

  it('marks failures as not transient when asked', async () => {
    const failing = callCollaborator(
      'appendAlert',
      100,
      async () => {
        throw new Error('connection reset');
      },
      { transient: false },
    );
    await expect(failing).rejects.toMatchObject({ operation: 'appendAlert', transient: false });

    const slow = callCollaborator('appendAlert', 10, () => delay(200), { transient: false });
    await expect(slow).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(slow).rejects.toMatchObject({ transient: false });
  });

  it('passes gateway errors through unchanged', async () => {
    const original = new ValidationError(['value: Required']);
    const promise = callCollaborator('verifyCredential', 100, async () => {
      throw original;
    });
    await expect(promise).rejects.toBe(original);
  });
});
