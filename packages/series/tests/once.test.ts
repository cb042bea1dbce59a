import { describe, it, expect, vi } from 'vitest';
import { Once } from '../src/once.js';

describe('Once', () => {
  it('computes lazily and caches the value', () => {
    const compute = vi.fn(() => 'jammy');
    const once = new Once(compute);

    expect(compute).not.toHaveBeenCalled();
    expect(once.settled).toBe(false);
    expect(once.get()).toBe('jammy');
    expect(once.get()).toBe('jammy');
    expect(compute).toHaveBeenCalledTimes(1);
    expect(once.settled).toBe(true);
  });

  it('caches the error', () => {
    const failure = new Error('boom');
    const compute = vi.fn((): string => {
      throw failure;
    });
    const once = new Once(compute);

    expect(() => once.get()).toThrow(failure);
    expect(() => once.get()).toThrow(failure);
    expect(compute).toHaveBeenCalledTimes(1);
  });
});
