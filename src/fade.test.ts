import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FADE_INTERVAL_MS, FADE_STEPS, fadeIn } from './fade';

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('fadeIn', () => {
  it('applies the first step immediately', () => {
    const applied: number[] = [];
    fadeIn(0.8, (opacity) => applied.push(opacity));
    expect(applied).toEqual([0]);
  });

  it('reaches the target after all steps and stops', () => {
    const applied: number[] = [];
    fadeIn(1, (opacity) => applied.push(opacity), { steps: 4, intervalMs: 10 });

    vi.advanceTimersByTime(40);
    expect(applied).toEqual([0, 0.25, 0.5, 0.75, 1]);

    vi.advanceTimersByTime(100);
    expect(applied).toHaveLength(5);
  });

  it('uses twenty steps thirty milliseconds apart by default', () => {
    const applied: number[] = [];
    fadeIn(0.5, (opacity) => applied.push(opacity));

    vi.advanceTimersByTime(FADE_INTERVAL_MS * (FADE_STEPS - 1));
    expect(applied).toHaveLength(FADE_STEPS);
    expect(applied[FADE_STEPS - 1]).toBeCloseTo(0.475);

    vi.advanceTimersByTime(FADE_INTERVAL_MS);
    expect(applied).toHaveLength(FADE_STEPS + 1);
    expect(applied[FADE_STEPS]).toBe(0.5);
  });

  it('stops when cancelled', () => {
    const applied: number[] = [];
    const cancel = fadeIn(1, (opacity) => applied.push(opacity), { steps: 4, intervalMs: 10 });

    vi.advanceTimersByTime(10);
    cancel();
    vi.advanceTimersByTime(100);
    expect(applied).toEqual([0, 0.25]);
  });
});
