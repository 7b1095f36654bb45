import { describe, expect, it } from 'vitest';
import { delayMs, politeDelay } from '../sleep.js';

describe('delayMs', () => {
  it('draws from the configured bounds', () => {
    const bounds = { minSeconds: 0.6, maxSeconds: 1.5 };
    expect(delayMs(bounds, () => 0)).toBe(600);
    expect(delayMs(bounds, () => 0.5)).toBe(1050);
    expect(delayMs(bounds, () => 1)).toBe(1500);
  });
});

describe('politeDelay', () => {
  it('hands the computed delay to the sleeper', async () => {
    const waits: number[] = [];
    await politeDelay({ minSeconds: 1, maxSeconds: 2 }, async ms => { waits.push(ms); }, () => 0.25);
    expect(waits).toEqual([1250]);
  });
});
