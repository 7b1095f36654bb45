export type Sleep = (ms: number) => Promise<void>;

export type DelayBounds = {
  minSeconds: number;
  maxSeconds: number;
};

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/** Milliseconds drawn uniformly from [minSeconds, maxSeconds]. */
export function delayMs(bounds: DelayBounds, random: () => number = Math.random): number {
  const span = bounds.maxSeconds - bounds.minSeconds;
  return Math.round((bounds.minSeconds + random() * span) * 1000);
}

export function politeDelay(bounds: DelayBounds, wait: Sleep = sleep, random?: () => number): Promise<void> {
  return wait(delayMs(bounds, random));
}
