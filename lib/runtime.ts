/**
 * Clock, sleep and randomness used by the driver and workers. Tests swap in
 * a manual runtime so delays complete instantly and time is deterministic.
 */
export interface Runtime {
  now(): Date;
  sleep(ms: number): Promise<void>;
  /** Uniform in [0, 1). */
  random(): number;
}

export const systemRuntime: Runtime = {
  now: () => new Date(),
  sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
  random: () => Math.random(),
};

/** Uniform integer in [min, max]. */
export function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function pickRandom<T>(random: () => number, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}
