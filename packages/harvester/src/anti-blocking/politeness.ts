import type { PolitenessConfig } from '../crawl/types.js';

type Sleep = (ms: number) => Promise<void>;

const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Uniform integer delay in `[minDelayMs, maxDelayMs]`. Swapped bounds are
 * tolerated; negative ones are clamped to zero.
 */
function randomDelayMs(
  { minDelayMs, maxDelayMs }: PolitenessConfig,
  random: () => number = Math.random,
): number {
  const low = Math.max(0, Math.min(minDelayMs, maxDelayMs));
  const high = Math.max(0, Math.max(minDelayMs, maxDelayMs));

  return Math.floor(random() * (high - low + 1)) + low;
}

async function waitPolitely(
  config: PolitenessConfig,
  wait: Sleep = sleep,
  random: () => number = Math.random,
): Promise<number> {
  const delayMs = randomDelayMs(config, random);
  if (delayMs > 0) {
    await wait(delayMs);
  }

  return delayMs;
}

export { randomDelayMs, sleep, waitPolitely };
export type { Sleep };
