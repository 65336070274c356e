import type { ReconnectConfig } from '../config/schema.js';

/**
 * Delay before reconnect attempt `attempt` (1-based): exponential growth from
 * `initialDelayMs`, capped at `maxDelayMs`, then spread by ±`jitterRatio`.
 * The result never exceeds `maxDelayMs`.
 */
export function computeBackoffDelay(
  attempt: number,
  config: ReconnectConfig,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const base = Math.min(config.maxDelayMs, config.initialDelayMs * Math.pow(config.multiplier, exponent));
  const jitter = base * config.jitterRatio * (random() * 2 - 1);
  return Math.round(Math.min(config.maxDelayMs, Math.max(0, base + jitter)));
}
