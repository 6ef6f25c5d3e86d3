/**
 * Source of "now" for anything that compares timestamps.
 * Injected so tests can drive time explicitly.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function secondsBetween(earlier: string | Date, later: Date): number {
  const from = typeof earlier === 'string' ? Date.parse(earlier) : earlier.getTime();
  return (later.getTime() - from) / 1000;
}
