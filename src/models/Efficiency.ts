/**
 * AF gained per centisecond of improvement. Tracks the player has no time on
 * are `infinite`, which sorts ahead of every finite value and serializes as
 * the string "infinite".
 */
export type Efficiency =
  | { kind: 'infinite' }
  | { kind: 'finite'; value: number };

export const INFINITE_EFFICIENCY: Efficiency = { kind: 'infinite' };
export const ZERO_EFFICIENCY: Efficiency = { kind: 'finite', value: 0 };

export function finiteEfficiency(value: number): Efficiency {
  return { kind: 'finite', value };
}

/**
 * Sort comparator, best first: infinite before every finite value, then
 * finite values descending.
 */
export function compareEfficiencyDesc(a: Efficiency, b: Efficiency): number {
  if (a.kind === 'infinite' && b.kind === 'infinite') return 0;
  if (a.kind === 'infinite') return -1;
  if (b.kind === 'infinite') return 1;
  return b.value - a.value;
}

export function isBetterEfficiency(candidate: Efficiency, current: Efficiency): boolean {
  return compareEfficiencyDesc(candidate, current) < 0;
}

export function efficiencyToJson(efficiency: Efficiency): number | 'infinite' {
  return efficiency.kind === 'infinite' ? 'infinite' : efficiency.value;
}
