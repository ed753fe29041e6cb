/**
 * TierDerivationService: turns "the N players just ahead of me" into
 * concrete climb targets: whose time to beat, by how much, and what it is
 * worth in AF.
 */

import { LeaderboardEntry } from '../models/Track';
import { Efficiency, finiteEfficiency } from '../models/Efficiency';

export interface Tier {
  targetRank: number;
  opponentTimeCs: number; // the opponent's actual time
  targetTimeCs: number; // time needed to pass them (opponent - 1cs)
  positionsGained: number;
  afImprovement: number;
  timeDeltaCs: number; // current time - target time
  efficiency: Efficiency;
}

export interface InconsistentTier {
  climb: number;
  targetRank: number;
  opponentTimeCs: number;
  currentRank: number;
  currentTimeCs: number;
}

export interface TierDerivationInput {
  currentRank: number;
  currentTimeCs: number;
  /** Real entries ahead of the player, furthest ahead first. */
  above: readonly LeaderboardEntry[];
  totalTracks: number;
  climbSizes: readonly number[];
  /** Called for climbs dropped because the player already beats the target. */
  onInconsistentTier?: (detail: InconsistentTier) => void;
}

/** Climbs shown in the opportunity list. */
export const DISPLAY_CLIMB_SIZES: readonly number[] = [1, 3, 5, 10, 15, 20, 25];

export function fullClimbRange(aboveCount: number): number[] {
  return Array.from({ length: aboveCount }, (_, i) => i + 1);
}

/**
 * Derive one tier per requested climb size. Positions are counted by array
 * position, not rank number, so tied players ahead are separate targets.
 */
export function deriveTiers(input: TierDerivationInput): Tier[] {
  const { above, currentTimeCs, totalTracks } = input;
  const tiers: Tier[] = [];
  const seen = new Set<number>();

  for (const requested of input.climbSizes) {
    const climb = Math.min(requested, above.length);
    if (climb <= 0) break;
    if (seen.has(climb)) continue;
    seen.add(climb);

    const target = above[above.length - climb];
    const targetTimeCs = target.timeCs - 1;
    const timeDeltaCs = currentTimeCs - targetTimeCs;

    if (timeDeltaCs <= 0) {
      input.onInconsistentTier?.({
        climb,
        targetRank: target.rank,
        opponentTimeCs: target.timeCs,
        currentRank: input.currentRank,
        currentTimeCs,
      });
      continue;
    }

    const afImprovement = climb / totalTracks;
    tiers.push({
      targetRank: target.rank,
      opponentTimeCs: target.timeCs,
      targetTimeCs,
      positionsGained: climb,
      afImprovement,
      timeDeltaCs,
      efficiency: finiteEfficiency(afImprovement / timeDeltaCs),
    });
  }

  return tiers;
}
