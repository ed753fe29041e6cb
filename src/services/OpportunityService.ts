/**
 * OpportunityService: for every variant the player appears on, works out
 * which leaderboard climbs are available and ranks them by AF gained per
 * centisecond of improvement.
 *
 * Variants without a leaderboard are out of scope and skipped entirely.
 * Placeholder ("Default Time") entries never count as competitors.
 */

import {
  LeaderboardEntry,
  PlayerStanding,
  StandingsSnapshot,
  TrackVariant,
  isSameUser,
  variantKey,
} from '../models/Track';
import {
  Efficiency,
  INFINITE_EFFICIENCY,
  ZERO_EFFICIENCY,
  compareEfficiencyDesc,
  isBetterEfficiency,
} from '../models/Efficiency';
import {
  DISPLAY_CLIMB_SIZES,
  InconsistentTier,
  Tier,
  deriveTiers,
  fullClimbRange,
} from './TierDerivationService';

export interface Opportunity {
  track: TrackVariant;
  currentRank: number;
  currentTimeCs: number; // 0 for N/A tracks
  isNa: boolean;
  tiers: Tier[];
  bestEfficiency: Efficiency;
  bestTierIdx: number;
}

/** Display tiers, or every climb from 1 to the number of players ahead. */
export type ClimbSizes = readonly number[] | 'full';

export interface OpportunityOptions {
  climbSizes?: ClimbSizes;
  onInconsistentTier?: (track: TrackVariant, detail: InconsistentTier) => void;
}

function toTrack(standing: PlayerStanding): TrackVariant {
  return {
    trackSlug: standing.trackSlug,
    trackName: standing.trackName,
    vehicle: standing.vehicle,
    category: standing.category,
    laps: standing.laps,
  };
}

function emptyOpportunity(track: TrackVariant, currentRank: number, currentTimeCs: number, isNa: boolean): Opportunity {
  return {
    track,
    currentRank,
    currentTimeCs,
    isNa,
    tiers: [],
    bestEfficiency: ZERO_EFFICIENCY,
    bestTierIdx: 0,
  };
}

/**
 * No time submitted: the player sits one past the last real entry, and any
 * submitted time is assumed to land just below the current worst entry.
 * Investment is 0 by policy, which makes the efficiency infinite.
 */
export function computeNaOpportunity(
  standing: PlayerStanding,
  realEntries: readonly LeaderboardEntry[],
  totalTracks: number
): Opportunity {
  const track = toTrack(standing);
  if (realEntries.length === 0) {
    return emptyOpportunity(track, 0, 0, true);
  }

  const worst = realEntries[realEntries.length - 1];
  const effectiveLastRank = worst.rank + 1;
  const landingRank = worst.rank + 1;
  const positionsGained = effectiveLastRank - landingRank;

  const tier: Tier = {
    targetRank: landingRank,
    opponentTimeCs: worst.timeCs,
    targetTimeCs: worst.timeCs,
    positionsGained,
    afImprovement: positionsGained / totalTracks,
    timeDeltaCs: 0,
    efficiency: INFINITE_EFFICIENCY,
  };

  return {
    track,
    currentRank: effectiveLastRank,
    currentTimeCs: 0,
    isNa: true,
    tiers: [tier],
    bestEfficiency: INFINITE_EFFICIENCY,
    bestTierIdx: 0,
  };
}

export function computeRankedOpportunity(
  standing: PlayerStanding,
  realEntries: readonly LeaderboardEntry[],
  totalTracks: number,
  username: string,
  options: OpportunityOptions = {}
): Opportunity {
  const track = toTrack(standing);
  const playerIdx = realEntries.findIndex(e => isSameUser(e.username, username));

  let currentRank: number;
  let currentTimeCs: number;
  let above: readonly LeaderboardEntry[];

  if (playerIdx === -1) {
    // Not on the board (stale snapshot): trust the standing and rebuild who is ahead
    currentRank = standing.rank;
    currentTimeCs = standing.timeCs;
    above = realEntries.filter(e => e.timeCs < currentTimeCs);
  } else {
    currentRank = realEntries[playerIdx].rank;
    currentTimeCs = realEntries[playerIdx].timeCs;
    above = realEntries.slice(0, playerIdx);
  }

  if (above.length === 0 || currentRank <= 1) {
    return emptyOpportunity(track, currentRank, currentTimeCs, false);
  }

  const requested = options.climbSizes ?? DISPLAY_CLIMB_SIZES;
  const onInconsistent = options.onInconsistentTier;
  const tiers = deriveTiers({
    currentRank,
    currentTimeCs,
    above,
    totalTracks,
    climbSizes: requested === 'full' ? fullClimbRange(above.length) : requested,
    onInconsistentTier: onInconsistent ? detail => onInconsistent(track, detail) : undefined,
  });

  let bestEfficiency = ZERO_EFFICIENCY;
  let bestTierIdx = 0;
  tiers.forEach((tier, idx) => {
    if (isBetterEfficiency(tier.efficiency, bestEfficiency)) {
      bestEfficiency = tier.efficiency;
      bestTierIdx = idx;
    }
  });

  return {
    track,
    currentRank,
    currentTimeCs,
    isNa: false,
    tiers,
    bestEfficiency,
    bestTierIdx,
  };
}

class OpportunityService {
  /**
   * One opportunity per in-scope variant, best efficiency first (N/A tracks
   * lead). Opportunities with no tiers are kept so callers can list tracks
   * where nothing can be gained.
   */
  buildOpportunities(snapshot: StandingsSnapshot, options: OpportunityOptions = {}): Opportunity[] {
    const opportunities: Opportunity[] = [];

    for (const standing of snapshot.standings) {
      const entries = snapshot.leaderboards.get(variantKey(standing));
      if (!entries || entries.length === 0) continue;

      const realEntries = entries.filter(e => !e.isDefault);
      opportunities.push(
        standing.isNa
          ? computeNaOpportunity(standing, realEntries, snapshot.totalTracks)
          : computeRankedOpportunity(standing, realEntries, snapshot.totalTracks, snapshot.username, options)
      );
    }

    // Array.prototype.sort is stable, so equal efficiencies keep input order
    return opportunities.sort((a, b) => compareEfficiencyDesc(a.bestEfficiency, b.bestEfficiency));
  }

  /**
   * Planning option sets: every possible climb on every variant, built once
   * and shared by both overtake planners.
   */
  buildTrackOptions(snapshot: StandingsSnapshot, options: Omit<OpportunityOptions, 'climbSizes'> = {}): Opportunity[] {
    return this.buildOpportunities(snapshot, { ...options, climbSizes: 'full' });
  }
}

export const opportunityService = new OpportunityService();
