/**
 * OvertakePlanService: picks which tracks to improve (and by how much) to
 * pass a specific player in the combined ranking.
 *
 * Two plans are offered side by side:
 *  - min-time: cheapest total improvement, solved as a multi-choice knapsack
 *    (each variant is a group, each of its tiers an option, at most one
 *    option per group)
 *  - min-tracks: greedy, fewest variants to practise
 *
 * N/A variants are always included, at zero cost.
 */

import { TrackVariant, Vehicle } from '../models/Track';
import { Efficiency } from '../models/Efficiency';
import { Opportunity } from './OpportunityService';
import { Tier } from './TierDerivationService';

/** Steepness of the penalty for climbs that approach rank 1. */
export const DIFFICULTY_K = 5.0;

// Keeps an exact boundary (gap * tracks == integer) from rounding below the ceiling
const REQUIREMENT_EPSILON = 1e-9;

const SKIPPED = -1;

export type PlanMode = 'min-time' | 'min-tracks';

export interface PlanExclusion {
  track: string;
  vehicle: Vehicle;
}

export interface OvertakeRequest {
  currentAf: number;
  targetAf: number;
  targetUsername: string;
  totalTracks: number;
  exclude?: readonly PlanExclusion[];
}

export interface OvertakePlanItem {
  track: TrackVariant;
  isNa: boolean;
  currentRank: number;
  currentTimeCs: number;
  newRank: number;
  targetTimeCs: number;
  opponentTimeCs: number;
  positionsGained: number;
  afImprovement: number;
  timeDeltaCs: number;
  efficiency: Efficiency;
  difficultyWeight: number;
}

export interface OvertakePlan {
  mode: PlanMode;
  targetUsername: string;
  targetAf: number;
  currentAf: number;
  afGap: number;
  totalPositionsNeeded: number;
  totalPositionsGained: number;
  totalTimeInvestmentCs: number; // ranked tracks only, unweighted
  totalWeightedCost: number;
  newAf: number;
  items: OvertakePlanItem[];
  feasible: boolean;
}

/**
 * The optimizer found no state meeting a requirement it had already checked
 * was reachable. Always a bug, never a planning outcome.
 */
export class PlanInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlanInvariantError';
  }
}

/**
 * Cost multiplier for climbing from `currentRank` to `targetRank`:
 * exp(K * (1 - target / current)). 1 for no climb, growing as the target
 * approaches rank 1.
 */
export function difficultyWeight(targetRank: number, currentRank: number): number {
  return Math.exp(DIFFICULTY_K * (1 - targetRank / currentRank));
}

export function requiredPositions(afGap: number, totalTracks: number): number {
  if (afGap <= 0) return 0;
  return Math.ceil(afGap * totalTracks + REQUIREMENT_EPSILON);
}

interface PlanOption {
  tier: Tier;
  weightedCost: number;
  weight: number;
}

interface PlanGroup {
  opportunity: Opportunity;
  options: PlanOption[];
  maxGain: number;
}

interface PlanSetup {
  afGap: number;
  needed: number;
  naItems: OvertakePlanItem[];
  naGained: number;
  groups: PlanGroup[];
}

function toItem(opp: Opportunity, tier: Tier, weight: number): OvertakePlanItem {
  return {
    track: opp.track,
    isNa: opp.isNa,
    currentRank: opp.currentRank,
    currentTimeCs: opp.currentTimeCs,
    newRank: tier.targetRank,
    targetTimeCs: tier.targetTimeCs,
    opponentTimeCs: tier.opponentTimeCs,
    positionsGained: tier.positionsGained,
    afImprovement: tier.afImprovement,
    timeDeltaCs: tier.timeDeltaCs,
    efficiency: tier.efficiency,
    difficultyWeight: weight,
  };
}

function isExcluded(track: TrackVariant, exclude: readonly PlanExclusion[]): boolean {
  return exclude.some(e => e.track === track.trackSlug && e.vehicle === track.vehicle);
}

function buildGroup(opp: Opportunity): PlanGroup {
  const options = opp.tiers.map(tier => {
    const weight = difficultyWeight(tier.targetRank, opp.currentRank);
    return { tier, weight, weightedCost: tier.timeDeltaCs * weight };
  });
  const maxGain = Math.max(...options.map(o => o.tier.positionsGained));
  return { opportunity: opp, options, maxGain };
}

function preparePlan(trackOptions: readonly Opportunity[], request: OvertakeRequest): PlanSetup {
  const afGap = request.currentAf - request.targetAf;
  const needed = requiredPositions(afGap, request.totalTracks);
  const exclude = request.exclude ?? [];

  const naItems: OvertakePlanItem[] = [];
  const groups: PlanGroup[] = [];

  for (const opp of trackOptions) {
    if (opp.tiers.length === 0 || isExcluded(opp.track, exclude)) continue;
    if (opp.isNa) {
      naItems.push(toItem(opp, opp.tiers[0], 1));
    } else {
      groups.push(buildGroup(opp));
    }
  }

  const naGained = naItems.reduce((sum, item) => sum + item.positionsGained, 0);
  return { afGap, needed, naItems, naGained, groups };
}

function finishPlan(
  mode: PlanMode,
  request: OvertakeRequest,
  setup: PlanSetup,
  ranked: Array<{ group: PlanGroup; option: PlanOption }>,
  feasible: boolean
): OvertakePlan {
  const rankedItems = ranked.map(({ group, option }) => toItem(group.opportunity, option.tier, option.weight));
  const items = [...setup.naItems, ...rankedItems].sort((a, b) => b.afImprovement - a.afImprovement);

  const totalPositionsGained = items.reduce((sum, item) => sum + item.positionsGained, 0);
  const totalTimeInvestmentCs = rankedItems.reduce((sum, item) => sum + item.timeDeltaCs, 0);
  const totalWeightedCost = ranked.reduce((sum, { option }) => sum + option.weightedCost, 0);

  return {
    mode,
    targetUsername: request.targetUsername,
    targetAf: request.targetAf,
    currentAf: request.currentAf,
    afGap: setup.afGap,
    totalPositionsNeeded: setup.needed,
    totalPositionsGained,
    totalTimeInvestmentCs,
    totalWeightedCost,
    newAf: request.currentAf - totalPositionsGained / request.totalTracks,
    items,
    feasible,
  };
}

function largestClimb(group: PlanGroup): PlanOption {
  return group.options.reduce((best, o) => (o.tier.positionsGained > best.tier.positionsGained ? o : best));
}

/**
 * Minimum weighted cost over all ways to gain at least `remaining`
 * positions, taking at most one option per group.
 *
 * costs[p] is the cheapest way to gain exactly p positions with the groups
 * seen so far; choices[g * width + p] is the option group g contributed to
 * that state (or SKIPPED). Walking choices backwards from the best state
 * recovers the selection.
 */
function solveMultiChoiceKnapsack(
  groups: readonly PlanGroup[],
  remaining: number
): Array<{ group: PlanGroup; option: PlanOption }> {
  const maxTotal = groups.reduce((sum, g) => sum + g.maxGain, 0);
  const width = maxTotal + 1;

  let costs = new Float64Array(width).fill(Infinity);
  costs[0] = 0;
  const choices = new Int32Array(groups.length * width).fill(SKIPPED);

  groups.forEach((group, g) => {
    const next = costs.slice();
    const row = g * width;

    for (let p = 0; p < width; p++) {
      const base = costs[p];
      if (base === Infinity) continue;

      group.options.forEach((option, o) => {
        const reach = p + option.tier.positionsGained;
        const cost = base + option.weightedCost;
        if (cost < next[reach]) {
          next[reach] = cost;
          choices[row + reach] = o;
        }
      });
    }

    costs = next;
  });

  let bestState = -1;
  let bestCost = Infinity;
  for (let p = remaining; p < width; p++) {
    if (costs[p] < bestCost) {
      bestCost = costs[p];
      bestState = p;
    }
  }

  if (bestState === -1) {
    throw new PlanInvariantError(
      `no selection reaches ${remaining} positions although ${maxTotal} are available`
    );
  }

  const picked: Array<{ group: PlanGroup; option: PlanOption }> = [];
  let state = bestState;
  for (let g = groups.length - 1; g >= 0; g--) {
    const o = choices[g * width + state];
    if (o === SKIPPED) continue;
    const group = groups[g];
    const option = group.options[o];
    picked.push({ group, option });
    state -= option.tier.positionsGained;
  }

  if (state !== 0) {
    throw new PlanInvariantError(`backtracking ended at ${state} positions instead of 0`);
  }

  return picked.reverse();
}

class OvertakePlanService {
  /**
   * Cheapest set of improvements that closes the AF gap. Costs are weighted
   * by `difficultyWeight` while searching; the reported investment is the
   * raw time.
   */
  planMinTime(trackOptions: readonly Opportunity[], request: OvertakeRequest): OvertakePlan {
    const setup = preparePlan(trackOptions, request);
    if (setup.needed === 0) {
      return finishPlan('min-time', request, { ...setup, naItems: [] }, [], true);
    }

    const remaining = setup.needed - setup.naGained;
    if (remaining <= 0) {
      return finishPlan('min-time', request, setup, [], true);
    }

    const maxAvailable = setup.groups.reduce((sum, g) => sum + g.maxGain, 0);
    if (maxAvailable < remaining) {
      // Not enough to overtake; report the most that can be gained
      const best = setup.groups.map(group => ({ group, option: largestClimb(group) }));
      return finishPlan('min-time', request, setup, best, false);
    }

    return finishPlan('min-time', request, setup, solveMultiChoiceKnapsack(setup.groups, remaining), true);
  }

  /**
   * Fewest tracks: each variant offers its best-return climb (positions per
   * unit of difficulty) and the biggest gains are taken first.
   */
  planMinTracks(trackOptions: readonly Opportunity[], request: OvertakeRequest): OvertakePlan {
    const setup = preparePlan(trackOptions, request);
    if (setup.needed === 0) {
      return finishPlan('min-tracks', request, { ...setup, naItems: [] }, [], true);
    }

    const remaining = setup.needed - setup.naGained;
    if (remaining <= 0) {
      return finishPlan('min-tracks', request, setup, [], true);
    }

    const candidates = setup.groups
      .map(group => ({
        group,
        option: group.options.reduce((best, o) =>
          o.tier.positionsGained / o.weight > best.tier.positionsGained / best.weight ? o : best
        ),
      }))
      .sort((a, b) => b.option.tier.positionsGained - a.option.tier.positionsGained);

    const chosen: typeof candidates = [];
    let gained = 0;
    for (const candidate of candidates) {
      if (gained >= remaining) break;
      chosen.push(candidate);
      gained += candidate.option.tier.positionsGained;
    }

    return finishPlan('min-tracks', request, setup, chosen, gained >= remaining);
  }
}

export const overtakePlanService = new OvertakePlanService();
