/**
 * ReportService: flattens analysis results into JSON-ready records and CSV.
 * Every time is given both as raw centiseconds and as formatted text.
 */

import Papa from 'papaparse';
import { TrackVariant, variantKey } from '../models/Track';
import { efficiencyToJson } from '../models/Efficiency';
import { formatTime } from '../utils/timeFormat';
import { Opportunity } from './OpportunityService';
import { OvertakePlan, OvertakePlanItem } from './OvertakePlanService';
import { Tier } from './TierDerivationService';

export interface ReportInput {
  username: string;
  currentAf: number;
  currentRank: number;
  totalTracks: number;
  opportunities: readonly Opportunity[];
  overtakeMinTime: OvertakePlan | null;
  overtakeMinTracks: OvertakePlan | null;
  generatedAt: Date;
}

export interface TrackRecord {
  key: string;
  track_slug: string;
  track_name: string;
  vehicle: string;
  category: string;
  laps: string;
}

export interface TierRecord {
  target_rank: number;
  opponent_time_cs: number;
  opponent_time: string;
  target_time_cs: number;
  target_time: string;
  positions_gained: number;
  af_improvement: number;
  time_delta_cs: number;
  time_delta: string;
  efficiency: number | 'infinite';
}

export interface OpportunityRecord extends TrackRecord {
  current_rank: number;
  current_time_cs: number;
  current_time: string | null;
  is_na: boolean;
  best_efficiency: number | 'infinite';
  best_tier_idx: number;
  tiers: TierRecord[];
}

export interface PlanItemRecord extends TrackRecord {
  is_na: boolean;
  current_rank: number;
  current_time_cs: number;
  current_time: string | null;
  new_rank: number;
  target_time_cs: number;
  target_time: string;
  positions_gained: number;
  af_improvement: number;
  time_delta_cs: number;
  time_delta: string;
  difficulty_weight: number;
}

export interface PlanRecord {
  mode: string;
  target_username: string;
  target_af: number;
  current_af: number;
  af_gap: number;
  total_positions_needed: number;
  total_positions_gained: number;
  total_time_investment_cs: number;
  total_time_investment: string;
  new_af: number;
  feasible: boolean;
  items: PlanItemRecord[];
}

export interface ReportData {
  username: string;
  current_af: number;
  current_rank: number;
  total_tracks: number;
  generated_at: string;
  summary: {
    na_tracks: number;
    improvable_tracks: number;
    no_improvement_tracks: number;
  };
  na_opportunities: OpportunityRecord[];
  ranked_opportunities: OpportunityRecord[];
  no_improvement: OpportunityRecord[];
  overtake_min_time: PlanRecord | null;
  overtake_min_tracks: PlanRecord | null;
}

function trackRecord(track: TrackVariant): TrackRecord {
  return {
    key: variantKey(track),
    track_slug: track.trackSlug,
    track_name: track.trackName,
    vehicle: track.vehicle,
    category: track.category,
    laps: track.laps,
  };
}

function tierRecord(tier: Tier): TierRecord {
  return {
    target_rank: tier.targetRank,
    opponent_time_cs: tier.opponentTimeCs,
    opponent_time: formatTime(tier.opponentTimeCs),
    target_time_cs: tier.targetTimeCs,
    target_time: formatTime(tier.targetTimeCs),
    positions_gained: tier.positionsGained,
    af_improvement: tier.afImprovement,
    time_delta_cs: tier.timeDeltaCs,
    time_delta: formatTime(tier.timeDeltaCs),
    efficiency: efficiencyToJson(tier.efficiency),
  };
}

export function opportunityRecord(o: Opportunity): OpportunityRecord {
  return {
    ...trackRecord(o.track),
    current_rank: o.currentRank,
    current_time_cs: o.currentTimeCs,
    current_time: o.isNa ? null : formatTime(o.currentTimeCs),
    is_na: o.isNa,
    best_efficiency: efficiencyToJson(o.bestEfficiency),
    best_tier_idx: o.bestTierIdx,
    tiers: o.tiers.map(tierRecord),
  };
}

function planItemRecord(item: OvertakePlanItem): PlanItemRecord {
  return {
    ...trackRecord(item.track),
    is_na: item.isNa,
    current_rank: item.currentRank,
    current_time_cs: item.currentTimeCs,
    current_time: item.isNa ? null : formatTime(item.currentTimeCs),
    new_rank: item.newRank,
    target_time_cs: item.targetTimeCs,
    target_time: formatTime(item.targetTimeCs),
    positions_gained: item.positionsGained,
    af_improvement: item.afImprovement,
    time_delta_cs: item.timeDeltaCs,
    time_delta: formatTime(item.timeDeltaCs),
    difficulty_weight: item.difficultyWeight,
  };
}

export function planRecord(plan: OvertakePlan): PlanRecord {
  return {
    mode: plan.mode,
    target_username: plan.targetUsername,
    target_af: plan.targetAf,
    current_af: plan.currentAf,
    af_gap: plan.afGap,
    total_positions_needed: plan.totalPositionsNeeded,
    total_positions_gained: plan.totalPositionsGained,
    total_time_investment_cs: plan.totalTimeInvestmentCs,
    total_time_investment: formatTime(plan.totalTimeInvestmentCs),
    new_af: plan.newAf,
    feasible: plan.feasible,
    items: plan.items.map(planItemRecord),
  };
}

class ReportService {
  buildReportData(input: ReportInput): ReportData {
    const na = input.opportunities.filter(o => o.isNa);
    const ranked = input.opportunities.filter(o => !o.isNa && o.tiers.length > 0);
    const noImprovement = input.opportunities.filter(o => !o.isNa && o.tiers.length === 0);

    return {
      username: input.username,
      current_af: input.currentAf,
      current_rank: input.currentRank,
      total_tracks: input.totalTracks,
      generated_at: input.generatedAt.toISOString(),
      summary: {
        na_tracks: na.length,
        improvable_tracks: ranked.length,
        no_improvement_tracks: noImprovement.length,
      },
      na_opportunities: na.map(opportunityRecord),
      ranked_opportunities: ranked.map(opportunityRecord),
      no_improvement: noImprovement.map(opportunityRecord),
      overtake_min_time: input.overtakeMinTime ? planRecord(input.overtakeMinTime) : null,
      overtake_min_tracks: input.overtakeMinTracks ? planRecord(input.overtakeMinTracks) : null,
    };
  }

  /** One row per tier; opportunities without tiers get a single row with empty tier columns. */
  opportunitiesToCsv(opportunities: readonly Opportunity[]): string {
    const rows: Array<Record<string, string | number>> = [];

    for (const o of opportunities) {
      const base = {
        key: variantKey(o.track),
        track_name: o.track.trackName,
        current_rank: o.currentRank,
        current_time: o.isNa ? 'N/A' : formatTime(o.currentTimeCs),
      };
      if (o.tiers.length === 0) {
        rows.push({ ...base, target_rank: '', target_time: '', positions_gained: '', time_delta: '', efficiency: '' });
        continue;
      }
      for (const tier of o.tiers) {
        rows.push({
          ...base,
          target_rank: tier.targetRank,
          target_time: formatTime(tier.targetTimeCs),
          positions_gained: tier.positionsGained,
          time_delta: formatTime(tier.timeDeltaCs),
          efficiency: efficiencyToJson(tier.efficiency),
        });
      }
    }

    return Papa.unparse(rows, {
      columns: ['key', 'track_name', 'current_rank', 'current_time', 'target_rank', 'target_time', 'positions_gained', 'time_delta', 'efficiency'],
    });
  }
}

export const reportService = new ReportService();
