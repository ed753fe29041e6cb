/**
 * OptimizerRunService: the end-to-end pipeline behind tools/optimize.ts:
 * overrides → opportunities → overtake target → both plans → report data.
 *
 * File access lives in `loadOptimizerConfig` and the loaders; `runOptimizer`
 * itself only works on the values it is given.
 */

import * as fs from 'fs';
import {
  CombinedRankingEntry,
  LeaderboardEntry,
  PlayerStanding,
  StandingsSnapshot,
  TrackVariant,
  describeVariant,
  isLapCount,
  isSameUser,
  isTrackCategory,
  isVehicle,
} from '../models/Track';
import { Opportunity, opportunityService } from './OpportunityService';
import { OvertakePlan, PlanExclusion, overtakePlanService } from './OvertakePlanService';
import { ReportData, reportService } from './ReportService';
import { InconsistentTier } from './TierDerivationService';
import { TimeOverride, applyTimeOverrides } from './TimeOverrideService';
import { formatTime } from '../utils/timeFormat';

export interface OptimizerConfig {
  username?: string;
  // Both used when the player is missing from the combined ranking
  currentAf?: number;
  currentRank?: number;
  outputDir?: string;
  timeOverrides?: TimeOverride[];
  excludeFromPlans?: PlanExclusion[];
}

export interface OptimizerInput {
  username: string;
  standings: readonly PlayerStanding[];
  leaderboards: ReadonlyMap<string, readonly LeaderboardEntry[]>;
  ranking: readonly CombinedRankingEntry[];
  config: OptimizerConfig;
  now?: Date;
  log?: (message: string) => void;
  warn?: (message: string) => void;
}

export interface OptimizerResult {
  currentAf: number;
  currentRank: number;
  totalTracks: number;
  opportunities: Opportunity[];
  target: CombinedRankingEntry | null;
  overtakeMinTime: OvertakePlan | null;
  overtakeMinTracks: OvertakePlan | null;
  report: ReportData;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new ConfigError(`"${key}" must be a string`);
  return value;
}

function parseOverride(value: unknown, idx: number): TimeOverride {
  if (!isRecord(value)) throw new ConfigError(`timeOverrides[${idx}] must be an object`);
  const track = optionalString(value, 'track');
  const vehicle = optionalString(value, 'vehicle');
  const category = optionalString(value, 'category') ?? 'standard';
  const laps = optionalString(value, 'laps');
  const time = optionalString(value, 'time');

  if (!track || !time) throw new ConfigError(`timeOverrides[${idx}] needs "track" and "time"`);
  if (!vehicle || !isVehicle(vehicle)) throw new ConfigError(`timeOverrides[${idx}] has an invalid vehicle`);
  if (!isTrackCategory(category)) throw new ConfigError(`timeOverrides[${idx}] has an invalid category`);
  if (!laps || !isLapCount(laps)) throw new ConfigError(`timeOverrides[${idx}] has an invalid laps value`);

  return { track, vehicle, category, laps, time };
}

function parseExclusion(value: unknown, idx: number): PlanExclusion {
  if (!isRecord(value)) throw new ConfigError(`excludeFromPlans[${idx}] must be an object`);
  const track = optionalString(value, 'track');
  const vehicle = optionalString(value, 'vehicle');
  if (!track || !vehicle || !isVehicle(vehicle)) {
    throw new ConfigError(`excludeFromPlans[${idx}] needs "track" and a valid "vehicle"`);
  }
  return { track, vehicle };
}

function parseList<T>(obj: Record<string, unknown>, key: string, parseItem: (v: unknown, i: number) => T): T[] | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw new ConfigError(`"${key}" must be a list`);
  return value.map((item: unknown, i) => parseItem(item, i));
}

export function parseOptimizerConfig(raw: unknown): OptimizerConfig {
  if (!isRecord(raw)) throw new ConfigError('config must be a JSON object');

  const rawAf = raw['currentAf'];
  let currentAf: number | undefined;
  if (typeof rawAf === 'number') {
    currentAf = rawAf;
  } else if (rawAf !== undefined) {
    throw new ConfigError('"currentAf" must be a number');
  }

  const rawRank = raw['currentRank'];
  let currentRank: number | undefined;
  if (typeof rawRank === 'number' && Number.isInteger(rawRank) && rawRank >= 1) {
    currentRank = rawRank;
  } else if (rawRank !== undefined) {
    throw new ConfigError('"currentRank" must be a positive integer');
  }

  return {
    username: optionalString(raw, 'username'),
    currentAf,
    currentRank,
    outputDir: optionalString(raw, 'outputDir'),
    timeOverrides: parseList(raw, 'timeOverrides', parseOverride),
    excludeFromPlans: parseList(raw, 'excludeFromPlans', parseExclusion),
  };
}

/** Missing file means defaults; a file that exists must be valid. */
export function loadOptimizerConfig(filePath: string): OptimizerConfig {
  if (!fs.existsSync(filePath)) return {};
  const text = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseOptimizerConfig(raw);
}

export function findOvertakeTarget(
  ranking: readonly CombinedRankingEntry[],
  currentRank: number
): CombinedRankingEntry | null {
  if (currentRank <= 1) return null;
  return ranking.find(r => r.rank === currentRank - 1) ?? null;
}

export function runOptimizer(input: OptimizerInput): OptimizerResult {
  const log = input.log ?? (() => undefined);
  const warn = input.warn ?? (() => undefined);
  const { username, config } = input;

  const me = input.ranking.find(r => isSameUser(r.username, username));
  let currentAf: number;
  let currentRank: number;
  if (me) {
    currentAf = me.af;
    currentRank = me.rank;
  } else if (config.currentAf !== undefined) {
    warn(`${username} not found in combined ranking, using configured AF ${config.currentAf}`);
    currentAf = config.currentAf;
    currentRank = config.currentRank ?? 0;
  } else {
    throw new ConfigError(`${username} not found in combined ranking and no currentAf configured`);
  }

  // Only variants that actually have a leaderboard count towards AF
  const totalTracks = input.leaderboards.size;
  let snapshot: StandingsSnapshot = {
    username,
    standings: input.standings,
    leaderboards: input.leaderboards,
    totalTracks,
  };
  log(`Track variants in scope: ${totalTracks}`);

  const overrides = config.timeOverrides ?? [];
  if (overrides.length > 0) {
    const applied = applyTimeOverrides(snapshot, overrides, username);
    applied.warnings.forEach(w => warn(w));
    snapshot = applied.snapshot;
    for (const change of applied.changes) {
      const oldTime = change.oldTimeCs > 0 ? formatTime(change.oldTimeCs) : 'N/A';
      log(`${change.key}: ${oldTime} -> ${formatTime(change.newTimeCs)}, rank ${change.oldRank} -> ${change.newRank}`);
    }
    if (applied.tracksAffected > 0 && totalTracks > 0) {
      const oldAf = currentAf;
      currentAf += applied.rankDelta / totalTracks;
      log(`AF adjusted by ${applied.tracksAffected} override(s): ${oldAf} -> ${currentAf.toFixed(3)}`);
    }
  }

  const onInconsistentTier = (track: TrackVariant, detail: InconsistentTier) =>
    warn(`${describeVariant(track)}: already faster than rank ${detail.targetRank}, tier skipped`);

  const opportunities = opportunityService.buildOpportunities(snapshot, { onInconsistentTier });

  const target = findOvertakeTarget(input.ranking, currentRank);
  let overtakeMinTime: OvertakePlan | null = null;
  let overtakeMinTracks: OvertakePlan | null = null;

  if (target) {
    log(`Planning overtake of #${target.rank} ${target.username} (AF ${target.af})`);
    const trackOptions = opportunityService.buildTrackOptions(snapshot);
    const request = {
      currentAf,
      targetAf: target.af,
      targetUsername: target.username,
      totalTracks,
      exclude: config.excludeFromPlans,
    };
    overtakeMinTime = overtakePlanService.planMinTime(trackOptions, request);
    overtakeMinTracks = overtakePlanService.planMinTracks(trackOptions, request);
  }

  const report = reportService.buildReportData({
    username,
    currentAf,
    currentRank,
    totalTracks,
    opportunities,
    overtakeMinTime,
    overtakeMinTracks,
    generatedAt: input.now ?? new Date(),
  });

  return {
    currentAf,
    currentRank,
    totalTracks,
    opportunities,
    target,
    overtakeMinTime,
    overtakeMinTracks,
    report,
  };
}
