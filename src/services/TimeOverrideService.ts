/**
 * TimeOverrideService: applies times the player has set but that are not
 * on the site yet, so the analysis starts from where they really are.
 *
 * Works on copies: the snapshot passed in is left untouched.
 */

import {
  LapCount,
  LeaderboardEntry,
  PlayerStanding,
  StandingsSnapshot,
  TrackCategory,
  Vehicle,
  isSameUser,
  variantKey,
} from '../models/Track';
import { parseTime } from '../utils/timeFormat';

export interface TimeOverride {
  track: string;
  vehicle: Vehicle;
  category?: TrackCategory;
  laps: LapCount;
  time: string;
}

export interface OverrideChange {
  key: string;
  oldTimeCs: number;
  newTimeCs: number;
  oldRank: number;
  newRank: number;
}

export interface OverrideResult {
  snapshot: StandingsSnapshot;
  rankDelta: number; // negative = improvement
  tracksAffected: number;
  changes: OverrideChange[];
  warnings: string[];
}

/**
 * Real entries by time, placeholders after. Real ties share a rank; the
 * running rank advances once per real entry, and placeholders take the
 * running rank without advancing it.
 */
export function rerankEntries(entries: readonly LeaderboardEntry[]): LeaderboardEntry[] {
  const sorted = [...entries].sort((a, b) => {
    if (a.isDefault !== b.isDefault) return a.isDefault ? 1 : -1;
    return a.timeCs - b.timeCs;
  });

  const ranked: LeaderboardEntry[] = [];
  let rank = 1;
  for (const entry of sorted) {
    if (entry.isDefault) {
      ranked.push({ ...entry, rank });
      continue;
    }
    const prev = ranked[ranked.length - 1];
    const tied = prev !== undefined && !prev.isDefault && prev.timeCs === entry.timeCs;
    ranked.push({ ...entry, rank: tied ? prev.rank : rank });
    rank++;
  }
  return ranked;
}

// An N/A player effectively sits one past the last real entry
function currentRankOf(standing: PlayerStanding, entries: readonly LeaderboardEntry[]): number {
  if (!standing.isNa) return standing.rank;
  const real = entries.filter(e => !e.isDefault);
  return real.length > 0 ? real[real.length - 1].rank + 1 : 1;
}

export function applyTimeOverrides(
  snapshot: StandingsSnapshot,
  overrides: readonly TimeOverride[],
  username: string
): OverrideResult {
  const standings: PlayerStanding[] = snapshot.standings.map(s => ({ ...s }));
  const leaderboards = new Map<string, readonly LeaderboardEntry[]>(snapshot.leaderboards);
  const changes: OverrideChange[] = [];
  const warnings: string[] = [];
  let rankDelta = 0;

  for (const override of overrides) {
    const key = variantKey({
      trackSlug: override.track,
      vehicle: override.vehicle,
      category: override.category ?? 'standard',
      laps: override.laps,
    });
    const newTimeCs = parseTime(override.time);

    const standingIdx = standings.findIndex(s => variantKey(s) === key);
    if (standingIdx === -1) {
      warnings.push(`Override for ${key} has no matching player track`);
      continue;
    }

    const entries = leaderboards.get(key);
    if (!entries || entries.length === 0) {
      warnings.push(`No leaderboard for ${key}`);
      continue;
    }

    const standing = standings[standingIdx];
    const existing = entries.find(e => isSameUser(e.username, username));
    const oldRank = existing ? existing.rank : currentRankOf(standing, entries);

    const updated: LeaderboardEntry[] = existing
      ? entries.map(e => (e === existing ? { ...e, timeCs: newTimeCs } : e))
      : [...entries, { rank: 0, username, displayName: username, timeCs: newTimeCs, isDefault: false }];

    const reranked = rerankEntries(updated);
    leaderboards.set(key, reranked);

    const mine = reranked.find(e => isSameUser(e.username, username));
    const newRank = mine ? mine.rank : oldRank;

    changes.push({ key, oldTimeCs: standing.timeCs, newTimeCs, oldRank, newRank });
    standings[standingIdx] = { ...standing, timeCs: newTimeCs, rank: newRank, isNa: false };
    rankDelta += newRank - oldRank;
  }

  return {
    snapshot: { ...snapshot, standings, leaderboards },
    rankDelta,
    tracksAffected: changes.length,
    changes,
    warnings,
  };
}
