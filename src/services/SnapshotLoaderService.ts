/**
 * SnapshotLoaderService: reads an already-scraped standings snapshot from a
 * directory of CSV files:
 *
 *   standings.csv     track_slug,track_name,vehicle,category,laps,time,rank
 *   leaderboards.csv  track_slug,vehicle,category,laps,rank,username,display_name,time,is_default
 *   ranking.csv       rank,username,display_name,af,gap
 *
 * Leaderboard rows keep file order within each variant; that order is the
 * leaderboard order.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import {
  CombinedRankingEntry,
  LapCount,
  LeaderboardEntry,
  PlayerStanding,
  TrackCategory,
  Vehicle,
  isLapCount,
  isTrackCategory,
  isVehicle,
  variantKey,
} from '../models/Track';
import { TimeFormatError, parseTime } from '../utils/timeFormat';

export class SnapshotFormatError extends Error {
  constructor(public readonly file: string, public readonly line: number, reason: string) {
    super(`${file}:${line}: ${reason}`);
    this.name = 'SnapshotFormatError';
  }
}

export interface LoadedSnapshot {
  standings: PlayerStanding[];
  leaderboards: Map<string, LeaderboardEntry[]>;
  ranking: CombinedRankingEntry[];
}

type CsvRow = Record<string, string>;

const NA_TIMES = new Set(['', 'N/A', 'n/a']);

/** Reads typed columns out of one CSV row, reporting the file and line on failure. */
class RowReader {
  constructor(private file: string, private line: number, private row: CsvRow) {}

  fail(reason: string): never {
    throw new SnapshotFormatError(this.file, this.line, reason);
  }

  text(column: string): string {
    const value = this.row[column];
    if (value === undefined) return this.fail(`missing column "${column}"`);
    return value;
  }

  int(column: string): number {
    const raw = this.text(column);
    if (!/^-?\d+$/.test(raw)) return this.fail(`${column} "${raw}" is not an integer`);
    return parseInt(raw, 10);
  }

  float(column: string): number {
    const raw = this.text(column);
    const value = Number(raw);
    if (raw === '' || !Number.isFinite(value)) return this.fail(`${column} "${raw}" is not a number`);
    return value;
  }

  bool(column: string): boolean {
    const raw = this.text(column).toLowerCase();
    if (raw === 'true' || raw === '1' || raw === 'yes') return true;
    if (raw === 'false' || raw === '0' || raw === 'no' || raw === '') return false;
    return this.fail(`${column} "${raw}" is not a boolean`);
  }

  time(column: string): number {
    try {
      return parseTime(this.text(column));
    } catch (err) {
      if (err instanceof TimeFormatError) return this.fail(err.message);
      throw err;
    }
  }

  vehicle(): Vehicle {
    const raw = this.text('vehicle');
    return isVehicle(raw) ? raw : this.fail(`unknown vehicle "${raw}"`);
  }

  category(): TrackCategory {
    const raw = this.text('category');
    return isTrackCategory(raw) ? raw : this.fail(`unknown category "${raw}"`);
  }

  laps(): LapCount {
    const raw = this.text('laps');
    return isLapCount(raw) ? raw : this.fail(`unknown lap count "${raw}"`);
  }
}

interface CsvRecord {
  line: number;
  row: CsvRow;
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

// With `info`, csv-parse reports the physical line each record ends on
function parseRows(file: string, content: string): CsvRecord[] {
  const records: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    info: true,
  });
  if (!Array.isArray(records)) {
    throw new SnapshotFormatError(file, 0, 'expected a list of rows');
  }
  return records.map((item: unknown) => {
    const record: unknown = isObject(item) && 'record' in item ? item.record : undefined;
    const info: unknown = isObject(item) && 'info' in item ? item.info : undefined;
    const line: unknown = isObject(info) && 'lines' in info ? info.lines : undefined;
    if (typeof line !== 'number' || !isObject(record)) {
      throw new SnapshotFormatError(file, typeof line === 'number' ? line : 0, 'malformed row');
    }
    const row: CsvRow = {};
    for (const [column, value] of Object.entries(record)) {
      row[column] = String(value);
    }
    return { line, row };
  });
}

function readRows<T>(file: string, content: string, read: (reader: RowReader) => T): T[] {
  return parseRows(file, content).map(({ line, row }) => read(new RowReader(file, line, row)));
}

export function parseStandingsCsv(content: string, file = 'standings.csv'): PlayerStanding[] {
  return readRows(file, content, r => {
    const rawTime = r.text('time');
    const isNa = NA_TIMES.has(rawTime);
    return {
      trackSlug: r.text('track_slug'),
      trackName: r.text('track_name'),
      vehicle: r.vehicle(),
      category: r.category(),
      laps: r.laps(),
      timeCs: isNa ? 0 : r.time('time'),
      rank: isNa ? 0 : r.int('rank'),
      isNa,
    };
  });
}

export function parseLeaderboardsCsv(content: string, file = 'leaderboards.csv'): Map<string, LeaderboardEntry[]> {
  const leaderboards = new Map<string, LeaderboardEntry[]>();
  const rows = readRows(file, content, r => ({
    key: variantKey({
      trackSlug: r.text('track_slug'),
      vehicle: r.vehicle(),
      category: r.category(),
      laps: r.laps(),
    }),
    entry: {
      rank: r.int('rank'),
      username: r.text('username'),
      displayName: r.text('display_name'),
      timeCs: r.time('time'),
      isDefault: r.bool('is_default'),
    },
  }));

  for (const { key, entry } of rows) {
    const list = leaderboards.get(key);
    if (list) {
      list.push(entry);
    } else {
      leaderboards.set(key, [entry]);
    }
  }
  return leaderboards;
}

export function parseRankingCsv(content: string, file = 'ranking.csv'): CombinedRankingEntry[] {
  return readRows(file, content, r => ({
    rank: r.int('rank'),
    username: r.text('username'),
    displayName: r.text('display_name'),
    af: r.float('af'),
    gap: r.float('gap'),
  }));
}

class SnapshotLoaderService {
  /**
   * Load all three files from `dir`. A missing leaderboards or ranking file
   * yields an empty collection; a missing standings file is an error since
   * there is nothing to analyze without it.
   */
  loadSnapshot(dir: string): LoadedSnapshot {
    const standingsPath = path.join(dir, 'standings.csv');
    if (!fs.existsSync(standingsPath)) {
      throw new Error(`Standings file not found: ${standingsPath}`);
    }

    const standings = parseStandingsCsv(fs.readFileSync(standingsPath, 'utf-8'), standingsPath);

    const leaderboardsPath = path.join(dir, 'leaderboards.csv');
    const leaderboards = fs.existsSync(leaderboardsPath)
      ? parseLeaderboardsCsv(fs.readFileSync(leaderboardsPath, 'utf-8'), leaderboardsPath)
      : new Map<string, LeaderboardEntry[]>();

    const rankingPath = path.join(dir, 'ranking.csv');
    const ranking = fs.existsSync(rankingPath)
      ? parseRankingCsv(fs.readFileSync(rankingPath, 'utf-8'), rankingPath)
      : [];

    return { standings, leaderboards, ranking };
  }
}

export const snapshotLoaderService = new SnapshotLoaderService();
