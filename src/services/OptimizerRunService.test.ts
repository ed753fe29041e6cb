import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CombinedRankingEntry, LeaderboardEntry, PlayerStanding, variantKey } from '../models/Track';
import {
  ConfigError,
  OptimizerInput,
  findOvertakeTarget,
  loadOptimizerConfig,
  parseOptimizerConfig,
  runOptimizer,
} from './OptimizerRunService';

// ============================================================================
// Fixture: two variants, one ranked and one N/A, chasing the leader
// ============================================================================

const lake: PlayerStanding = {
  trackSlug: 'ancient-lake',
  trackName: 'Ancient Lake',
  vehicle: 'car',
  category: 'standard',
  laps: '3-laps',
  timeCs: 9500,
  rank: 2,
  isNa: false,
};

const canyon: PlayerStanding = {
  ...lake,
  trackSlug: 'fossil-canyon',
  trackName: 'Fossil Canyon',
  timeCs: 0,
  rank: 0,
  isNa: true,
};

function entry(username: string, rank: number, timeCs: number): LeaderboardEntry {
  return { rank, username, displayName: username, timeCs, isDefault: false };
}

const RANKING: CombinedRankingEntry[] = [
  { rank: 1, username: 'Leader', displayName: 'Leader', af: 1.0, gap: 0 },
  { rank: 2, username: 'Racer', displayName: 'Racer', af: 1.25, gap: 0.25 },
];

function makeInput(overrides: Partial<OptimizerInput> = {}): OptimizerInput {
  return {
    username: 'racer',
    standings: [lake, canyon],
    leaderboards: new Map([
      [variantKey(lake), [entry('Leader', 1, 9000), entry('Racer', 2, 9500)]],
      [variantKey(canyon), [entry('Leader', 1, 8000)]],
    ]),
    ranking: RANKING,
    config: {},
    now: new Date('2026-03-01T00:00:00Z'),
    ...overrides,
  };
}

describe('runOptimizer', () => {
  test('ranks opportunities and plans the overtake of the player above', () => {
    const result = runOptimizer(makeInput());

    expect(result.currentAf).toBe(1.25);
    expect(result.currentRank).toBe(2);
    expect(result.totalTracks).toBe(2);
    expect(result.opportunities.map(o => o.track.trackSlug)).toEqual(['fossil-canyon', 'ancient-lake']);
    expect(result.target?.username).toBe('Leader');

    const minTime = result.overtakeMinTime;
    expect(minTime?.feasible).toBe(true);
    expect(minTime?.totalPositionsNeeded).toBe(1);
    expect(minTime?.totalTimeInvestmentCs).toBe(501);
    expect(minTime?.newAf).toBe(0.75);
    expect(minTime?.items.map(i => i.track.trackSlug)).toEqual(['ancient-lake', 'fossil-canyon']);
    expect(result.overtakeMinTracks?.totalPositionsGained).toBe(1);

    expect(result.report.summary).toEqual({ na_tracks: 1, improvable_tracks: 1, no_improvement_tracks: 0 });
    expect(result.report.generated_at).toBe('2026-03-01T00:00:00.000Z');
  });

  test('applies time overrides before analysing', () => {
    const logs: string[] = [];
    const result = runOptimizer(makeInput({
      config: { timeOverrides: [{ track: 'ancient-lake', vehicle: 'car', laps: '3-laps', time: '01:29:00' }] },
      log: message => logs.push(message),
    }));

    // Rank 2 -> 1 on one of two tracks
    expect(result.currentAf).toBe(0.75);
    expect(logs).toContain('ancient-lake/car/standard/3-laps: 01:35.00 -> 01:29.00, rank 2 -> 1');
    expect(logs).toContain('AF adjusted by 1 override(s): 1.25 -> 0.750');
    expect(result.opportunities.find(o => o.track.trackSlug === 'ancient-lake')?.tiers).toEqual([]);
    // Already ahead of the leader's AF
    expect(result.overtakeMinTime?.totalPositionsNeeded).toBe(0);
    expect(result.overtakeMinTime?.items).toEqual([]);
  });

  test('excluded tracks make the overtake infeasible here', () => {
    const result = runOptimizer(makeInput({
      config: { excludeFromPlans: [{ track: 'ancient-lake', vehicle: 'car' }] },
    }));

    expect(result.overtakeMinTime?.feasible).toBe(false);
    expect(result.overtakeMinTime?.items.map(i => i.track.trackSlug)).toEqual(['fossil-canyon']);
    expect(result.overtakeMinTracks?.feasible).toBe(false);
  });

  test('falls back to the configured AF when the player is not ranked', () => {
    const warnings: string[] = [];
    const result = runOptimizer(makeInput({
      ranking: [RANKING[0]],
      config: { currentAf: 1.5 },
      warn: message => warnings.push(message),
    }));

    expect(result.currentAf).toBe(1.5);
    expect(result.target).toBeNull();
    expect(result.overtakeMinTime).toBeNull();
    expect(warnings).toEqual(['racer not found in combined ranking, using configured AF 1.5']);
  });

  test('plans from the configured rank when the player is not ranked', () => {
    const result = runOptimizer(makeInput({
      ranking: [RANKING[0]],
      config: { currentAf: 1.25, currentRank: 2 },
    }));

    expect(result.currentRank).toBe(2);
    expect(result.target?.username).toBe('Leader');
    expect(result.overtakeMinTime?.feasible).toBe(true);
    expect(result.overtakeMinTime?.totalTimeInvestmentCs).toBe(501);
  });

  test('refuses to guess an AF', () => {
    expect(() => runOptimizer(makeInput({ ranking: [RANKING[0]] }))).toThrow(ConfigError);
  });
});

describe('findOvertakeTarget', () => {
  test('picks the player one place above', () => {
    expect(findOvertakeTarget(RANKING, 2)?.username).toBe('Leader');
  });

  test('nobody to overtake at rank 1 or when the rank is missing', () => {
    expect(findOvertakeTarget(RANKING, 1)).toBeNull();
    expect(findOvertakeTarget(RANKING, 5)).toBeNull();
  });
});

describe('parseOptimizerConfig', () => {
  test('reads overrides with a default category', () => {
    const config = parseOptimizerConfig({
      username: 'Racer',
      timeOverrides: [{ track: 'ancient-lake', vehicle: 'car', laps: '3-laps', time: '01:29:00' }],
      excludeFromPlans: [{ track: 'fossil-canyon', vehicle: 'plane' }],
    });

    expect(config).toEqual({
      username: 'Racer',
      currentAf: undefined,
      outputDir: undefined,
      timeOverrides: [{ track: 'ancient-lake', vehicle: 'car', category: 'standard', laps: '3-laps', time: '01:29:00' }],
      excludeFromPlans: [{ track: 'fossil-canyon', vehicle: 'plane' }],
    });
  });

  test('rejects invalid values', () => {
    expect(() => parseOptimizerConfig([])).toThrow('config must be a JSON object');
    expect(() => parseOptimizerConfig({ currentAf: 'low' })).toThrow('"currentAf" must be a number');
    expect(() => parseOptimizerConfig({ currentRank: 1.5 })).toThrow('"currentRank" must be a positive integer');
    expect(() => parseOptimizerConfig({
      timeOverrides: [{ track: 'ancient-lake', vehicle: 'boat', laps: '3-laps', time: '01:29:00' }],
    })).toThrow('timeOverrides[0] has an invalid vehicle');
  });
});

describe('loadOptimizerConfig', () => {
  test('a missing file means defaults', () => {
    expect(loadOptimizerConfig(path.join(os.tmpdir(), 'no-such-optimizer-config.json'))).toEqual({});
  });

  test('invalid JSON is a config error', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'af-config-'));
    const file = path.join(dir, 'optimizer.config.json');
    fs.writeFileSync(file, '{ not json');
    try {
      expect(() => loadOptimizerConfig(file)).toThrow(ConfigError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
