import { LeaderboardEntry, PlayerStanding, StandingsSnapshot, TrackVariant, variantKey } from '../models/Track';
import { INFINITE_EFFICIENCY, ZERO_EFFICIENCY } from '../models/Efficiency';
import { computeNaOpportunity, computeRankedOpportunity, opportunityService } from './OpportunityService';
import { InconsistentTier } from './TierDerivationService';

// ============================================================================
// Helpers
// ============================================================================

function makeStanding(overrides: Partial<PlayerStanding> = {}): PlayerStanding {
  return {
    trackSlug: 'ancient-lake',
    trackName: 'Ancient Lake',
    vehicle: 'car',
    category: 'standard',
    laps: '3-laps',
    timeCs: 10000,
    rank: 5,
    isNa: false,
    ...overrides,
  };
}

function makeEntry(rank: number, timeCs: number, username = `player${rank}`, isDefault = false): LeaderboardEntry {
  return { rank, username, displayName: username, timeCs, isDefault };
}

const BOARD: LeaderboardEntry[] = [
  makeEntry(1, 9000),
  makeEntry(2, 9200),
  makeEntry(3, 9400),
  makeEntry(4, 9600),
  makeEntry(5, 10000, 'Racer'),
  makeEntry(6, 10500),
  makeEntry(7, 20000, 'default', true),
];

function makeSnapshot(standings: PlayerStanding[], boards: Array<[PlayerStanding, LeaderboardEntry[]]>): StandingsSnapshot {
  return {
    username: 'racer',
    standings,
    leaderboards: new Map(boards.map(([s, entries]) => [variantKey(s), entries])),
    totalTracks: 10,
  };
}

const realOnly = (entries: LeaderboardEntry[]) => entries.filter(e => !e.isDefault);

// ============================================================================
// Ranked tracks
// ============================================================================

describe('computeRankedOpportunity', () => {
  test('finds the player case-insensitively and derives display tiers', () => {
    const opp = computeRankedOpportunity(makeStanding(), realOnly(BOARD), 10, 'racer');

    expect(opp.currentRank).toBe(5);
    expect(opp.currentTimeCs).toBe(10000);
    expect(opp.isNa).toBe(false);
    expect(opp.tiers.map(t => t.positionsGained)).toEqual([1, 3, 4]);
    expect(opp.tiers.map(t => t.timeDeltaCs)).toEqual([401, 801, 1001]);
  });

  test('best tier is the one with the highest efficiency', () => {
    const opp = computeRankedOpportunity(makeStanding(), realOnly(BOARD), 10, 'racer');

    // 0.1/401 < 0.3/801 < 0.4/1001
    expect(opp.bestTierIdx).toBe(2);
    expect(opp.bestEfficiency).toEqual({ kind: 'finite', value: 0.4 / 1001 });
  });

  test('falls back to the standing when the player is missing from the board', () => {
    const board = [makeEntry(1, 9000), makeEntry(2, 9200), makeEntry(3, 9400), makeEntry(4, 9600)];
    const opp = computeRankedOpportunity(makeStanding({ rank: 5, timeCs: 9500 }), board, 10, 'racer');

    expect(opp.currentRank).toBe(5);
    expect(opp.currentTimeCs).toBe(9500);
    // Only the three faster entries are ahead
    expect(opp.tiers.map(t => [t.positionsGained, t.targetRank, t.timeDeltaCs])).toEqual([
      [1, 3, 101],
      [3, 1, 501],
    ]);
  });

  test('rank 1 has nothing to gain', () => {
    const board = [makeEntry(1, 9000, 'Racer'), makeEntry(2, 9100)];
    const opp = computeRankedOpportunity(makeStanding({ rank: 1, timeCs: 9000 }), board, 10, 'racer');

    expect(opp.tiers).toEqual([]);
    expect(opp.bestEfficiency).toEqual(ZERO_EFFICIENCY);
    expect(opp.bestTierIdx).toBe(0);
  });

  test('all tiers dropped leaves best efficiency at zero', () => {
    // Stale board: the only player ahead is slower than the recorded time
    const inconsistent = [makeEntry(1, 9990), makeEntry(2, 9950, 'Racer')];
    const none = computeRankedOpportunity(makeStanding({ rank: 2, timeCs: 9950 }), inconsistent, 10, 'racer');
    expect(none.tiers).toEqual([]);
    expect(none.bestEfficiency).toEqual(ZERO_EFFICIENCY);
  });

  test('full climb range produces one tier per player ahead', () => {
    const opp = computeRankedOpportunity(makeStanding(), realOnly(BOARD), 10, 'racer', { climbSizes: 'full' });
    expect(opp.tiers.map(t => t.positionsGained)).toEqual([1, 2, 3, 4]);
  });
});

// ============================================================================
// N/A tracks
// ============================================================================

describe('computeNaOpportunity', () => {
  test('lands just below the worst real entry with infinite efficiency', () => {
    const opp = computeNaOpportunity(makeStanding({ isNa: true, timeCs: 0, rank: 0 }), realOnly(BOARD), 10);

    expect(opp.isNa).toBe(true);
    expect(opp.currentRank).toBe(7);
    expect(opp.currentTimeCs).toBe(0);
    expect(opp.bestEfficiency).toEqual(INFINITE_EFFICIENCY);
    expect(opp.tiers).toEqual([
      {
        targetRank: 7,
        opponentTimeCs: 10500,
        targetTimeCs: 10500,
        positionsGained: 0,
        afImprovement: 0,
        timeDeltaCs: 0,
        efficiency: INFINITE_EFFICIENCY,
      },
    ]);
  });

  test('no real entries means nothing to analyze', () => {
    const opp = computeNaOpportunity(makeStanding({ isNa: true, timeCs: 0, rank: 0 }), [], 10);
    expect(opp.tiers).toEqual([]);
    expect(opp.currentRank).toBe(0);
    expect(opp.isNa).toBe(true);
  });
});

// ============================================================================
// Aggregation
// ============================================================================

describe('opportunityService.buildOpportunities', () => {
  const ranked = makeStanding();
  const naTrack = makeStanding({ trackSlug: 'fossil-canyon', trackName: 'Fossil Canyon', isNa: true, timeCs: 0, rank: 0 });
  const first = makeStanding({ trackSlug: 'pirate-lagoon', trackName: 'Pirate Lagoon', rank: 1, timeCs: 8000 });
  const unscored = makeStanding({ trackSlug: 'hot-top-volcano', trackName: 'Hot Top Volcano' });

  const snapshot = makeSnapshot([first, ranked, unscored, naTrack], [
    [ranked, BOARD],
    [naTrack, [makeEntry(1, 9000), makeEntry(2, 9900)]],
    [first, [makeEntry(1, 8000, 'Racer'), makeEntry(2, 8100)]],
  ]);

  test('skips variants without a leaderboard', () => {
    const slugs = opportunityService.buildOpportunities(snapshot).map(o => o.track.trackSlug);
    expect(slugs).not.toContain('hot-top-volcano');
    expect(slugs).toHaveLength(3);
  });

  test('orders N/A first, then by efficiency, keeping zero-tier tracks last', () => {
    const slugs = opportunityService.buildOpportunities(snapshot).map(o => o.track.trackSlug);
    expect(slugs).toEqual(['fossil-canyon', 'ancient-lake', 'pirate-lagoon']);
  });

  test('track options use every climb size', () => {
    const options = opportunityService.buildTrackOptions(snapshot);
    const lake = options.find(o => o.track.trackSlug === 'ancient-lake');
    expect(lake?.tiers.map(t => t.positionsGained)).toEqual([1, 2, 3, 4]);
  });

  test('reports dropped tiers with their track', () => {
    const stale = makeStanding({ rank: 2, timeCs: 9950 });
    const staleSnapshot = makeSnapshot([stale], [[stale, [makeEntry(1, 9990), makeEntry(2, 9950, 'Racer')]]]);
    const seen: Array<[TrackVariant, InconsistentTier]> = [];

    opportunityService.buildOpportunities(staleSnapshot, {
      onInconsistentTier: (track, detail) => seen.push([track, detail]),
    });

    expect(seen).toHaveLength(1);
    expect(seen[0][0].trackSlug).toBe('ancient-lake');
    expect(seen[0][1].targetRank).toBe(1);
  });
});
