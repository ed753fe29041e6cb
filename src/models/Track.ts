export type Vehicle = 'car' | 'hover' | 'plane';
export type TrackCategory = 'standard' | 'shortcut';
export type LapCount = '3-laps' | '1-lap';

export const VEHICLES: readonly Vehicle[] = ['car', 'hover', 'plane'];
export const TRACK_CATEGORIES: readonly TrackCategory[] = ['standard', 'shortcut'];
export const LAP_COUNTS: readonly LapCount[] = ['3-laps', '1-lap'];

/**
 * One scored combination of track, vehicle, category and lap count.
 * Every leaderboard (and every AF position) belongs to exactly one variant.
 */
export interface TrackVariant {
  trackSlug: string;
  trackName: string;
  vehicle: Vehicle;
  category: TrackCategory;
  laps: LapCount;
}

/**
 * The player's own standing on a variant. `timeCs` and `rank` are 0 when
 * the player has never submitted a time (`isNa`).
 */
export interface PlayerStanding extends TrackVariant {
  timeCs: number;
  rank: number;
  isNa: boolean;
}

export interface LeaderboardEntry {
  rank: number;
  username: string;
  displayName: string;
  timeCs: number;
  isDefault: boolean; // synthetic "Default Time" placeholder
}

export interface CombinedRankingEntry {
  rank: number;
  username: string;
  displayName: string;
  af: number;
  gap: number;
}

/**
 * Everything the analysis needs, captured once. Leaderboards are keyed by
 * `variantKey`; a missing key means the variant has no leaderboard and is
 * out of scope.
 */
export interface StandingsSnapshot {
  username: string;
  standings: readonly PlayerStanding[];
  leaderboards: ReadonlyMap<string, readonly LeaderboardEntry[]>;
  totalTracks: number;
}

type VariantIdentity = Pick<TrackVariant, 'trackSlug' | 'vehicle' | 'category' | 'laps'>;

export function variantKey(variant: VariantIdentity): string {
  return `${variant.trackSlug}/${variant.vehicle}/${variant.category}/${variant.laps}`;
}

export function describeVariant(variant: TrackVariant): string {
  return `${variant.trackName} (${variant.vehicle}/${variant.category}/${variant.laps})`;
}

export function isVehicle(value: string): value is Vehicle {
  return (VEHICLES as readonly string[]).includes(value);
}

export function isTrackCategory(value: string): value is TrackCategory {
  return (TRACK_CATEGORIES as readonly string[]).includes(value);
}

export function isLapCount(value: string): value is LapCount {
  return (LAP_COUNTS as readonly string[]).includes(value);
}

export function isSameUser(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
