import { opposingTeam, teamOf } from "./roles";
import { Participant, RatingSnapshot, RatingUpdate, RoleClass, Team } from "./types";
import { mean } from "./utils";

/** Tunable knobs for the rating pools. */
export interface RatingOptions {
  kFactor: number;
  initialRating: number;
}

export const DEFAULT_RATING_OPTIONS: RatingOptions = {
  kFactor: 32,
  initialRating: 1000
};

/** Merges supplied overrides with the default options. */
export function mergeRatingOptions(overrides?: Partial<RatingOptions>): RatingOptions {
  return { ...DEFAULT_RATING_OPTIONS, ...overrides };
}

/** Standard Elo expectation of `rating` against `opponentRating`. */
export function expectedScore(rating: number, opponentRating: number): number {
  return 1 / (1 + 10 ** ((opponentRating - rating) / 400));
}

/** Signed integer adjustment after one game. */
export function ratingDelta(
  rating: number,
  opponentAverage: number,
  won: boolean,
  kFactor: number = DEFAULT_RATING_OPTIONS.kFactor
): number {
  const actual = won ? 1 : 0;
  return Math.round(kFactor * (actual - expectedScore(rating, opponentAverage)));
}

/** Reads a pool rating, falling back to the initial rating for unseen agents or pools. */
export function ratingOf(
  snapshot: RatingSnapshot,
  agentId: string,
  pool: RoleClass,
  initialRating: number = DEFAULT_RATING_OPTIONS.initialRating
): number {
  return snapshot.get(agentId)?.[pool] ?? initialRating;
}

/** Rating outcome for one seat, computed from pre-game ratings only. */
export interface SeatRating {
  playerId: string;
  agentId: string;
  pool: RoleClass;
  before: number;
  opponentAverage: number;
  delta: number;
}

/**
 * Computes every seat's delta against the mean pre-game rating of the opposing seats.
 * Each seat reads the pool of the team it played for. Order-independent.
 */
export function computeSeatRatings(
  participants: readonly Participant[],
  winner: Team,
  snapshot: RatingSnapshot,
  options: RatingOptions = DEFAULT_RATING_OPTIONS
): SeatRating[] {
  const pre = participants.map(p => {
    const pool = teamOf(p.role);
    return { participant: p, pool, rating: ratingOf(snapshot, p.agentId, pool, options.initialRating) };
  });

  return pre.map(({ participant, pool, rating }) => {
    const opponents = pre.filter(other => other.pool === opposingTeam(pool)).map(other => other.rating);
    const opponentAverage = opponents.length > 0 ? mean(opponents) : options.initialRating;
    return {
      playerId: participant.playerId,
      agentId: participant.agentId,
      pool,
      before: rating,
      opponentAverage,
      delta: ratingDelta(rating, opponentAverage, pool === winner, options.kFactor)
    };
  });
}

/**
 * Folds seat results into one additive update per (agent, pool).
 * An agent occupying several seats of the same pool gets the sum of those deltas.
 */
export function collectRatingUpdates(seats: readonly SeatRating[]): RatingUpdate[] {
  const updates = new Map<string, RatingUpdate>();
  for (const seat of seats) {
    const key = `${seat.agentId}\u0000${seat.pool}`;
    const existing = updates.get(key);
    if (existing) {
      existing.delta += seat.delta;
      existing.after = existing.before + existing.delta;
    } else {
      updates.set(key, {
        agentId: seat.agentId,
        pool: seat.pool,
        before: seat.before,
        delta: seat.delta,
        after: seat.before + seat.delta
      });
    }
  }
  return [...updates.values()];
}

/** Returns a new snapshot with the updates written; the input is left untouched. */
export function applyRatingUpdates(snapshot: RatingSnapshot, updates: readonly RatingUpdate[]): RatingSnapshot {
  const next = new Map(snapshot);
  for (const update of updates) {
    next.set(update.agentId, { ...next.get(update.agentId), [update.pool]: update.after });
  }
  return next;
}
