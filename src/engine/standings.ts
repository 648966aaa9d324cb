import { DEFAULT_RATING_OPTIONS } from "./elo";
import { AgentRatings, GameResult, RoleClass, ScoredMetrics } from "./types";

export interface PoolRecord {
  games: number;
  wins: number;
}

/** Cumulative per-agent state folded from scored games. */
export interface AgentStanding {
  agentId: string;
  ratings: AgentRatings;
  gamesPlayed: number;
  wins: number;
  losses: number;
  pools: Record<RoleClass, PoolRecord>;
  /** Running mean of every metric across all seats played. */
  averages: ScoredMetrics;
  lastGameId: string | null;
}

export type Standings = ReadonlyMap<string, AgentStanding>;

export interface LeaderboardEntry {
  rank: number;
  agentId: string;
  rating: number;
  gamesPlayed: number;
  wins: number;
  losses: number;
  /** Percentage, one decimal. */
  winRate: number;
  poolGames: number;
  poolWins: number;
  averageAggregate: number;
}

const METRIC_KEYS: readonly (keyof ScoredMetrics)[] = [
  "influence",
  "consistency",
  "sabotage",
  "detection",
  "deception",
  "survival",
  "aggregate"
];

function emptyMetrics(): ScoredMetrics {
  return { influence: 0, consistency: 0, sabotage: 0, detection: 0, deception: 0, survival: 0, aggregate: 0 };
}

export function emptyStanding(agentId: string): AgentStanding {
  return {
    agentId,
    ratings: {},
    gamesPlayed: 0,
    wins: 0,
    losses: 0,
    pools: { WEREWOLVES: { games: 0, wins: 0 }, VILLAGERS: { games: 0, wins: 0 } },
    averages: emptyMetrics(),
    lastGameId: null
  };
}

/**
 * Folds one scored game into the standings (pure; returns a new map).
 * Every seat counts as a game, so an agent filling two seats is credited twice.
 */
export function applyResult(standings: Standings, result: GameResult): Standings {
  const next = new Map(standings);

  for (const player of result.players) {
    const current = next.get(player.agentId) ?? emptyStanding(player.agentId);
    const gamesPlayed = current.gamesPlayed + 1;
    const averages = emptyMetrics();
    for (const key of METRIC_KEYS) {
      averages[key] = current.averages[key] + (player.metrics[key] - current.averages[key]) / gamesPlayed;
    }
    const pool = current.pools[player.ratingPool];

    next.set(player.agentId, {
      ...current,
      gamesPlayed,
      wins: current.wins + (player.won ? 1 : 0),
      losses: current.losses + (player.won ? 0 : 1),
      pools: {
        ...current.pools,
        [player.ratingPool]: { games: pool.games + 1, wins: pool.wins + (player.won ? 1 : 0) }
      },
      averages,
      lastGameId: result.gameId
    });
  }

  for (const update of result.ratingUpdates) {
    const current = next.get(update.agentId) ?? emptyStanding(update.agentId);
    next.set(update.agentId, { ...current, ratings: { ...current.ratings, [update.pool]: update.after } });
  }

  return next;
}

/** Ranks every agent with at least one game by the chosen pool's rating. */
export function buildLeaderboard(
  standings: Standings,
  pool: RoleClass,
  initialRating: number = DEFAULT_RATING_OPTIONS.initialRating
): LeaderboardEntry[] {
  const rows = [...standings.values()]
    .filter(s => s.gamesPlayed > 0)
    .map(s => ({ standing: s, rating: s.ratings[pool] ?? initialRating }));

  rows.sort(
    (a, b) =>
      b.rating - a.rating ||
      b.standing.gamesPlayed - a.standing.gamesPlayed ||
      a.standing.agentId.localeCompare(b.standing.agentId)
  );

  return rows.map(({ standing, rating }, index) => ({
    rank: index + 1,
    agentId: standing.agentId,
    rating,
    gamesPlayed: standing.gamesPlayed,
    wins: standing.wins,
    losses: standing.losses,
    winRate: Math.round((standing.wins * 1000) / standing.gamesPlayed) / 10,
    poolGames: standing.pools[pool].games,
    poolWins: standing.pools[pool].wins,
    averageAggregate: standing.averages.aggregate
  }));
}
