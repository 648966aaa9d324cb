/**
 * Core domain types for the Werewolf league scoring engine.
 * Keep this file dependency-free so it can be shared across layers.
 */

/** Seat assigned to every participant. */
export type Role = "WEREWOLF" | "SEER" | "DOCTOR" | "VILLAGER";

/** The two opposing factions. */
export type Team = "WEREWOLVES" | "VILLAGERS";

/** Rating pool a seat is scored under: the team it played for. */
export type RoleClass = Team;

/** What a role's behaviour is judged on. */
export type Capability = "DETECTION" | "DECEPTION";

export type EliminationCause = "VOTE" | "KILL";

/** One seat in a finished game. */
export interface Participant {
  playerId: string;
  agentId: string;
  role: Role;
  survived: boolean;
  eliminatedRound: number | null;
}

/** Typed entries of a finished game's log, in the order they happened. */
export type GameEvent =
  | { type: "VOTE"; round: number; voterId: string; targetId: string }
  | { type: "DEBATE"; round: number; speakerId: string }
  | { type: "ACCUSATION"; round: number; accuserId: string; accusedId: string; successful: boolean }
  | { type: "ELIMINATION"; round: number; victimId: string; cause: EliminationCause }
  | { type: "INVESTIGATION"; round: number; investigatorId: string; targetId: string; isWerewolf: boolean }
  | { type: "PROTECTION"; round: number; protectorId: string; targetId: string; successful: boolean }
  | { type: "SUSPICION"; round: number; targetId: string; truthful: boolean };

/** Finalized game handed over by the game runner. Immutable once it concludes. */
export interface GameRecord {
  gameId: string;
  winner: Team;
  totalRounds: number;
  participants: Participant[];
  events: GameEvent[];
}

/** Bounded [0,1] behaviour scores for one seat. */
export interface MetricScores {
  influence: number;
  consistency: number;
  /** Penalty: lower is better. */
  sabotage: number;
  detection: number;
  deception: number;
}

export interface ScoredMetrics extends MetricScores {
  survival: number;
  aggregate: number;
}

/** One participant's scored game. Never mutated after creation. */
export interface PlayerGameRecord {
  playerId: string;
  agentId: string;
  role: Role;
  team: Team;
  won: boolean;
  survived: boolean;
  eliminatedRound: number | null;
  roundsSurvived: number;
  metrics: ScoredMetrics;
  ratingPool: RoleClass;
  ratingBefore: number;
  ratingDelta: number;
}

/** Ratings per pool; a missing pool reads as the initial rating. */
export type AgentRatings = Partial<Record<RoleClass, number>>;

/** Externally-owned rating table keyed by agent id. Agent ids are untrusted, so never a plain object. */
export type RatingSnapshot = ReadonlyMap<string, AgentRatings>;

export interface RatingUpdate {
  agentId: string;
  pool: RoleClass;
  before: number;
  delta: number;
  after: number;
}

/** Full output of scoring one game. Append-only. */
export interface GameResult {
  gameId: string;
  winner: Team;
  totalRounds: number;
  players: PlayerGameRecord[];
  ratingUpdates: RatingUpdate[];
}

export type ScoringErrorCode =
  | "MALFORMED_ROLE_COMPOSITION"
  | "INCOMPLETE_EVENT_LOG"
  | "GAME_ALREADY_SCORED"
  | "GAME_NOT_FOUND"
  | "AGENT_NOT_FOUND"
  | "INVALID_POOL";

/** Application-level error for rejected records and lookups. Surfaces to clients as structured error codes. */
export class ScoringError extends Error {
  constructor(
    public code: ScoringErrorCode,
    message: string,
    public issues: string[] = []
  ) {
    super(message);
    this.name = "ScoringError";
  }
}
