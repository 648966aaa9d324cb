import { DEFAULT_RATING_OPTIONS, RatingOptions } from "../engine/elo";
import { parseGameRecord } from "../engine/schema";
import { scoreGame } from "../engine/scoring";
import { AgentStanding, Standings, applyResult } from "../engine/standings";
import { GameResult, RatingSnapshot, ScoringError } from "../engine/types";

export type ResultListener = (result: GameResult, store: LeagueStore) => void;

/**
 * In-memory league registry: the rating table, the append-only results log and folded standings.
 * The HTTP and WS layers both treat it as the single source of truth per process.
 */
export class LeagueStore {
  private ratings: RatingSnapshot = new Map();
  private standings: Standings = new Map();
  private results = new Map<string, GameResult>();
  private listeners = new Set<ResultListener>();

  constructor(readonly ratingOptions: RatingOptions = DEFAULT_RATING_OPTIONS) {}

  /**
   * Read-snapshot → score → commit for one game.
   * Runs synchronously, so it cannot interleave with another submission on the event loop.
   * A rejected record leaves every table untouched.
   */
  submit(input: unknown): GameResult {
    const record = parseGameRecord(input);
    if (this.results.has(record.gameId)) {
      throw new ScoringError("GAME_ALREADY_SCORED", `Game ${record.gameId} was already scored`);
    }

    const scored = scoreGame(record, this.ratings, this.ratingOptions);
    const standings = applyResult(this.standings, scored.result);

    // Nothing is written until every table is computed.
    this.ratings = scored.ratings;
    this.standings = standings;
    this.results.set(scored.result.gameId, scored.result);

    for (const listener of this.listeners) {
      try {
        listener(scored.result, this);
      } catch (err) {
        console.error(`Result listener failed for game ${scored.result.gameId}`, err);
      }
    }
    return scored.result;
  }

  /** Registers a callback fired after every committed game. Returns the unsubscribe function. */
  onResult(listener: ResultListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Fetches a result by game id or undefined when missing. */
  getResult(gameId: string): GameResult | undefined {
    return this.results.get(gameId);
  }

  /** Results in commit order. */
  listResults(): GameResult[] {
    return Array.from(this.results.values());
  }

  getStanding(agentId: string): AgentStanding | undefined {
    return this.standings.get(agentId);
  }

  getStandings(): Standings {
    return this.standings;
  }

  getRatings(): RatingSnapshot {
    return this.ratings;
  }

  /** Seats the agent filled, oldest game first. */
  history(agentId: string) {
    return this.listResults().flatMap(result =>
      result.players.filter(p => p.agentId === agentId).map(player => ({ gameId: result.gameId, player }))
    );
  }
}
