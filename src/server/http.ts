import express, { NextFunction, Request, Response } from "express";
import { isTeam } from "../engine/roles";
import { buildLeaderboard } from "../engine/standings";
import { RoleClass, ScoringError, ScoringErrorCode } from "../engine/types";
import { buildGameSummary } from "../shared/messages";
import { LeagueStore } from "./store";

const STATUS_BY_CODE: Record<ScoringErrorCode, number> = {
  MALFORMED_ROLE_COMPOSITION: 422,
  INCOMPLETE_EVENT_LOG: 422,
  GAME_ALREADY_SCORED: 409,
  GAME_NOT_FOUND: 404,
  AGENT_NOT_FOUND: 404,
  INVALID_POOL: 400
};

const DEFAULT_POOL: RoleClass = "VILLAGERS";

/** Reads `?pool=`, defaulting to the village pool. */
export function parsePool(value: unknown): RoleClass {
  if (value === undefined) return DEFAULT_POOL;
  if (typeof value === "string" && isTeam(value)) return value;
  throw new ScoringError("INVALID_POOL", "pool must be WEREWOLVES or VILLAGERS");
}

/**
 * Express app exposing the scoring engine.
 * POST /games is the only write; everything else reads the in-memory league.
 */
export function createHttpApp(store: LeagueStore) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  /** Health probe for load balancers / ops. */
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      games: store.listResults().length,
      agents: store.getStandings().size,
      timestamp: Date.now()
    });
  });

  /** Scores and records one finished game. */
  app.post("/games", (req, res) => {
    const result = store.submit(req.body);
    res.status(201).json(result);
  });

  /** Recorded games, newest first. */
  app.get("/games", (_req, res) => {
    const games = store.listResults().map(buildGameSummary).reverse();
    res.json({ total: games.length, games });
  });

  app.get("/games/:gameId", (req, res) => {
    const result = store.getResult(req.params.gameId);
    if (!result) {
      throw new ScoringError("GAME_NOT_FOUND", `Game ${req.params.gameId} not found`);
    }
    res.json(result);
  });

  app.get("/leaderboard", (req, res) => {
    const pool = parsePool(req.query.pool);
    const rankings = buildLeaderboard(store.getStandings(), pool, store.ratingOptions.initialRating);
    res.json({ pool, total: rankings.length, rankings });
  });

  app.get("/agents/:agentId", (req, res) => {
    const standing = store.getStanding(req.params.agentId);
    if (!standing) {
      throw new ScoringError("AGENT_NOT_FOUND", `Agent ${req.params.agentId} not found`);
    }
    res.json({ standing, history: store.history(standing.agentId) });
  });

  app.get("/ratings", (_req, res) => {
    res.json(Object.fromEntries(store.getRatings()));
  });

  // Express only treats 4-arity handlers as error middleware.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ScoringError) {
      res.status(STATUS_BY_CODE[err.code]).json({
        error: { code: err.code, message: err.message, ...(err.issues.length > 0 ? { issues: err.issues } : {}) }
      });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: "BAD_JSON", message: "Invalid JSON payload" } });
      return;
    }
    console.error("Unhandled request error", err);
    res.status(500).json({ error: { code: "SERVER_ERROR", message: "Internal error" } });
  });

  return app;
}
