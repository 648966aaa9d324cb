import { z } from "zod";
import { TeamSchema } from "../engine/schema";
import { LeaderboardEntry } from "../engine/standings";
import { GameResult, RatingUpdate, RoleClass, Team } from "../engine/types";

/**
 * All actions that a client may issue over the WebSocket channel.
 * A socket follows at most one leaderboard pool at a time.
 */
export const ClientMessageSchema = z.discriminatedUnion("type", [
  /** Start (or switch) following the leaderboard of one rating pool. */
  z.object({ type: z.literal("SUBSCRIBE"), payload: z.object({ pool: TeamSchema }) }),
  /** Stop receiving pushes. */
  z.object({ type: z.literal("UNSUBSCRIBE"), payload: z.object({}).optional() })
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

/** Compact listing row for recorded games. */
export interface GameSummary {
  gameId: string;
  winner: Team;
  totalRounds: number;
  agents: string[];
  participantCount: number;
}

export function buildGameSummary(result: GameResult): GameSummary {
  return {
    gameId: result.gameId,
    winner: result.winner,
    totalRounds: result.totalRounds,
    agents: [...new Set(result.players.map(p => p.agentId))],
    participantCount: result.players.length
  };
}

/**
 * Messages emitted by the server. LEADERBOARD is only sent to sockets following that pool;
 * GAME_SCORED goes to every subscriber.
 */
export type ServerMessage =
  | { type: "ERROR"; payload: { code: string; message: string } }
  | { type: "LEADERBOARD"; payload: { pool: RoleClass; entries: LeaderboardEntry[] } }
  | { type: "GAME_SCORED"; payload: { gameId: string; winner: Team; ratingUpdates: RatingUpdate[] } };
