/**
 * Runtime validation for game records arriving from outside the process.
 * A record that fails here cannot be scored: every shape problem is reported as INCOMPLETE_EVENT_LOG.
 */

import { z } from "zod";
import { GameRecord, ScoringError } from "./types";

export const RoleSchema = z.enum(["WEREWOLF", "SEER", "DOCTOR", "VILLAGER"]);
export const TeamSchema = z.enum(["WEREWOLVES", "VILLAGERS"]);

const id = z.string().min(1);
const round = z.number().int().positive();

export const ParticipantSchema = z.object({
  playerId: id,
  agentId: id,
  role: RoleSchema,
  survived: z.boolean(),
  eliminatedRound: round.nullable()
});

export const GameEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("VOTE"), round, voterId: id, targetId: id }),
  z.object({ type: z.literal("DEBATE"), round, speakerId: id }),
  z.object({ type: z.literal("ACCUSATION"), round, accuserId: id, accusedId: id, successful: z.boolean() }),
  z.object({ type: z.literal("ELIMINATION"), round, victimId: id, cause: z.enum(["VOTE", "KILL"]) }),
  z.object({
    type: z.literal("INVESTIGATION"),
    round,
    investigatorId: id,
    targetId: id,
    isWerewolf: z.boolean()
  }),
  z.object({ type: z.literal("PROTECTION"), round, protectorId: id, targetId: id, successful: z.boolean() }),
  z.object({ type: z.literal("SUSPICION"), round, targetId: id, truthful: z.boolean() })
]);

export const GameRecordSchema: z.ZodType<GameRecord> = z.object({
  gameId: id,
  winner: TeamSchema,
  totalRounds: round,
  participants: z.array(ParticipantSchema),
  events: z.array(GameEventSchema)
});

/** Formats zod issues as `path: message` lines. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/** Validates an untrusted payload into a GameRecord or throws INCOMPLETE_EVENT_LOG. */
export function parseGameRecord(input: unknown): GameRecord {
  const parsed = GameRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new ScoringError("INCOMPLETE_EVENT_LOG", "Game record is missing required fields", describeIssues(parsed.error));
  }
  return parsed.data;
}
