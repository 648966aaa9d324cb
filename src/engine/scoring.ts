import { aggregateScore, roundsSurvived, survivalScore } from "./aggregate";
import { RatingOptions, applyRatingUpdates, collectRatingUpdates, computeSeatRatings, mergeRatingOptions } from "./elo";
import { computeMetrics, summarizePlayerEvents } from "./metrics";
import { teamOf, validateRoleComposition } from "./roles";
import { parseGameRecord } from "./schema";
import { GameEvent, GameRecord, GameResult, PlayerGameRecord, RatingSnapshot, ScoringError } from "./types";
import { deepFreeze } from "./utils";

/** Output of one all-or-nothing scoring call. */
export interface ScoredGame {
  result: GameResult;
  /** Input snapshot with this game's updates applied. */
  ratings: RatingSnapshot;
}

function referencedPlayers(event: GameEvent): string[] {
  switch (event.type) {
    case "VOTE":
      return [event.voterId, event.targetId];
    case "DEBATE":
      return [event.speakerId];
    case "ACCUSATION":
      return [event.accuserId, event.accusedId];
    case "ELIMINATION":
      return [event.victimId];
    case "INVESTIGATION":
      return [event.investigatorId, event.targetId];
    case "PROTECTION":
      return [event.protectorId, event.targetId];
    case "SUSPICION":
      return [event.targetId];
  }
}

/**
 * Checks the parts of a record the schema cannot see: survival fields agree with each other,
 * nothing happens after the last round and every event points at a seated player.
 */
export function assertCompleteRecord(record: GameRecord): void {
  const issues: string[] = [];
  const seated = new Set(record.participants.map(p => p.playerId));

  record.participants.forEach((p, index) => {
    if (p.survived && p.eliminatedRound !== null) {
      issues.push(`participants.${index}: survivor ${p.playerId} has an elimination round`);
    }
    if (!p.survived && p.eliminatedRound === null) {
      issues.push(`participants.${index}: ${p.playerId} was eliminated but has no elimination round`);
    }
    if (p.eliminatedRound !== null && p.eliminatedRound > record.totalRounds) {
      issues.push(`participants.${index}: elimination round ${p.eliminatedRound} exceeds ${record.totalRounds} rounds`);
    }
  });

  record.events.forEach((event, index) => {
    if (event.round > record.totalRounds) {
      issues.push(`events.${index}: round ${event.round} exceeds ${record.totalRounds} rounds`);
    }
    for (const playerId of referencedPlayers(event)) {
      if (!seated.has(playerId)) {
        issues.push(`events.${index}: unknown player ${playerId}`);
      }
    }
  });

  if (issues.length > 0) {
    throw new ScoringError("INCOMPLETE_EVENT_LOG", `Game ${record.gameId} cannot be scored`, issues);
  }
}

/**
 * Scores one finished game against a pre-game rating snapshot.
 * Either the whole game is scored or a ScoringError is thrown before any output exists;
 * the caller's snapshot is never mutated, so the same inputs always give the same result.
 */
export function scoreGame(
  input: unknown,
  ratings: RatingSnapshot,
  overrides?: Partial<RatingOptions>
): ScoredGame {
  const record = parseGameRecord(input);
  validateRoleComposition(record.participants);
  assertCompleteRecord(record);

  const options = mergeRatingOptions(overrides);
  const playerCount = record.participants.length;
  const seats = computeSeatRatings(record.participants, record.winner, ratings, options);
  const seatById = new Map(seats.map(seat => [seat.playerId, seat]));

  const players: PlayerGameRecord[] = record.participants.map(participant => {
    const team = teamOf(participant.role);
    const won = team === record.winner;
    const summary = summarizePlayerEvents(record, participant.playerId);
    const metrics = computeMetrics(summary, participant.role, playerCount);
    const survival = survivalScore(participant, record.totalRounds);
    const seat = seatById.get(participant.playerId);
    if (!seat) {
      throw new ScoringError("INCOMPLETE_EVENT_LOG", `No rating computed for ${participant.playerId}`);
    }

    return {
      playerId: participant.playerId,
      agentId: participant.agentId,
      role: participant.role,
      team,
      won,
      survived: participant.survived,
      eliminatedRound: participant.eliminatedRound,
      roundsSurvived: roundsSurvived(participant, record.totalRounds),
      metrics: { ...metrics, survival, aggregate: aggregateScore(won, survival, metrics) },
      ratingPool: seat.pool,
      ratingBefore: seat.before,
      ratingDelta: seat.delta
    };
  });

  const ratingUpdates = collectRatingUpdates(seats);
  const result: GameResult = {
    gameId: record.gameId,
    winner: record.winner,
    totalRounds: record.totalRounds,
    players,
    ratingUpdates
  };

  return {
    result: deepFreeze(result),
    ratings: applyRatingUpdates(ratings, ratingUpdates)
  };
}
