import { capabilityOf, isTeammate, teamOf } from "./roles";
import { GameRecord, MetricScores, Participant, Role, ScoringError } from "./types";
import { clampUnit, countWhere, getParticipant, safeRatio } from "./utils";

/** Raw per-player counts pulled out of a game log. Everything the formulas need, nothing else. */
export interface PlayerEventSummary {
  debates: number;
  accusations: number;
  successfulAccusations: number;
  votesAgainst: number;
  votesCast: number;
  correctVotes: number;
  teammateVotes: number;
  sabotageActions: number;
  eliminationsCaused: number;
  roleAppropriateAction: boolean;
  investigations: number;
  werewolvesFound: number;
  protections: number;
  successfulProtections: number;
  suspicions: number;
  falseSuspicions: number;
  survived: boolean;
}

/** Debates needed for full credit on the participation term. */
const FULL_DEBATE_CREDIT = 5;
/** Teammate votes beyond this stop lowering consistency. */
const MAX_COUNTED_TEAMMATE_VOTES = 3;
const SABOTAGE_PER_ACTION = 0.25;

/** Werewolves kill at night, before the day vote of the same round. */
function aliveAtStartOf(player: Participant, round: number): boolean {
  return player.eliminatedRound === null || player.eliminatedRound >= round;
}

/**
 * Walks the log once for the given seat and tallies every count the formulas use.
 * Throws INCOMPLETE_EVENT_LOG when the seat is not part of the game.
 */
export function summarizePlayerEvents(record: GameRecord, playerId: string): PlayerEventSummary {
  const player = getParticipant(record.participants, playerId);
  if (!player) {
    throw new ScoringError("INCOMPLETE_EVENT_LOG", `Player ${playerId} is not part of game ${record.gameId}`);
  }
  const team = teamOf(player.role);
  const byId = new Map(record.participants.map(p => [p.playerId, p]));
  const isOpponent = (otherId: string) => {
    const other = byId.get(otherId);
    return other !== undefined && teamOf(other.role) !== team;
  };
  const isTeammateId = (otherId: string) => {
    const other = byId.get(otherId);
    return other !== undefined && isTeammate(player, other);
  };

  const summary: PlayerEventSummary = {
    debates: 0,
    accusations: 0,
    successfulAccusations: 0,
    votesAgainst: 0,
    votesCast: 0,
    correctVotes: 0,
    teammateVotes: 0,
    sabotageActions: 0,
    eliminationsCaused: 0,
    roleAppropriateAction: false,
    investigations: 0,
    werewolvesFound: 0,
    protections: 0,
    successfulProtections: 0,
    suspicions: 0,
    falseSuspicions: 0,
    survived: player.survived
  };

  for (const event of record.events) {
    switch (event.type) {
      case "DEBATE":
        if (event.speakerId === playerId) summary.debates++;
        break;
      case "VOTE":
        if (event.targetId === playerId) summary.votesAgainst++;
        if (event.voterId !== playerId) break;
        summary.votesCast++;
        if (isOpponent(event.targetId)) summary.correctVotes++;
        if (isTeammateId(event.targetId)) summary.teammateVotes++;
        break;
      case "ACCUSATION":
        if (event.accuserId !== playerId) break;
        summary.accusations++;
        if (event.successful) summary.successfulAccusations++;
        if (player.role === "WEREWOLF" && isTeammateId(event.accusedId)) summary.sabotageActions++;
        break;
      case "ELIMINATION": {
        if (!isOpponent(event.victimId)) break;
        const contributed =
          event.cause === "VOTE"
            ? record.events.some(
                other =>
                  other.type === "VOTE" &&
                  other.round === event.round &&
                  other.voterId === playerId &&
                  other.targetId === event.victimId
              )
            : player.role === "WEREWOLF" && aliveAtStartOf(player, event.round);
        if (contributed) summary.eliminationsCaused++;
        break;
      }
      case "INVESTIGATION":
        if (event.investigatorId !== playerId) break;
        summary.investigations++;
        if (event.isWerewolf) summary.werewolvesFound++;
        break;
      case "PROTECTION":
        if (event.protectorId !== playerId) break;
        summary.protections++;
        if (event.successful) summary.successfulProtections++;
        break;
      case "SUSPICION":
        if (event.targetId !== playerId) break;
        summary.suspicions++;
        if (!event.truthful) summary.falseSuspicions++;
        break;
      default: {
        const exhaustive: never = event;
        throw new ScoringError("INCOMPLETE_EVENT_LOG", `Unknown event ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  summary.sabotageActions += summary.teammateVotes;
  summary.roleAppropriateAction =
    player.role === "WEREWOLF"
      ? summary.eliminationsCaused > 0
      : countWhere(
          record.events,
          e => e.type === "VOTE" && e.voterId === playerId && byId.get(e.targetId)?.role === "WEREWOLF"
        ) > 0;

  return summary;
}

/** Debate participation, landed accusations and how rarely the table turned on this player. */
export function influenceScore(summary: PlayerEventSummary, playerCount: number): number {
  const participation = Math.min(1, summary.debates / FULL_DEBATE_CREDIT);
  const accusations = Math.min(0.3, summary.successfulAccusations * 0.15);
  const resistance = Math.max(0, 1 - safeRatio(summary.votesAgainst, playerCount * 2));
  return clampUnit(0.4 * participation + 0.3 * accusations + 0.3 * resistance);
}

/** Starts at 0.5, loses 0.1 per teammate vote (up to 3) and gains 0.2 for a team-aligned play. */
export function consistencyScore(summary: PlayerEventSummary): number {
  const teammateVotes = Math.min(MAX_COUNTED_TEAMMATE_VOTES, summary.teammateVotes);
  const bonus = summary.roleAppropriateAction ? 1 : 0;
  return clampUnit(0.5 - 0.1 * teammateVotes + 0.2 * bonus);
}

/** Penalty metric: 0.25 per sabotage action, saturating at 4. */
export function sabotageScore(summary: PlayerEventSummary): number {
  return Math.min(1, summary.sabotageActions * SABOTAGE_PER_ACTION);
}

function detectionRoleBonus(summary: PlayerEventSummary, role: Role): number {
  switch (role) {
    case "SEER":
      return safeRatio(summary.werewolvesFound, summary.investigations);
    case "DOCTOR":
      return safeRatio(summary.successfulProtections, summary.protections);
    case "VILLAGER":
      return summary.survived ? 0.2 : 0.1;
    case "WEREWOLF":
      return 0;
    default: {
      const exhaustive: never = role;
      throw new ScoringError("MALFORMED_ROLE_COMPOSITION", `Unknown role ${String(exhaustive)}`);
    }
  }
}

/** Village-side read of the table: vote accuracy, accusation accuracy, role-specific success. */
export function detectionScore(summary: PlayerEventSummary, role: Role): number {
  if (capabilityOf(role) !== "DETECTION") return 0;
  return clampUnit(
    0.4 * safeRatio(summary.correctVotes, summary.votesCast) +
      0.3 * safeRatio(summary.successfulAccusations, summary.accusations) +
      0.3 * detectionRoleBonus(summary, role)
  );
}

/** Werewolf-side cover: survival, misplaced suspicion and kills (full kill credit at 3). */
export function deceptionScore(summary: PlayerEventSummary, role: Role): number {
  if (capabilityOf(role) !== "DECEPTION") return 0;
  const survival = summary.survived ? 1 : 0;
  const misdirection = safeRatio(summary.falseSuspicions, summary.suspicions);
  const kills = Math.min(0.3, summary.eliminationsCaused * 0.1) / 0.3;
  return clampUnit(0.4 * survival + 0.3 * misdirection + 0.3 * kills);
}

/** All five sub-scores for one seat; detection and deception are exclusive by capability. */
export function computeMetrics(summary: PlayerEventSummary, role: Role, playerCount: number): MetricScores {
  const base = {
    influence: influenceScore(summary, playerCount),
    consistency: consistencyScore(summary),
    sabotage: sabotageScore(summary)
  };
  const capability = capabilityOf(role);
  switch (capability) {
    case "DETECTION":
      return { ...base, detection: detectionScore(summary, role), deception: 0 };
    case "DECEPTION":
      return { ...base, detection: 0, deception: deceptionScore(summary, role) };
    default: {
      const exhaustive: never = capability;
      throw new ScoringError("MALFORMED_ROLE_COMPOSITION", `Unknown capability ${String(exhaustive)}`);
    }
  }
}
