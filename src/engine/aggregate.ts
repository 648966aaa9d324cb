import { MetricScores, Participant } from "./types";
import { clamp, clampUnit, safeRatio } from "./utils";

/** Weights of the aggregate score. Sabotage is the only subtracted term. */
export const AGGREGATE_WEIGHTS = {
  win: 0.3,
  survival: 0.15,
  influence: 0.15,
  consistency: 0.1,
  deception: 0.2,
  detection: 0.2,
  sabotage: 0.2
} as const;

/**
 * Rounds a seat lived through. Survivors get every round; the round a player
 * was eliminated in does not count.
 */
export function roundsSurvived(player: Pick<Participant, "survived" | "eliminatedRound">, totalRounds: number): number {
  if (player.survived || player.eliminatedRound === null) return totalRounds;
  return clamp(player.eliminatedRound - 1, 0, totalRounds);
}

/** 1.0 for survivors, otherwise the share of rounds survived. */
export function survivalScore(player: Pick<Participant, "survived" | "eliminatedRound">, totalRounds: number): number {
  if (player.survived) return 1;
  return clampUnit(safeRatio(roundsSurvived(player, totalRounds), totalRounds));
}

/**
 * Weighted overall score for one seat in [0,1].
 * Detection and deception are exclusive per role, so no role branching is needed here.
 */
export function aggregateScore(won: boolean, survival: number, metrics: MetricScores): number {
  const w = AGGREGATE_WEIGHTS;
  return clampUnit(
    w.win * (won ? 1 : 0) +
      w.survival * survival +
      w.influence * metrics.influence +
      w.consistency * metrics.consistency +
      w.deception * metrics.deception +
      w.detection * metrics.detection -
      w.sabotage * metrics.sabotage
  );
}
