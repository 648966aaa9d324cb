/** Utility helpers shared across engine modules. */
import { Participant } from "./types";

/** Ratio that resolves a zero (or non-finite) denominator to 0 instead of NaN/Infinity. */
export function safeRatio(numerator: number, denominator: number): number {
  if (denominator === 0 || !Number.isFinite(denominator)) return 0;
  return numerator / denominator;
}

/** Clamps into [min, max]; NaN collapses to min. */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/** Clamp into the unit interval used by every score. */
export function clampUnit(value: number): number {
  return clamp(value, 0, 1);
}

/** Arithmetic mean, 0 for an empty list. */
export function mean(values: readonly number[]): number {
  return safeRatio(
    values.reduce((sum, value) => sum + value, 0),
    values.length
  );
}

/** Counts items matching the predicate. */
export function countWhere<T>(items: readonly T[], predicate: (item: T) => boolean): number {
  let count = 0;
  for (const item of items) {
    if (predicate(item)) count++;
  }
  return count;
}

/** Safe participant lookup, null when missing. */
export function getParticipant(participants: readonly Participant[], playerId: string): Participant | null {
  return participants.find(p => p.playerId === playerId) ?? null;
}

/** Recursively freezes plain data so results cannot be edited after assembly. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
