import { Capability, Participant, Role, ScoringError, Team } from "./types";

interface RoleTraits {
  team: Team;
  capability: Capability;
  seats: number;
}

/** Fixed 8-seat table: 2 werewolves, seer, doctor, 4 villagers. */
export const ROLE_TRAITS: Readonly<Record<Role, RoleTraits>> = {
  WEREWOLF: { team: "WEREWOLVES", capability: "DECEPTION", seats: 2 },
  SEER: { team: "VILLAGERS", capability: "DETECTION", seats: 1 },
  DOCTOR: { team: "VILLAGERS", capability: "DETECTION", seats: 1 },
  VILLAGER: { team: "VILLAGERS", capability: "DETECTION", seats: 4 }
};

export const ROLES: readonly Role[] = ["WEREWOLF", "SEER", "DOCTOR", "VILLAGER"];

export const TEAMS: readonly Team[] = ["WEREWOLVES", "VILLAGERS"];

export const PLAYERS_PER_GAME = ROLES.reduce((sum, role) => sum + ROLE_TRAITS[role].seats, 0);

export function teamOf(role: Role): Team {
  return ROLE_TRAITS[role].team;
}

export function capabilityOf(role: Role): Capability {
  return ROLE_TRAITS[role].capability;
}

export function opposingTeam(team: Team): Team {
  return team === "WEREWOLVES" ? "VILLAGERS" : "WEREWOLVES";
}

export function isTeam(value: string): value is Team {
  return TEAMS.some(team => team === value);
}

/** Two distinct seats fighting for the same side. */
export function isTeammate(a: Participant, b: Participant): boolean {
  return a.playerId !== b.playerId && teamOf(a.role) === teamOf(b.role);
}

/**
 * Rejects anything but the exact 8-seat table with unique player ids.
 * Runs before any metric or rating work.
 */
export function validateRoleComposition(participants: readonly Participant[]): void {
  if (participants.length !== PLAYERS_PER_GAME) {
    throw new ScoringError(
      "MALFORMED_ROLE_COMPOSITION",
      `Expected ${PLAYERS_PER_GAME} participants, got ${participants.length}`
    );
  }

  const ids = new Set(participants.map(p => p.playerId));
  if (ids.size !== participants.length) {
    throw new ScoringError("MALFORMED_ROLE_COMPOSITION", "Player ids must be unique within a game");
  }

  const mismatched = ROLES.filter(
    role => participants.filter(p => p.role === role).length !== ROLE_TRAITS[role].seats
  );
  if (mismatched.length > 0) {
    const expected = ROLES.map(role => `${ROLE_TRAITS[role].seats} ${role}`).join(", ");
    throw new ScoringError(
      "MALFORMED_ROLE_COMPOSITION",
      `Role composition must be ${expected}; mismatched: ${mismatched.join(", ")}`
    );
  }
}
