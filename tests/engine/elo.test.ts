import { describe, it, expect } from "vitest";
import {
  applyRatingUpdates,
  collectRatingUpdates,
  computeSeatRatings,
  expectedScore,
  mergeRatingOptions,
  ratingDelta,
  ratingOf
} from "../../src/engine/elo";
import { AgentRatings, RatingSnapshot } from "../../src/engine/types";
import { quietGame, seat } from "../helpers/game";

describe("expectedScore", () => {
  it("is 0.5 for equal ratings", () => {
    expect(expectedScore(1000, 1000)).toBe(0.5);
  });

  it("favours the higher rating", () => {
    expect(expectedScore(900, 1100)).toBeCloseTo(0.2403, 4);
    expect(expectedScore(1100, 900)).toBeCloseTo(0.7597, 4);
  });
});

describe("ratingDelta", () => {
  it("is symmetric for an even matchup", () => {
    expect(ratingDelta(1000, 1000, true)).toBe(16);
    expect(ratingDelta(1000, 1000, false)).toBe(-16);
  });

  it("rewards the underdog", () => {
    expect(ratingDelta(900, 1100, true)).toBe(24);
    expect(ratingDelta(900, 1100, false)).toBe(-8);
  });

  it("discounts the favourite", () => {
    expect(ratingDelta(1100, 900, true)).toBe(8);
    expect(ratingDelta(1100, 900, false)).toBe(-24);
  });

  it("scales with the K-factor", () => {
    expect(ratingDelta(1000, 1000, true, 16)).toBe(8);
  });
});

describe("ratingOf", () => {
  const snapshot: RatingSnapshot = new Map([["a", { WEREWOLVES: 1040 }]]);

  it("reads the requested pool", () => {
    expect(ratingOf(snapshot, "a", "WEREWOLVES")).toBe(1040);
  });

  it("defaults unseen agents and pools", () => {
    expect(ratingOf(snapshot, "a", "VILLAGERS")).toBe(1000);
    expect(ratingOf(snapshot, "b", "WEREWOLVES")).toBe(1000);
    expect(ratingOf(snapshot, "b", "WEREWOLVES", 1500)).toBe(1500);
  });
});

describe("computeSeatRatings", () => {
  const participants = quietGame().participants;
  const options = mergeRatingOptions();

  it("moves every seat by 16 from a fresh table", () => {
    const seats = computeSeatRatings(participants, "VILLAGERS", new Map(), options);
    expect(seats).toHaveLength(8);
    for (const s of seats) {
      expect(s.before).toBe(1000);
      expect(s.delta).toBe(s.pool === "VILLAGERS" ? 16 : -16);
    }
  });

  it("averages the opposing seats in their own pool", () => {
    const snapshot = new Map<string, AgentRatings>([
      ["agent-w1", { WEREWOLVES: 900, VILLAGERS: 2000 }],
      ["agent-w2", { WEREWOLVES: 900 }]
    ]);
    for (const id of ["seer", "doc", "v1", "v2", "v3", "v4"]) {
      snapshot.set(`agent-${id}`, { VILLAGERS: 1100, WEREWOLVES: 0 });
    }
    const seats = computeSeatRatings(participants, "WEREWOLVES", snapshot, options);
    const w1 = seats.find(s => s.playerId === "w1");
    const seer = seats.find(s => s.playerId === "seer");
    expect(w1).toMatchObject({ before: 900, opponentAverage: 1100, delta: 24 });
    expect(seer).toMatchObject({ before: 1100, opponentAverage: 900, delta: -24 });
  });

  it("does not depend on seat order", () => {
    const snapshot: RatingSnapshot = new Map<string, AgentRatings>([
      ["agent-v2", { VILLAGERS: 1200 }],
      ["agent-w2", { WEREWOLVES: 950 }]
    ]);
    const forward = computeSeatRatings(participants, "WEREWOLVES", snapshot, options);
    const backward = computeSeatRatings([...participants].reverse(), "WEREWOLVES", snapshot, options);
    const byId = (list: typeof forward) => Object.fromEntries(list.map(s => [s.playerId, s.delta]));
    expect(byId(backward)).toEqual(byId(forward));
  });
});

describe("collectRatingUpdates", () => {
  it("sums seats of the same agent and pool", () => {
    const participants = quietGame().participants.map(p =>
      p.playerId === "v1" || p.playerId === "v2" ? seat(p.playerId, p.role, null, "shared") : p
    );
    const updates = collectRatingUpdates(computeSeatRatings(participants, "VILLAGERS", new Map(), mergeRatingOptions()));
    expect(updates).toHaveLength(7);
    expect(updates.find(u => u.agentId === "shared")).toEqual({
      agentId: "shared",
      pool: "VILLAGERS",
      before: 1000,
      delta: 32,
      after: 1032
    });
  });
});

describe("applyRatingUpdates", () => {
  it("writes a new snapshot and leaves the input alone", () => {
    const before: RatingSnapshot = new Map([["a", { WEREWOLVES: 1010, VILLAGERS: 990 }]]);
    const after = applyRatingUpdates(before, [
      { agentId: "a", pool: "VILLAGERS", before: 990, delta: 8, after: 998 },
      { agentId: "b", pool: "WEREWOLVES", before: 1000, delta: -16, after: 984 }
    ]);
    expect(after).toEqual(
      new Map<string, AgentRatings>([
        ["a", { WEREWOLVES: 1010, VILLAGERS: 998 }],
        ["b", { WEREWOLVES: 984 }]
      ])
    );
    expect(before).toEqual(new Map([["a", { WEREWOLVES: 1010, VILLAGERS: 990 }]]));
  });

  it("stores agent ids that shadow object properties as plain entries", () => {
    const after = applyRatingUpdates(new Map(), [
      { agentId: "__proto__", pool: "WEREWOLVES", before: 1000, delta: -16, after: 984 },
      { agentId: "constructor", pool: "VILLAGERS", before: 1000, delta: 16, after: 1016 }
    ]);
    expect([...after.keys()]).toEqual(["__proto__", "constructor"]);
    expect(ratingOf(after, "__proto__", "WEREWOLVES")).toBe(984);
    expect(ratingOf(after, "constructor", "VILLAGERS")).toBe(1016);
    expect(ratingOf(after, "toString", "VILLAGERS")).toBe(1000);
  });
});
