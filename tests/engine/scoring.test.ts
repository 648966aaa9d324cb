import { describe, it, expect } from "vitest";
import { assertCompleteRecord, scoreGame } from "../../src/engine/scoring";
import { GameRecord, RatingSnapshot, ScoringError } from "../../src/engine/types";
import { quietGame, seat, villageWin, withAgentIds } from "../helpers/game";

function rejection(fn: () => unknown): ScoringError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ScoringError) return err;
    throw err;
  }
  throw new Error("expected a ScoringError");
}

describe("scoreGame", () => {
  const { result, ratings } = scoreGame(villageWin(), new Map());
  const player = (id: string) => {
    const found = result.players.find(p => p.playerId === id);
    if (!found) throw new Error(`missing ${id}`);
    return found;
  };

  it("scores every seat once", () => {
    expect(result.gameId).toBe("village-win");
    expect(result.winner).toBe("VILLAGERS");
    expect(result.players.map(p => p.playerId)).toEqual(["w1", "w2", "seer", "doc", "v1", "v2", "v3", "v4"]);
  });

  it("computes the werewolf metrics", () => {
    const w1 = player("w1");
    expect(w1.won).toBe(false);
    expect(w1.roundsSurvived).toBe(0);
    expect(w1.metrics.influence).toBeCloseTo(0.28625, 10);
    expect(w1.metrics.consistency).toBeCloseTo(0.7, 10);
    expect(w1.metrics.sabotage).toBe(0);
    expect(w1.metrics.deception).toBeCloseTo(0.1, 10);
    expect(w1.metrics.detection).toBe(0);
    expect(w1.metrics.survival).toBe(0);
    expect(w1.metrics.aggregate).toBeCloseTo(0.1329375, 10);

    const w2 = player("w2");
    expect(w2.roundsSurvived).toBe(1);
    expect(w2.metrics).toMatchObject({ sabotage: 0.25, survival: 0.5, detection: 0 });
    expect(w2.metrics.influence).toBeCloseTo(0.385, 10);
    expect(w2.metrics.consistency).toBeCloseTo(0.6, 10);
    expect(w2.metrics.deception).toBeCloseTo(0.35, 10);
    expect(w2.metrics.aggregate).toBeCloseTo(0.21275, 10);
  });

  it("computes the village metrics", () => {
    const seer = player("seer");
    expect(seer.metrics.influence).toBeCloseTo(0.48625, 10);
    expect(seer.metrics.detection).toBeCloseTo(0.85, 10);
    expect(seer.metrics.deception).toBe(0);
    expect(seer.metrics.aggregate).toBeCloseTo(0.7629375, 10);

    expect(player("doc").metrics.detection).toBeCloseTo(0.55, 10);
    expect(player("doc").metrics.aggregate).toBeCloseTo(0.675, 10);
    expect(player("v1").metrics.aggregate).toBeCloseTo(0.401, 10);
    expect(player("v2").metrics.aggregate).toBeCloseTo(0.576, 10);
    expect(player("v3").metrics.influence).toBeCloseTo(0.3425, 10);
    expect(player("v3").metrics.aggregate).toBeCloseTo(0.663375, 10);
    expect(player("v4").metrics.sabotage).toBe(0.25);
    expect(player("v4").metrics.aggregate).toBeCloseTo(0.557, 10);
  });

  it("moves ratings by 16 from a fresh table", () => {
    expect(player("seer")).toMatchObject({ ratingPool: "VILLAGERS", ratingBefore: 1000, ratingDelta: 16 });
    expect(player("w1")).toMatchObject({ ratingPool: "WEREWOLVES", ratingBefore: 1000, ratingDelta: -16 });
    expect(result.ratingUpdates).toHaveLength(8);
    expect(ratings.get("agent-seer")).toEqual({ VILLAGERS: 1016 });
    expect(ratings.get("agent-w2")).toEqual({ WEREWOLVES: 984 });
  });

  it("is deterministic and leaves the input snapshot alone", () => {
    const snapshot: RatingSnapshot = new Map([["agent-w1", { WEREWOLVES: 1040 }]]);
    const first = scoreGame(villageWin(), snapshot);
    const second = scoreGame(villageWin(), snapshot);
    expect(second).toEqual(first);
    expect(snapshot).toEqual(new Map([["agent-w1", { WEREWOLVES: 1040 }]]));
  });

  it("freezes the result", () => {
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.players[0].metrics)).toBe(true);
  });

  it("keeps every score in the unit interval", () => {
    for (const p of result.players) {
      for (const value of Object.values(p.metrics)) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
  });

  it("rates agents whose ids shadow object properties", () => {
    const game = withAgentIds(quietGame({ gameId: "shadowed" }), { w1: "constructor", w2: "__proto__" });
    const scored = scoreGame(game, new Map());
    expect(scored.ratings.get("constructor")).toEqual({ WEREWOLVES: 984 });
    expect(scored.ratings.get("__proto__")).toEqual({ WEREWOLVES: 984 });
    expect(scored.ratings.has("toString")).toBe(false);
    expect(scored.ratings.size).toBe(8);
  });

  it("honours rating overrides", () => {
    const scored = scoreGame(quietGame(), new Map(), { kFactor: 20, initialRating: 1500 });
    expect(scored.result.players[0]).toMatchObject({ ratingBefore: 1500, ratingDelta: -10 });
    expect(scored.ratings.get("agent-v1")).toEqual({ VILLAGERS: 1510 });
  });
});

describe("scoreGame rejections", () => {
  it("rejects a table of seven", () => {
    const game = quietGame();
    const err = rejection(() => scoreGame({ ...game, participants: game.participants.slice(0, 7) }, new Map()));
    expect(err.code).toBe("MALFORMED_ROLE_COMPOSITION");
  });

  it("rejects a wrong role mix", () => {
    const game = quietGame();
    const participants = [...game.participants.slice(0, 7), seat("w3", "WEREWOLF")];
    expect(rejection(() => scoreGame({ ...game, participants }, new Map())).code).toBe("MALFORMED_ROLE_COMPOSITION");
  });

  it("rejects records with missing fields", () => {
    const { winner: _winner, ...withoutWinner } = quietGame();
    const err = rejection(() => scoreGame(withoutWinner, new Map()));
    expect(err.code).toBe("INCOMPLETE_EVENT_LOG");
    expect(err.issues).toContain("winner: Required");
  });

  it("rejects events missing a required field", () => {
    const game = { ...quietGame(), events: [{ type: "VOTE", round: 1, voterId: "v1" }] };
    const err = rejection(() => scoreGame(game, new Map()));
    expect(err.code).toBe("INCOMPLETE_EVENT_LOG");
    expect(err.issues).toContain("events.0.targetId: Required");
  });

  it("rejects events naming unseated players", () => {
    const game: GameRecord = quietGame({
      events: [{ type: "VOTE", round: 1, voterId: "v1", targetId: "ghost" }]
    });
    const err = rejection(() => scoreGame(game, new Map()));
    expect(err.code).toBe("INCOMPLETE_EVENT_LOG");
    expect(err.issues).toEqual(["events.0: unknown player ghost"]);
  });

  it("checks the composition before the event log", () => {
    const game = quietGame({ events: [{ type: "DEBATE", round: 1, speakerId: "ghost" }] });
    const err = rejection(() => scoreGame({ ...game, participants: game.participants.slice(1) }, new Map()));
    expect(err.code).toBe("MALFORMED_ROLE_COMPOSITION");
  });
});

describe("assertCompleteRecord", () => {
  it("requires an elimination round for every eliminated seat", () => {
    const game = quietGame();
    game.participants[4] = { ...game.participants[4], survived: false, eliminatedRound: null };
    const err = rejection(() => assertCompleteRecord(game));
    expect(err.issues).toEqual(["participants.4: v1 was eliminated but has no elimination round"]);
  });

  it("rejects survivors with an elimination round and rounds past the end", () => {
    const game = quietGame({ events: [{ type: "DEBATE", round: 2, speakerId: "v1" }] });
    game.participants[5] = { ...game.participants[5], eliminatedRound: 1 };
    const err = rejection(() => assertCompleteRecord(game));
    expect(err.issues).toEqual([
      "participants.5: survivor v2 has an elimination round",
      "events.0: round 2 exceeds 1 rounds"
    ]);
  });
});
