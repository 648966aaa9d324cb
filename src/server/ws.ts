import http from "http";
import { WebSocketServer, WebSocket } from "ws";
import { buildLeaderboard } from "../engine/standings";
import { GameResult, RoleClass } from "../engine/types";
import { ClientMessage, ClientMessageSchema, ServerMessage } from "../shared/messages";
import { LeagueStore } from "./store";

/**
 * WebSocket gateway responsible for:
 * - tracking which pool each socket follows,
 * - pushing a fresh leaderboard on subscribe, and
 * - fanning out GAME_SCORED plus updated leaderboards after every committed game.
 */
export class LeaderboardGateway {
  private subscriptions = new Map<WebSocket, RoleClass>();
  private wss: WebSocketServer | null = null;
  private unsubscribeStore: () => void;

  constructor(private store: LeagueStore) {
    this.unsubscribeStore = store.onResult(result => this.onGameScored(result));
  }

  /** Binds the gateway to an HTTP server and starts accepting connections. */
  attach(server: http.Server): void {
    const wss = new WebSocketServer({ server });
    wss.on("connection", socket => {
      socket.on("message", data => this.handleMessage(socket, data.toString()));
      socket.on("close", () => this.subscriptions.delete(socket));
      socket.on("error", err => console.error("WebSocket error", err));
    });
    this.wss = wss;
  }

  /** Stops listening to the store and closes every socket. */
  close(): Promise<void> {
    this.unsubscribeStore();
    this.subscriptions.clear();
    const wss = this.wss;
    if (!wss) return Promise.resolve();
    for (const client of wss.clients) {
      client.terminate();
    }
    return new Promise((resolve, reject) => wss.close(err => (err ? reject(err) : resolve())));
  }

  /** Parses an incoming payload and dispatches typed client messages. */
  private handleMessage(socket: WebSocket, raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.sendError(socket, "BAD_JSON", "Invalid JSON payload");
      return;
    }

    const parsed = ClientMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.sendError(socket, "INVALID_MESSAGE", "Unknown or malformed message");
      return;
    }

    try {
      this.handleClientMessage(socket, parsed.data);
    } catch (err) {
      console.error("Handler error", err);
      this.sendError(socket, "SERVER_ERROR", "Internal error");
    }
  }

  private handleClientMessage(socket: WebSocket, msg: ClientMessage): void {
    switch (msg.type) {
      case "SUBSCRIBE":
        this.subscriptions.set(socket, msg.payload.pool);
        this.sendLeaderboard(socket, msg.payload.pool);
        break;
      case "UNSUBSCRIBE":
        this.subscriptions.delete(socket);
        break;
      default: {
        const exhaustive: never = msg;
        this.sendError(socket, "INVALID_MESSAGE", `Unknown message ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private onGameScored(result: GameResult): void {
    const scored: ServerMessage = {
      type: "GAME_SCORED",
      payload: { gameId: result.gameId, winner: result.winner, ratingUpdates: result.ratingUpdates }
    };
    for (const [socket, pool] of this.subscriptions) {
      this.send(socket, scored);
      this.sendLeaderboard(socket, pool);
    }
  }

  private sendLeaderboard(socket: WebSocket, pool: RoleClass): void {
    const entries = buildLeaderboard(this.store.getStandings(), pool, this.store.ratingOptions.initialRating);
    this.send(socket, { type: "LEADERBOARD", payload: { pool, entries } });
  }

  private send(socket: WebSocket, message: ServerMessage): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify(message));
  }

  private sendError(socket: WebSocket, code: string, message: string): void {
    this.send(socket, { type: "ERROR", payload: { code, message } });
  }
}
