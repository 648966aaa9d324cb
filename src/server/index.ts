import http from "http";
import { loadConfig } from "./config";
import { createHttpApp } from "./http";
import { LeagueStore } from "./store";
import { LeaderboardGateway } from "./ws";

// Bootstrap that wires the in-memory league to HTTP + WebSocket layers.

const config = loadConfig();

const store = new LeagueStore(config.rating);
const app = createHttpApp(store);
const server = http.createServer(app);

const gateway = new LeaderboardGateway(store);
gateway.attach(server);

server.listen(config.port, () => {
  console.log(`Werewolf league scorer running on port ${config.port} (${config.env})`);
  console.log(`Rating pools: K=${config.rating.kFactor}, initial=${config.rating.initialRating}`);
  console.log("Health check: GET /health");
});
