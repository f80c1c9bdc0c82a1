import dotenv from "dotenv";
dotenv.config({ path: ".env.local" }); // local overrides first; dotenv never overwrites a key already set
dotenv.config();
import express from "express";
import { WebSocketServer, WebSocket } from "ws";
import http from "http";
import { loadConfig } from "@/config";
import { createRuntime } from "@/runtime";
import { closeServer } from "./lifecycle";
import { createHandlers, registerRoutes } from "./routes";
import { eventToWire, snapshotToWire } from "./wire";

const config = loadConfig();
const runtime = createRuntime(config);
const { simulation, surface, world } = runtime;

const zoneSource = config.zonesFile ?? `random (seed ${runtime.seed})`;
console.log(`World ${config.world.width}x${config.world.height}, ${world.drones.size} drones, ${world.zones.length} zones from ${zoneSource}`);
for (const zone of world.zones) {
  const { xmin, xmax, ymin, ymax } = zone.rect;
  console.log(`  ${zone.id} ${zone.type} [${xmin.toFixed(1)}, ${xmax.toFixed(1)}] x [${ymin.toFixed(1)}, ${ymax.toFixed(1)}]`);
}

const app = express();
app.use(express.json());

// CORS for a dashboard served from another origin
app.use((req, res, next) => {
  res.header("Access-Control-Allow-Origin", "*");
  res.header("Access-Control-Allow-Headers", "Content-Type");
  res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  if (req.method === "OPTIONS") return res.sendStatus(204);
  next();
});

registerRoutes(app, createHandlers(runtime));

// Body parser failures and anything a route let through
app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  if (err instanceof SyntaxError) {
    return res.status(400).json({ ok: false, error: "Invalid JSON body", code: "BAD_REQUEST" });
  }
  console.error("Unhandled error:", err);
  res.status(500).json({ ok: false, error: "Internal error" });
});

const server = http.createServer(app);
const wss = new WebSocketServer({ server, path: "/ws" });

function broadcast(message: string) {
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) {
      client.send(message);
    }
  });
}

function broadcastSnapshot() {
  surface
    .readSnapshot()
    .then((snapshot) => broadcast(JSON.stringify({ type: "world_snapshot", data: snapshotToWire(snapshot), timestamp: snapshot.ts })))
    .catch((err) => console.error("Snapshot broadcast failed:", err));
}

// Stream world events and task transitions as they commit
simulation.onEvent((event) => {
  switch (event.type) {
    case "world_event":
    case "task_fault":
      broadcast(JSON.stringify({ type: event.type, data: eventToWire(event.data), timestamp: event.timestamp }));
      break;
    case "task_completed":
      broadcast(JSON.stringify(event));
      break;
    case "tick":
      if (event.data.tick % config.snapshotBroadcastEvery === 0) broadcastSnapshot();
      break;
  }
});

wss.on("connection", (ws) => {
  console.log("Client connected");
  surface
    .readSnapshot()
    .then((snapshot) => ws.send(JSON.stringify({ type: "world_snapshot", data: snapshotToWire(snapshot), timestamp: snapshot.ts })))
    .catch((err) => console.error("Initial snapshot failed:", err));

  ws.on("close", () => {
    console.log("Client disconnected");
  });
});

function shutdown() {
  simulation.stop();
  closeServer(server, wss)
    .then(() => process.exit(0))
    .catch((err) => {
      console.error("Shutdown failed:", err);
      process.exit(1);
    });
}
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

server.listen(config.port, config.host, () => {
  console.log(`Server running on http://${config.host}:${config.port}`);
  console.log(`WebSocket at ws://${config.host}:${config.port}/ws`);
  simulation.start(config.tickIntervalMs);
});
