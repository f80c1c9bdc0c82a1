import http from "http";
import { describe, expect, it } from "vitest";
import { WebSocket, WebSocketServer } from "ws";

import { closeServer } from "@/server/lifecycle";

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      resolve(typeof address === "object" && address ? address.port : 0);
    });
  });
}

describe("closeServer", () => {
  it("closes while a WebSocket client is still connected", async () => {
    const server = http.createServer();
    const wss = new WebSocketServer({ server, path: "/ws" });
    const port = await listen(server);

    const client = new WebSocket(`ws://127.0.0.1:${port}/ws`);
    await new Promise<void>((resolve, reject) => {
      client.once("open", () => resolve());
      client.once("error", reject);
    });
    const clientClosed = new Promise<void>((resolve) => client.once("close", () => resolve()));

    await closeServer(server, wss);
    await clientClosed;

    expect(server.listening).toBe(false);
    expect(client.readyState).toBe(WebSocket.CLOSED);
  });

  it("closes an idle server", async () => {
    const server = http.createServer();
    const wss = new WebSocketServer({ server });
    await listen(server);

    await expect(closeServer(server, wss)).resolves.toBeUndefined();
  });
});
