import type http from "http";
import type { WebSocketServer } from "ws";

/**
 * Stops accepting connections and resolves once the HTTP server has closed.
 * Live WebSocket clients are terminated first: server.close waits on upgraded
 * sockets, and wss.close leaves them open when the server is external.
 */
export function closeServer(server: http.Server, wss: WebSocketServer): Promise<void> {
  wss.clients.forEach((client) => client.terminate());
  wss.close();
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
