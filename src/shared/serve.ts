import type { Server } from "node:http";
import type { Express } from "express";

export interface ListeningServer {
  server: Server;
  /** Base URL, e.g. `http://127.0.0.1:5000` */
  url: string;
}

/**
 * Starts an Express app and resolves once it accepts connections.
 * Port 0 picks a free port. Rejects if the port can't be bound.
 */
export async function listen(app: Express, port: number, host = "127.0.0.1"): Promise<ListeningServer> {
  const server = await new Promise<Server>((resolve, reject) => {
    const started = app.listen(port, host);
    started.once("listening", () => {
      started.off("error", reject);
      resolve(started);
    });
    started.once("error", reject);
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    server.close();
    throw new Error("Expected the server to listen on a TCP port");
  }
  const displayHost = address.family === "IPv6" ? `[${address.address}]` : address.address;
  return { server, url: `http://${displayHost}:${address.port}` };
}

/**
 * Stops accepting connections and waits for open ones to finish.
 */
export async function closeServer(server: Server): Promise<void> {
  if (!server.listening) return;
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
