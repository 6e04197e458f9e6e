import { once } from "node:events";
import type { Server } from "node:http";
import type express from "express";

export interface Listening {
  server: Server;
  base: string;
}

/** Binds `handler` to an ephemeral loopback port. */
export async function listen(handler: express.Express): Promise<Listening> {
  const server = handler.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not bound to a TCP port");
  }
  return { server, base: `http://127.0.0.1:${address.port}` };
}

export async function close({ server }: Listening): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) =>
    server.close((error) => (error ? reject(error) : resolve())),
  );
}
