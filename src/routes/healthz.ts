import type { FastifyInstance } from "fastify";

import type { RealtimeCore } from "../control-plane/runtime";

export async function healthRoutes(app: FastifyInstance, opts: { core: RealtimeCore }) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "relay-orchestrator",
    ts: new Date().toISOString(),
    connections: opts.core.connections.activeConnectionCount(),
    sessions: await opts.core.store.count(),
  }));
}
