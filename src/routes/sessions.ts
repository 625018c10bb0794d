import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { readBearer } from "../connections/identity";
import { progressPercent, type Session } from "../contracts/session";
import type { RealtimeCore } from "../control-plane/runtime";

const SessionParams = z.object({ id: z.string().min(1) });

export function sessionSnapshot(session: Session) {
  return {
    id: session.id,
    phase: session.phase,
    percent_complete: progressPercent(session),
    degraded: session.degraded,
    connection_state: session.connection_state,
    clarification_round_count: session.clarification_round_count,
    retry_count: session.retry_count,
    rounds: session.rounds,
    result: session.final_result,
    error: session.terminal_error,
    created_at: session.created_at,
    last_activity_at: session.last_activity_at,
  };
}

export async function sessionRoutes(app: FastifyInstance, opts: { core: RealtimeCore }) {
  const { core } = opts;

  app.options("/sessions/:id", async (_req, reply) => reply.code(204).send());

  app.get("/sessions/:id", async (req, reply) => {
    const token = readBearer(req.headers.authorization);
    const verified = token ? await core.verifier.verify(token) : null;
    if (!verified || !verified.ok) {
      reply.header("WWW-Authenticate", "Bearer");
      return reply.code(401).send({ error: "unauthorized" });
    }

    const params = SessionParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }

    const session = await core.orchestrator.getSession(params.data.id);
    if (!session || session.user_id !== verified.userId) {
      return reply.code(404).send({ error: "not_found" });
    }
    return sessionSnapshot(session);
  });
}
