import type { FastifyInstance } from "fastify";
import type { RawData, WebSocket } from "ws";
import { z } from "zod";

import { CLOSE_CODES, type Channel } from "../connections/connection_manager";
import { readBearer } from "../connections/identity";
import type { RealtimeCore } from "../control-plane/runtime";

const SocketQuery = z.object({ token: z.string().min(1).optional() });

function frameText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

function socketChannel(socket: WebSocket): Channel {
  return {
    send(data) {
      if (socket.readyState !== socket.OPEN) {
        throw new Error(`socket not open (readyState ${socket.readyState})`);
      }
      socket.send(data);
    },
    close(code, reason) {
      if (socket.readyState === socket.CLOSED) return;
      socket.close(code, reason);
    },
  };
}

/**
 * The client channel. Browsers cannot set headers on a WebSocket, so the
 * credential may also come as `?token=`.
 */
export async function socketRoutes(app: FastifyInstance, opts: { core: RealtimeCore }) {
  const { core } = opts;

  app.get("/ws", { websocket: true }, (socket, req) => {
    const query = SocketQuery.safeParse(req.query);
    const credential = readBearer(req.headers.authorization) ?? (query.success ? query.data.token ?? null : null);

    // Listeners go on before the first await so early frames are not lost.
    const accepted = core.connections.accept(credential, socketChannel(socket));

    socket.on("message", (data: RawData) => {
      const raw = frameText(data);
      accepted
        .then((result) => (result.ok ? core.router.handleFrame(result.connection, raw) : undefined))
        .catch((error: unknown) => {
          req.log.error({ err: String(error) }, "socket.frame_failed");
        });
    });

    socket.on("close", () => {
      accepted
        .then((result) => {
          if (result.ok) core.connections.handleChannelClosed(result.connection.id);
        })
        .catch((error: unknown) => {
          req.log.error({ err: String(error) }, "socket.close_failed");
        });
    });

    accepted
      .then((result) => {
        if (result.ok) return;
        req.log.info({ reason: result.error.reason }, "socket.rejected");
        socket.close(CLOSE_CODES.policyViolation, result.error.reason);
      })
      .catch((error: unknown) => {
        req.log.error({ err: String(error) }, "socket.accept_failed");
        socket.close(CLOSE_CODES.policyViolation, "verification_failed");
      });
  });
}
