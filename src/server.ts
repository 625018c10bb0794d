import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import Fastify, { type FastifyInstance } from "fastify";

import type { AppConfig } from "./config";
import { createRealtimeCore, type RealtimeCore, type RealtimeCoreOptions } from "./control-plane/runtime";
import { loggerOptions } from "./logger";
import { healthRoutes } from "./routes/healthz";
import { sessionRoutes } from "./routes/sessions";
import { socketRoutes } from "./routes/socket";

const MAX_FRAME_BYTES = 1024 * 1024;

export type BuildServerOptions = Omit<RealtimeCoreOptions, "log"> & {
  // false silences logging (tests).
  logger?: boolean;
};

export async function buildServer(opts: BuildServerOptions): Promise<{ app: FastifyInstance; core: RealtimeCore }> {
  const config: AppConfig = opts.config;
  const app = Fastify({
    logger:
      opts.logger === false
        ? false
        : loggerOptions({ level: config.logLevel, pretty: config.prettyLogs, isDev: config.isDev }),
  });

  const core = createRealtimeCore({ ...opts, log: app.log });

  // CORS (dev): permissive. Tighten before prod.
  await app.register(cors, { origin: true });
  await app.register(websocket, { options: { maxPayload: MAX_FRAME_BYTES } });

  await app.register(healthRoutes, { core });
  await app.register(socketRoutes, { core });
  await app.register(sessionRoutes, { prefix: "/v1", core });

  app.addHook("onReady", async () => {
    core.start();
  });
  app.addHook("onClose", async () => {
    await core.stop();
  });

  return { app, core };
}
