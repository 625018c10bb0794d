import { loadConfig } from "./config";
import { buildServer } from "./server";

async function main() {
  const config = loadConfig();
  const { app, core } = await buildServer({ config });

  app.log.info(
    {
      collaborator: config.collaborator.mode,
      store: config.sessions.store,
      maxRetries: config.workflow.maxRetries,
      maxClarificationRounds: config.workflow.maxClarificationRounds,
      collaboratorName: core.gateway.collaboratorName,
    },
    "server.config"
  );

  const shutdown = (signal: string) => {
    app.log.info({ signal }, "server.shutdown");
    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        app.log.error({ err: String(err) }, "server.shutdown_failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
