import type { AppConfig } from "../config";
import { ConnectionManager } from "../connections/connection_manager";
import { HmacCredentialVerifier, type IdentityVerifier } from "../connections/identity";
import type { Logger } from "../logger";
import { selectCollaborator } from "../providers/collaborator_config";
import type { SessionStore } from "../store/session_store";
import { MemorySessionStore } from "../store/session_store";
import { SqliteSessionStore } from "../store/sqlite_session_store";
import { CollaboratorGateway, type Collaborator } from "./collaborator_gateway";
import { MessageRouter, SessionBindings } from "./message_router";
import { WorkflowOrchestrator } from "./orchestrator";

export type RealtimeCoreOptions = {
  config: AppConfig;
  log: Logger;
  // Overrides, mostly for tests.
  store?: SessionStore;
  collaborator?: Collaborator;
  verifier?: IdentityVerifier;
  sleepImpl?: (ms: number, signal: AbortSignal) => Promise<void>;
};

export type RealtimeCore = {
  store: SessionStore;
  gateway: CollaboratorGateway;
  orchestrator: WorkflowOrchestrator;
  router: MessageRouter;
  connections: ConnectionManager;
  verifier: IdentityVerifier;
  start(): void;
  stop(): Promise<void>;
};

function createStore(config: AppConfig, log: Logger): { store: SessionStore; close?: () => void } {
  if (config.sessions.store === "sqlite") {
    const store = new SqliteSessionStore(config.sessions.dbPath, log);
    return { store, close: () => store.close() };
  }
  return { store: new MemorySessionStore() };
}

/** Wire the session store, collaborators, orchestrator, router and connections together. */
export function createRealtimeCore(opts: RealtimeCoreOptions): RealtimeCore {
  const { config, log } = opts;
  const owned = opts.store ? { store: opts.store } : createStore(config, log);
  const store = owned.store;

  const collaborator = opts.collaborator ?? selectCollaborator(config.collaborator, { logger: log }).collaborator;
  const gateway = new CollaboratorGateway(collaborator, { timeoutMs: config.workflow.collaboratorTimeoutMs });

  const bindings = new SessionBindings();
  const orchestrator = new WorkflowOrchestrator({
    store,
    gateway,
    outbox: bindings,
    log,
    limits: {
      maxClarificationRounds: config.workflow.maxClarificationRounds,
      completenessThreshold: config.workflow.completenessThreshold,
      collaboratorTimeoutMs: config.workflow.collaboratorTimeoutMs,
    },
    retry: {
      maxRetries: config.workflow.maxRetries,
      baseDelayMs: config.workflow.retryBaseDelayMs,
      maxDelayMs: config.workflow.retryMaxDelayMs,
    },
    idleTtlMs: config.sessions.idleTtlMs,
    sleepImpl: opts.sleepImpl,
  });

  const verifier = opts.verifier ?? new HmacCredentialVerifier(config.credentialSecret);

  // The router needs the manager (pongs) and the manager needs the router (teardown).
  let router: MessageRouter | null = null;
  const detaching = new Set<Promise<void>>();
  const connections = new ConnectionManager({
    verifier,
    log,
    heartbeatIntervalMs: config.connections.heartbeatIntervalMs,
    heartbeatTimeoutMs: config.connections.heartbeatTimeoutMs,
    onTeardown: (connection) => {
      if (!router) return;
      const pending = router
        .detachConnection(connection.id)
        .catch((error: unknown) => {
          log.error({ connectionId: connection.id, err: String(error) }, "connection.detach_failed");
        })
        .finally(() => detaching.delete(pending));
      detaching.add(pending);
    },
  });

  router = new MessageRouter({
    orchestrator,
    bindings,
    log,
    maxInputChars: config.sessions.maxInputChars,
    maxQueueDepth: config.sessions.maxQueueDepth,
    framesPerMinute: config.connections.framesPerMinute,
    onPong: (connectionId) => connections.markAlive(connectionId),
  });

  return {
    store,
    gateway,
    orchestrator,
    router,
    connections,
    verifier,
    start() {
      orchestrator.startSweeper(config.sessions.sweepIntervalMs);
    },
    async stop() {
      connections.shutdown();
      orchestrator.stop();
      await Promise.all(Array.from(detaching));
      owned.close?.();
    },
  };
}
