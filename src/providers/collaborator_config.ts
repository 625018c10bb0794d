import type { AppConfig } from "../config";
import type { Collaborator } from "../control-plane/collaborator_gateway";
import type { Logger } from "../logger";
import { HttpCollaborator } from "./http_collaborator";
import { MockCollaborator } from "./mock_collaborator";

export type CollaboratorSelection = {
  collaborator: Collaborator;
  source: "mock" | "http";
  degraded: boolean;
};

/** Pick the implementation behind the gateway. Mock is the degraded pipeline. */
export function selectCollaborator(
  config: AppConfig["collaborator"],
  args: { logger?: Logger; fetchImpl?: (input: string, init: RequestInit) => Promise<Response> } = {}
): CollaboratorSelection {
  if (config.mode === "http") {
    return {
      collaborator: new HttpCollaborator({
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        logger: args.logger,
        fetchImpl: args.fetchImpl,
      }),
      source: "http",
      degraded: false,
    };
  }

  args.logger?.warn({ collaborator: "mock" }, "collaborator.degraded_pipeline");
  return { collaborator: new MockCollaborator(), source: "mock", degraded: true };
}
