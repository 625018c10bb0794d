import { describe, it, expect, vi } from "vitest";

import {
  CollaboratorContractError,
  CollaboratorInconsistencyError,
  CollaboratorUnavailableError,
} from "../src/control-plane/collaborator_errors";
import type { CollaboratorRequest } from "../src/control-plane/collaborator_gateway";
import { classifyFailure } from "../src/control-plane/error_classifier";
import { selectCollaborator } from "../src/providers/collaborator_config";
import { HttpCollaborator } from "../src/providers/http_collaborator";
import { MockCollaborator } from "../src/providers/mock_collaborator";

const request: CollaboratorRequest = {
  session_id: "s-1",
  phase: "generating",
  agent: "content",
  attempt: 1,
  text: "Write a post",
  answers: {},
  round_number: 0,
  degraded: false,
};

const signal = new AbortController().signal;

function respondWith(body: string, init: ResponseInit = {}) {
  return vi.fn(async (_input: string, _init: RequestInit) => new Response(body, init));
}

describe("HttpCollaborator", () => {
  it("posts the request to the phase endpoint and returns the JSON body", async () => {
    const fetchImpl = respondWith(JSON.stringify({ artifact: { body: "draft" } }), { status: 200 });
    const collaborator = new HttpCollaborator({ baseUrl: "http://collab.test/v1/", apiKey: "test-key", fetchImpl });

    await expect(collaborator.invoke("generating", request, signal)).resolves.toEqual({ artifact: { body: "draft" } });

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://collab.test/v1/generating");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "content-type": "application/json", authorization: "Bearer test-key" });
    expect(JSON.parse(String(init?.body))).toEqual({ phase: "generating", agent: "content", request });
    expect(init?.signal).toBe(signal);
  });

  it("maps 503 with Retry-After to a recoverable failure", async () => {
    const fetchImpl = respondWith("overloaded", { status: 503, headers: { "retry-after": "2" } });
    const collaborator = new HttpCollaborator({ baseUrl: "http://collab.test", fetchImpl });

    const error = await collaborator.invoke("analyzing", request, signal).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CollaboratorUnavailableError);
    expect(error).toMatchObject({ statusCode: 503, retryAfterMs: 2_000 });
    expect(classifyFailure(error)).toMatchObject({ classification: "recoverable", retryAfterMs: 2_000 });
  });

  it("treats 429 as unavailable", async () => {
    const collaborator = new HttpCollaborator({
      baseUrl: "http://collab.test",
      fetchImpl: respondWith("slow down", { status: 429 }),
    });

    await expect(collaborator.invoke("analyzing", request, signal)).rejects.toBeInstanceOf(CollaboratorUnavailableError);
  });

  it("treats 409 as a temporary inconsistency", async () => {
    const collaborator = new HttpCollaborator({
      baseUrl: "http://collab.test",
      fetchImpl: respondWith("stale", { status: 409 }),
    });

    await expect(collaborator.invoke("analyzing", request, signal)).rejects.toBeInstanceOf(
      CollaboratorInconsistencyError
    );
  });

  it("treats other client errors as contract violations", async () => {
    const collaborator = new HttpCollaborator({
      baseUrl: "http://collab.test",
      fetchImpl: respondWith("bad request", { status: 400 }),
    });

    const error = await collaborator.invoke("analyzing", request, signal).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CollaboratorContractError);
    expect(error).toMatchObject({ message: "Collaborator rejected the request 400: bad request", statusCode: 400 });
  });

  it("rejects a body that is not JSON", async () => {
    const collaborator = new HttpCollaborator({
      baseUrl: "http://collab.test",
      fetchImpl: respondWith("<html>", { status: 200 }),
    });

    await expect(collaborator.invoke("analyzing", request, signal)).rejects.toThrow("Collaborator response is not JSON");
  });
});

describe("selectCollaborator", () => {
  it("uses the mock pipeline without a base url", () => {
    const selection = selectCollaborator({ mode: "mock" });

    expect(selection.source).toBe("mock");
    expect(selection.degraded).toBe(true);
    expect(selection.collaborator).toBeInstanceOf(MockCollaborator);
  });

  it("uses http when configured", () => {
    const selection = selectCollaborator({ mode: "http", baseUrl: "http://collab.test" });

    expect(selection).toMatchObject({ source: "http", degraded: false });
    expect(selection.collaborator).toBeInstanceOf(HttpCollaborator);
  });

  it("sends the configured api key with every call", async () => {
    const fetchImpl = respondWith(JSON.stringify({ completeness: 1 }), { status: 200 });
    const selection = selectCollaborator({ mode: "http", baseUrl: "http://collab.test", apiKey: "test-key" }, { fetchImpl });

    await selection.collaborator.invoke("analyzing", request, signal);

    const [, init] = fetchImpl.mock.calls[0] ?? [];
    expect(init?.headers).toEqual({ "content-type": "application/json", authorization: "Bearer test-key" });
  });
});
