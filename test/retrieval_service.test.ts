import { describe, it, expect } from "vitest";

import { GenerationFailure } from "../src/control-plane/errors";
import { PolicyRetrievalService } from "../src/control-plane/retrieval_service";
import type { SessionLogger } from "../src/logger";
import { MemoryControlPlaneStore } from "../src/store/control_plane_store";
import { APPROVED, ScriptedCompletion, StaticSearch, silentLog } from "./support/scripted";

const METADATA = "Requested drug: cannabidiol oral solution.";

function makeService(completion: ScriptedCompletion, search = new StaticSearch()) {
  const store = new MemoryControlPlaneStore();
  const service = new PolicyRetrievalService({
    store,
    search,
    completion,
    log: silentLog,
    config: { agentTimeoutMs: 200, generationRetries: 0 },
  });
  return { store, service };
}

describe("PolicyRetrievalService", () => {
  it("returns the verdict and persists the session", async () => {
    const { store, service } = makeService(new ScriptedCompletion({ evaluator: [APPROVED] }));

    const { sessionId, result } = await service.runRetrievalDetailed(METADATA, { caseId: "case-7" });

    expect(result.ok).toBe(true);
    const session = await store.getSession(sessionId);
    expect(session).toMatchObject({ caseId: "case-7", status: "completed", maxIterations: 10, iterationCount: 1 });
    expect(await store.getMessages(sessionId)).toHaveLength(4);
    expect(await store.getSpans(sessionId)).toHaveLength(4);
  });

  it("exposes only the verdict through runRetrieval", async () => {
    const { service } = makeService(new ScriptedCompletion({ evaluator: [APPROVED] }));

    await expect(service.runRetrieval(METADATA)).resolves.toEqual(JSON.parse(APPROVED));
  });

  it("throws the fatal error from runRetrieval", async () => {
    const { service } = makeService(new ScriptedCompletion({ formulator: [new Error("upstream down")] }));

    await expect(service.runRetrieval(METADATA)).rejects.toBeInstanceOf(GenerationFailure);
  });

  it("applies a per-request iteration cap", async () => {
    const { store, service } = makeService(new ScriptedCompletion());

    const { sessionId, result } = await service.runRetrievalDetailed(METADATA, { maxIterations: 2 });

    expect(result.ok && result.terminationReason).toBe("iteration_cap");
    expect(result.iterationCount).toBe(2);
    expect((await store.getSession(sessionId))?.maxIterations).toBe(2);
  });

  it("marks the session failed and rethrows unexpected errors", async () => {
    const store = new MemoryControlPlaneStore();
    const brokenLog: SessionLogger = {
      debug: () => {},
      info: () => {
        throw new Error("log sink closed");
      },
      warn: () => {},
      error: () => {},
      child: () => brokenLog,
    };
    const service = new PolicyRetrievalService({
      store,
      search: new StaticSearch(),
      completion: new ScriptedCompletion(),
      log: brokenLog,
    });
    let sessionId = "";
    const createSession = store.createSession.bind(store);
    store.createSession = async (args) => {
      const record = await createSession(args);
      sessionId = record.id;
      return record;
    };

    await expect(service.runRetrieval(METADATA)).rejects.toThrow("log sink closed");
    expect((await store.getSession(sessionId))?.error).toEqual({
      code: "internal_error",
      component: "orchestrator",
      message: "log sink closed",
      retryable: false,
    });
  });
});
