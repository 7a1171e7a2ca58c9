import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";

import type { SessionConfig } from "./control-plane/session_config";
import { PolicyRetrievalService } from "./control-plane/retrieval_service";
import type { SqlitePolicyIndex } from "./lattice/policy_index";
import type { CompletionCapability } from "./providers/completion";
import type { ControlPlaneStore } from "./store/control_plane_store";
import { healthRoutes } from "./routes/healthz";
import { policyRoutes } from "./routes/policies";
import { retrievalRoutes } from "./routes/retrieval";
import { sessionRoutes } from "./routes/sessions";

export type BuildAppArgs = {
  store: ControlPlaneStore;
  index: SqlitePolicyIndex;
  completion: CompletionCapability;
  config?: Partial<SessionConfig>;
  logger?: FastifyServerOptions["logger"];
};

// Policy documents can be large.
const BODY_LIMIT_BYTES = 4 * 1024 * 1024;

export function buildApp(args: BuildAppArgs) {
  const app = Fastify({ logger: args.logger ?? false, bodyLimit: BODY_LIMIT_BYTES });

  const service = new PolicyRetrievalService({
    store: args.store,
    search: args.index,
    completion: args.completion,
    log: app.log,
    config: args.config,
  });

  // CORS (v0/dev): permissive. Tighten before prod.
  app.register(cors, { origin: true });

  app.register(healthRoutes);
  app.register(retrievalRoutes, { prefix: "/v1", service });
  app.register(sessionRoutes, { prefix: "/v1", store: args.store });
  app.register(policyRoutes, { prefix: "/v1", index: args.index });

  return app;
}
