import type { FastifyInstance } from "fastify";

import { PolicyIngestInput, PolicySearchQuery } from "../contracts/search";
import type { SqlitePolicyIndex } from "../lattice/policy_index";
import { sendInvalidRequest } from "./request_validation";

export async function policyRoutes(
  app: FastifyInstance,
  opts: { index: SqlitePolicyIndex }
) {
  const { index } = opts;

  app.options("/policies", async (_req, reply) => reply.code(204).send());

  app.post("/policies", async (req, reply) => {
    const parsed = PolicyIngestInput.safeParse(req.body);
    if (!parsed.success) {
      return sendInvalidRequest(reply, parsed.error);
    }

    const ingested = index.ingest(parsed.data);
    req.log.info(
      {
        evt: "policy.ingested",
        sourcePath: ingested.sourcePath,
        chunks: ingested.chunks,
        contentChars: parsed.data.content.length,
      },
      "policy.ingested"
    );
    return reply.code(200).send(ingested);
  });

  app.get("/policies/search", async (req, reply) => {
    const parsed = PolicySearchQuery.safeParse(req.query);
    if (!parsed.success) {
      return sendInvalidRequest(reply, parsed.error);
    }

    const { q, mode: requested, limit } = parsed.data;
    const mode = requested ?? index.selectMode(q);
    const results = await index.search(q, mode, limit);
    return reply.code(200).send({ query: q, mode, results });
  });
}
