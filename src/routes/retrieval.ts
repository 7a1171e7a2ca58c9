import type { FastifyInstance } from "fastify";

import { RetrievalRequest } from "../contracts/conversation";
import type { OrchestrationErrorCode } from "../control-plane/errors";
import type { PolicyRetrievalService } from "../control-plane/retrieval_service";
import { sendInvalidRequest } from "./request_validation";

const STATUS_BY_ERROR: Record<OrchestrationErrorCode, number> = {
  generation_failure: 502,
  verdict_parse_error: 502,
  selection_error: 500,
  retrieval_failure: 502,
  // nginx's "client closed request"
  session_cancelled: 499,
};

export async function retrievalRoutes(
  app: FastifyInstance,
  opts: { service: PolicyRetrievalService }
) {
  const { service } = opts;

  app.options("/retrieval", async (_req, reply) => reply.code(204).send());

  app.post("/retrieval", async (req, reply) => {
    const parsed = RetrievalRequest.safeParse(req.body);
    if (!parsed.success) {
      return sendInvalidRequest(reply, parsed.error);
    }

    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.once("close", onClose);

    const { clinicalMetadata, caseId, maxIterations } = parsed.data;
    try {
      const { sessionId, result } = await service.runRetrievalDetailed(clinicalMetadata, {
        caseId,
        maxIterations,
        signal: controller.signal,
      });

      if (!result.ok) {
        req.log.warn(
          { evt: "retrieval.failed", sessionId, code: result.error.code, component: result.error.component },
          "retrieval.failed"
        );
        return reply.code(STATUS_BY_ERROR[result.error.code]).send({
          error: result.error.code,
          component: result.error.component,
          message: result.error.message,
          sessionId,
        });
      }

      req.log.info(
        {
          evt: "retrieval.completed",
          sessionId,
          terminationReason: result.terminationReason,
          iterationCount: result.iterationCount,
          policies: result.verdict.policies.length,
        },
        "retrieval.completed"
      );
      return reply.code(200).send({
        sessionId,
        verdict: result.verdict,
        terminationReason: result.terminationReason,
        iterationCount: result.iterationCount,
      });
    } finally {
      reply.raw.off("close", onClose);
    }
  });
}
