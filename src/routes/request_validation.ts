import type { FastifyReply } from "fastify";
import type { z } from "zod";

const extractUnrecognizedKeys = (error: z.ZodError) => {
  const unrecognized = new Set<string>();
  for (const issue of error.issues) {
    if (issue.code === "unrecognized_keys") {
      for (const key of issue.keys) {
        unrecognized.add(key);
      }
    }
  }
  return Array.from(unrecognized);
};

export function sendInvalidRequest(reply: FastifyReply, error: z.ZodError) {
  const unrecognizedKeys = extractUnrecognizedKeys(error);
  if (unrecognizedKeys.length > 0) {
    return reply.code(400).send({
      error: "invalid_request",
      message: "Unrecognized keys in request",
      unrecognizedKeys,
    });
  }
  return reply.code(400).send({
    error: "invalid_request",
    details: error.flatten(),
  });
}
