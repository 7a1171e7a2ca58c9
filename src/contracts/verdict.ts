import { z } from "zod";

/**
 * Evaluator verdict wire format. Exactly three keys; anything else is a
 * protocol violation rather than a partial verdict. An approval must name at
 * least one policy and give its reasoning.
 */
export const EvaluatorVerdictSchema = z.object({
  policies: z.array(z.string().min(1)).superRefine((policies, ctx) => {
    const seen = new Set<string>();
    policies.forEach((policy, index) => {
      if (seen.has(policy)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `duplicate policy reference: ${policy}`,
        });
      }
      seen.add(policy);
    });
  }),
  reasoning: z.array(z.string()),
  retry: z.boolean(),
}).strict().superRefine((verdict, ctx) => {
  if (!verdict.retry && verdict.policies.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["retry"],
      message: "retry is false but no policy is approved",
    });
  }
  if (verdict.policies.length > 0 && verdict.reasoning.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["reasoning"],
      message: "approved policies need at least one reasoning entry",
    });
  }
});

export type EvaluatorVerdict = z.infer<typeof EvaluatorVerdictSchema>;

// Same contract, expressed for the provider's structured-output mode.
export const EVALUATOR_VERDICT_JSON_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["policies", "reasoning", "retry"],
  properties: {
    policies: {
      type: "array",
      items: { type: "string" },
    },
    reasoning: {
      type: "array",
      items: { type: "string" },
    },
    retry: { type: "boolean" },
  },
} as const;

export type TerminationReason = "satisfied" | "iteration_cap";
