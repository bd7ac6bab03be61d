import { findDuplicateIds, type Topic } from "@featuretour/core";
import { z } from "zod";

// ============================================================================
// Schemas
// ============================================================================

export const topicSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  summary: z.string(),
  highlights: z.array(z.string()),
  codeHint: z.string(),
});

/**
 * Ordered topic catalog. Ids must be unique across the whole array.
 */
export const catalogSchema = z.array(topicSchema).superRefine((topics, ctx) => {
  for (const id of findDuplicateIds(topics)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `duplicate topic id "${id}"`,
    });
  }
});

export type TopicInput = z.input<typeof topicSchema>;

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

/**
 * Validates an unknown value as a topic catalog.
 *
 * @param source - Where the value came from, used in the error message
 * @throws Error when the value is not a valid catalog
 *
 * @example
 * ```ts
 * const topics = parseCatalog(JSON.parse(raw), "./topics.json");
 * ```
 */
export function parseCatalog(value: unknown, source: string): Topic[] {
  const result = catalogSchema.safeParse(value);
  if (!result.success) {
    throw new Error(
      `Invalid topic catalog (${source}): ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}
