import { z } from "zod";
import { addTerminalIssue } from "./query.js";

/**
 * Parameter envelope returned by the model for every operation:
 *
 * - `plan`: what the model intends to do, or why it cannot
 * - `search_parameters`: the operation's parameter object; absent means abort
 * - `artifact_description`: present exactly when `search_parameters` is
 */
export interface Envelope<P> {
  plan: string;
  search_parameters?: P;
  artifact_description?: string;
}

/**
 * Envelope fields for a given parameter schema. Compose with
 * {@link checkEnvelopePairing}:
 *
 * ```typescript
 * const RecordsEnvelope = z
 *   .object(envelopeShape(RecordsSearchParameters, "A concise characterization of the records"))
 *   .superRefine(checkEnvelopePairing);
 * ```
 */
export function envelopeShape<T extends z.ZodTypeAny>(parameters: T, artifactDescription: string) {
  return {
    plan: z
      .string()
      .min(1)
      .describe(
        "A brief explanation of what API parameters you plan to use. Or, if you are unable to fulfill the " +
          "user's request using the available API parameters, a brief explanation of why not.",
      ),
    search_parameters: parameters
      .optional()
      .describe(
        "The search parameters that fulfil the request. If the request cannot be fully met with the available " +
          "API parameters, leave this field unset to abort.",
      ),
    artifact_description: z.string().min(1).optional().describe(artifactDescription),
  };
}

const MISSING_DESCRIPTION = "artifact_description is required when search_parameters are provided";
const STRAY_DESCRIPTION = "artifact_description must be left unset when search_parameters are not provided";

/**
 * Pairing violation of a raw, null-stripped envelope, judged on key presence
 * alone so malformed `search_parameters` still count as provided.
 */
export function findPairingViolation(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  const hasParameters = "search_parameters" in value && value.search_parameters !== undefined;
  const hasDescription = "artifact_description" in value && value.artifact_description !== undefined;

  if (hasParameters && !hasDescription) return MISSING_DESCRIPTION;
  if (!hasParameters && hasDescription) return STRAY_DESCRIPTION;
  return undefined;
}

/**
 * `artifact_description` must accompany `search_parameters` and must not
 * appear without it. Either violation is terminal.
 */
export function checkEnvelopePairing(
  envelope: { search_parameters?: unknown; artifact_description?: string },
  ctx: z.RefinementCtx,
): void {
  const violation = findPairingViolation(envelope);
  if (violation !== undefined) {
    addTerminalIssue(ctx, "envelope_mismatch", violation, ["artifact_description"]);
  }
}

/**
 * Drop `null` values from objects at every depth so a model that writes
 * `"search_parameters": null` is read as leaving the field unset. Nulls inside
 * arrays are kept and fail validation normally.
 */
export function stripNulls(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripNulls);
  }
  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      if (child !== null) {
        result[key] = stripNulls(child);
      }
    }
    return result;
  }
  return value;
}
