import { IDigBioRequestError, type IDigBioClient } from "../../adapters/idigbio/client.js";
import type { IDigBioResponse } from "../../adapters/idigbio/types.js";
import type { LLMAdapter } from "../../adapters/llm/types.js";
import { emit, TelemetryEvents } from "../../utils/telemetry.js";
import {
  GenerationError,
  generateSearchParameters,
  type EnvelopeSchema,
  type GenerationResult,
} from "../generation.js";
import type { AgentProcess, ResponseContext } from "../response-context.js";

export type EntrypointId = "find_occurrence_records" | "count_occurrence_records" | "find_media_records";

/**
 * Collaborators an entrypoint would otherwise take from configuration.
 */
export interface EntrypointDeps {
  adapter?: LLMAdapter;
  client?: IDigBioClient;
  requestId?: string;
}

export interface AgentEntrypoint {
  id: EntrypointId;
  description: string;
  run(context: ResponseContext, request: string, deps?: EntrypointDeps): Promise<void>;
}

export interface GeneratedParameters<P> {
  params: P;
  artifactDescription: string;
}

/**
 * Generate parameters for `request`, logging the outcome to `agentProcess`.
 * Returns null when generation failed or the model aborted; the reason has
 * already been logged.
 */
export async function generateOrReport<P>(
  agentProcess: AgentProcess,
  entrypoint: EntrypointId,
  request: string,
  systemPrompt: string,
  schema: EnvelopeSchema<P>,
  deps: EntrypointDeps,
): Promise<GeneratedParameters<P> | null> {
  let generated: GenerationResult<P>;
  try {
    generated = await generateSearchParameters(request, systemPrompt, schema, {
      adapter: deps.adapter,
      requestId: deps.requestId,
      entrypoint,
    });
  } catch (error) {
    if (error instanceof GenerationError) {
      await agentProcess.log(`Error: ${error.message}`);
      return null;
    }
    throw error;
  }

  if (generated.searchParameters === undefined) {
    await agentProcess.log(`Failed to generate appropriate search parameters. Reason: ${generated.plan}`);
    return null;
  }

  return {
    params: generated.searchParameters,
    artifactDescription: generated.artifactDescription ?? generated.plan,
  };
}

/**
 * Run an iDigBio call, logging `Response code: ... - something went wrong!`
 * and returning null when it fails.
 */
export async function callSearchApi<T>(
  agentProcess: AgentProcess,
  entrypoint: EntrypointId,
  deps: EntrypointDeps,
  call: () => Promise<IDigBioResponse<T>>,
): Promise<IDigBioResponse<T> | null> {
  const startTime = Date.now();
  emit(TelemetryEvents.SearchApiRequested, { request_id: deps.requestId, entrypoint });

  try {
    const response = await call();
    emit(TelemetryEvents.SearchApiSucceeded, {
      request_id: deps.requestId,
      entrypoint,
      status: response.status,
      latency_ms: Date.now() - startTime,
    });
    return response;
  } catch (error) {
    if (error instanceof IDigBioRequestError) {
      emit(TelemetryEvents.SearchApiFailed, {
        request_id: deps.requestId,
        entrypoint,
        response_code: error.responseCode,
        latency_ms: Date.now() - startTime,
      });
      await agentProcess.log(`Response code: ${error.responseCode} - something went wrong!`);
      return null;
    }
    throw error;
  }
}
