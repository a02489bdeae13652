/**
 * iDigBio search agent: the card advertised to callers and the dispatcher
 * that routes a request to one of its entrypoints.
 */

import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { entrypoint as countOccurrenceRecords } from "./entrypoints/count-occurrence-records.js";
import { entrypoint as findMediaRecords } from "./entrypoints/find-media-records.js";
import { entrypoint as findOccurrenceRecords } from "./entrypoints/find-occurrence-records.js";
import type { AgentEntrypoint, EntrypointDeps } from "./entrypoints/shared.js";
import type { ResponseContext } from "./response-context.js";

export interface AgentCard {
  name: string;
  description: string;
  icon: string | null;
  entrypoints: Array<{ id: string; description: string; parameters: null }>;
}

export const ENTRYPOINTS: ReadonlyArray<AgentEntrypoint> = [
  findOccurrenceRecords,
  findMediaRecords,
  countOccurrenceRecords,
];

export function getAgentCard(): AgentCard {
  return {
    name: "iDigBio Search",
    description: "Searches for information in the iDigBio portal (https://idigbio.org).",
    icon: null,
    entrypoints: ENTRYPOINTS.map(({ id, description }) => ({ id, description, parameters: null })),
  };
}

export class UnknownEntrypointError extends Error {
  readonly statusCode = 400;

  constructor(public readonly entrypoint: string) {
    super(`Unknown entrypoint: ${entrypoint}`);
    this.name = "UnknownEntrypointError";
  }
}

/**
 * Run `request` through the named entrypoint, streaming output to `context`.
 *
 * @throws UnknownEntrypointError when no entrypoint has that id
 */
export async function runAgent(
  context: ResponseContext,
  request: string,
  entrypointId: string,
  deps: EntrypointDeps = {},
): Promise<void> {
  const selected = ENTRYPOINTS.find((candidate) => candidate.id === entrypointId);
  if (!selected) {
    throw new UnknownEntrypointError(entrypointId);
  }

  const startTime = Date.now();
  emit(TelemetryEvents.AgentRunRequested, {
    request_id: deps.requestId,
    entrypoint: selected.id,
    request_chars: request.length,
  });

  await selected.run(context, request, deps);

  emit(TelemetryEvents.AgentRunCompleted, {
    request_id: deps.requestId,
    entrypoint: selected.id,
    latency_ms: Date.now() - startTime,
  });
}
