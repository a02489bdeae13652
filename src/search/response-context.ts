/**
 * Response channel for agent runs.
 *
 * Operations talk to the caller through a ResponseContext: direct replies,
 * plus processes that log progress and publish artifacts. The recording
 * implementation keeps the message stream in memory for the HTTP route.
 */

import { emit, TelemetryEvents } from "../utils/telemetry.js";

export interface Artifact {
  mimetype: string;
  description: string;
  uris: string[];
  metadata: Record<string, unknown>;
}

export interface AgentProcess {
  log(text: string, data?: Record<string, unknown>): Promise<void>;
  createArtifact(artifact: Artifact): Promise<void>;
}

export interface ResponseContext {
  reply(text: string): Promise<void>;
  /**
   * Run `fn` inside a named process. The process is closed when `fn`
   * settles, whether or not it throws.
   */
  beginProcess<T>(summary: string, fn: (process: AgentProcess) => Promise<T>): Promise<T>;
}

export type AgentMessage =
  | { type: "reply"; text: string }
  | { type: "process_begin"; summary: string }
  | { type: "process_log"; text: string; data?: Record<string, unknown> }
  | ({ type: "artifact" } & Artifact)
  | { type: "process_end"; summary: string };

export class RecordingResponseContext implements ResponseContext {
  readonly messages: AgentMessage[] = [];

  constructor(private readonly requestId?: string) {}

  async reply(text: string): Promise<void> {
    this.messages.push({ type: "reply", text });
  }

  async beginProcess<T>(summary: string, fn: (process: AgentProcess) => Promise<T>): Promise<T> {
    this.messages.push({ type: "process_begin", summary });
    const agentProcess: AgentProcess = {
      log: async (text, data) => {
        this.messages.push(data === undefined ? { type: "process_log", text } : { type: "process_log", text, data });
      },
      createArtifact: async (artifact) => {
        this.messages.push({ type: "artifact", ...artifact });
        emit(TelemetryEvents.ArtifactCreated, {
          request_id: this.requestId,
          mimetype: artifact.mimetype,
          uri_count: artifact.uris.length,
        });
      },
    };

    try {
      return await fn(agentProcess);
    } finally {
      this.messages.push({ type: "process_end", summary });
    }
  }

  /** Text of every reply, in order */
  replies(): string[] {
    return this.messages.flatMap((message) => (message.type === "reply" ? [message.text] : []));
  }

  /** Text of every process log line, in order */
  logs(): string[] {
    return this.messages.flatMap((message) => (message.type === "process_log" ? [message.text] : []));
  }

  artifacts(): Artifact[] {
    return this.messages.flatMap((message) =>
      message.type === "artifact"
        ? [{ mimetype: message.mimetype, description: message.description, uris: message.uris, metadata: message.metadata }]
        : [],
    );
  }
}
