import { describe, it, expect, afterEach, vi } from "vitest";
import { IDigBioClient } from "../../src/adapters/idigbio/client.js";
import { getAgentCard, runAgent, UnknownEntrypointError } from "../../src/search/agent.js";
import { RecordingResponseContext } from "../../src/search/response-context.js";
import { setTestSink } from "../../src/utils/telemetry.js";
import { toErrorV1 } from "../../src/utils/errors.js";
import { stubFetch } from "../helpers/fetch-stub.js";
import { envelope, RecordingAdapter } from "../helpers/recording-adapter.js";

const client = new IDigBioClient({
  searchBaseUrl: "https://search.idigbio.org",
  portalBaseUrl: "https://portal.idigbio.org",
});

describe("getAgentCard", () => {
  it("should advertise the three entrypoints", () => {
    const card = getAgentCard();

    expect(card.name).toBe("iDigBio Search");
    expect(card.entrypoints.map((entrypoint) => entrypoint.id)).toEqual([
      "find_occurrence_records",
      "find_media_records",
      "count_occurrence_records",
    ]);
    expect(card.entrypoints.every((entrypoint) => entrypoint.description.length > 0)).toBe(true);
  });
});

describe("runAgent", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    setTestSink(null);
  });

  it("should dispatch to the named entrypoint", async () => {
    const events: string[] = [];
    setTestSink((eventName) => {
      events.push(eventName);
    });
    const context = new RecordingResponseContext("req-agent");
    const adapter = new RecordingAdapter([envelope({ plan: "Cannot count by colour." })]);

    await runAgent(context, "Count blue birds", "count_occurrence_records", { adapter, client, requestId: "req-agent" });

    expect(context.messages[0]).toEqual({ type: "process_begin", summary: "Requesting iDigBio statistics" });
    expect(context.logs()).toContain("Failed to generate appropriate search parameters. Reason: Cannot count by colour.");
    expect(events[0]).toBe("agent.run.requested");
    expect(events[events.length - 1]).toBe("agent.run.completed");
  });

  it("should route a media request to the media search", async () => {
    stubFetch({ body: { itemCount: 0, items: [] } });
    const context = new RecordingResponseContext();
    const adapter = new RecordingAdapter([
      envelope({
        plan: "Search sounds",
        search_parameters: { mq: { mediatype: "sounds" } },
        artifact_description: "Sound recordings",
      }),
    ]);

    await runAgent(context, "Any sound recordings", "find_media_records", { adapter, client });

    expect(context.replies()).toEqual([
      "The API query returned 0 out of 0 matching media records in iDigBio using the URL " +
        "https://search.idigbio.org/v2/search/media?mq=%7B%22mediatype%22:%22sounds%22%7D",
    ]);
  });

  it("should reject unknown entrypoints as bad input", async () => {
    const context = new RecordingResponseContext();

    const error = await runAgent(context, "Homo sapiens", "find_everything").then(
      () => undefined,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(UnknownEntrypointError);
    expect(toErrorV1(error)).toEqual({
      schema: "error.v1",
      code: "BAD_INPUT",
      message: "Unknown entrypoint: find_everything",
    });
    expect(context.messages).toEqual([]);
  });
});
