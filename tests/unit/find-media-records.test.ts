import { describe, it, expect, afterEach, vi } from "vitest";
import { IDigBioClient } from "../../src/adapters/idigbio/client.js";
import {
  buildMediaPreview,
  EXAMPLES,
  getSystemPrompt,
  MediaEnvelope,
  run,
} from "../../src/search/entrypoints/find-media-records.js";
import { RecordingResponseContext } from "../../src/search/response-context.js";
import { stubFetch } from "../helpers/fetch-stub.js";
import { envelope, RecordingAdapter } from "../helpers/recording-adapter.js";

const client = new IDigBioClient({
  searchBaseUrl: "https://search.idigbio.org",
  portalBaseUrl: "https://portal.idigbio.org",
});

const RAT_IMAGES = envelope({
  plan: "Filter media by mediatype images and records by genus Rattus",
  search_parameters: { rq: { genus: "Rattus" }, mq: { mediatype: "images" } },
  artifact_description: "Images of the genus Rattus",
});

const RAT_IMAGES_URL =
  "https://search.idigbio.org/v2/search/media?mq=%7B%22mediatype%22:%22images%22%7D" +
  "&rq=%7B%22genus%22:%22Rattus%22%7D";

const ITEMS = [
  { uuid: "m0", indexTerms: {} },
  { uuid: "m1", indexTerms: { accessuri: "https://media.example.org/1.jpg" } },
  { indexTerms: { accessuri: "https://media.example.org/2.jpg" } },
  { uuid: "m3", indexTerms: { accessuri: "https://media.example.org/3.jpg" } },
  { uuid: "m4", indexTerms: { accessuri: "https://media.example.org/4.jpg" } },
  { uuid: "m5", indexTerms: { accessuri: "https://media.example.org/5.jpg" } },
  { uuid: "m6", indexTerms: { accessuri: "https://media.example.org/6.jpg" } },
];

const PREVIEW = [
  {
    accessuri: "https://media.example.org/1.jpg",
    link: "[view online](https://portal.idigbio.org/portal/mediarecords/m1)",
  },
  { accessuri: "https://media.example.org/2.jpg" },
  {
    accessuri: "https://media.example.org/3.jpg",
    link: "[view online](https://portal.idigbio.org/portal/mediarecords/m3)",
  },
  {
    accessuri: "https://media.example.org/4.jpg",
    link: "[view online](https://portal.idigbio.org/portal/mediarecords/m4)",
  },
  {
    accessuri: "https://media.example.org/5.jpg",
    link: "[view online](https://portal.idigbio.org/portal/mediarecords/m5)",
  },
];

describe("find_media_records", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should search media, preview it and publish an artifact", async () => {
    const fetchMock = stubFetch({ body: { itemCount: 120, items: ITEMS } });
    const context = new RecordingResponseContext();

    await run(context, "Pictures of rats", { adapter: new RecordingAdapter([RAT_IMAGES]), client });

    expect(fetchMock.mock.calls[0][0]).toBe("https://search.idigbio.org/v2/search/media");
    expect(fetchMock.mock.calls[0][1]).toMatchObject({
      method: "POST",
      body: '{"mq":{"mediatype":"images"},"rq":{"genus":"Rattus"}}',
    });

    expect(context.logs()).toEqual([
      "Generating search parameters for iDigBio's media records API",
      "Generated search parameters",
      `Sending a POST request to the iDigBio media records API at ${RAT_IMAGES_URL}`,
      "Preview of 5 out of 7 retrieved media records",
    ]);
    expect(context.messages).toContainEqual({
      type: "process_log",
      text: "Preview of 5 out of 7 retrieved media records",
      data: { __table: PREVIEW },
    });

    const replies = context.replies();
    expect(replies).toHaveLength(2);
    expect(replies[0]).toBe(
      `The API query returned 7 out of 120 matching media records in iDigBio using the URL ${RAT_IMAGES_URL}`,
    );
    expect(replies[1]).toContain(
      "- The web pages for individual media records follow the pattern " +
        "https://portal.idigbio.org/portal/mediarecords/[UUID] using the UUIDs",
    );

    expect(context.artifacts()).toEqual([
      {
        mimetype: "application/json",
        description: "Images of the genus Rattus",
        uris: [RAT_IMAGES_URL],
        metadata: { data_source: "iDigBio", retrieved_record_count: 7, total_matching_count: 120 },
      },
    ]);
  });

  it("should report zero results without an artifact or tips", async () => {
    stubFetch({ body: { itemCount: 0, items: [] } });
    const context = new RecordingResponseContext();

    await run(context, "Pictures of rats", { adapter: new RecordingAdapter([RAT_IMAGES]), client });

    expect(context.replies()).toEqual([
      `The API query returned 0 out of 0 matching media records in iDigBio using the URL ${RAT_IMAGES_URL}`,
    ]);
    expect(context.artifacts()).toEqual([]);
  });

  it("should log the model's reason when it aborts", async () => {
    const fetchMock = stubFetch();
    const context = new RecordingResponseContext();
    const adapter = new RecordingAdapter([
      envelope({ plan: "There are no search parameters for color or other image features, so I should abort." }),
    ]);

    await run(context, "Find pictures of blue butterflies", { adapter, client });

    expect(context.logs()[1]).toBe(
      "Failed to generate appropriate search parameters. Reason: There are no search parameters for color or other " +
        "image features, so I should abort.",
    );
    expect(fetchMock).not.toHaveBeenCalled();
    expect(context.artifacts()).toEqual([]);
  });

  it("should log a failed API call", async () => {
    stubFetch({ status: 404 });
    const context = new RecordingResponseContext();

    await run(context, "Pictures of rats", { adapter: new RecordingAdapter([RAT_IMAGES]), client });

    expect(context.logs()[3]).toBe("Response code: 404 Not Found - something went wrong!");
  });
});

describe("buildMediaPreview", () => {
  it("should take the first five items with an access URI", () => {
    expect(buildMediaPreview(ITEMS, client)).toEqual(PREVIEW);
  });

  it("should skip empty access URIs", () => {
    expect(buildMediaPreview([{ uuid: "m0", indexTerms: { accessuri: "" } }], client)).toEqual([]);
  });
});

describe("find_media_records prompt", () => {
  it("should document both query objects", () => {
    const prompt = getSystemPrompt();

    expect(prompt).toContain("## rq (records query) fields");
    expect(prompt).toContain("## mq (media query) fields");
    expect(prompt).not.toContain("# General rq object examples");
  });

  it("should only show examples that validate", () => {
    for (const example of EXAMPLES) {
      expect(MediaEnvelope.safeParse(example.response).success).toBe(true);
    }
  });
});
