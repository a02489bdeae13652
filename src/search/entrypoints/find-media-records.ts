import { z } from "zod";
import { getIDigBioClient, type IDigBioClient } from "../../adapters/idigbio/client.js";
import type { SearchItemT } from "../../adapters/idigbio/types.js";
import { checkEnvelopePairing, envelopeShape } from "../../schemas/envelope.js";
import { MediaSearchParameters, type MediaSearchParametersInput } from "../../schemas/parameters.js";
import { describeQueryFields, MediaQuery, RecordsQuery } from "../../schemas/query.js";
import { buildSystemPrompt, LIST_OR_TIP, NO_PARTIAL_MATCH_TIP, type PromptExample } from "../prompt.js";
import { sanitizeParams } from "../query-encoding.js";
import type { ResponseContext } from "../response-context.js";
import { callSearchApi, generateOrReport, type AgentEntrypoint, type EntrypointDeps } from "./shared.js";

const ENDPOINT = "/v2/search/media";

export const PREVIEW_SIZE = 5;

export const description = `\
Searches iDigBio for media records (like images and audio). Returns the total number of media records that were \
found, a URL to access the raw results returned by the iDigBio media API, and a URL to view the results in the \
iDigBio Search Portal. Also displays an interactive media gallery to the user.`;

export const MediaEnvelope = z
  .object(
    envelopeShape(MediaSearchParameters, "A concise characterization of the retrieved media records."),
  )
  .superRefine(checkEnvelopePairing);

export const EXAMPLES: ReadonlyArray<PromptExample<MediaSearchParametersInput>> = [
  {
    request: "Homo sapiens",
    response: {
      plan: "The request only specifies occurrence-related information, so I will search using rq fields. The name doesn't have authority specified, so I will search by genus and specificepithet instead of scientificname",
      search_parameters: { rq: { genus: "Homo", specificepithet: "sapiens" } },
      artifact_description: "Media records for the species Homo sapiens",
    },
  },
  {
    request: "Audio of Homo sapiens",
    response: {
      plan: 'To filter for audio I need to use the mq field and search by mediatype. The mediatype for audio is "sounds". The name Homo sapiens has no authority, so I will search by genus and specificepithet',
      search_parameters: {
        mq: { mediatype: "sounds" },
        rq: { genus: "Homo", specificepithet: "sapiens" },
      },
      artifact_description: "Audio recordings of the species Homo sapiens",
    },
  },
  {
    request: "Pictures of Rattus rattus in Taiwan",
    response: {
      plan: 'To filter for pictures I need to use the mq field and search by mediatype. The mediatype for pictures is "images". To filter by species and country I use rq fields. The name has no authority, so I will search by genus and specificepithet',
      search_parameters: {
        mq: { mediatype: "images" },
        rq: { country: "Taiwan", genus: "Rattus", specificepithet: "rattus" },
      },
      artifact_description: "Images of the species Rattus rattus in Taiwan",
    },
  },
  {
    request: "Blurry images in Canada",
    response: {
      plan: "There are no search parameters for image quality, so I should abort.",
    },
  },
  {
    request: "Images of blue plants",
    response: {
      plan: "There are no search parameters for color or other image features, so I should abort.",
    },
  },
];

let systemPrompt: string | null = null;

export function getSystemPrompt(): string {
  if (systemPrompt === null) {
    systemPrompt = buildSystemPrompt({
      intro: "You translate user requests into parameters for the iDigBio media search API.",
      fieldDocs:
        `## rq (records query) fields\n\n${describeQueryFields(RecordsQuery.shape)}\n\n` +
        `## mq (media query) fields\n\n${describeQueryFields(MediaQuery.shape)}`,
      parametersDoc:
        '"search_parameters" is {"mq": <media query>, "rq": <records query>, "limit": <integer 1-5000>}. ' +
        'All three are optional. "mq" filters the media records themselves; "rq" filters the occurrence records ' +
        "the media belong to.",
      tips: [LIST_OR_TIP, NO_PARTIAL_MATCH_TIP],
      examples: EXAMPLES,
    });
  }
  return systemPrompt;
}

export interface MediaPreviewRow {
  accessuri: string;
  link?: string;
}

/**
 * Up to {@link PREVIEW_SIZE} items that have an access URI, with a portal link
 * when the item has a uuid.
 */
export function buildMediaPreview(items: SearchItemT[], client: IDigBioClient): MediaPreviewRow[] {
  const rows: MediaPreviewRow[] = [];
  for (const item of items) {
    if (rows.length >= PREVIEW_SIZE) break;
    const accessuri = item.indexTerms.accessuri;
    if (typeof accessuri !== "string" || accessuri === "") continue;
    rows.push(
      item.uuid ? { accessuri, link: `[view online](${client.mediaRecordUrl(item.uuid)})` } : { accessuri },
    );
  }
  return rows;
}

/**
 * Generate media search parameters for `request`, run the search, and report
 * a preview of the media found plus an artifact.
 */
export async function run(context: ResponseContext, request: string, deps: EntrypointDeps = {}): Promise<void> {
  await context.beginProcess("Searching iDigBio media records", async (agentProcess) => {
    await agentProcess.log("Generating search parameters for iDigBio's media records API");

    const generated = await generateOrReport(
      agentProcess,
      "find_media_records",
      request,
      getSystemPrompt(),
      MediaEnvelope,
      deps,
    );
    if (!generated) return;

    const params = sanitizeParams(generated.params);
    await agentProcess.log("Generated search parameters", params);

    const client = deps.client ?? getIDigBioClient();
    const apiUrl = client.apiUrl(ENDPOINT, params);
    await agentProcess.log(`Sending a POST request to the iDigBio media records API at ${apiUrl}`);

    const response = await callSearchApi(agentProcess, "find_media_records", deps, () =>
      client.search(ENDPOINT, params),
    );
    if (!response) return;

    const matchingCount = response.data.itemCount;
    const recordCount = response.data.items.length;

    await context.reply(
      `The API query returned ${recordCount} out of ${matchingCount} matching media records in iDigBio using the ` +
        `URL ${apiUrl}`,
    );

    if (recordCount === 0) return;

    const preview = buildMediaPreview(response.data.items, client);
    if (preview.length > 0) {
      await agentProcess.log(`Preview of ${preview.length} out of ${recordCount} retrieved media records`, {
        __table: preview,
      });
    }

    await agentProcess.createArtifact({
      mimetype: "application/json",
      description: generated.artifactDescription,
      uris: [apiUrl],
      metadata: {
        data_source: "iDigBio",
        retrieved_record_count: recordCount,
        total_matching_count: matchingCount,
      },
    });

    await context.reply(
      "Tips:\n" +
        "- Image URLs can be found in the artifact record data at items[].indexTerms.accessuri\n" +
        "- UUIDs for associated specimen/occurrence records in iDigBio are found in the artifact record data at " +
        "items[].indexTerms.records\n" +
        `- The web pages for individual media records follow the pattern ${client.mediaRecordUrl("[UUID]")} using ` +
        "the UUIDs found in the artifact record data at items[].uuid.",
    );
  });
}

export const entrypoint: AgentEntrypoint = {
  id: "find_media_records",
  description,
  run,
};
