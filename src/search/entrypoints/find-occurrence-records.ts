import { z } from "zod";
import { getIDigBioClient } from "../../adapters/idigbio/client.js";
import { checkEnvelopePairing, envelopeShape } from "../../schemas/envelope.js";
import {
  RecordsSearchParameters,
  type RecordsSearchParametersInput,
} from "../../schemas/parameters.js";
import { describeQueryFields, RecordsQuery } from "../../schemas/query.js";
import { buildSystemPrompt, LIST_OR_TIP, NO_RELATIONS_TIP, NO_PARTIAL_MATCH_TIP, type PromptExample } from "../prompt.js";
import { sanitizeParams } from "../query-encoding.js";
import type { ResponseContext } from "../response-context.js";
import { callSearchApi, generateOrReport, type AgentEntrypoint, type EntrypointDeps } from "./shared.js";

const ENDPOINT = "/v2/search/records";

export const description = `\
Searches for species occurrence records using the iDigBio Portal or the iDigBio records API. Returns the total number \
of records that were found, the URL used to call the iDigBio Records API to perform the search, and a URL to view the \
results in the iDigBio Search Portal.`;

export const OccurrenceEnvelope = z
  .object(
    envelopeShape(
      RecordsSearchParameters,
      "A concise characterization of the retrieved occurrence record data.",
    ),
  )
  .superRefine(checkEnvelopePairing);

export const EXAMPLES: ReadonlyArray<PromptExample<RecordsSearchParametersInput>> = [
  {
    request: "Homo sapiens",
    response: {
      plan: "The name Homo sapiens doesn't have authority specified, so I will search by genus and specificepithet instead of scientificname",
      search_parameters: { rq: { genus: "Homo", specificepithet: "sapiens" } },
      artifact_description: "Occurrence records for the species Homo sapiens",
    },
  },
  {
    request: "Only Homo sapiens Linnaeus, 1758",
    response: {
      plan: "The name includes authority information, so I will search by scientificname",
      search_parameters: { rq: { scientificname: "Homo sapiens Linnaeus, 1758" } },
      artifact_description: 'Occurrence records for the species "Homo sapiens Linnaeus, 1758"',
    },
  },
  {
    request: 'Scientific name "this is fake but use it anyway"',
    response: {
      plan: "The request placed a scientific name in quotes, so I will search by scientificname for an exact match",
      search_parameters: { rq: { scientificname: "this is fake but use it anyway" } },
      artifact_description: 'Occurrence records for the species "this is fake but use it anyway"',
    },
  },
  {
    request: "kingdom must be specified",
    response: {
      plan: 'To find records that have the kingdom field, I need to search by kingdom for {"type": "exists"}',
      search_parameters: { rq: { kingdom: { type: "exists" } } },
      artifact_description: "Occurrence records with the kingdom field specified",
    },
  },
  {
    request: "Records with no collector specified",
    response: {
      plan: 'To find records with no collector field, I need to search by collector for {"type": "missing"}',
      search_parameters: { rq: { collector: { type: "missing" } } },
      artifact_description: "Occurrence records with no collector specified",
    },
  },
  {
    request: "Homo sapiens and Rattus rattus in North America and Australia",
    response: {
      plan: "The request concerns two species in two continents, so I will search using the scientificname and continent fields, giving the values as lists.",
      search_parameters: {
        rq: {
          scientificname: ["Homo sapiens", "Rattus rattus"],
          continent: ["North America", "Australia"],
        },
      },
      artifact_description: "Occurrence records of Homo sapiens and Rattus rattus in North America and Australia",
    },
  },
  {
    request: "Ursus arctos records within 50 km of Rattus rattus records",
    response: {
      plan: "The iDigBio API cannot relate records to each other, so records near other records cannot be searched for. I must abort.",
    },
  },
];

let systemPrompt: string | null = null;

export function getSystemPrompt(): string {
  if (systemPrompt === null) {
    systemPrompt = buildSystemPrompt({
      intro: "You translate user requests into parameters for the iDigBio record search API.",
      fieldDocs: describeQueryFields(RecordsQuery.shape),
      parametersDoc:
        '"search_parameters" is {"rq": <records query>, "limit": <integer 1-5000, default 100>}. ' +
        '"rq" is required; use {} to match every record.',
      includeRecordsExamples: true,
      tips: [LIST_OR_TIP, NO_RELATIONS_TIP, NO_PARTIAL_MATCH_TIP],
      examples: EXAMPLES,
    });
  }
  return systemPrompt;
}

/**
 * Generate a records query for `request`, run it, and report the matching
 * records as an artifact.
 */
export async function run(context: ResponseContext, request: string, deps: EntrypointDeps = {}): Promise<void> {
  await context.beginProcess("Searching iDigBio occurrence records", async (agentProcess) => {
    await agentProcess.log("Generating search parameters for iDigBio's occurrence records API");

    const generated = await generateOrReport(
      agentProcess,
      "find_occurrence_records",
      request,
      getSystemPrompt(),
      OccurrenceEnvelope,
      deps,
    );
    if (!generated) return;

    const params = sanitizeParams(generated.params);
    await agentProcess.log("Generated search parameters", params);

    const client = deps.client ?? getIDigBioClient();
    const apiUrl = client.apiUrl(ENDPOINT, params);
    await agentProcess.log(`Sending a POST request to the iDigBio occurrence records API at ${apiUrl}`);

    const response = await callSearchApi(agentProcess, "find_occurrence_records", deps, () =>
      client.search(ENDPOINT, params),
    );
    if (!response) return;

    const matchingCount = response.data.itemCount;
    const recordCount = response.data.items.length;

    await context.reply(
      `The API query returned ${recordCount} out of ${matchingCount} matching records in iDigBio using the URL ${apiUrl}`,
    );

    const portalUrl = client.portalUrl(params);
    await agentProcess.log(
      `[View ${recordCount} out of ${matchingCount} matching records](${apiUrl}) | [Show in iDigBio portal](${portalUrl})`,
    );

    if (recordCount > 0) {
      await context.reply(
        `The records can be viewed in the iDigBio portal at ${portalUrl}. The portal shows the records in an ` +
          `interactive list and plots them on a map. The raw records returned by the API can be found at ${apiUrl}`,
      );
      await agentProcess.createArtifact({
        mimetype: "application/json",
        description: generated.artifactDescription,
        uris: [apiUrl],
        metadata: {
          data_source: "iDigBio",
          portal_url: portalUrl,
          retrieved_record_count: recordCount,
          total_matching_count: matchingCount,
        },
      });
    }
  });
}

export const entrypoint: AgentEntrypoint = {
  id: "find_occurrence_records",
  description,
  run,
};
