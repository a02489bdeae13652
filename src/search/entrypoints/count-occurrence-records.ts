import { z } from "zod";
import { getIDigBioClient } from "../../adapters/idigbio/client.js";
import { SummaryBreakdown, type SummaryResponseT } from "../../adapters/idigbio/types.js";
import { checkEnvelopePairing, envelopeShape } from "../../schemas/envelope.js";
import {
  SummarySearchParameters,
  type SummarySearchParametersInput,
  type SummarySearchParametersT,
} from "../../schemas/parameters.js";
import { describeQueryFields, RecordsQuery } from "../../schemas/query.js";
import { emit, TelemetryEvents } from "../../utils/telemetry.js";
import { remapTopFields } from "../field-remapping.js";
import { buildSystemPrompt, LIST_OR_TIP, NO_RELATIONS_TIP, NO_PARTIAL_MATCH_TIP, type PromptExample } from "../prompt.js";
import { sanitizeParams } from "../query-encoding.js";
import type { ResponseContext } from "../response-context.js";
import { callSearchApi, generateOrReport, type AgentEntrypoint, type EntrypointDeps } from "./shared.js";

const ENDPOINT = "/v2/summary/top/records";

export const DEFAULT_COUNT_TO_SHOW = 10;
export const MAX_COUNT_TO_SHOW = 25;
/** The summary API never reports more unique values than this */
export const MAX_COUNT = 5000;

export const description = `\
Counts the total number of records in iDigBio matching the user's search criteria. Also breaks the count down by a \
specified field (default: scientific name) to build top-N lists or to find unique record field values that were \
matched. Counts can be broken down by any of iDigBio's query fields, such as "country" or "collector". Does NOT count \
the total number of unique values that were matched.

Here are some examples of building top-N lists:
- List the 10 species that have the most records in a country
- List the 5 countries that have the most records of a species
- List the 3 collectors who have recorded the most occurrences of a species

Here are some examples of finding unique values in matching records:
- List the continents that a species occurs in
- List different scientific names that have the same genus and specific epithet (e.g., scientific names with \
different authors)

Also returns the URL used to collect records counts from the iDigBio Summary API.`;

export const CountEnvelope = z
  .object(
    envelopeShape(
      SummarySearchParameters,
      'A concise characterization of the retrieved occurrence record statistics, e.g. "Per-country record counts ' +
        'for species Rattus rattus".',
    ),
  )
  .superRefine(checkEnvelopePairing);

export const EXAMPLES: ReadonlyArray<PromptExample<SummarySearchParametersInput>> = [
  {
    request: "Count number of species of Aves",
    response: {
      plan: "To count unique species I break the counts down by scientificname, restrict the records to class Aves and taxon rank species, and ask for the maximum count",
      search_parameters: {
        top_fields: "scientificname",
        count: 5000,
        rq: { class: "Aves", taxonrank: "species" },
      },
      artifact_description: "Per-species record counts for the class Aves",
    },
  },
  {
    request: "Which 5 countries have the most records of Rattus rattus?",
    response: {
      plan: "I break the counts down by country and limit the breakdown to the top 5 values. The name has no authority, so I search by genus and specificepithet",
      search_parameters: {
        top_fields: "country",
        count: 5,
        rq: { genus: "Rattus", specificepithet: "rattus" },
      },
      artifact_description: "Per-country record counts for species Rattus rattus",
    },
  },
  {
    request: "Who collected the most Quercus specimens?",
    response: {
      plan: "I break the counts down by collector for records of the genus Quercus",
      search_parameters: {
        top_fields: "collector",
        rq: { genus: "Quercus" },
      },
      artifact_description: "Per-collector record counts for the genus Quercus",
    },
  },
  {
    request: "How many species live in the same places as Puma concolor?",
    response: {
      plan: "The iDigBio API cannot relate records to each other, so co-occurrence with Puma concolor cannot be expressed. I must abort.",
    },
  },
];

let systemPrompt: string | null = null;

export function getSystemPrompt(): string {
  if (systemPrompt === null) {
    systemPrompt = buildSystemPrompt({
      intro: "You translate user requests into parameters for the iDigBio records summary API.",
      fieldDocs: describeQueryFields(RecordsQuery.shape),
      parametersDoc:
        '"search_parameters" is {"top_fields": <field name>, "count": <integer 1-5000>, "rq": <records query>}. ' +
        '"top_fields" is the field to break record counts down by, usually "scientificname". ' +
        '"count" is how many unique values to report; leave it out for the API default of 10 and use 5000 to count ' +
        'every unique value. "rq" is optional.',
      includeRecordsExamples: true,
      tips: [LIST_OR_TIP, NO_RELATIONS_TIP, NO_PARTIAL_MATCH_TIP],
      examples: EXAMPLES,
    });
  }
  return systemPrompt;
}

/**
 * Number of breakdown rows shown in the preview table.
 */
export function previewCount(count: number | undefined): number {
  if (count === undefined) return DEFAULT_COUNT_TO_SHOW;
  if (count === 0 || count > MAX_COUNT_TO_SHOW) return MAX_COUNT_TO_SHOW;
  return count;
}

/**
 * Per-value record counts of the first breakdown field in a summary response.
 */
export function readBreakdown(data: SummaryResponseT): Array<[string, number]> {
  const key = Object.keys(data).find((candidate) => candidate !== "itemCount");
  if (key === undefined) return [];

  const breakdown = SummaryBreakdown.safeParse(data[key]);
  if (!breakdown.success) return [];

  return Object.entries(breakdown.data).map(([value, counts]) => [value, counts.itemCount]);
}

function fieldLabel(topFields: string | string[]): string {
  return Array.isArray(topFields) ? topFields.join(", ") : topFields;
}

/**
 * Generate summary parameters for `request`, fetch per-value record counts,
 * and report them with a preview table and an artifact.
 */
export async function run(context: ResponseContext, request: string, deps: EntrypointDeps = {}): Promise<void> {
  await context.beginProcess("Requesting iDigBio statistics", async (agentProcess) => {
    await agentProcess.log("Generating search parameters for species occurrences");

    const generated = await generateOrReport(
      agentProcess,
      "count_occurrence_records",
      request,
      getSystemPrompt(),
      CountEnvelope,
      deps,
    );
    if (!generated) return;

    const remapped: SummarySearchParametersT = {
      ...generated.params,
      top_fields: remapTopFields(generated.params.top_fields),
    };
    const params = sanitizeParams(remapped);
    const topFields = fieldLabel(remapped.top_fields);

    await agentProcess.log("Generated search parameters", params);

    const client = deps.client ?? getIDigBioClient();
    const apiUrl = client.apiUrl(ENDPOINT, params);
    await agentProcess.log(`Sending a GET request to the iDigBio records summary API at ${apiUrl}`);

    const response = await callSearchApi(agentProcess, "count_occurrence_records", deps, () =>
      client.summarizeTopRecords(params),
    );
    if (!response) return;

    await agentProcess.log(`Response code: ${response.responseCode}`);

    const totalRecordCount = response.data.itemCount;
    const breakdown = readBreakdown(response.data);
    const totalUniqueCount = breakdown.length;

    await context.reply(
      `The API query found ${totalUniqueCount} unique "${topFields}" values across ${totalRecordCount} matching ` +
        "records in iDigBio",
    );
    await agentProcess.log(
      `[View summary of ${totalUniqueCount} unique "${topFields}" values across ${totalRecordCount} records](${apiUrl})`,
    );

    if (totalRecordCount === 0) return;

    if (totalUniqueCount >= MAX_COUNT) {
      emit(TelemetryEvents.SummaryCapReached, {
        request_id: deps.requestId,
        entrypoint: "count_occurrence_records",
        top_fields: topFields,
      });
      await context.reply(
        `Warning: Maximum count reached! iDigBio's Summary API can not return more than ${MAX_COUNT} unique values. ` +
          "There are probably more than that. Consider narrowing your search parameters if you need exact counts.",
      );
    }

    const shown = previewCount(remapped.count);
    await agentProcess.log(
      `Record counts for the top ${shown} out of ${totalUniqueCount} unique "${topFields}" values`,
      { __table: Object.fromEntries(breakdown.slice(0, shown)) },
    );

    await agentProcess.createArtifact({
      mimetype: "application/json",
      description: generated.artifactDescription,
      uris: [apiUrl],
      metadata: {
        data_source: "iDigBio",
        total_record_count: totalRecordCount,
        total_unique_count: totalUniqueCount,
      },
    });
  });
}

export const entrypoint: AgentEntrypoint = {
  id: "count_occurrence_records",
  description,
  run,
};
