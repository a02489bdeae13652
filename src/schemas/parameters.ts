import { z } from "zod";
import { MediaQuery, RecordsQuery } from "./query.js";

/** Largest page or breakdown size the iDigBio search API accepts */
export const MAX_API_LIMIT = 5000;

/**
 * Body of a POST to /v2/search/records.
 */
export const RecordsSearchParameters = z
  .object({
    rq: RecordsQuery.describe("Search criteria for species occurrence records in iDigBio"),
    limit: z
      .number()
      .int()
      .min(1)
      .max(MAX_API_LIMIT)
      .default(100)
      .describe("The maximum number of records to return"),
  })
  .strict();

export type RecordsSearchParametersT = z.infer<typeof RecordsSearchParameters>;
export type RecordsSearchParametersInput = z.input<typeof RecordsSearchParameters>;

/**
 * Query string of a GET to /v2/summary/top/records.
 */
export const SummarySearchParameters = z
  .object({
    top_fields: z
      .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
      .describe(
        'The field to break down record counts by, usually "scientificname". For example, if top_fields is ' +
          '"country", the iDigBio API finds the countries with the most records matching the search parameters.',
      ),
    count: z
      .number()
      .int()
      .min(1)
      .max(MAX_API_LIMIT)
      .optional()
      .describe(
        'The maximum number of unique values to report record counts for. For example, to find 10 species set "count" ' +
          "to 10. To find the total number of unique values, use the maximum count allowed (5000). " +
          "The API returns 10 when unset.",
      ),
    rq: RecordsQuery.optional().describe("Search criteria for the records to summarise"),
  })
  .strict();

export type SummarySearchParametersT = z.infer<typeof SummarySearchParameters>;
export type SummarySearchParametersInput = z.input<typeof SummarySearchParameters>;

/**
 * Body of a POST to /v2/search/media.
 */
export const MediaSearchParameters = z
  .object({
    mq: MediaQuery.optional().describe("Search criteria for media and media records"),
    rq: RecordsQuery.optional().describe("Search criteria for the occurrence records the media belong to"),
    limit: z
      .number()
      .int()
      .min(1)
      .max(MAX_API_LIMIT)
      .optional()
      .describe("The maximum number of media records to return"),
  })
  .strict();

export type MediaSearchParametersT = z.infer<typeof MediaSearchParameters>;
export type MediaSearchParametersInput = z.input<typeof MediaSearchParameters>;
