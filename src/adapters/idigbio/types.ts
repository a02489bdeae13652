/**
 * iDigBio search API response shapes.
 *
 * Only the fields the agent reads are declared; everything else passes
 * through untouched so artifacts keep the full record data.
 */

import { z } from "zod";

export const SearchItem = z
  .object({
    uuid: z.string().optional(),
    type: z.string().optional(),
    indexTerms: z.record(z.unknown()).default({}),
  })
  .passthrough();

export type SearchItemT = z.infer<typeof SearchItem>;

/**
 * /v2/search/records and /v2/search/media
 */
export const SearchResponse = z
  .object({
    itemCount: z.number().int().nonnegative(),
    items: z.array(SearchItem).default([]),
  })
  .passthrough();

export type SearchResponseT = z.infer<typeof SearchResponse>;

/**
 * /v2/summary/top/records: `itemCount` plus one object per breakdown field,
 * keyed by field value.
 */
export const SummaryResponse = z.object({ itemCount: z.number().int().nonnegative() }).catchall(z.unknown());

export type SummaryResponseT = z.infer<typeof SummaryResponse>;

export const SummaryBreakdown = z.record(z.object({ itemCount: z.number().int().nonnegative() }).passthrough());

export type SummaryBreakdownT = z.infer<typeof SummaryBreakdown>;

export interface IDigBioResponse<T> {
  status: number;
  /** Status code and reason phrase, e.g. "200 OK" */
  responseCode: string;
  data: T;
}

export interface IDigBioClientConfig {
  searchBaseUrl: string;
  portalBaseUrl: string;
  timeoutMs?: number;
}

export type SearchEndpoint = "/v2/search/records" | "/v2/search/media";

export type SummaryEndpoint = "/v2/summary/top/records";
