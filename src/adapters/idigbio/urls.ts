import { encodeQueryParams, type JsonObject } from "../../search/query-encoding.js";

function withParams(base: string, params?: JsonObject): string {
  return params === undefined ? base : `${base}?${encodeQueryParams(params)}`;
}

/**
 * Search API URL, e.g. https://search.idigbio.org/v2/search/records?rq=...
 */
export function makeApiUrl(searchBaseUrl: string, endpoint: string, params?: JsonObject): string {
  return withParams(`${searchBaseUrl}${endpoint}`, params);
}

/**
 * Portal search page showing the same records on a list and a map.
 */
export function makePortalUrl(portalBaseUrl: string, params?: JsonObject): string {
  return withParams(`${portalBaseUrl}/portal/search`, params);
}

export function makeMediaRecordUrl(portalBaseUrl: string, uuid: string): string {
  return `${portalBaseUrl}/portal/mediarecords/${uuid}`;
}
