/**
 * iDigBio search API client
 *
 * Thin fetch wrapper over the records, media and summary endpoints of
 * https://search.idigbio.org. Every failure (non-2xx, timeout, network,
 * unreadable body) surfaces as an IDigBioRequestError.
 */

import { STATUS_CODES } from "node:http";
import type { z } from "zod";
import { config } from "../../config/index.js";
import { sanitizeParams, type JsonObject } from "../../search/query-encoding.js";
import { log } from "../../utils/telemetry.js";
import {
  SearchResponse,
  SummaryResponse,
  type IDigBioClientConfig,
  type IDigBioResponse,
  type SearchEndpoint,
  type SearchResponseT,
  type SummaryResponseT,
} from "./types.js";
import { makeApiUrl, makeMediaRecordUrl, makePortalUrl } from "./urls.js";

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * "<status> <reason>", e.g. "404 Not Found"
 */
export function formatResponseCode(status: number): string {
  return `${status} ${STATUS_CODES[status] ?? ""}`.trimEnd();
}

/**
 * Request to the iDigBio API failed
 */
export class IDigBioRequestError extends Error {
  constructor(
    message: string,
    /** What to show as the response code: "502 Bad Gateway", "timeout", "network error" */
    public readonly responseCode: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "IDigBioRequestError";
  }
}

export class IDigBioClient {
  private readonly searchBaseUrl: string;
  private readonly portalBaseUrl: string;
  private readonly timeout: number;

  constructor(clientConfig: IDigBioClientConfig) {
    this.searchBaseUrl = clientConfig.searchBaseUrl;
    this.portalBaseUrl = clientConfig.portalBaseUrl;
    this.timeout = clientConfig.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  apiUrl(endpoint: string, params?: JsonObject): string {
    return makeApiUrl(this.searchBaseUrl, endpoint, params);
  }

  portalUrl(params?: JsonObject): string {
    return makePortalUrl(this.portalBaseUrl, params);
  }

  mediaRecordUrl(uuid: string): string {
    return makeMediaRecordUrl(this.portalBaseUrl, uuid);
  }

  /**
   * POST a search to /v2/search/records or /v2/search/media. Empty values are
   * stripped from the body.
   *
   * @throws IDigBioRequestError
   */
  async search(endpoint: SearchEndpoint, params: JsonObject): Promise<IDigBioResponse<SearchResponseT>> {
    return this.makeRequest(
      this.apiUrl(endpoint),
      {
        method: "POST",
        body: JSON.stringify(sanitizeParams(params)),
        headers: { "Content-Type": "application/json", Accept: "application/json" },
      },
      SearchResponse,
    );
  }

  /**
   * GET per-value record counts from /v2/summary/top/records.
   *
   * @throws IDigBioRequestError
   */
  async summarizeTopRecords(params: JsonObject): Promise<IDigBioResponse<SummaryResponseT>> {
    return this.makeRequest(
      this.apiUrl("/v2/summary/top/records", params),
      { method: "GET", headers: { Accept: "application/json" } },
      SummaryResponse,
    );
  }

  private async makeRequest<T>(
    url: string,
    options: globalThis.RequestInit,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<IDigBioResponse<T>> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const startTime = Date.now();

    let response: Response;
    try {
      response = await fetch(url, { ...options, signal: controller.signal });
    } catch (error) {
      clearTimeout(timeoutId);
      const latency = Date.now() - startTime;

      if (controller.signal.aborted) {
        log.warn({ event: "idigbio.request.timeout", url, latency_ms: latency }, "iDigBio request timed out");
        throw new IDigBioRequestError(`iDigBio request timed out after ${this.timeout}ms`, "timeout");
      }

      const reason = error instanceof Error ? error.message : String(error);
      log.warn({ event: "idigbio.request.failed", url, error: reason, latency_ms: latency }, "iDigBio request failed");
      throw new IDigBioRequestError(`iDigBio request failed: ${reason}`, "network error");
    }

    clearTimeout(timeoutId);
    const responseCode = formatResponseCode(response.status);

    if (!response.ok) {
      log.warn(
        { event: "idigbio.request.rejected", url, status: response.status, latency_ms: Date.now() - startTime },
        "iDigBio returned non-2xx status"
      );
      throw new IDigBioRequestError(`iDigBio request failed: ${responseCode}`, responseCode, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new IDigBioRequestError(`iDigBio returned a non-JSON body: ${reason}`, responseCode, response.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      log.warn(
        { event: "idigbio.response.invalid", url, issues: parsed.error.issues.slice(0, 5) },
        "iDigBio response did not match the expected shape"
      );
      throw new IDigBioRequestError("iDigBio returned an unexpected response shape", responseCode, response.status);
    }

    log.debug({ event: "idigbio.request.success", url, status: response.status, latency_ms: Date.now() - startTime });

    return { status: response.status, responseCode, data: parsed.data };
  }
}

let defaultClient: IDigBioClient | null = null;

/**
 * Client configured from IDIGBIO_* environment variables.
 */
export function getIDigBioClient(): IDigBioClient {
  if (!defaultClient) {
    defaultClient = new IDigBioClient({
      searchBaseUrl: config.idigbio.searchBaseUrl,
      portalBaseUrl: config.idigbio.portalBaseUrl,
      timeoutMs: config.idigbio.timeoutMs,
    });
  }
  return defaultClient;
}

/**
 * Drop the cached client (tests only)
 */
export function resetIDigBioClient(): void {
  defaultClient = null;
}
