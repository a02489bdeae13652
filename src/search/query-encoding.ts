/**
 * URL encoding for iDigBio search parameters.
 *
 * The search API and portal both take each top-level parameter as
 * `name=<JSON-ish value>`, e.g.
 *
 *   rq={"genus":"Homo","specificepithet":"sapiens"}&limit=100
 *
 * with only braces, double quotes and spaces percent-escaped, so the URLs
 * stay readable when shown to a user.
 */

export type JsonObject = { [key: string]: unknown };

function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === "") return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Recursively drop empty objects, empty arrays, empty strings and undefined
 * values. Children are cleaned first, so a parent left empty is dropped too.
 */
export function sanitizeJson(data: unknown): unknown {
  if (Array.isArray(data)) {
    return data.map(sanitizeJson).filter((item) => !isEmpty(item));
  }
  if (isPlainObject(data)) {
    const result: JsonObject = {};
    for (const [key, value] of Object.entries(data)) {
      const cleaned = sanitizeJson(value);
      if (!isEmpty(cleaned)) {
        result[key] = cleaned;
      }
    }
    return result;
  }
  return data;
}

/**
 * {@link sanitizeJson} for a parameter object, keeping the object type.
 */
export function sanitizeParams(params: JsonObject): JsonObject {
  const cleaned = sanitizeJson(params);
  return isPlainObject(cleaned) ? cleaned : {};
}

function encodeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(encodeValue).join(",")}]`;
  }
  if (isPlainObject(value)) {
    const entries = Object.entries(value)
      .filter(([, child]) => child !== undefined)
      .map(([key, child]) => `${JSON.stringify(key)}:${encodeValue(child)}`);
    return `{${entries.join(",")}}`;
  }
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value === null) return "null";
  return JSON.stringify(String(value));
}

const PERCENT_ESCAPES: ReadonlyArray<readonly [string, string]> = [
  ["{", "%7B"],
  ["}", "%7D"],
  ['"', "%22"],
  [" ", "%20"],
];

export function percentEncode(text: string): string {
  return PERCENT_ESCAPES.reduce((acc, [raw, escaped]) => acc.split(raw).join(escaped), text);
}

/**
 * Serialize parameters to the query-string form used by the iDigBio search
 * API and portal. Empty values are removed first; key order is preserved.
 */
export function encodeQueryParams(params: JsonObject): string {
  const cleaned = sanitizeParams(params);
  return percentEncode(
    Object.entries(cleaned)
      .map(([key, value]) => `${key}=${encodeValue(value)}`)
      .join("&"),
  );
}
