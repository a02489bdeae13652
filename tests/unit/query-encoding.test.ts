/**
 * iDigBio query-string encoding
 *
 * URLs are compared character for character: they are shown to users and
 * must match what the search API and portal accept.
 */

import { describe, it, expect } from "vitest";
import {
  encodeQueryParams,
  percentEncode,
  sanitizeJson,
  sanitizeParams,
} from "../../src/search/query-encoding.js";

function decodeQueryParams(encoded: string): Record<string, unknown> {
  return Object.fromEntries(
    encoded.split("&").map((pair) => {
      const separator = pair.indexOf("=");
      return [pair.slice(0, separator), JSON.parse(decodeURIComponent(pair.slice(separator + 1)))];
    }),
  );
}

describe("sanitizeJson", () => {
  it("should drop empty strings, arrays and objects at every depth", () => {
    const input = {
      rq: { genus: "", family: [], geopoint: {}, class: "aves" },
      mq: { nested: {} },
      limit: 10,
    };

    expect(sanitizeJson(input)).toEqual({ rq: { class: "aves" }, limit: 10 });
  });

  it("should clean array elements", () => {
    expect(sanitizeJson(["a", "", [], {}, { b: "" }])).toEqual(["a"]);
  });

  it("should keep zero, false and null", () => {
    expect(sanitizeJson({ count: 0, hasImage: false, missing: null })).toEqual({
      count: 0,
      hasImage: false,
      missing: null,
    });
  });

  it("should return an empty object when nothing survives", () => {
    expect(sanitizeParams({ rq: { genus: "" } })).toEqual({});
  });
});

describe("percentEncode", () => {
  it("should escape only braces, double quotes and spaces", () => {
    expect(percentEncode('{"a b":[1,2]}')).toBe("%7B%22a%20b%22:[1,2]%7D");
  });
});

describe("encodeQueryParams", () => {
  it("should encode a records search", () => {
    expect(encodeQueryParams({ rq: { genus: "Homo", specificepithet: "sapiens" }, limit: 100 })).toBe(
      "rq=%7B%22genus%22:%22Homo%22,%22specificepithet%22:%22sapiens%22%7D&limit=100",
    );
  });

  it("should encode a summary request with a bare string parameter", () => {
    expect(
      encodeQueryParams({
        top_fields: "scientificname",
        count: 5000,
        rq: { class: "Aves", country: "Colombia", taxonrank: "species" },
      }),
    ).toBe(
      "top_fields=%22scientificname%22&count=5000&rq=%7B%22class%22:%22Aves%22,%22country%22:%22Colombia%22," +
        "%22taxonrank%22:%22species%22%7D",
    );
  });

  it("should escape spaces inside values", () => {
    expect(encodeQueryParams({ rq: { country: "United States" } })).toBe(
      "rq=%7B%22country%22:%22United%20States%22%7D",
    );
  });

  it("should write lists with brackets and booleans bare", () => {
    expect(encodeQueryParams({ rq: { genus: ["Ursus", "Puffinus"], hasImage: true } })).toBe(
      "rq=%7B%22genus%22:[%22Ursus%22,%22Puffinus%22],%22hasImage%22:true%7D",
    );
  });

  it("should drop empty parameters before encoding", () => {
    expect(encodeQueryParams({ rq: { genus: "Homo", family: "" }, mq: {} })).toBe(
      "rq=%7B%22genus%22:%22Homo%22%7D",
    );
  });

  it("should return an empty string for empty parameters", () => {
    expect(encodeQueryParams({})).toBe("");
  });

  it("should leave no raw braces, quotes or spaces", () => {
    const encoded = encodeQueryParams({
      rq: {
        scientificname: "Puma concolor (Linnaeus, 1771)",
        datecollected: { type: "range", gte: "1900-01-01", lte: "1950-12-31" },
      },
      limit: 5,
    });

    expect(encoded).not.toMatch(/[{}" ]/);
    expect(encoded).toContain(":");
    expect(encoded).toContain(",");
  });

  it("should decode back to the sanitized parameters", () => {
    const params = {
      rq: {
        genus: "Homo",
        geopoint: { type: "geo_distance", lat: 1.5, lon: -2, distance: "10km" },
        basisofrecord: "",
      },
      limit: 5,
    };

    expect(decodeQueryParams(encodeQueryParams(params))).toEqual({
      rq: { genus: "Homo", geopoint: { type: "geo_distance", lat: 1.5, lon: -2, distance: "10km" } },
      limit: 5,
    });
  });
});
