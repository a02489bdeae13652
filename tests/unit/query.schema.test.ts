/**
 * Records and media query schemas
 *
 * Covers the per-kind value shapes and the geo-point rules, including which
 * failures are terminal for the generation loop.
 */

import { describe, it, expect } from "vitest";
import {
  describeQueryFields,
  findTerminalIssue,
  GeoPoint,
  MediaQuery,
  RecordsQuery,
} from "../../src/schemas/query.js";

function terminalMessage(value: unknown): string | undefined {
  const result = RecordsQuery.safeParse(value);
  if (result.success) return undefined;
  return findTerminalIssue(result.error)?.message;
}

describe("RecordsQuery", () => {
  it("should accept an empty wildcard query", () => {
    expect(RecordsQuery.parse({})).toEqual({});
  });

  describe("string fields", () => {
    it("should accept a string, a list and an existence marker", () => {
      expect(RecordsQuery.parse({ genus: "Homo" })).toEqual({ genus: "Homo" });
      expect(RecordsQuery.parse({ genus: ["Ursus", "Puffinus"] })).toEqual({ genus: ["Ursus", "Puffinus"] });
      expect(RecordsQuery.parse({ genus: { type: "exists" } })).toEqual({ genus: { type: "exists" } });
    });

    it("should reject a number", () => {
      expect(RecordsQuery.safeParse({ genus: 5 }).success).toBe(false);
    });
  });

  describe("date fields", () => {
    it("should normalise unpadded dates", () => {
      expect(RecordsQuery.parse({ datecollected: "1900-3-14" })).toEqual({ datecollected: "1900-03-14" });
    });

    it("should accept ranges", () => {
      expect(RecordsQuery.parse({ eventdate: { type: "range", gte: "2000-1-1", lte: "2010-12-31" } })).toEqual({
        eventdate: { type: "range", gte: "2000-01-01", lte: "2010-12-31" },
      });
    });

    it("should reject impossible calendar dates without stopping generation", () => {
      const result = RecordsQuery.safeParse({ datecollected: "2020-02-30" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(findTerminalIssue(result.error)).toBeUndefined();
      }
    });
  });

  it("should reject non-integer values for integer fields", () => {
    expect(RecordsQuery.safeParse({ version: 1.5 }).success).toBe(false);
    expect(RecordsQuery.parse({ version: 2 })).toEqual({ version: 2 });
  });

  it("should accept hasImage as a plain boolean", () => {
    expect(RecordsQuery.parse({ hasImage: true })).toEqual({ hasImage: true });
  });

  it("should reject unknown fields as a retryable error", () => {
    const result = RecordsQuery.safeParse({ color: "blue" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(findTerminalIssue(result.error)).toBeUndefined();
    }
  });
});

describe("GeoPoint", () => {
  it("should default the type to geo_distance", () => {
    expect(GeoPoint.parse({ lat: 10, lon: 20, distance: "5km" })).toEqual({
      type: "geo_distance",
      lat: 10,
      lon: 20,
      distance: "5km",
    });
  });

  it("should accept a bounding box", () => {
    const box = {
      type: "geo_bounding_box",
      top_left: { lat: 40, lon: -100 },
      bottom_right: { lat: 30, lon: -90 },
    };

    expect(GeoPoint.parse(box)).toEqual(box);
  });

  it("should accept coordinates on the range boundaries", () => {
    expect(GeoPoint.safeParse({ lat: 90, lon: 180 }).success).toBe(true);
    expect(GeoPoint.safeParse({ lat: -90, lon: -180 }).success).toBe(true);
  });

  it("should mark an out-of-range latitude as terminal", () => {
    expect(terminalMessage({ geopoint: { lat: 91, lon: 0 } })).toBe(
      "Invalid latitude value: 91 is not in range [-90, +90]",
    );
  });

  it("should mark an out-of-range corner longitude as terminal", () => {
    expect(
      terminalMessage({
        geopoint: {
          type: "geo_bounding_box",
          top_left: { lat: 10, lon: -181 },
          bottom_right: { lat: 0, lon: 10 },
        },
      }),
    ).toBe("Invalid longitude value: -181 is not in range [-180, +180]");
  });

  it("should mark an out-of-range latitude as terminal when the longitude is malformed", () => {
    expect(terminalMessage({ geopoint: { lat: 95, lon: "0" } })).toBe(
      "Invalid latitude value: 95 is not in range [-90, +90]",
    );
  });

  it("should mark an out-of-range corner latitude as terminal when the corner is incomplete", () => {
    expect(
      terminalMessage({
        geopoint: {
          type: "geo_bounding_box",
          top_left: { lat: 95 },
          bottom_right: { lat: 0, lon: 10 },
        },
      }),
    ).toBe("Invalid latitude value: 95 is not in range [-90, +90]");
  });

  it("should reject corners on a geo_distance point", () => {
    expect(terminalMessage({ geopoint: { type: "geo_distance", lat: 1, lon: 2, top_left: { lat: 1, lon: 1 } } })).toBe(
      "top_left and bottom_right should not be present when type is geo_distance",
    );
  });

  it("should reject a centre point on a bounding box", () => {
    expect(
      terminalMessage({
        geopoint: {
          type: "geo_bounding_box",
          lat: 1,
          top_left: { lat: 10, lon: 0 },
          bottom_right: { lat: 0, lon: 10 },
        },
      }),
    ).toBe("lat, lon, and distance should not be present when type is geo_bounding_box");
  });

  it("should require both corners of a bounding box", () => {
    expect(terminalMessage({ geopoint: { type: "geo_bounding_box", top_left: { lat: 10, lon: 0 } } })).toBe(
      "bottom_right is required when type is geo_bounding_box",
    );
  });

  it("should require lat and lon for geo_distance", () => {
    expect(terminalMessage({ geopoint: { lon: 5, distance: "1km" } })).toBe(
      "lat is required when type is geo_distance",
    );
  });
});

describe("MediaQuery", () => {
  it("should accept the known media types", () => {
    expect(MediaQuery.parse({ mediatype: "sounds" })).toEqual({ mediatype: "sounds" });
  });

  it("should reject other media types without stopping generation", () => {
    const result = MediaQuery.safeParse({ mediatype: "videos" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(findTerminalIssue(result.error)).toBeUndefined();
    }
  });
});

describe("describeQueryFields", () => {
  it("should render one line per records field", () => {
    const lines = describeQueryFields(RecordsQuery.shape).split("\n");

    expect(lines).toHaveLength(57);
    expect(lines).toContain(
      '- `genus` (string | string[] | {"type":"exists"|"missing"}): Scientific name of the genus in which the ' +
        "taxon is classified.",
    );
    expect(lines).toContain(
      '- `version` (integer | {"type":"exists"|"missing"}): Integer representing the current revision number of ' +
        "the record in iDigBio.",
    );
  });

  it("should list enum options for media types", () => {
    expect(describeQueryFields(MediaQuery.shape)).toContain(
      '- `mediatype` ("images" | "sounds"): Kind of media: "images" or "sounds".',
    );
  });
});
