import { describe, it, expect } from "vitest";
import { FIELD_REPLACEMENTS, remapTopFields } from "../../src/search/field-remapping.js";

describe("remapTopFields", () => {
  it("should replace word-indexed fields with their keyword variants", () => {
    expect(remapTopFields("collector")).toBe("collector.keyword");
    expect(remapTopFields("locality")).toBe("locality.keyword");
    expect(remapTopFields("highertaxon")).toBe("highertaxon.keyword");
  });

  it("should pass other fields through", () => {
    expect(remapTopFields("scientificname")).toBe("scientificname");
  });

  it("should remap lists element-wise", () => {
    expect(remapTopFields(["country", "collector"])).toEqual(["country", "collector.keyword"]);
  });

  it("should be idempotent", () => {
    for (const field of Object.keys(FIELD_REPLACEMENTS)) {
      expect(remapTopFields(remapTopFields(field))).toBe(remapTopFields(field));
    }
  });

  it("should ignore inherited object keys", () => {
    expect(remapTopFields("toString")).toBe("toString");
  });
});
