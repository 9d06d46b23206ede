import { describe, expect, it } from "vitest";
import { COMPUTED_FIELDS, computedFieldExclusion, isComputedField } from "./computed-fields.js";

describe("computed fields", () => {
  it("contains the provider-assigned attributes", () => {
    expect(COMPUTED_FIELDS.size).toBe(16);
    for (const field of ["id", "arn", "self_link", "status", "private_dns"]) {
      expect(isComputedField(field)).toBe(true);
    }
    expect(isComputedField("bucket")).toBe(false);
  });

  it("matches whole field names only", () => {
    expect(isComputedField("bucket_id")).toBe(false);
    expect(isComputedField("ID")).toBe(false);
  });

  it("accepts extra names", () => {
    expect(isComputedField("etag", ["etag"])).toBe(true);
    const exclude = computedFieldExclusion(["etag"]);
    expect(exclude("etag")).toBe(true);
    expect(exclude("arn")).toBe(true);
    expect(exclude("acl")).toBe(false);
  });
});
