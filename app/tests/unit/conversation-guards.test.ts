import { describe, it, expect } from "vitest";
import { isLikelyNoise, NOISE_THRESHOLDS } from "~/services/design/noise-guard.server";
import {
  extractListingIdentifier,
  isIdentifierCancel,
  LISTING_IDENTIFIER_REQUEST,
  requestsListingIdentifier,
} from "~/services/design/identifier.server";
import { formatPriceText, normalizePriceModifications } from "~/services/design/price-format.server";

describe("noise-guard", () => {
  it("flags very short input", () => {
    expect(isLikelyNoise("k")).toBe(true);
    expect(isLikelyNoise("  ok ")).toBe(true);
  });

  it("flags a single unbroken token longer than the limit", () => {
    expect(isLikelyNoise("asdfghjklqwertyuiopzx")).toBe(true);
  });

  it("accepts ordinary requests", () => {
    expect(isLikelyNoise("start over please")).toBe(false);
    expect(isLikelyNoise("reset")).toBe(false);
  });

  it("honours custom thresholds", () => {
    expect(isLikelyNoise("reset", { ...NOISE_THRESHOLDS, maxUnbrokenLength: 4 })).toBe(true);
  });
});

describe("identifier", () => {
  it("extracts the first run of digits", () => {
    expect(extractListingIdentifier("it's MLS 384921 I think")).toBe("384921");
  });

  it("returns null when there are no digits", () => {
    expect(extractListingIdentifier("no idea")).toBeNull();
  });

  it("recognises the MLS ID request in an assistant reply", () => {
    expect(requestsListingIdentifier(LISTING_IDENTIFIER_REQUEST)).toBe(true);
    expect(requestsListingIdentifier("Sure, CAN YOU PROVIDE THE MLS ID FOR THE PROPERTY?")).toBe(true);
    expect(requestsListingIdentifier("What is the address?")).toBe(false);
  });

  it("recognises cancel words", () => {
    expect(isIdentifierCancel("skip")).toBe(true);
    expect(isIdentifierCancel("Never mind!")).toBe(true);
    expect(isIdentifierCancel("skip the garage")).toBe(false);
  });

  it("treats having no MLS ID as a cancel", () => {
    expect(isIdentifierCancel("no")).toBe(true);
    expect(isIdentifierCancel("None.")).toBe(true);
    expect(isIdentifierCancel("I don't have one")).toBe(true);
    expect(isIdentifierCancel("i do not have an MLS ID")).toBe(true);
    expect(isIdentifierCancel("no idea")).toBe(false);
  });
});

describe("price-format", () => {
  it("formats bare amounts", () => {
    expect(formatPriceText("450000")).toBe("$450,000");
    expect(formatPriceText("$450000")).toBe("$450,000");
    expect(formatPriceText("450,000.00")).toBe("$450,000");
    expect(formatPriceText("950")).toBe("$950");
  });

  it("leaves other text alone", () => {
    expect(formatPriceText("Call for price")).toBe("Call for price");
    expect(formatPriceText("$1.2M")).toBe("$1.2M");
  });

  it("only rewrites price layers", () => {
    expect(
      normalizePriceModifications([
        { name: "List Price", text: "1250000" },
        { name: "bedrooms", text: "3" },
      ])
    ).toEqual([
      { name: "List Price", text: "$1,250,000" },
      { name: "bedrooms", text: "3" },
    ]);
  });
});
