import { describe, expect, it } from "vitest";
import { resolveExtractionSettings } from "../src/config/extractionSettings";
import { isHeaderLine, parseStructuredText } from "../src/extract/textStructure";

const settings = resolveExtractionSettings();

describe("isHeaderLine", () => {
  it("recognises heading-shaped lines", () => {
    expect(isHeaderLine("1. Engineering")).toBe(true);
    expect(isHeaderLine("2) hospitality")).toBe(true);
    expect(isHeaderLine("Short courses:")).toBe(true);
    expect(isHeaderLine("FINANCE")).toBe(true);
    expect(isHeaderLine("Professional Development")).toBe(true);
    expect(isHeaderLine("Advanced Certificate In Corporate Tax Law")).toBe(true);
  });

  it("treats sentence-shaped lines as items", () => {
    expect(isHeaderLine("diploma in business")).toBe(false);
    expect(isHeaderLine("Diploma in accounting and finance practice")).toBe(false);
  });
});

describe("parseStructuredText", () => {
  it("groups lines under the preceding header and merges repeated headers", () => {
    const text = [
      "intro text before any header",
      "Business:",
      "Diploma in accounting and finance practice",
      "Technology:",
      "web development bootcamp",
      "Business:",
      "advanced certificate in corporate tax law"
    ].join("\n");

    const structure = parseStructuredText(text, settings);

    expect(Object.fromEntries(structure)).toEqual({
      Business: ["Diploma in accounting and finance practice", "advanced certificate in corporate tax law"],
      Technology: ["web development bootcamp"]
    });
  });

  it("returns an empty structure when no line looks like a header", () => {
    const text = "diploma in accounting and finance practice\ncertificate course in digital marketing basics";
    expect(parseStructuredText(text, settings).size).toBe(0);
  });
});
