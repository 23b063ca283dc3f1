import { readFileSync } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { CheerioDocumentView } from "../src/dom/cheerioView";
import { describeProgramsSource, formatPrograms, programsToJson } from "../src/extract/format";
import { extractPrograms } from "../src/extract/programs";
import { ProgramsResult } from "../src/types/programs";

const fixturesDir = path.join(process.cwd(), "fixtures");

function disclosurePage(panel: string): string {
  return `
    <button data-bs-toggle="collapse" data-bs-target="#p" aria-expanded="false">Programs Offered</button>
    <div id="p" class="collapse">${panel}</div>
  `;
}

describe("extractPrograms", () => {
  it("recovers categories and items from a Bootstrap accordion", async () => {
    const html = readFileSync(path.join(fixturesDir, "programs_accordion.html"), "utf8");
    const view = CheerioDocumentView.fromHtml(html);

    const result = await extractPrograms(view, { label: "Programs Offered" });

    expect(programsToJson(result)).toEqual({
      kind: "structured",
      categories: { Business: ["Item1", "Item2"], Technology: ["Item3", "Item4"] }
    });
    expect(formatPrograms(result)).toBe("Business (Item1, Item2); Technology (Item3, Item4)");
    expect(result.diagnostics.disclosure).toBe('button[data-bs-toggle="collapse"] -> target_reference');
    expect(describeProgramsSource(result)).toBe("categories:h4");
  });

  it("reports N/A when the page has no programs disclosure", async () => {
    const view = CheerioDocumentView.fromHtml(`<main><h1>Gamma College</h1><p>Welcome</p></main>`);

    const result = await extractPrograms(view);

    expect(result.kind).toBe("empty");
    expect(formatPrograms(result)).toBe("N/A");
    expect(describeProgramsSource(result)).toBe("no_disclosure");
  });

  it("parses the container text when it has no category headers", async () => {
    const view = CheerioDocumentView.fromHtml(
      disclosurePage("<p>Business:</p><p>Diploma in accounting and finance practice</p>")
    );

    const result = await extractPrograms(view);

    expect(result.diagnostics.fallback).toBe("text_structure");
    expect(formatPrograms(result)).toBe("Business (Diploma in accounting and finance practice)");
  });

  it("falls back to a flat item list", async () => {
    const view = CheerioDocumentView.fromHtml(
      disclosurePage(
        "<ul><li>Diploma in accounting and finance practice</li><li>Certificate course in digital marketing basics</li></ul>"
      )
    );

    const result = await extractPrograms(view);

    expect(programsToJson(result)).toEqual({
      kind: "flat",
      items: ["Diploma in accounting and finance practice", "Certificate course in digital marketing basics"]
    });
    expect(formatPrograms(result)).toBe(
      "Diploma in accounting and finance practice; Certificate course in digital marketing basics"
    );
    expect(describeProgramsSource(result)).toBe("flat_items");
  });

  it("formats standalone categories without parentheses", () => {
    const result: ProgramsResult = {
      kind: "structured",
      categories: new Map<string, string[]>([
        ["Short Courses", []],
        ["Diplomas", ["Diploma in Logistics"]]
      ]),
      diagnostics: { disclosure: null, categories: null, fallback: null, messages: [] }
    };
    expect(formatPrograms(result)).toBe("Short Courses; Diplomas (Diploma in Logistics)");
  });
});
