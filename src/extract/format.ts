import { ProgramStructure, ProgramsResult } from "../types/programs";

export const EMPTY_PROGRAMS = "N/A";

export function formatProgramStructure(structure: ProgramStructure): string {
  const parts: string[] = [];
  for (const [title, items] of structure) {
    parts.push(items.length ? `${title} (${items.join(", ")})` : title);
  }
  return parts.join("; ");
}

/** Serializes a result into the single `programs` field: `"Category (a, b); Standalone; ..."`. */
export function formatPrograms(result: ProgramsResult): string {
  let formatted = "";
  if (result.kind === "structured") {
    formatted = formatProgramStructure(result.categories);
  } else if (result.kind === "flat") {
    formatted = result.items.join("; ");
  }
  return formatted || EMPTY_PROGRAMS;
}

export type ProgramsJson =
  | { kind: "structured"; categories: Record<string, string[]> }
  | { kind: "flat"; items: string[] }
  | { kind: "empty" };

export function programsToJson(result: ProgramsResult): ProgramsJson {
  switch (result.kind) {
    case "structured":
      return { kind: "structured", categories: Object.fromEntries(result.categories) };
    case "flat":
      return { kind: "flat", items: result.items };
    default:
      return { kind: "empty" };
  }
}

/** Short label of the path that produced a result, for run summaries. */
export function describeProgramsSource(result: ProgramsResult): string {
  const { diagnostics } = result;
  if (result.kind === "empty") return diagnostics.disclosure ? "no_items" : "no_disclosure";
  if (diagnostics.fallback) return diagnostics.fallback;
  return diagnostics.categories ? `categories:${diagnostics.categories}` : "categories";
}
