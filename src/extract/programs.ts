import { ExtractionSettings, resolveExtractionSettings } from "../config/extractionSettings";
import { DocumentView } from "../dom/documentView";
import { errorMessage } from "../errors";
import { ExtractionDiagnostics, ProgramStructure, ProgramsResult } from "../types/programs";
import { discoverCategories } from "./categories";
import { locateDisclosure } from "./disclosure";
import { scrapeFlatItems } from "./flatItems";
import { harvestCategory } from "./harvest";
import { parseStructuredText } from "./textStructure";

export const DEFAULT_PROGRAMS_LABEL = "Programs Offered";

export interface ExtractProgramsOptions {
  label?: string;
  settings?: ExtractionSettings;
}

async function extractWithDiagnostics<E>(
  view: DocumentView<E>,
  label: string,
  settings: ExtractionSettings,
  diagnostics: ExtractionDiagnostics
): Promise<ProgramsResult> {
  const { messages } = diagnostics;

  const disclosure = await locateDisclosure(view, label, settings, messages);
  if (!disclosure) return { kind: "empty", diagnostics };
  diagnostics.disclosure = `${disclosure.triggerVia} -> ${disclosure.containerVia}`;

  const candidates = await discoverCategories(view, disclosure.container, messages);
  if (candidates.length) {
    diagnostics.categories = [...new Set(candidates.map((candidate) => candidate.via))].join(", ");
    const categories: ProgramStructure = new Map();
    for (const candidate of candidates) {
      if (categories.has(candidate.title)) continue;
      categories.set(
        candidate.title,
        await harvestCategory(view, candidate.element, candidate.title, settings, messages)
      );
    }
    return { kind: "structured", categories, diagnostics };
  }

  const text = await view.innerText(disclosure.container);
  const parsed = parseStructuredText(text, settings);
  if (parsed.size) {
    diagnostics.fallback = "text_structure";
    return { kind: "structured", categories: parsed, diagnostics };
  }

  const items = await scrapeFlatItems(view, disclosure.container, settings, messages);
  if (items.length) {
    diagnostics.fallback = "flat_items";
    return { kind: "flat", items, diagnostics };
  }
  return { kind: "empty", diagnostics };
}

/**
 * Locates the programs disclosure on the current document and recovers its
 * category → items structure, degrading to text-structure parsing and then to
 * a flat item list. Absence of data resolves `{ kind: "empty" }`; this
 * function does not reject.
 */
export async function extractPrograms<E>(
  view: DocumentView<E>,
  options: ExtractProgramsOptions = {}
): Promise<ProgramsResult> {
  const label = options.label ?? DEFAULT_PROGRAMS_LABEL;
  const settings = options.settings ?? resolveExtractionSettings();
  const diagnostics: ExtractionDiagnostics = {
    disclosure: null,
    categories: null,
    fallback: null,
    messages: []
  };

  try {
    return await extractWithDiagnostics(view, label, settings, diagnostics);
  } catch (error) {
    diagnostics.messages.push(`extraction aborted: ${errorMessage(error)}`);
    return { kind: "empty", diagnostics };
  }
}
