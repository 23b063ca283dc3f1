import { ExtractionSettings } from "../config/extractionSettings";
import { ProgramStructure } from "../types/programs";
import { splitLines } from "../utils/text";
import { ItemCollector } from "./itemCollector";
import { noiseContextFrom } from "./noise";

const NUMBERED = /^\d+[.)]\s+\w/;

function startsUpper(word: string): boolean {
  const first = word.charAt(0);
  return first !== first.toLowerCase() && first === first.toUpperCase();
}

function isAllUpper(line: string): boolean {
  return line !== line.toLowerCase() && line === line.toUpperCase();
}

export function isHeaderLine(line: string): boolean {
  if (NUMBERED.test(line)) return true;
  if (line.endsWith(":")) return true;
  const words = line.split(/\s+/).filter(Boolean);
  if (words.length < 5 && (isAllUpper(line) || startsUpper(line))) return true;
  return words.length > 0 && words.every(startsUpper);
}

/**
 * Recovers categories from flattened container text. Header lines open a
 * category, the lines after them are its items; anything before the first
 * header is dropped.
 */
export function parseStructuredText(text: string, settings: ExtractionSettings): ProgramStructure {
  const collectors = new Map<string, ItemCollector>();
  let current: ItemCollector | null = null;

  for (const line of splitLines(text)) {
    if (isHeaderLine(line)) {
      const title = line.replace(/:$/, "").trim();
      if (!title) continue;
      current = collectors.get(title) ?? new ItemCollector(noiseContextFrom(settings, title));
      collectors.set(title, current);
    } else if (current) {
      current.add(line);
    }
  }

  const structure: ProgramStructure = new Map();
  for (const [title, collector] of collectors) {
    structure.set(title, collector.toArray());
  }
  return structure;
}
