import { ExtractionSettings } from "../config/extractionSettings";

export interface NoiseContext {
  vocabulary: readonly string[];
  /** Title of the category the item is harvested for; an item equal to it is noise. */
  categoryTitle?: string;
  minLength?: number;
  maxLength?: number;
}

const BRACKETS_ONLY = /^\s*[[(<>)\]]+\s*$/;
const NUMBER_ONLY = /^\s*\d+\s*$/;
const ARROW_ONLY = /^\s*[<>→←↑↓⇒⇐⇑⇓]\s*$/;
const HAS_WORD = /[a-zA-Z]{2,}/;
const DATE_OR_TIME = /\d{2}[:/]\d{2}[:/]\d{2,4}/;
const NUMERIC_ONLY = /^[\d\s.,]+$/;

// Vocabulary entries up to this length only match the whole item.
const SHORT_ENTRY_LENGTH = 4;

export function noiseContextFrom(settings: ExtractionSettings, categoryTitle?: string): NoiseContext {
  return {
    vocabulary: settings.noiseVocabulary,
    categoryTitle,
    minLength: settings.minItemLength,
    maxLength: settings.maxItemLength
  };
}

export function matchesVocabulary(text: string, vocabulary: readonly string[]): boolean {
  const lower = text.trim().toLowerCase();
  return vocabulary.some(
    (entry) => entry === lower || (entry.length > SHORT_ENTRY_LENGTH && lower.includes(entry))
  );
}

export function isNoise(text: string, context: NoiseContext): boolean {
  const trimmed = text.trim();
  if (trimmed.length < (context.minLength ?? 3)) return true;
  if (matchesVocabulary(trimmed, context.vocabulary)) return true;

  if (BRACKETS_ONLY.test(trimmed) || NUMBER_ONLY.test(trimmed) || ARROW_ONLY.test(trimmed)) {
    return true;
  }
  if (trimmed.length < 5 && !HAS_WORD.test(trimmed)) return true;

  if (context.categoryTitle !== undefined && trimmed === context.categoryTitle.trim()) return true;

  const lower = trimmed.toLowerCase();
  if (lower.includes("http") || lower.includes("www.")) return true;
  if (DATE_OR_TIME.test(trimmed) || NUMERIC_ONLY.test(trimmed)) return true;

  return false;
}

/**
 * Returns the item as it should be stored, or `null` when it is noise.
 * Overlong text falls back to its first line.
 */
export function cleanItem(text: string, context: NoiseContext): string | null {
  const maxLength = context.maxLength ?? 100;
  let candidate = text.trim();
  if (candidate.length > maxLength) {
    const firstLine = candidate.split("\n")[0].trim();
    if (!firstLine || firstLine.length >= maxLength) return null;
    candidate = firstLine;
  }
  return isNoise(candidate, context) ? null : candidate;
}

export function firstLine(text: string): string {
  return text.trim().split("\n")[0].trim();
}
