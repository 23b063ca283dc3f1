/** Category title → items, in discovery order. */
export type ProgramStructure = Map<string, string[]>;

export type FlatItemList = string[];

export interface CategoryCandidate<E> {
  title: string;
  element: E;
  /** Selector family (or scan) that produced the candidate. */
  via: string;
}

export interface DisclosureMatch<E> {
  trigger: E;
  container: E;
  /** Template that matched the trigger. */
  triggerVia: string;
  /** Strategy that resolved the revealed container. */
  containerVia: string;
}

export type ProgramsFallback = "text_structure" | "flat_items";

export interface ExtractionDiagnostics {
  disclosure: string | null;
  categories: string | null;
  fallback: ProgramsFallback | null;
  messages: string[];
}

export type ProgramsResult =
  | { kind: "structured"; categories: ProgramStructure; diagnostics: ExtractionDiagnostics }
  | { kind: "flat"; items: FlatItemList; diagnostics: ExtractionDiagnostics }
  | { kind: "empty"; diagnostics: ExtractionDiagnostics };
