import { DocumentView, ScanQuery } from "../dom/documentView";
import { errorMessage } from "../errors";
import { CategoryCandidate } from "../types/programs";

export const CATEGORY_SELECTOR_FAMILIES: readonly string[] = [
  "h3",
  "h4",
  "h5",
  "strong",
  ".program-title",
  ".main-program",
  'div[class*="header"]',
  ".accordion-button",
  ".card-header",
  'div[role="button"]',
  'a[role="button"]',
  ".panel-heading",
  ".accordion-header",
  'button[data-toggle="collapse"]',
  '[class*="accordion"]',
  'a[data-toggle="tab"]',
  '[class*="tab-header"]',
  ".nav-link",
  '[data-bs-toggle="collapse"]',
  '[data-bs-toggle="tab"]',
  ".btn-accordion",
  ".toggle-trigger",
  ".dropdown-toggle"
];

export const CLICKABLE_SCAN: ScanQuery = {
  tags: ["a", "button"],
  attributes: [
    { name: "role", equals: "button" },
    { name: "aria-expanded" },
    { name: "data-toggle", equals: "collapse" },
    { name: "data-bs-toggle", equals: "collapse" }
  ],
  clickHandler: true,
  minTextLength: 2
};

async function scanClickableHeaders<E>(
  view: DocumentView<E>,
  container: E,
  messages: string[]
): Promise<CategoryCandidate<E>[]> {
  const candidates: CategoryCandidate<E>[] = [];
  const matches = await view.scan(CLICKABLE_SCAN, container);
  for (const match of matches) {
    if (candidates.some((candidate) => candidate.title === match.text)) continue;
    try {
      const elements = await view.querySelectorAll(match.selector);
      const element = elements[match.index];
      if (element === undefined) continue;
      candidates.push({ title: match.text, element, via: "clickable_scan" });
    } catch (error) {
      messages.push(`reacquire ${match.selector}[${match.index}]: ${errorMessage(error)}`);
    }
  }
  return candidates;
}

/**
 * Candidate category headers inside an expanded container, in document order
 * per selector family. Families are tried until more than one distinct title
 * has been collected; when none matches at all, visible clickable elements in
 * the container are scanned instead.
 */
export async function discoverCategories<E>(
  view: DocumentView<E>,
  container: E,
  messages: string[] = []
): Promise<CategoryCandidate<E>[]> {
  const candidates: CategoryCandidate<E>[] = [];

  for (const family of CATEGORY_SELECTOR_FAMILIES) {
    try {
      const elements = await view.querySelectorAll(family, container);
      for (const element of elements) {
        const title = (await view.innerText(element)).trim();
        if (title.length <= 1) continue;
        if (candidates.some((candidate) => candidate.title === title)) continue;
        candidates.push({ title, element, via: family });
      }
    } catch (error) {
      messages.push(`${family}: ${errorMessage(error)}`);
    }
    if (candidates.length > 1) break;
  }

  if (candidates.length) return candidates;

  try {
    return await scanClickableHeaders(view, container, messages);
  } catch (error) {
    messages.push(`clickable_scan: ${errorMessage(error)}`);
    return [];
  }
}
