import { DirectoryConfig } from "../config/directoryConfig";
import { DocumentView } from "../dom/documentView";
import { MISSING, ListingEntry } from "../types/provider";
import { splitLines } from "../utils/text";

const CARD_SELECTORS = ["tr", ".card", '[class*="item"]', "div"];
const AREA_SELECTORS = ["td:nth-child(2)", ".area", ".location-area", '[class*="area"]'];
const LOCATION_SELECTORS = [
  "td:nth-child(3)",
  ".location",
  ".address",
  '[class*="location"]',
  '[class*="address"]'
];

export interface CardFields {
  area: string | null;
  location: string | null;
}

/**
 * Reads area and location from a listing card's text. The area is the line
 * after the one carrying the provider name; the location follows a
 * "Location" label, or is a long line mentioning it.
 */
export function parseCardText(text: string, name: string): CardFields {
  const lines = splitLines(text);
  const needle = name.trim().toLowerCase();
  let area: string | null = null;
  let location: string | null = null;

  const nameIndex = needle ? lines.findIndex((line) => line.toLowerCase().includes(needle)) : -1;
  if (nameIndex >= 0 && nameIndex + 1 < lines.length) {
    const candidate = lines[nameIndex + 1];
    if (!candidate.toLowerCase().startsWith("location") && candidate.length > 2) {
      area = candidate;
    }
  }

  for (let i = 0; i < lines.length; i += 1) {
    const lower = lines[i].toLowerCase();
    if (lower === "location" && i + 1 < lines.length) {
      location = lines[i + 1];
      break;
    }
    if (lower.startsWith("location:")) {
      location = lines[i].slice("location:".length).trim() || null;
      break;
    }
    if (lower.includes("location") && lines[i].length > 10) {
      location = lines[i];
      break;
    }
  }

  return { area, location };
}

export function parseTotalItems(text: string): number | null {
  const match = text.match(/of (\d+) items/);
  return match ? Number(match[1]) : null;
}

/** Total item count from the first pager label present, e.g. `"1 - 10 of 245 items"`. */
export async function readTotalItems<E>(
  view: DocumentView<E>,
  selectors: readonly string[]
): Promise<number | null> {
  for (const selector of selectors) {
    const element = await view.querySelector(selector);
    if (!element) continue;
    return parseTotalItems(await view.innerText(element));
  }
  return null;
}

async function firstText<E>(
  view: DocumentView<E>,
  card: E,
  selectors: readonly string[]
): Promise<string | null> {
  for (const selector of selectors) {
    const element = await view.querySelector(selector, card);
    if (!element) continue;
    const text = (await view.innerText(element)).trim();
    if (text) return text;
  }
  return null;
}

async function findCard<E>(view: DocumentView<E>, link: E): Promise<E | null> {
  for (const selector of CARD_SELECTORS) {
    const card = await view.closest(link, selector);
    if (card) return card;
  }
  return null;
}

export function resolveDetailUrl(href: string, listUrl: string): string | null {
  try {
    return new URL(href, listUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Reads every provider link on the current listing page. Entries are plain
 * strings so they survive the navigations that follow.
 */
export async function readListingEntries<E>(
  view: DocumentView<E>,
  config: DirectoryConfig
): Promise<ListingEntry[]> {
  const entries: ListingEntry[] = [];
  for (const link of await view.querySelectorAll(config.provider_link_selector)) {
    const name = (await view.innerText(link)).trim();
    const href = await view.getAttribute(link, "href");
    if (!name || !href) continue;
    const detailUrl = resolveDetailUrl(href, config.list_url);
    if (!detailUrl) continue;

    let fields: CardFields = { area: null, location: null };
    const card = await findCard(view, link);
    if (card) {
      fields = parseCardText(await view.innerText(card), name);
      fields.area ??= await firstText(view, card, AREA_SELECTORS);
      fields.location ??= await firstText(view, card, LOCATION_SELECTORS);
    }

    entries.push({
      name,
      detail_url: detailUrl,
      area: fields.area ?? MISSING,
      listing_location: fields.location ?? MISSING
    });
  }
  return entries;
}
