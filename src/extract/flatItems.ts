import { ExtractionSettings } from "../config/extractionSettings";
import { DocumentView } from "../dom/documentView";
import { errorMessage } from "../errors";
import { FlatItemList } from "../types/programs";
import { dedupeItems } from "./itemCollector";
import { noiseContextFrom } from "./noise";

export const FLAT_ITEM_SELECTORS: readonly string[] = [
  "li",
  ".list-item",
  "p",
  'div[class*="program"]',
  'div[class*="item"]',
  ".card",
  "span"
];

/** Last-resort scrape: items from the first selector that yields any text inside the container. */
export async function scrapeFlatItems<E>(
  view: DocumentView<E>,
  container: E,
  settings: ExtractionSettings,
  messages: string[] = []
): Promise<FlatItemList> {
  for (const selector of FLAT_ITEM_SELECTORS) {
    try {
      const texts: string[] = [];
      for (const element of await view.querySelectorAll(selector, container)) {
        const text = (await view.innerText(element)).trim();
        if (text.length > 1) texts.push(text);
      }
      if (texts.length) return dedupeItems(texts, noiseContextFrom(settings));
    } catch (error) {
      messages.push(`${selector}: ${errorMessage(error)}`);
    }
  }
  return [];
}
