import { ExtractionSettings } from "../config/extractionSettings";
import { DocumentView } from "../dom/documentView";
import { errorMessage } from "../errors";
import { activate, classList, idSelector, readTargetId } from "./interaction";
import { ItemCollector } from "./itemCollector";
import { firstLine, noiseContextFrom } from "./noise";
import { MatchStrategy, runStrategyChain } from "./strategy";

const SNAPSHOT_SELECTOR = "ul, ol, li, p, div, span";
const TARGET_ITEM_SELECTOR = "li, .list-item, p, div, span";
const LIST_GROUP_SELECTOR = "ul, ol";
const LIST_ITEM_SELECTOR = "li";
const PANEL_GROUP_SELECTOR =
  '.collapse.show, [aria-expanded="true"] + *, .card-body, .panel-body, .accordion-body';
const PANEL_ITEM_SELECTOR = "p, div, span, li";
const PANEL_CLASSES = [
  "collapse",
  "panel",
  "content",
  "card-body",
  "panel-body",
  "accordion-body",
  "accordion-collapse"
];

interface HarvestContext<E> {
  view: DocumentView<E>;
  header: E;
  title: string;
  settings: ExtractionSettings;
  /** Visible texts captured before the header was clicked. */
  before: ReadonlySet<string>;
}

function collect<E>(context: HarvestContext<E>, texts: Iterable<string>): string[] {
  const collector = new ItemCollector(noiseContextFrom(context.settings, context.title));
  for (const text of texts) {
    collector.add(firstLine(text));
  }
  return collector.toArray();
}

function isNew<E>(context: HarvestContext<E>, text: string): boolean {
  return !context.before.has(text);
}

async function isListLike<E>(view: DocumentView<E>, element: E): Promise<boolean> {
  const tag = await view.tagName(element);
  if (tag === "ul" || tag === "ol") return true;
  if (await view.querySelector("li", element)) return true;
  return (await classList(view, element)).includes("list");
}

/**
 * The region a header is already showing: its open `<details>`, its visible
 * target, or a visible panel right after it. `null` when the header is closed
 * or opens nothing recognisable.
 */
async function expandedRegion<E>(view: DocumentView<E>, header: E): Promise<E | null> {
  if ((await view.tagName(header)) === "summary") {
    const details = await view.parent(header);
    if (
      details &&
      (await view.tagName(details)) === "details" &&
      (await view.getAttribute(details, "open")) !== null
    ) {
      return details;
    }
    return null;
  }

  const targetId = await readTargetId(view, header);
  if (targetId) {
    const target = await view.querySelector(idSelector(targetId));
    return target && (await view.isVisible(target)) ? target : null;
  }

  const [sibling] = await view.nextSiblings(header, 1);
  if (sibling === undefined || !(await view.isVisible(sibling))) return null;
  const classes = await classList(view, sibling);
  return classes.some((name) => PANEL_CLASSES.includes(name)) ? sibling : null;
}

async function isExpanded<E>(view: DocumentView<E>, header: E): Promise<boolean> {
  if ((await view.getAttribute(header, "aria-expanded")) === "true") return true;
  return (await expandedRegion(view, header)) !== null;
}

function harvestStrategies<E>(): MatchStrategy<HarvestContext<E>, string[]>[] {
  return [
    {
      name: "target_reference",
      apply: async (context) => {
        const { view, header } = context;
        const targetId = await readTargetId(view, header);
        if (!targetId) return null;
        const target = await view.querySelector(idSelector(targetId));
        if (!target) return null;
        await view.forceVisible(target);
        return collect(context, await view.visibleTexts(TARGET_ITEM_SELECTOR, target));
      }
    },
    {
      name: "expanded_region",
      apply: async (context) => {
        const { view, header } = context;
        const region = await expandedRegion(view, header);
        if (!region) return null;
        const [list] = await view.visibleGroups(LIST_GROUP_SELECTOR, LIST_ITEM_SELECTOR, region);
        if (list) return collect(context, list.items);
        const [panel] = await view.visibleGroups(PANEL_GROUP_SELECTOR, PANEL_ITEM_SELECTOR, region);
        if (panel) return collect(context, panel.items);
        return collect(context, await view.visibleTexts(PANEL_ITEM_SELECTOR, region));
      }
    },
    {
      name: "revealed_group",
      apply: async (context) => {
        const { view } = context;
        const lists = (await view.visibleGroups(LIST_GROUP_SELECTOR, LIST_ITEM_SELECTOR)).filter(
          (group) => isNew(context, group.text)
        );
        if (lists.length) return collect(context, lists[0].items);
        const panels = (
          await view.visibleGroups(PANEL_GROUP_SELECTOR, PANEL_ITEM_SELECTOR)
        ).filter((group) => isNew(context, group.text));
        return panels.length ? collect(context, panels[0].items) : null;
      }
    },
    {
      name: "revealed_text",
      apply: async (context) => {
        const { view } = context;
        const listItems = (await view.visibleTexts("li")).filter((text) => isNew(context, text));
        const fromListItems = collect(context, listItems);
        if (fromListItems.length) return fromListItems;
        const paragraphs = (await view.visibleTexts("p")).filter((text) => isNew(context, text));
        return collect(context, paragraphs);
      }
    },
    {
      name: "following_siblings",
      apply: async (context) => {
        const { view, header, settings } = context;
        for (const sibling of await view.nextSiblings(header, settings.maxSiblingScan)) {
          if (!(await isListLike(view, sibling))) continue;
          const texts: string[] = [];
          for (const item of await view.querySelectorAll("li", sibling)) {
            texts.push(await view.innerText(item));
          }
          if (!texts.length) texts.push(await view.innerText(sibling));
          return collect(context, texts);
        }
        return null;
      }
    }
  ];
}

/**
 * Activates one category header and collects the items it reveals: the
 * header's explicit target, else the open region it shows, else a list or
 * panel that became visible, else newly visible list items or paragraphs,
 * else a list among the header's following siblings. A header that is
 * already expanded (`aria-expanded="true"`, an open `<details>`, a visible
 * target or adjacent panel) is not clicked again. Resolves an empty array
 * when nothing qualifies.
 */
export async function harvestCategory<E>(
  view: DocumentView<E>,
  header: E,
  title: string,
  settings: ExtractionSettings,
  messages: string[] = []
): Promise<string[]> {
  const onError = (message: string) => messages.push(`${title}: ${message}`);

  let before: Set<string>;
  try {
    before = new Set(await view.visibleTexts(SNAPSHOT_SELECTOR));
    if (!(await isExpanded(view, header))) {
      await activate(view, header, messages);
      await view.waitForTimeout(settings.headerSettleMs);
    }
  } catch (error) {
    onError(errorMessage(error));
    return [];
  }

  const outcome = await runStrategyChain(
    harvestStrategies<E>(),
    { view, header, title, settings, before },
    { onError }
  );
  return outcome ? outcome.value : [];
}
