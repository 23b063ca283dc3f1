import * as cheerio from "cheerio";
import { isTag, isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";
import { InteractionError } from "../errors";
import { normalizeWhitespace } from "../utils/text";
import {
  ClickOptions,
  DocumentView,
  ScanMatch,
  ScanQuery,
  VisibleGroup,
  WaitForSelectorOptions
} from "./documentView";
import { GenerationHandle, HandleGenerations } from "./handles";

export type CheerioHandle = GenerationHandle<Element>;

const NEVER_RENDERED = new Set([
  "script",
  "style",
  "noscript",
  "template",
  "head",
  "meta",
  "link",
  "title"
]);

const BLOCK_TAGS = new Set([
  "address",
  "article",
  "aside",
  "blockquote",
  "caption",
  "dd",
  "details",
  "div",
  "dl",
  "dt",
  "fieldset",
  "figcaption",
  "figure",
  "footer",
  "form",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hr",
  "li",
  "main",
  "nav",
  "ol",
  "p",
  "pre",
  "section",
  "summary",
  "table",
  "tbody",
  "tfoot",
  "thead",
  "tr",
  "ul"
]);

const CELL_TAGS = new Set(["td", "th"]);

// Elements that occupy space without text content.
const REPLACED_TAGS = new Set(["img", "input", "select", "textarea", "iframe", "svg", "video", "hr"]);

const TOGGLE_SELECTOR =
  '[data-bs-toggle], [data-toggle], [aria-controls], [data-bs-target], [data-target], a[href^="#"], summary';

const SIMPLE_IDENT = /^[A-Za-z_-][A-Za-z0-9_-]*$/;

function hasClass(element: Element, className: string): boolean {
  const classes = element.attribs.class;
  if (!classes) return false;
  return classes.split(/\s+/).includes(className);
}

function isHiddenByStyle(style: string | undefined): boolean {
  if (!style) return false;
  return /display\s*:\s*none/i.test(style) || /visibility\s*:\s*hidden/i.test(style);
}

function targetIdOf(element: Element): string | null {
  const attrs = element.attribs;
  const candidates = [attrs["data-bs-target"], attrs["data-target"], attrs.href];
  for (const candidate of candidates) {
    if (candidate && candidate.startsWith("#") && candidate.length > 1) {
      return candidate.slice(1);
    }
  }
  const controls = attrs["aria-controls"]?.trim();
  return controls ? controls.split(/\s+/)[0] : null;
}

function idSelector(id: string): string {
  return `[id="${id.replace(/["\\]/g, "\\$&")}"]`;
}

function normalizeLines(raw: string): string {
  return raw
    .split("\n")
    .map((line) => normalizeWhitespace(line))
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * DocumentView over a static HTML document. Layout is approximated from markup:
 * an element is visible unless it or an ancestor is never rendered, carries
 * `hidden`/`aria-hidden="true"`, an inline `display:none`/`visibility:hidden`,
 * is a `.collapse` without `.show`, an inactive `.tab-pane`, or sits in a closed
 * `<details>`. Clicks follow Bootstrap collapse/tab toggles and `<summary>`.
 * There is no animation or network, so every wait resolves immediately.
 */
export class CheerioDocumentView implements DocumentView<CheerioHandle> {
  private $: cheerio.CheerioAPI;
  private readonly generations = new HandleGenerations();

  constructor(html: string) {
    this.$ = cheerio.load(html);
  }

  static fromHtml(html: string): CheerioDocumentView {
    return new CheerioDocumentView(html);
  }

  /** Replaces the document; handles issued before this call become stale. */
  load(html: string): void {
    this.$ = cheerio.load(html);
    this.generations.advance();
  }

  /** Marks every outstanding handle stale without changing the document. */
  invalidate(): void {
    this.generations.advance();
  }

  get generation(): number {
    return this.generations.generation;
  }

  async querySelector(selector: string, scope?: CheerioHandle): Promise<CheerioHandle | null> {
    const first = this.select(selector, scope)[0];
    return first ? this.generations.wrap(first) : null;
  }

  async querySelectorAll(selector: string, scope?: CheerioHandle): Promise<CheerioHandle[]> {
    return this.select(selector, scope).map((element) => this.generations.wrap(element));
  }

  async waitForSelector(
    selector: string,
    options: WaitForSelectorOptions
  ): Promise<CheerioHandle | null> {
    const needle = options.hasText ? normalizeWhitespace(options.hasText).toLowerCase() : null;
    const match = this.select(selector).find((element) => {
      if (needle && !this.fullText(element).toLowerCase().includes(needle)) return false;
      if (options.state === "visible" && !this.visible(element)) return false;
      return true;
    });
    return match ? this.generations.wrap(match) : null;
  }

  async getAttribute(element: CheerioHandle, name: string): Promise<string | null> {
    return this.generations.unwrap(element).attribs[name] ?? null;
  }

  async innerText(element: CheerioHandle): Promise<string> {
    return this.renderedText(this.generations.unwrap(element));
  }

  async tagName(element: CheerioHandle): Promise<string> {
    return this.generations.unwrap(element).name.toLowerCase();
  }

  async isVisible(element: CheerioHandle): Promise<boolean> {
    return this.visible(this.generations.unwrap(element));
  }

  async click(element: CheerioHandle, _options?: ClickOptions): Promise<void> {
    const node = this.generations.unwrap(element);
    if (!this.visible(node)) {
      throw new InteractionError(`<${node.name}> is not visible and cannot be clicked`);
    }
    this.activate(node);
  }

  async scriptedClick(element: CheerioHandle): Promise<void> {
    this.activate(this.generations.unwrap(element));
  }

  async forceVisible(element: CheerioHandle): Promise<void> {
    const node = this.generations.unwrap(element);
    const $node = this.$(node);
    const style = (node.attribs.style ?? "")
      .replace(/display\s*:\s*[^;]*;?/gi, "")
      .trim()
      .replace(/;?$/, "");
    $node.addClass("show");
    $node.attr("style", style ? `${style}; display: block` : "display: block");
    $node.attr("aria-expanded", "true");
  }

  async parent(element: CheerioHandle): Promise<CheerioHandle | null> {
    const parent = this.generations.unwrap(element).parent;
    return parent && isTag(parent) ? this.generations.wrap(parent) : null;
  }

  async closest(element: CheerioHandle, selector: string): Promise<CheerioHandle | null> {
    const match = this.$(this.generations.unwrap(element)).closest(selector).get(0);
    return match && isTag(match) ? this.generations.wrap(match) : null;
  }

  async nextSiblings(element: CheerioHandle, limit: number): Promise<CheerioHandle[]> {
    return this.$(this.generations.unwrap(element))
      .nextAll()
      .toArray()
      .filter(isTag)
      .slice(0, limit)
      .map((sibling) => this.generations.wrap(sibling));
  }

  async visibleTexts(selector: string, scope?: CheerioHandle): Promise<string[]> {
    return this.collectVisibleTexts(this.select(selector, scope));
  }

  async visibleGroups(
    groupSelector: string,
    itemSelector: string,
    scope?: CheerioHandle
  ): Promise<VisibleGroup[]> {
    const groups: VisibleGroup[] = [];
    for (const group of this.select(groupSelector, scope)) {
      if (!this.visible(group)) continue;
      const items = this.collectVisibleTexts(
        this.$(group).find(itemSelector).toArray().filter(isTag)
      );
      if (!items.length) continue;
      groups.push({ text: this.renderedText(group), items });
    }
    return groups;
  }

  async scan(query: ScanQuery, scope?: CheerioHandle): Promise<ScanMatch[]> {
    const tags = new Set(query.tags.map((tag) => tag.toLowerCase()));
    const matches: ScanMatch[] = [];
    for (const element of this.select("*", scope)) {
      const attrs = element.attribs;
      const qualifies =
        tags.has(element.name) ||
        query.attributes.some((test) =>
          test.equals === undefined ? attrs[test.name] !== undefined : attrs[test.name] === test.equals
        ) ||
        (query.clickHandler && attrs.onclick !== undefined);
      if (!qualifies || !this.visible(element)) continue;

      const text = this.renderedText(element);
      if (text.length < query.minTextLength) continue;
      matches.push({ text, tag: element.name, ...this.reacquireSelector(element) });
    }
    return matches;
  }

  async waitForTimeout(_ms: number): Promise<void> {
    return;
  }

  async waitForLoadState(): Promise<void> {
    return;
  }

  private select(selector: string, scope?: CheerioHandle): Element[] {
    if (scope) {
      return this.$(this.generations.unwrap(scope)).find(selector).toArray().filter(isTag);
    }
    return this.$(selector).toArray().filter(isTag);
  }

  private collectVisibleTexts(elements: Element[]): string[] {
    return elements
      .filter((element) => this.visible(element))
      .map((element) => this.renderedText(element).trim())
      .filter((text) => text.length > 0);
  }

  private hiddenSelf(element: Element): boolean {
    if (NEVER_RENDERED.has(element.name)) return true;
    const attrs = element.attribs;
    if (attrs.hidden !== undefined) return true;
    if (attrs["aria-hidden"] === "true") return true;
    if (isHiddenByStyle(attrs.style)) return true;
    if (hasClass(element, "collapse") && !hasClass(element, "show")) return true;
    if (hasClass(element, "tab-pane") && !hasClass(element, "active") && !hasClass(element, "show")) {
      return true;
    }
    const parent = element.parent;
    if (parent && isTag(parent) && parent.name === "details" && parent.attribs.open === undefined) {
      return element.name !== "summary";
    }
    return false;
  }

  private visible(element: Element): boolean {
    let current: Element | null = element;
    while (current) {
      if (this.hiddenSelf(current)) return false;
      const parent: AnyNode | null = current.parent;
      current = parent && isTag(parent) ? parent : null;
    }
    if (REPLACED_TAGS.has(element.name)) return true;
    return this.renderedText(element).length > 0;
  }

  private renderedText(element: Element): string {
    const parts: string[] = [];
    const walk = (node: AnyNode): void => {
      if (isText(node)) {
        parts.push(node.data.replace(/\s+/g, " "));
        return;
      }
      if (!isTag(node) || this.hiddenSelf(node)) return;
      if (node.name === "br") {
        parts.push("\n");
        return;
      }
      const block = BLOCK_TAGS.has(node.name);
      if (block) parts.push("\n");
      for (const child of node.children) walk(child);
      if (block) parts.push("\n");
      if (CELL_TAGS.has(node.name)) parts.push(" ");
    };
    for (const child of element.children) walk(child);
    return normalizeLines(parts.join(""));
  }

  private fullText(element: Element): string {
    return normalizeWhitespace(this.$(element).text());
  }

  private reacquireSelector(element: Element): { selector: string; index: number } {
    const id = element.attribs.id;
    let selector: string;
    if (id && SIMPLE_IDENT.test(id)) {
      selector = `#${id}`;
    } else {
      const classes = (element.attribs.class ?? "")
        .split(/\s+/)
        .filter((name) => SIMPLE_IDENT.test(name));
      selector = classes.length ? `${element.name}.${classes.join(".")}` : element.name;
    }
    const index = this.$(selector).toArray().filter(isTag).indexOf(element);
    return { selector, index: Math.max(index, 0) };
  }

  private activate(element: Element): void {
    const trigger = this.$(element).closest(TOGGLE_SELECTOR).get(0);
    if (!trigger || !isTag(trigger)) return;

    if (trigger.name === "summary") {
      const details = trigger.parent;
      if (details && isTag(details) && details.name === "details") {
        if (details.attribs.open === undefined) {
          this.$(details).attr("open", "");
        } else {
          this.$(details).removeAttr("open");
        }
      }
      return;
    }

    const targetId = targetIdOf(trigger);
    if (!targetId) return;
    const target = this.$(idSelector(targetId)).first();
    if (!target.length) return;

    const mode = trigger.attribs["data-bs-toggle"] ?? trigger.attribs["data-toggle"];
    if (mode === "tab" || mode === "pill") {
      target.siblings(".tab-pane").removeClass("active show");
      target.addClass("active show");
      this.$(trigger).attr("aria-selected", "true");
      return;
    }

    if (target.hasClass("show")) {
      target.removeClass("show");
      this.$(trigger).attr("aria-expanded", "false").addClass("collapsed");
      return;
    }

    const accordionParent = target.attr("data-bs-parent") ?? target.attr("data-parent");
    if (accordionParent) {
      this.$(accordionParent)
        .find(".collapse.show")
        .each((_, open) => {
          this.$(open).removeClass("show");
          const openId = isTag(open) ? open.attribs.id : undefined;
          if (openId) {
            this.$(`[data-bs-target="#${openId}"], [data-target="#${openId}"], [href="#${openId}"]`)
              .attr("aria-expanded", "false")
              .addClass("collapsed");
          }
        });
    }
    target.addClass("show");
    this.$(trigger).attr("aria-expanded", "true").removeClass("collapsed");
  }
}
