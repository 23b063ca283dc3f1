import { errors } from "playwright-core";
import type { ElementHandle, Page } from "playwright-core";
import { InteractionError, NavigationError, errorMessage } from "../errors";
import {
  ClickOptions,
  GotoOptions,
  LoadState,
  NavigableView,
  ScanMatch,
  ScanQuery,
  VisibleGroup,
  WaitForSelectorOptions
} from "./documentView";
import { GenerationHandle, HandleGenerations } from "./handles";

export type PlaywrightHandle = GenerationHandle<ElementHandle>;

const DEFAULT_CLICK_TIMEOUT_MS = 5000;

// The functions below run inside the page and are serialized by Playwright:
// they must not close over anything from this module.

const visibleTextsInPage = (elements: Element[]): string[] =>
  elements
    .filter(
      (element): element is HTMLElement =>
        element instanceof HTMLElement && element.offsetWidth > 0 && element.offsetHeight > 0
    )
    .map((element) => element.innerText.trim())
    .filter((text) => text.length > 0);

const visibleGroupsInPage = (groups: Element[], itemSelector: string): VisibleGroup[] => {
  const isShown = (element: Element): element is HTMLElement =>
    element instanceof HTMLElement && element.offsetWidth > 0 && element.offsetHeight > 0;
  const result: VisibleGroup[] = [];
  for (const group of groups) {
    if (!isShown(group)) continue;
    const items = Array.from(group.querySelectorAll(itemSelector))
      .filter(isShown)
      .map((item) => item.innerText.trim())
      .filter((text) => text.length > 0);
    if (items.length) result.push({ text: group.innerText.trim(), items });
  }
  return result;
};

const scanInPage = ({ root, query }: { root: Node | null; query: ScanQuery }): ScanMatch[] => {
  const ident = /^[A-Za-z_-][A-Za-z0-9_-]*$/;
  const tags = new Set(query.tags.map((tag) => tag.toLowerCase()));
  const base: ParentNode = root instanceof Element ? root : document;
  const matches: ScanMatch[] = [];
  for (const element of Array.from(base.querySelectorAll("*"))) {
    if (!(element instanceof HTMLElement)) continue;
    const tag = element.tagName.toLowerCase();
    const qualifies =
      tags.has(tag) ||
      query.attributes.some((test) =>
        test.equals === undefined
          ? element.hasAttribute(test.name)
          : element.getAttribute(test.name) === test.equals
      ) ||
      (query.clickHandler && (element.onclick !== null || element.hasAttribute("onclick")));
    if (!qualifies) continue;

    const rect = element.getBoundingClientRect();
    if (rect.width <= 0 || rect.height <= 0) continue;
    const text = element.innerText.trim();
    if (text.length < query.minTextLength) continue;

    let selector: string;
    if (element.id && ident.test(element.id)) {
      selector = `#${element.id}`;
    } else {
      const classes = Array.from(element.classList).filter((name) => ident.test(name));
      selector = classes.length ? `${tag}.${classes.join(".")}` : tag;
    }
    const index = Array.from(document.querySelectorAll(selector)).indexOf(element);
    matches.push({ text, tag, selector, index: Math.max(index, 0) });
  }
  return matches;
};

/**
 * DocumentView over a live Playwright page. Navigations started through
 * `goto()` advance the handle generation; callers that trigger an in-page
 * re-render themselves (pagination clicks) call `invalidate()`.
 */
export class PlaywrightDocumentView implements NavigableView<PlaywrightHandle> {
  private readonly page: Page;
  private readonly generations = new HandleGenerations();

  constructor(page: Page) {
    this.page = page;
  }

  url(): string {
    return this.page.url();
  }

  invalidate(): void {
    this.generations.advance();
  }

  async goto(url: string, options: GotoOptions = {}): Promise<void> {
    this.generations.advance();
    const timeout = options.timeoutMs ?? 60000;
    try {
      await this.page.goto(url, { waitUntil: "load", timeout });
    } catch (error) {
      if (!(options.retryOnTimeout && error instanceof errors.TimeoutError)) {
        throw new NavigationError(url, `Failed to load ${url}: ${errorMessage(error)}`, {
          cause: error
        });
      }
      try {
        await this.page.goto(url, { waitUntil: "domcontentloaded", timeout });
      } catch (retryError) {
        throw new NavigationError(url, `Failed to load ${url}: ${errorMessage(retryError)}`, {
          cause: retryError
        });
      }
    }
  }

  async querySelector(selector: string, scope?: PlaywrightHandle): Promise<PlaywrightHandle | null> {
    const handle = scope
      ? await this.generations.unwrap(scope).$(selector)
      : await this.page.$(selector);
    return handle ? this.generations.wrap(handle) : null;
  }

  async querySelectorAll(selector: string, scope?: PlaywrightHandle): Promise<PlaywrightHandle[]> {
    const handles = scope
      ? await this.generations.unwrap(scope).$$(selector)
      : await this.page.$$(selector);
    return handles.map((handle) => this.generations.wrap(handle));
  }

  async waitForSelector(
    selector: string,
    options: WaitForSelectorOptions
  ): Promise<PlaywrightHandle | null> {
    const query = options.hasText
      ? `${selector}:has-text(${JSON.stringify(options.hasText)})`
      : selector;
    try {
      const handle = await this.page.waitForSelector(query, {
        timeout: options.timeout,
        state: options.state
      });
      return handle ? this.generations.wrap(handle) : null;
    } catch (error) {
      if (error instanceof errors.TimeoutError) return null;
      throw error;
    }
  }

  async getAttribute(element: PlaywrightHandle, name: string): Promise<string | null> {
    return this.generations.unwrap(element).getAttribute(name);
  }

  async innerText(element: PlaywrightHandle): Promise<string> {
    return this.generations
      .unwrap(element)
      .evaluate((node) => (node instanceof HTMLElement ? node.innerText : node.textContent ?? ""));
  }

  async tagName(element: PlaywrightHandle): Promise<string> {
    return this.generations.unwrap(element).evaluate((node) => node.nodeName.toLowerCase());
  }

  async isVisible(element: PlaywrightHandle): Promise<boolean> {
    return this.generations.unwrap(element).isVisible();
  }

  async click(element: PlaywrightHandle, options: ClickOptions = {}): Promise<void> {
    const handle = this.generations.unwrap(element);
    try {
      await handle.click({ timeout: options.timeout ?? DEFAULT_CLICK_TIMEOUT_MS });
    } catch (error) {
      throw new InteractionError(`Click failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async scriptedClick(element: PlaywrightHandle): Promise<void> {
    const handle = this.generations.unwrap(element);
    try {
      await handle.evaluate((node) => {
        if (node instanceof HTMLElement) node.click();
      });
    } catch (error) {
      throw new InteractionError(`Scripted click failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async forceVisible(element: PlaywrightHandle): Promise<void> {
    await this.generations.unwrap(element).evaluate((node) => {
      if (!(node instanceof HTMLElement)) return;
      node.classList.add("show");
      node.style.display = "block";
      node.setAttribute("aria-expanded", "true");
    });
  }

  async parent(element: PlaywrightHandle): Promise<PlaywrightHandle | null> {
    const handle = await this.generations
      .unwrap(element)
      .evaluateHandle((node) => node.parentElement);
    const parent = handle.asElement();
    if (!parent) {
      await handle.dispose();
      return null;
    }
    return this.generations.wrap(parent);
  }

  async closest(element: PlaywrightHandle, selector: string): Promise<PlaywrightHandle | null> {
    const handle = await this.generations
      .unwrap(element)
      .evaluateHandle(
        (node, sel) => (node instanceof Element ? node.closest(sel) : null),
        selector
      );
    const match = handle.asElement();
    if (!match) {
      await handle.dispose();
      return null;
    }
    return this.generations.wrap(match);
  }

  async nextSiblings(element: PlaywrightHandle, limit: number): Promise<PlaywrightHandle[]> {
    const arrayHandle = await this.generations.unwrap(element).evaluateHandle((node, max) => {
      const siblings: Element[] = [];
      let sibling = node instanceof Element ? node.nextElementSibling : null;
      while (sibling && siblings.length < max) {
        siblings.push(sibling);
        sibling = sibling.nextElementSibling;
      }
      return siblings;
    }, limit);
    const properties = await arrayHandle.getProperties();
    const siblings: PlaywrightHandle[] = [];
    for (const property of properties.values()) {
      const sibling = property.asElement();
      if (sibling) siblings.push(this.generations.wrap(sibling));
    }
    await arrayHandle.dispose();
    return siblings;
  }

  async visibleTexts(selector: string, scope?: PlaywrightHandle): Promise<string[]> {
    if (scope) {
      return this.generations.unwrap(scope).$$eval(selector, visibleTextsInPage);
    }
    return this.page.$$eval(selector, visibleTextsInPage);
  }

  async visibleGroups(
    groupSelector: string,
    itemSelector: string,
    scope?: PlaywrightHandle
  ): Promise<VisibleGroup[]> {
    if (scope) {
      return this.generations
        .unwrap(scope)
        .$$eval(groupSelector, visibleGroupsInPage, itemSelector);
    }
    return this.page.$$eval(groupSelector, visibleGroupsInPage, itemSelector);
  }

  async scan(query: ScanQuery, scope?: PlaywrightHandle): Promise<ScanMatch[]> {
    const root = scope ? this.generations.unwrap(scope) : null;
    return this.page.evaluate(scanInPage, { root, query });
  }

  async waitForTimeout(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async waitForLoadState(state: LoadState): Promise<void> {
    try {
      await this.page.waitForLoadState(state);
    } catch (error) {
      // pages that keep polling never reach networkidle
      if (!(error instanceof errors.TimeoutError)) throw error;
    }
  }
}
