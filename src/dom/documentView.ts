export type WaitState = "attached" | "visible";

export type LoadState = "load" | "domcontentloaded" | "networkidle";

export interface WaitForSelectorOptions {
  timeout: number;
  state: WaitState;
  /** Case-insensitive substring the element's rendered text must contain. */
  hasText?: string;
}

export interface ClickOptions {
  timeout?: number;
}

export interface VisibleGroup {
  text: string;
  items: string[];
}

export interface AttributeTest {
  name: string;
  /** When omitted the attribute only has to be present. */
  equals?: string;
}

/**
 * Declarative predicate for whole-tree scans. An element matches when it is
 * visible, its trimmed text is at least `minTextLength` long, and it satisfies
 * any one of the tag, attribute or click-handler tests.
 */
export interface ScanQuery {
  tags: string[];
  attributes: AttributeTest[];
  clickHandler: boolean;
  minTextLength: number;
}

export interface ScanMatch {
  text: string;
  tag: string;
  /** Selector to re-acquire the element from the document root. */
  selector: string;
  /** Position of the element among the document matches of `selector`. */
  index: number;
}

/**
 * Host-neutral view over a rendered page. `E` is the host's element handle.
 *
 * Handles belong to one document generation: once the view navigates or loads
 * a new document every earlier handle is stale, and passing one back in
 * rejects with `StaleHandleError`. Callers carry strings (names, URLs) across
 * navigations, never handles.
 */
export interface DocumentView<E> {
  querySelector(selector: string, scope?: E): Promise<E | null>;
  querySelectorAll(selector: string, scope?: E): Promise<E[]>;
  /** Resolves `null` when nothing matched within the timeout. */
  waitForSelector(selector: string, options: WaitForSelectorOptions): Promise<E | null>;
  getAttribute(element: E, name: string): Promise<string | null>;
  innerText(element: E): Promise<string>;
  tagName(element: E): Promise<string>;
  isVisible(element: E): Promise<boolean>;
  /** Rejects with `InteractionError` when the host refuses the click. */
  click(element: E, options?: ClickOptions): Promise<void>;
  /** Dispatches a click from inside the page, skipping actionability checks. */
  scriptedClick(element: E): Promise<void>;
  /** Marks a collapsed container as shown (`show` class, `display: block`, `aria-expanded`). */
  forceVisible(element: E): Promise<void>;
  parent(element: E): Promise<E | null>;
  closest(element: E, selector: string): Promise<E | null>;
  nextSiblings(element: E, limit: number): Promise<E[]>;
  /** Trimmed, non-empty texts of visible matches, in document order. */
  visibleTexts(selector: string, scope?: E): Promise<string[]>;
  /** Visible group elements with the trimmed texts of their visible items; groups without items are omitted. */
  visibleGroups(groupSelector: string, itemSelector: string, scope?: E): Promise<VisibleGroup[]>;
  scan(query: ScanQuery, scope?: E): Promise<ScanMatch[]>;
  waitForTimeout(ms: number): Promise<void>;
  /** Resolves once the state is reached or the host stops waiting for it. */
  waitForLoadState(state: LoadState): Promise<void>;
}

export interface GotoOptions {
  timeoutMs?: number;
  /** Retry once waiting only for DOMContentLoaded when the full load times out. */
  retryOnTimeout?: boolean;
}

/** A view that can replace its document by URL. */
export interface NavigableView<E> extends DocumentView<E> {
  url(): string;
  goto(url: string, options?: GotoOptions): Promise<void>;
  /** Marks every outstanding handle stale after an in-page re-render (pagination). */
  invalidate(): void;
}
