export type ScraperErrorCode =
  | "INTERACTION_FAILED"
  | "STALE_HANDLE"
  | "NAVIGATION_FAILED"
  | "CONFIG_INVALID"
  | "OUTPUT_LOCKED"
  | "OUTPUT_UNREADABLE";

export class ScraperError extends Error {
  readonly code: ScraperErrorCode;

  constructor(code: ScraperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A click or in-page action on an element was rejected by the host. */
export class InteractionError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INTERACTION_FAILED", message, options);
  }
}

/** An element handle was used after the document that produced it was replaced. */
export class StaleHandleError extends ScraperError {
  readonly handleGeneration: number;
  readonly currentGeneration: number;

  constructor(handleGeneration: number, currentGeneration: number) {
    super(
      "STALE_HANDLE",
      `Element handle from document generation ${handleGeneration} used after navigation (current ${currentGeneration})`
    );
    this.handleGeneration = handleGeneration;
    this.currentGeneration = currentGeneration;
  }
}

export class NavigationError extends ScraperError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super("NAVIGATION_FAILED", message, options);
    this.url = url;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
