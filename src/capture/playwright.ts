import { chromium, Browser, BrowserContext } from "playwright-core";

export const DEFAULT_VIEWPORT = { width: 1280, height: 800 };
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
export const DEFAULT_ACCEPT_LANGUAGE = "en-US,en;q=0.9";

export interface LaunchOptions {
  headless: boolean;
  /** Local Chrome/Chromium binary; playwright-core downloads none. */
  executablePath?: string;
  channel?: string;
}

export function launchOptionsFromEnv(env: NodeJS.ProcessEnv, headed = false): LaunchOptions {
  const headless = !headed && (env.SCRAPER_HEADLESS ?? "true").toLowerCase() !== "false";
  return {
    headless,
    executablePath: env.CHROMIUM_EXECUTABLE_PATH || undefined,
    channel: env.CHROMIUM_CHANNEL || undefined
  };
}

export async function launchChromium(options: LaunchOptions): Promise<Browser> {
  return chromium.launch({
    headless: options.headless,
    executablePath: options.executablePath,
    channel: options.executablePath ? undefined : options.channel,
    args: ["--disable-blink-features=AutomationControlled"]
  });
}

export async function newContext(
  browser: Browser,
  viewport = DEFAULT_VIEWPORT
): Promise<BrowserContext> {
  return browser.newContext({
    viewport,
    userAgent: DEFAULT_USER_AGENT,
    locale: "en-US",
    extraHTTPHeaders: {
      "Accept-Language": DEFAULT_ACCEPT_LANGUAGE,
      "Cache-Control": "no-cache"
    }
  });
}
