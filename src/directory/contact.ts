import { DocumentView } from "../dom/documentView";
import { ContactDetails, MISSING } from "../types/provider";

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_RUN = /\+?[0-9\s\-()]{7,15}/g;
const MIN_PHONE_DIGITS = 7;
const ADDRESS_SELECTORS = ['[class*="address"]', '[class*="location"]', "address"];

export interface ContactOptions {
  /** Hosts (and their subdomains) that never count as the provider's website. */
  excludeHosts: readonly string[];
}

function isExcludedHost(hostname: string, excludeHosts: readonly string[]): boolean {
  const host = hostname.toLowerCase();
  return excludeHosts.some((excluded) => {
    const bare = excluded.toLowerCase();
    return host === bare || host.endsWith(`.${bare}`);
  });
}

export function pickWebsite(hrefs: readonly string[], excludeHosts: readonly string[]): string | null {
  for (const href of hrefs) {
    let url: URL;
    try {
      url = new URL(href.trim());
    } catch {
      continue;
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") continue;
    if (isExcludedHost(url.hostname, excludeHosts)) continue;
    return href.trim();
  }
  return null;
}

export function findEmail(text: string): string | null {
  const match = text.match(EMAIL_PATTERN);
  return match ? match[0] : null;
}

/** First run of 7–15 phone characters carrying at least seven digits. */
export function findPhone(text: string): string | null {
  for (const match of text.matchAll(PHONE_RUN)) {
    const candidate = match[0].trim();
    if ((candidate.match(/\d/g) ?? []).length >= MIN_PHONE_DIGITS) return candidate;
  }
  return null;
}

function stripScheme(href: string, scheme: string): string {
  const value = href.trim().slice(scheme.length).split("?")[0];
  try {
    return decodeURIComponent(value).trim();
  } catch {
    return value.trim();
  }
}

async function bodyText<E>(view: DocumentView<E>): Promise<string> {
  const body = await view.querySelector("body");
  return body ? view.innerText(body) : "";
}

async function readEmail<E>(view: DocumentView<E>, text: () => Promise<string>): Promise<string> {
  for (const link of await view.querySelectorAll('a[href*="mailto:"], a[href*="@"]')) {
    const href = await view.getAttribute(link, "href");
    if (!href || !href.includes("@")) continue;
    const email = href.trim().toLowerCase().startsWith("mailto:") ? stripScheme(href, "mailto:") : href.trim();
    if (email) return email;
  }
  return findEmail(await text()) ?? MISSING;
}

async function readPhone<E>(view: DocumentView<E>, text: () => Promise<string>): Promise<string> {
  for (const link of await view.querySelectorAll('a[href^="tel:"]')) {
    const href = await view.getAttribute(link, "href");
    const phone = href ? stripScheme(href, "tel:") : "";
    if (phone) return phone;
  }
  return findPhone(await text()) ?? MISSING;
}

async function readAddress<E>(view: DocumentView<E>): Promise<string> {
  for (const selector of ADDRESS_SELECTORS) {
    const element = await view.querySelector(selector);
    if (!element) continue;
    const address = (await view.innerText(element)).trim();
    if (address.length > 5) return address;
  }
  return MISSING;
}

/** Website, email, phone and address from a provider detail page; `"N/A"` for anything not found. */
export async function extractContactDetails<E>(
  view: DocumentView<E>,
  options: ContactOptions
): Promise<ContactDetails> {
  const hrefs: string[] = [];
  for (const link of await view.querySelectorAll("a[href]")) {
    const href = await view.getAttribute(link, "href");
    if (href) hrefs.push(href);
  }

  let cachedText: string | null = null;
  const text = async (): Promise<string> => {
    cachedText ??= await bodyText(view);
    return cachedText;
  };

  return {
    website: pickWebsite(hrefs, options.excludeHosts) ?? MISSING,
    email: await readEmail(view, text),
    phone: await readPhone(view, text),
    address: await readAddress(view)
  };
}
