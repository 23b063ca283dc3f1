import { readFileSync } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { resolveCrawlSettings } from "../src/config/crawlSettings";
import { resolveExtractionSettings } from "../src/config/extractionSettings";
import { parseDirectoryConfig } from "../src/config/loadConfig";
import { crawlDirectory } from "../src/directory/crawl";
import { CheerioDocumentView, CheerioHandle } from "../src/dom/cheerioView";
import { ClickOptions, NavigableView } from "../src/dom/documentView";
import { NavigationError } from "../src/errors";
import { ProviderRecord } from "../src/types/provider";

const fixturesDir = path.join(process.cwd(), "fixtures");
const fixture = (name: string) => readFileSync(path.join(fixturesDir, name), "utf8");

const LIST_URL = "https://directory.example.gov/list";

/** In-memory site: `goto` loads pages by URL and link clicks follow their href. */
class StaticSite extends CheerioDocumentView implements NavigableView<CheerioHandle> {
  private readonly pages: Map<string, string>;
  private current = "about:blank";

  constructor(pages: Map<string, string>) {
    super("<html><body></body></html>");
    this.pages = pages;
  }

  url(): string {
    return this.current;
  }

  async goto(url: string): Promise<void> {
    const html = this.pages.get(url);
    if (html === undefined) throw new NavigationError(url, `No page at ${url}`);
    this.current = url;
    this.load(html);
  }

  async click(element: CheerioHandle, options?: ClickOptions): Promise<void> {
    const href = await this.getAttribute(element, "href");
    if (href && !href.startsWith("#")) {
      await this.goto(new URL(href, this.current).toString());
      return;
    }
    await super.click(element, options);
  }
}

/** Serves the listing once; every later load of it times out. */
class ListingOnceSite extends StaticSite {
  private listingLoads = 0;

  async goto(url: string): Promise<void> {
    if (url === LIST_URL) {
      this.listingLoads += 1;
      if (this.listingLoads > 1) throw new NavigationError(url, `Timed out loading ${url}`);
    }
    await super.goto(url);
  }
}

function pages(): Map<string, string> {
  return new Map([
    [LIST_URL, fixture("listing_page1.html")],
    [`${LIST_URL}?page=2`, fixture("listing_page2.html")],
    ["https://directory.example.gov/detail/alpha", fixture("provider_detail.html")],
    [
      "https://directory.example.gov/detail/gamma",
      "<html><body><h1>Gamma College</h1><p>Call 04 765 4321</p></body></html>"
    ]
  ]);
}

function site(): StaticSite {
  return new StaticSite(pages());
}

const config = parseDirectoryConfig({
  list_url: LIST_URL,
  provider_link_selector: 'a[id="lnkName"]',
  listing_ready_selector: "table",
  exclude_website_hosts: ["directory.example.gov"],
  next_page_probes: [{ selector: 'a.k-link[title="Go to the next page"]' }],
  pager_info_selectors: [".k-pager-info.k-label"]
});

function sink() {
  const records: ProviderRecord[] = [];
  return {
    records,
    upsert: async (record: ProviderRecord) => {
      records.push(record);
    }
  };
}

describe("crawlDirectory", () => {
  it("walks every page and records failures without stopping", async () => {
    const output = sink();
    const lines: string[] = [];

    const result = await crawlDirectory(site(), {
      config,
      crawl: resolveCrawlSettings(),
      extraction: resolveExtractionSettings(),
      sink: output,
      log: (line) => lines.push(line)
    });

    expect(result.totalItems).toBe(3);
    expect(result.pagesVisited).toBe(2);
    expect(
      result.providers.map((provider) => [provider.name, provider.page, provider.status, provider.programs_strategy])
    ).toEqual([
      ["Alpha Academy", 1, "success", "categories:h4"],
      ["Beta Institute", 1, "error", null],
      ["Gamma College", 2, "success", "no_disclosure"]
    ]);
    expect(result.providers[1].error?.message).toBe(
      "No page at https://directory.example.gov/detail/beta"
    );

    const [alpha, gamma] = output.records;
    expect({ ...alpha, scraped_at: "" }).toEqual({
      name: "Alpha Academy",
      area: "Deira",
      listing_location: "Creek Harbour",
      website: "https://www.example-training.test/",
      email: "info@example-training.test",
      phone: "+971 4 000 0000",
      address: "Office 12, Knowledge Park, Dubai",
      programs: "Business (Item1, Item2); Technology (Item3, Item4)",
      scraped_at: ""
    });
    expect(gamma.programs).toBe("N/A");
    expect(gamma.phone).toBe("04 765 4321");
    expect(output.records).toHaveLength(2);
    expect(lines[lines.length - 1]).toBe("No further pages");
  });

  it("stops at the provider limit", async () => {
    const output = sink();

    const result = await crawlDirectory(site(), {
      config,
      crawl: resolveCrawlSettings(),
      extraction: resolveExtractionSettings(),
      sink: output,
      limit: 1
    });

    expect(result.providers.map((provider) => provider.name)).toEqual(["Alpha Academy"]);
    expect(result.pagesVisited).toBe(1);
    expect(output.records).toHaveLength(1);
  });

  it("stops at the page limit", async () => {
    const result = await crawlDirectory(site(), {
      config,
      crawl: resolveCrawlSettings(),
      extraction: resolveExtractionSettings(),
      sink: sink(),
      maxPages: 1
    });

    expect(result.pagesVisited).toBe(1);
    expect(result.providers.map((provider) => provider.name)).toEqual(["Alpha Academy", "Beta Institute"]);
  });

  it("ends the walk when the listing cannot be reopened", async () => {
    const output = sink();
    const lines: string[] = [];

    const result = await crawlDirectory(new ListingOnceSite(pages()), {
      config,
      crawl: resolveCrawlSettings(),
      extraction: resolveExtractionSettings(),
      sink: output,
      log: (line) => lines.push(line)
    });

    expect(result.pagesVisited).toBe(1);
    expect(result.providers.map((provider) => [provider.name, provider.status])).toEqual([
      ["Alpha Academy", "success"],
      ["Beta Institute", "error"]
    ]);
    expect(output.records.map((record) => record.name)).toEqual(["Alpha Academy"]);
    expect(lines[lines.length - 1]).toBe(
      "Lost the listing after page 1: Timed out loading https://directory.example.gov/list; stopping"
    );
  });
});
