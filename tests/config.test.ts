import path from "path";
import { describe, expect, it } from "vitest";
import { resolveCrawlSettings } from "../src/config/crawlSettings";
import { resolveExtractionSettings } from "../src/config/extractionSettings";
import { loadDirectoryConfig, parseDirectoryConfig } from "../src/config/loadConfig";
import { ScraperError } from "../src/errors";

describe("directory config", () => {
  it("loads the bundled configuration", async () => {
    const config = await loadDirectoryConfig(path.join(process.cwd(), "config", "directory.json"));

    expect(config.programs_label).toBe("Programs Offered");
    expect(config.provider_link_selector).toBe('a[id="lnkName"]');
    expect(config.next_page_probes[config.next_page_probes.length - 1]).toEqual({
      selector: "button",
      has_text: "Next"
    });
  });

  it("applies defaults", () => {
    const config = parseDirectoryConfig({
      list_url: "https://directory.example.gov/list",
      provider_link_selector: "a.provider",
      listing_ready_selector: "table",
      next_page_probes: [{ selector: "a.next" }]
    });

    expect(config.programs_label).toBe("Programs Offered");
    expect(config.exclude_website_hosts).toEqual([]);
    expect(config.pager_info_selectors).toEqual([]);
  });

  it("rejects an invalid file with the offending field", () => {
    const parse = () =>
      parseDirectoryConfig({
        list_url: "not a url",
        provider_link_selector: "a",
        listing_ready_selector: "table",
        next_page_probes: [{ selector: "a.next" }]
      });

    expect(parse).toThrow(ScraperError);
    expect(parse).toThrow(/list_url/);
  });
});

describe("settings", () => {
  it("normalizes the noise vocabulary", () => {
    const settings = resolveExtractionSettings({ noiseVocabulary: [" Home ", "home", "FAQ", ""] });
    expect(settings.noiseVocabulary).toEqual(["home", "faq"]);
    expect(settings.probeTimeoutMs).toBe(3000);
  });

  it("ships the default vocabulary", () => {
    const settings = resolveExtractionSettings();
    expect(settings.noiseVocabulary).toContain("programs offered");
    expect(settings.maxItemLength).toBe(100);
  });

  it("defaults crawl timing", () => {
    expect(resolveCrawlSettings()).toEqual({
      navigationTimeoutMs: 60000,
      listingTimeoutMs: 60000,
      nextProbeTimeoutMs: 2000,
      detailSettleMs: 2000,
      pageSettleMs: 3000
    });
  });
});
