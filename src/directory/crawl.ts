import { CrawlSettings } from "../config/crawlSettings";
import { DirectoryConfig } from "../config/directoryConfig";
import { ExtractionSettings } from "../config/extractionSettings";
import { NavigableView } from "../dom/documentView";
import { errorMessage } from "../errors";
import { activate } from "../extract/interaction";
import { describeProgramsSource, formatPrograms } from "../extract/format";
import { extractPrograms } from "../extract/programs";
import { toRunSummaryError } from "../io/runSummary";
import { ListingEntry, ProviderRecord } from "../types/provider";
import { RunSummaryProvider } from "../types/runSummary";
import { truncate } from "../utils/text";
import { nowUtcIsoSeconds } from "../utils/time";
import { extractContactDetails } from "./contact";
import { readListingEntries, readTotalItems } from "./listing";
import { findNextPageButton } from "./pagination";

export interface ProviderSink {
  upsert(record: ProviderRecord): Promise<void>;
}

export interface CrawlOptions {
  config: DirectoryConfig;
  crawl: CrawlSettings;
  extraction: ExtractionSettings;
  sink: ProviderSink;
  maxPages?: number;
  limit?: number;
  log?: (line: string) => void;
}

export interface CrawlResult {
  totalItems: number | null;
  pagesVisited: number;
  providers: RunSummaryProvider[];
}

async function settle<E>(view: NavigableView<E>, ms: number): Promise<void> {
  await view.waitForLoadState("networkidle");
  await view.waitForTimeout(ms);
}

async function openListing<E>(view: NavigableView<E>, options: CrawlOptions): Promise<void> {
  const { config, crawl } = options;
  await view.goto(config.list_url, { timeoutMs: crawl.navigationTimeoutMs, retryOnTimeout: true });
  await view.waitForLoadState("networkidle");
  await view.waitForSelector(config.listing_ready_selector, {
    timeout: crawl.listingTimeoutMs,
    state: "attached"
  });
}

async function nextPage<E>(view: NavigableView<E>, options: CrawlOptions): Promise<boolean> {
  const { config, crawl } = options;
  const button = await findNextPageButton(view, config.next_page_probes, crawl.nextProbeTimeoutMs);
  if (!button) return false;
  if ((await activate(view, button)) === "failed") return false;
  view.invalidate();
  await settle(view, crawl.pageSettleMs);
  return true;
}

/** Reloads the listing and pages forward to `pageNumber`; detail visits leave page 1 behind. */
async function returnToPage<E>(
  view: NavigableView<E>,
  pageNumber: number,
  options: CrawlOptions
): Promise<boolean> {
  await openListing(view, options);
  for (let page = 1; page < pageNumber; page += 1) {
    if (!(await nextPage(view, options))) return false;
  }
  return true;
}

async function scrapeProvider<E>(
  view: NavigableView<E>,
  entry: ListingEntry,
  options: CrawlOptions
): Promise<{ record: ProviderRecord; summary: Pick<RunSummaryProvider, "programs_kind" | "programs_strategy"> }> {
  const { config, crawl, extraction } = options;
  await view.goto(entry.detail_url, { timeoutMs: crawl.navigationTimeoutMs, retryOnTimeout: true });
  await settle(view, crawl.detailSettleMs);

  const contacts = await extractContactDetails(view, { excludeHosts: config.exclude_website_hosts });
  const programs = await extractPrograms(view, { label: config.programs_label, settings: extraction });
  for (const message of programs.diagnostics.messages) {
    options.log?.(`    ${message}`);
  }

  return {
    record: {
      name: entry.name,
      area: entry.area,
      listing_location: entry.listing_location,
      ...contacts,
      programs: formatPrograms(programs),
      scraped_at: nowUtcIsoSeconds()
    },
    summary: {
      programs_kind: programs.kind,
      programs_strategy: describeProgramsSource(programs)
    }
  };
}

/**
 * Walks the directory page by page, visiting every provider's detail page and
 * handing each record to the sink as soon as it is scraped. Failures on one
 * provider are recorded and the walk moves on; losing the listing between
 * pages ends the walk with what was scraped so far. Only the first listing
 * load rejects.
 */
export async function crawlDirectory<E>(
  view: NavigableView<E>,
  options: CrawlOptions
): Promise<CrawlResult> {
  const log = options.log ?? (() => undefined);
  const providers: RunSummaryProvider[] = [];
  const seen = new Set<string>();

  await openListing(view, options);
  const totalItems = await readTotalItems(view, options.config.pager_info_selectors);
  log(`Found ${totalItems ?? "an unknown number of"} training providers`);

  let pageNumber = 1;
  for (;;) {
    const entries = await readListingEntries(view, options.config);
    log(`Page ${pageNumber}: ${entries.length} provider links`);

    for (const entry of entries) {
      if (options.limit !== undefined && providers.length >= options.limit) {
        return { totalItems, pagesVisited: pageNumber, providers };
      }
      if (seen.has(entry.name)) continue;
      seen.add(entry.name);

      log(`  ${entry.name} (${entry.area}, ${entry.listing_location})`);
      try {
        const { record, summary } = await scrapeProvider(view, entry, options);
        await options.sink.upsert(record);
        log(`    programs: ${truncate(record.programs, 200)}`);
        providers.push({
          name: entry.name,
          detail_url: entry.detail_url,
          page: pageNumber,
          status: "success",
          ...summary,
          error: null
        });
      } catch (error) {
        const summaryError = toRunSummaryError(error);
        log(`    failed: ${summaryError.message}`);
        providers.push({
          name: entry.name,
          detail_url: entry.detail_url,
          page: pageNumber,
          status: "error",
          programs_kind: null,
          programs_strategy: null,
          error: summaryError
        });
      }
    }

    if (options.maxPages !== undefined && pageNumber >= options.maxPages) break;
    try {
      if (!(await returnToPage(view, pageNumber, options))) {
        log(`Could not page back to ${pageNumber}; stopping`);
        break;
      }
      if (!(await nextPage(view, options))) {
        log("No further pages");
        break;
      }
    } catch (error) {
      log(`Lost the listing after page ${pageNumber}: ${errorMessage(error)}; stopping`);
      break;
    }
    pageNumber += 1;
  }

  return { totalItems, pagesVisited: pageNumber, providers };
}
