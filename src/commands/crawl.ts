import { launchChromium, launchOptionsFromEnv, newContext } from "../capture/playwright";
import { resolveCrawlSettings } from "../config/crawlSettings";
import { resolveExtractionSettings } from "../config/extractionSettings";
import { loadDirectoryConfig } from "../config/loadConfig";
import { crawlDirectory } from "../directory/crawl";
import { PlaywrightDocumentView } from "../dom/playwrightView";
import { providersCsvPath } from "../io/paths";
import { ProviderCsvWriter } from "../io/providerCsv";
import { buildRunSummary, writeRunSummary } from "../io/runSummary";
import { ensureDir } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

export interface CrawlCommandOptions {
  configPath: string;
  outDir: string;
  maxPages?: number;
  limit?: number;
  headed: boolean;
}

export async function runCrawl(options: CrawlCommandOptions): Promise<void> {
  const startedAt = nowUtcIsoSeconds();
  const config = await loadDirectoryConfig(options.configPath);
  await ensureDir(options.outDir);
  const writer = await ProviderCsvWriter.open(providersCsvPath(options.outDir));
  if (writer.size) {
    console.log(`Resuming with ${writer.size} providers already in ${writer.filePath}`);
  }

  const browser = await launchChromium(launchOptionsFromEnv(process.env, options.headed));
  try {
    const context = await newContext(browser);
    const page = await context.newPage();
    page.setDefaultTimeout(60000);
    const view = new PlaywrightDocumentView(page);

    console.log(`Navigating to ${config.list_url}...`);
    const result = await crawlDirectory(view, {
      config,
      crawl: resolveCrawlSettings(),
      extraction: resolveExtractionSettings(),
      sink: writer,
      maxPages: options.maxPages,
      limit: options.limit,
      log: (line) => console.log(line)
    });

    const summary = buildRunSummary({
      listUrl: config.list_url,
      outDir: options.outDir,
      startedAt,
      endedAt: nowUtcIsoSeconds(),
      totalItems: result.totalItems,
      pagesVisited: result.pagesVisited,
      providers: result.providers
    });
    await writeRunSummary(summary);

    const failed = result.providers.filter((provider) => provider.status === "error").length;
    console.log(
      `Crawl complete: ${result.providers.length - failed} providers saved, ${failed} failed, ${result.pagesVisited} pages. CSV: ${writer.filePath}`
    );
    if (failed) process.exitCode = 1;
  } finally {
    await browser.close();
  }
}
