#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runCrawl } from "../commands/crawl";
import { runExtract } from "../commands/extract";
import { DEFAULT_PROGRAMS_LABEL } from "../extract/programs";
import { parsePositiveInt } from "../utils/number";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.SCRAPER_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function positiveInt(value: string): number {
  const n = parsePositiveInt(value);
  if (n === null) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("training-provider-scraper")
  .description("Training provider directory scraper")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides SCRAPER_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("crawl")
  .description("Walk the directory and write providers.csv and run_summary.json")
  .requiredOption("--config <path>", "Path to directory.json")
  .option("--out <dir>", "Output directory", "./results")
  .option("--max-pages <n>", "Stop after this many listing pages", positiveInt)
  .option("--limit <n>", "Stop after this many providers", positiveInt)
  .option("--headed", "Show the browser window", false)
  .action(async (opts) => {
    await runCrawl({
      configPath: opts.config,
      outDir: opts.out,
      maxPages: opts.maxPages,
      limit: opts.limit,
      headed: Boolean(opts.headed)
    });
  });

program
  .command("extract")
  .description("Extract the programs field from a saved provider detail page")
  .requiredOption("--html <path>", "Saved detail page HTML")
  .option("--label <text>", "Disclosure label", DEFAULT_PROGRAMS_LABEL)
  .option("--json", "Print the structure and diagnostics as JSON", false)
  .action(async (opts) => {
    await runExtract({ htmlPath: opts.html, label: opts.label, json: Boolean(opts.json) });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
