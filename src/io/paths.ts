import path from "path";

export const PROVIDERS_CSV = "providers.csv";
export const RUN_SUMMARY_JSON = "run_summary.json";

export function providersCsvPath(outDir: string): string {
  return path.join(outDir, PROVIDERS_CSV);
}

export function runSummaryPath(outDir: string): string {
  return path.join(outDir, RUN_SUMMARY_JSON);
}
