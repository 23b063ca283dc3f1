import { writeJson } from "../utils/fs";
import { RunSummary, RunSummaryError, RunSummaryProvider } from "../types/runSummary";
import { providersCsvPath, runSummaryPath } from "./paths";

export interface RunSummaryParams {
  listUrl: string;
  outDir: string;
  startedAt: string;
  endedAt: string;
  totalItems: number | null;
  pagesVisited: number;
  providers: RunSummaryProvider[];
}

export function buildRunSummary(params: RunSummaryParams): RunSummary {
  return {
    schema_version: "1.0",
    list_url: params.listUrl,
    out_dir: params.outDir,
    csv_path: providersCsvPath(params.outDir),
    started_at: params.startedAt,
    ended_at: params.endedAt,
    total_items: params.totalItems,
    pages_visited: params.pagesVisited,
    providers: params.providers
  };
}

export function toRunSummaryError(error: unknown): RunSummaryError {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

export async function writeRunSummary(summary: RunSummary): Promise<void> {
  await writeJson(runSummaryPath(summary.out_dir), summary);
}
