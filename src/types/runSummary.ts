import { ProgramsResult } from "./programs";

export interface RunSummaryError {
  message: string;
  stack?: string;
}

export interface RunSummaryProvider {
  name: string;
  detail_url: string;
  page: number;
  status: "success" | "error";
  programs_kind: ProgramsResult["kind"] | null;
  programs_strategy: string | null;
  error: RunSummaryError | null;
}

export interface RunSummary {
  schema_version: "1.0";
  list_url: string;
  out_dir: string;
  csv_path: string;
  started_at: string;
  ended_at: string;
  total_items: number | null;
  pages_visited: number;
  providers: RunSummaryProvider[];
}
