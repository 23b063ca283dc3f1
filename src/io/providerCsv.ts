import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { setTimeout as sleep } from "timers/promises";
import { ScraperError, errorMessage } from "../errors";
import { MISSING, PROVIDER_COLUMNS, ProviderRecord } from "../types/provider";
import { ensureDir, pathExists } from "../utils/fs";
import { formatCsvRow, parseCsv } from "./csv";

const LOCKED_CODES = new Set(["EBUSY", "EPERM", "EACCES"]);

export interface ProviderCsvWriterOptions {
  /** Extra attempts after a rename refused because the file is locked. */
  retries?: number;
  retryDelayMs?: number;
  rename?: (from: string, to: string) => Promise<void>;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function toCsv(records: Iterable<ProviderRecord>): string {
  const lines = [formatCsvRow(PROVIDER_COLUMNS)];
  for (const record of records) {
    lines.push(formatCsvRow(PROVIDER_COLUMNS.map((column) => record[column])));
  }
  return lines.join("\n") + "\n";
}

export function recordsFromCsv(text: string, source = "CSV"): ProviderRecord[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  const nameIndex = header.indexOf("name");
  if (nameIndex < 0) {
    throw new ScraperError("OUTPUT_UNREADABLE", `${source} has no "name" column`);
  }
  const records: ProviderRecord[] = [];
  for (const row of rows) {
    if (!row[nameIndex]) continue;
    const record: ProviderRecord = {
      name: MISSING,
      area: MISSING,
      listing_location: MISSING,
      website: MISSING,
      email: MISSING,
      phone: MISSING,
      address: MISSING,
      programs: MISSING,
      scraped_at: ""
    };
    for (const column of PROVIDER_COLUMNS) {
      const index = header.indexOf(column);
      if (index >= 0 && row[index] !== undefined) record[column] = row[index];
    }
    records.push(record);
  }
  return records;
}

/**
 * Provider table keyed by name. Every upsert rewrites the whole file through a
 * temp file and a rename, so a crash never leaves a half-written CSV behind.
 */
export class ProviderCsvWriter {
  readonly filePath: string;
  private readonly records = new Map<string, ProviderRecord>();
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly rename: (from: string, to: string) => Promise<void>;

  constructor(filePath: string, options: ProviderCsvWriterOptions = {}) {
    this.filePath = filePath;
    this.retries = options.retries ?? 5;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.rename = options.rename ?? ((from, to) => fs.rename(from, to));
  }

  /** Writer seeded with the rows of an existing file, so reruns update rather than duplicate. */
  static async open(filePath: string, options: ProviderCsvWriterOptions = {}): Promise<ProviderCsvWriter> {
    const writer = new ProviderCsvWriter(filePath, options);
    if (await pathExists(filePath)) {
      const text = await fs.readFile(filePath, "utf8");
      for (const record of recordsFromCsv(text, filePath)) {
        writer.records.set(record.name, record);
      }
    }
    return writer;
  }

  get size(): number {
    return this.records.size;
  }

  get(name: string): ProviderRecord | undefined {
    return this.records.get(name);
  }

  async upsert(record: ProviderRecord): Promise<void> {
    this.records.set(record.name, record);
    await this.flush();
  }

  async flush(): Promise<void> {
    const dir = path.dirname(this.filePath);
    await ensureDir(dir);
    const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${randomUUID()}.tmp`);
    await fs.writeFile(tempPath, toCsv(this.records.values()), "utf8");

    for (let attempt = 0; ; attempt += 1) {
      try {
        await this.rename(tempPath, this.filePath);
        return;
      } catch (error) {
        const code = errorCode(error);
        if (code !== undefined && LOCKED_CODES.has(code) && attempt < this.retries) {
          await sleep(this.retryDelayMs);
          continue;
        }
        await fs.rm(tempPath, { force: true });
        if (code !== undefined && LOCKED_CODES.has(code)) {
          throw new ScraperError(
            "OUTPUT_LOCKED",
            `${this.filePath} is locked (${code}); close any program holding it and rerun`,
            { cause: error }
          );
        }
        throw new ScraperError("OUTPUT_UNREADABLE", `Failed to write ${this.filePath}: ${errorMessage(error)}`, {
          cause: error
        });
      }
    }
  }
}
