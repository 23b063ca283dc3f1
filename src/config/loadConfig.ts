import { ZodError } from "zod";
import { ScraperError } from "../errors";
import { readJson } from "../utils/fs";
import { DirectoryConfig, DirectoryConfigSchema } from "./directoryConfig";

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseDirectoryConfig(data: unknown, source = "directory config"): DirectoryConfig {
  const parsed = DirectoryConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ScraperError("CONFIG_INVALID", `Invalid ${source}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadDirectoryConfig(configPath: string): Promise<DirectoryConfig> {
  const data = await readJson(configPath);
  return parseDirectoryConfig(data, configPath);
}
