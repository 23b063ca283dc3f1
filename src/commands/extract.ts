import { promises as fs } from "fs";
import { resolveExtractionSettings } from "../config/extractionSettings";
import { CheerioDocumentView } from "../dom/cheerioView";
import { formatPrograms, programsToJson } from "../extract/format";
import { extractPrograms } from "../extract/programs";

export interface ExtractCommandOptions {
  htmlPath: string;
  label: string;
  json: boolean;
}

/** Runs the programs extraction on a saved detail page. */
export async function runExtract(options: ExtractCommandOptions): Promise<void> {
  const html = await fs.readFile(options.htmlPath, "utf8");
  const view = CheerioDocumentView.fromHtml(html);
  const result = await extractPrograms(view, {
    label: options.label,
    settings: resolveExtractionSettings()
  });

  for (const message of result.diagnostics.messages) {
    console.warn(message);
  }
  if (options.json) {
    console.log(
      JSON.stringify(
        { ...programsToJson(result), programs: formatPrograms(result), diagnostics: result.diagnostics },
        null,
        2
      )
    );
    return;
  }
  console.log(formatPrograms(result));
}
