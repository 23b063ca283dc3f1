import { z } from "zod";
import defaultNoiseVocabulary from "./noiseVocabulary.json";

const timeoutMs = z.number().int().nonnegative();

export const ExtractionSettingsSchema = z.object({
  probeTimeoutMs: timeoutMs.default(3000),
  settleMs: timeoutMs.default(1500),
  headerSettleMs: timeoutMs.default(1000),
  forceVisibleSettleMs: timeoutMs.default(500),
  reacquireTimeoutMs: timeoutMs.default(1000),
  maxSiblingScan: z.number().int().positive().default(5),
  minItemLength: z.number().int().positive().default(3),
  maxItemLength: z.number().int().positive().default(100),
  contentHints: z.array(z.string().min(1)).default(["Programs", "Courses"]),
  contentClassHints: z.array(z.string().min(1)).default(["program", "course"]),
  noiseVocabulary: z
    .array(z.string())
    .default(defaultNoiseVocabulary)
    .transform((entries) => [
      ...new Set(entries.map((entry) => entry.trim().toLowerCase()).filter(Boolean))
    ])
});

export type ExtractionSettings = z.infer<typeof ExtractionSettingsSchema>;
export type ExtractionSettingsInput = z.input<typeof ExtractionSettingsSchema>;

export function resolveExtractionSettings(input: ExtractionSettingsInput = {}): ExtractionSettings {
  return ExtractionSettingsSchema.parse(input);
}
