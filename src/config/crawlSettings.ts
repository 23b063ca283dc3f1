import { z } from "zod";

export const CrawlSettingsSchema = z.object({
  navigationTimeoutMs: z.number().int().positive().default(60000),
  listingTimeoutMs: z.number().int().positive().default(60000),
  nextProbeTimeoutMs: z.number().int().positive().default(2000),
  detailSettleMs: z.number().int().nonnegative().default(2000),
  pageSettleMs: z.number().int().nonnegative().default(3000)
});

export type CrawlSettings = z.infer<typeof CrawlSettingsSchema>;
export type CrawlSettingsInput = z.input<typeof CrawlSettingsSchema>;

export function resolveCrawlSettings(input: CrawlSettingsInput = {}): CrawlSettings {
  return CrawlSettingsSchema.parse(input);
}
