import { z } from "zod";

const NextPageProbeSchema = z.object({
  selector: z.string().min(1),
  has_text: z.string().min(1).optional()
});

export const DirectoryConfigSchema = z.object({
  list_url: z.string().url(),
  provider_link_selector: z.string().min(1),
  listing_ready_selector: z.string().min(1),
  programs_label: z.string().min(1).default("Programs Offered"),
  exclude_website_hosts: z.array(z.string()).default([]),
  next_page_probes: z.array(NextPageProbeSchema).min(1),
  pager_info_selectors: z.array(z.string()).default([])
});

export type DirectoryConfig = z.infer<typeof DirectoryConfigSchema>;
export type NextPageProbe = z.infer<typeof NextPageProbeSchema>;
