export const MISSING = "N/A";

/** One provider row as read from the directory listing. */
export interface ListingEntry {
  name: string;
  detail_url: string;
  area: string;
  listing_location: string;
}

export interface ContactDetails {
  website: string;
  email: string;
  phone: string;
  address: string;
}

export const PROVIDER_COLUMNS = [
  "name",
  "area",
  "listing_location",
  "website",
  "email",
  "phone",
  "address",
  "programs",
  "scraped_at"
] as const;

export type ProviderColumn = (typeof PROVIDER_COLUMNS)[number];

export type ProviderRecord = Record<ProviderColumn, string>;
