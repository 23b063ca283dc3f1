import { readFileSync } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { parseDirectoryConfig } from "../src/config/loadConfig";
import { findNextPageButton } from "../src/directory/pagination";
import {
  parseCardText,
  parseTotalItems,
  readListingEntries,
  readTotalItems
} from "../src/directory/listing";
import { CheerioDocumentView } from "../src/dom/cheerioView";

const fixturesDir = path.join(process.cwd(), "fixtures");

const config = parseDirectoryConfig({
  list_url: "https://directory.example.gov/en/Education-Directory/Training",
  provider_link_selector: 'a[id="lnkName"]',
  listing_ready_selector: "table",
  next_page_probes: [{ selector: 'a.k-link[title="Go to the next page"]' }],
  pager_info_selectors: [".k-pager-info.k-label"]
});

describe("parseCardText", () => {
  it("reads the area after the name and the location after its label", () => {
    const text = "Alpha Academy\nBusiness Bay\nLocation\nDubai Knowledge Park";
    expect(parseCardText(text, "Alpha Academy")).toEqual({
      area: "Business Bay",
      location: "Dubai Knowledge Park"
    });
  });

  it("reads an inline location label and skips it as an area", () => {
    expect(parseCardText("Alpha Academy\nLOCATION: Al Quoz", "Alpha Academy")).toEqual({
      area: null,
      location: "Al Quoz"
    });
  });
});

describe("listing page", () => {
  const view = CheerioDocumentView.fromHtml(
    readFileSync(path.join(fixturesDir, "listing_page1.html"), "utf8")
  );

  it("reads entries with table columns as area and location", async () => {
    expect(await readListingEntries(view, config)).toEqual([
      {
        name: "Alpha Academy",
        detail_url: "https://directory.example.gov/detail/alpha",
        area: "Deira",
        listing_location: "Creek Harbour"
      },
      {
        name: "Beta Institute",
        detail_url: "https://directory.example.gov/detail/beta",
        area: "Al Quoz",
        listing_location: "Industrial Area 3"
      }
    ]);
  });

  it("reads the total from the pager label", async () => {
    expect(await readTotalItems(view, config.pager_info_selectors)).toBe(3);
    expect(parseTotalItems("showing everything")).toBeNull();
  });

  it("finds an enabled next-page control", async () => {
    const button = await findNextPageButton(view, config.next_page_probes, 100);
    expect(button && (await view.getAttribute(button, "href"))).toBe("/list?page=2");
  });

  it("ignores a disabled next-page control", async () => {
    const lastPage = CheerioDocumentView.fromHtml(
      readFileSync(path.join(fixturesDir, "listing_page2.html"), "utf8")
    );
    expect(await findNextPageButton(lastPage, config.next_page_probes, 100)).toBeNull();
  });
});
