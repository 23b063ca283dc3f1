import { readFileSync } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { extractContactDetails, findPhone, pickWebsite } from "../src/directory/contact";
import { CheerioDocumentView } from "../src/dom/cheerioView";

const fixturesDir = path.join(process.cwd(), "fixtures");
const excludeHosts = ["directory.example.gov"];

describe("extractContactDetails", () => {
  it("reads website, email, phone and address from links and labelled blocks", async () => {
    const html = readFileSync(path.join(fixturesDir, "provider_detail.html"), "utf8");
    const view = CheerioDocumentView.fromHtml(html);

    expect(await extractContactDetails(view, { excludeHosts })).toEqual({
      website: "https://www.example-training.test/",
      email: "info@example-training.test",
      phone: "+971 4 000 0000",
      address: "Office 12, Knowledge Park, Dubai"
    });
  });

  it("falls back to the page text", async () => {
    const view = CheerioDocumentView.fromHtml(
      "<body><p>Write to admissions@college.test or call 04 123 4567 today</p></body>"
    );

    expect(await extractContactDetails(view, { excludeHosts })).toEqual({
      website: "N/A",
      email: "admissions@college.test",
      phone: "04 123 4567",
      address: "N/A"
    });
  });
});

describe("contact helpers", () => {
  it("skips excluded hosts, relative links and other schemes", () => {
    const hrefs = [
      "mailto:office@provider.test",
      "/relative/path",
      "https://maps.directory.example.gov/place",
      "http://provider.test"
    ];
    expect(pickWebsite(hrefs, excludeHosts)).toBe("http://provider.test");
  });

  it("needs seven digits for a phone number", () => {
    expect(findPhone("Founded 2012 in Dubai")).toBeNull();
    expect(findPhone("Tel: +971 4 555 0101")).toBe("+971 4 555 0101");
  });
});
