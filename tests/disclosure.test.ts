import { readFileSync } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { resolveExtractionSettings } from "../src/config/extractionSettings";
import { CheerioDocumentView } from "../src/dom/cheerioView";
import { locateDisclosure } from "../src/extract/disclosure";

const fixturesDir = path.join(process.cwd(), "fixtures");
const settings = resolveExtractionSettings();

describe("locateDisclosure", () => {
  it("expands a Bootstrap collapse and follows its target", async () => {
    const html = readFileSync(path.join(fixturesDir, "programs_accordion.html"), "utf8");
    const view = CheerioDocumentView.fromHtml(html);

    const match = await locateDisclosure(view, "Programs Offered", settings);

    expect(match).not.toBeNull();
    if (!match) return;
    expect(match.triggerVia).toBe('button[data-bs-toggle="collapse"]');
    expect(match.containerVia).toBe("target_reference");
    expect(await view.getAttribute(match.container, "id")).toBe("panel1");
    expect(await view.isVisible(match.container)).toBe(true);
    expect(await view.getAttribute(match.trigger, "aria-expanded")).toBe("true");
  });

  it("uses the panel next to a trigger without a target", async () => {
    const view = CheerioDocumentView.fromHtml(`
      <div class="panel-heading"><h3>Programs Offered</h3></div>
      <div class="panel"><h4>Arts</h4><ul><li>Fine Arts Diploma</li></ul></div>
    `);

    const match = await locateDisclosure(view, "Programs Offered", settings);

    expect(match?.triggerVia).toBe(".panel-heading");
    expect(match?.containerVia).toBe("adjacent_panel");
    expect(match && (await view.getAttribute(match.container, "class"))).toBe("panel");
  });

  it("falls back to a container mentioning the content hints", async () => {
    const view = CheerioDocumentView.fromHtml(`
      <h3>Programs Offered</h3>
      <section><div class="course-list"><p>Courses</p><p>Welding Certificate</p></div></section>
    `);

    const match = await locateDisclosure(view, "Programs Offered", settings);

    expect(match?.triggerVia).toBe("h3");
    expect(match?.containerVia).toBe("content_hint");
    expect(match && (await view.getAttribute(match.container, "class"))).toBe("course-list");
  });

  it("forces a target open when the click leaves it hidden", async () => {
    const view = CheerioDocumentView.fromHtml(`
      <a role="button" href="#programList">Programs Offered</a>
      <div id="programList" style="display:none"><ul><li>Hospitality Diploma</li></ul></div>
    `);

    const match = await locateDisclosure(view, "Programs Offered", settings);

    expect(match?.triggerVia).toBe('a[role="button"]');
    expect(match?.containerVia).toBe("target_reference");
    if (!match) return;
    expect(await view.isVisible(match.container)).toBe(true);
    expect(await view.getAttribute(match.container, "style")).toBe("display: block");
    expect(await view.getAttribute(match.container, "aria-expanded")).toBe("true");
  });

  it("resolves null when no trigger carries the label", async () => {
    const view = CheerioDocumentView.fromHtml(`<main><h3>About the centre</h3></main>`);
    const messages: string[] = [];

    const match = await locateDisclosure(view, "Programs Offered", settings, messages);

    expect(match).toBeNull();
    expect(messages).toEqual(['no disclosure trigger labelled "Programs Offered"']);
  });
});
