import { describe, expect, it } from "vitest";
import { CheerioDocumentView, CheerioHandle } from "../src/dom/cheerioView";
import { InteractionError } from "../src/errors";
import { activate } from "../src/extract/interaction";

/** A page whose overlay swallows every standard click. */
class OverlaidView extends CheerioDocumentView {
  async click(_element: CheerioHandle): Promise<void> {
    throw new InteractionError("element is covered by an overlay");
  }
}

class UnclickableView extends OverlaidView {
  async scriptedClick(_element: CheerioHandle): Promise<void> {
    throw new InteractionError("page script rejected the click");
  }
}

const ACCORDION = `
  <button data-bs-toggle="collapse" data-bs-target="#hours" aria-expanded="false">Opening hours</button>
  <div id="hours" class="collapse"><p>Sunday to Thursday</p></div>
`;

async function button(view: CheerioDocumentView): Promise<CheerioHandle> {
  const element = await view.querySelector("button");
  if (!element) throw new Error("missing button");
  return element;
}

describe("activate", () => {
  it("clicks through the host when it can", async () => {
    const view = CheerioDocumentView.fromHtml(ACCORDION);
    const messages: string[] = [];

    expect(await activate(view, await button(view), messages)).toBe("clicked");
    expect(messages).toEqual([]);
  });

  it("falls back to an in-page click when the standard click is refused", async () => {
    const view = new OverlaidView(ACCORDION);
    const messages: string[] = [];

    expect(await activate(view, await button(view), messages)).toBe("scripted");

    const panel = await view.querySelector("#hours");
    expect(panel && (await view.isVisible(panel))).toBe(true);
    expect(messages).toEqual([]);
  });

  it("reports both refusals when neither click lands", async () => {
    const view = new UnclickableView(ACCORDION);
    const messages: string[] = [];

    expect(await activate(view, await button(view), messages)).toBe("failed");
    expect(messages).toEqual([
      "click failed: element is covered by an overlay; page script rejected the click"
    ]);
  });
});
