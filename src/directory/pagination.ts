import { NextPageProbe } from "../config/directoryConfig";
import { DocumentView } from "../dom/documentView";
import { classList } from "../extract/interaction";

const DISABLED_CLASSES = ["disabled", "k-state-disabled"];

export async function isEnabledControl<E>(view: DocumentView<E>, element: E): Promise<boolean> {
  if ((await view.getAttribute(element, "disabled")) !== null) return false;
  if ((await view.getAttribute(element, "aria-disabled")) === "true") return false;
  const classes = await classList(view, element);
  return !classes.some((name) => DISABLED_CLASSES.includes(name));
}

/** First enabled next-page control among the probes, or `null` on the last page. */
export async function findNextPageButton<E>(
  view: DocumentView<E>,
  probes: readonly NextPageProbe[],
  timeoutMs: number
): Promise<E | null> {
  for (const probe of probes) {
    const button = await view.waitForSelector(probe.selector, {
      timeout: timeoutMs,
      state: "attached",
      hasText: probe.has_text
    });
    if (button && (await isEnabledControl(view, button))) return button;
  }
  return null;
}
