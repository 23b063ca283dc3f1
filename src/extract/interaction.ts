import { DocumentView } from "../dom/documentView";
import { errorMessage } from "../errors";

export type ActivationResult = "clicked" | "scripted" | "failed";

/** Standard click, then an in-page click when the host refuses the first one. */
export async function activate<E>(
  view: DocumentView<E>,
  element: E,
  messages: string[] = []
): Promise<ActivationResult> {
  try {
    await view.click(element);
    return "clicked";
  } catch (clickError) {
    try {
      await view.scriptedClick(element);
      return "scripted";
    } catch (scriptError) {
      messages.push(`click failed: ${errorMessage(clickError)}; ${errorMessage(scriptError)}`);
      return "failed";
    }
  }
}

function stripHash(value: string | null): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed.startsWith("#") && trimmed.length > 1 ? trimmed.slice(1) : null;
}

/** Id of the element a toggle controls (`href="#id"`, `data-bs-target`, `data-target`, `aria-controls`). */
export async function readTargetId<E>(view: DocumentView<E>, element: E): Promise<string | null> {
  const fromHref = stripHash(await view.getAttribute(element, "href"));
  if (fromHref) return fromHref;
  const fromBootstrap =
    stripHash(await view.getAttribute(element, "data-bs-target")) ??
    stripHash(await view.getAttribute(element, "data-target"));
  if (fromBootstrap) return fromBootstrap;
  const controls = (await view.getAttribute(element, "aria-controls"))?.trim();
  return controls ? controls.split(/\s+/)[0] : null;
}

export function idSelector(id: string): string {
  return `[id="${id.replace(/["\\]/g, "\\$&")}"]`;
}

export async function classList<E>(view: DocumentView<E>, element: E): Promise<string[]> {
  const classes = await view.getAttribute(element, "class");
  return classes ? classes.split(/\s+/).filter(Boolean) : [];
}
