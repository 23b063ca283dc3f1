import { ExtractionSettings } from "../config/extractionSettings";
import { DocumentView } from "../dom/documentView";
import { errorMessage } from "../errors";
import { DisclosureMatch } from "../types/programs";
import { activate, classList, idSelector, readTargetId } from "./interaction";
import { MatchStrategy, runStrategyChain } from "./strategy";

/**
 * Trigger templates, most specific first. Each is combined with the label as a
 * text filter; the generic ones at the end match any ancestor of the label.
 */
export const TRIGGER_TEMPLATES: readonly string[] = [
  'a[role="button"][data-bs-toggle="collapse"]',
  'a[role="button"]',
  'button[data-bs-toggle="collapse"]',
  '[data-bs-toggle="collapse"]',
  '[data-toggle="collapse"]',
  "button.accordion-button",
  ".accordion-header",
  ".card-header",
  ".panel-heading",
  "a",
  "div.accordion",
  "div",
  "h3",
  "h4",
  "h5",
  "*"
];

const PANEL_CLASSES = ["collapse", "content", "panel"];

interface ContainerContext<E> {
  view: DocumentView<E>;
  trigger: E;
  settings: ExtractionSettings;
}

function triggerStrategies<E>(
  view: DocumentView<E>,
  label: string,
  settings: ExtractionSettings
): MatchStrategy<void, E>[] {
  return TRIGGER_TEMPLATES.map((template) => ({
    name: template,
    apply: () =>
      view.waitForSelector(template, {
        state: "attached",
        timeout: settings.probeTimeoutMs,
        hasText: label
      })
  }));
}

async function looksLikePanel<E>(view: DocumentView<E>, element: E | undefined): Promise<boolean> {
  if (element === undefined) return false;
  const classes = await classList(view, element);
  return classes.some((name) => PANEL_CLASSES.includes(name));
}

function containerStrategies<E>(): MatchStrategy<ContainerContext<E>, E>[] {
  return [
    {
      name: "target_reference",
      apply: async ({ view, trigger, settings }) => {
        const targetId = await readTargetId(view, trigger);
        if (!targetId) return null;
        const content = await view.waitForSelector(idSelector(targetId), {
          state: "attached",
          timeout: settings.probeTimeoutMs
        });
        if (!content) return null;
        if (!(await view.isVisible(content))) {
          await view.forceVisible(content);
          await view.waitForTimeout(settings.forceVisibleSettleMs);
        }
        return content;
      }
    },
    {
      name: "adjacent_panel",
      apply: async ({ view, trigger }) => {
        const [sibling] = await view.nextSiblings(trigger, 1);
        if (await looksLikePanel(view, sibling)) return sibling;
        const parent = await view.parent(trigger);
        if (!parent) return null;
        const [parentSibling] = await view.nextSiblings(parent, 1);
        return (await looksLikePanel(view, parentSibling)) ? parentSibling : null;
      }
    },
    {
      name: "content_hint",
      apply: async ({ view, settings }) => {
        for (const hint of settings.contentHints) {
          const match = await view.waitForSelector("div", {
            state: "attached",
            timeout: settings.reacquireTimeoutMs,
            hasText: hint
          });
          if (match) return match;
        }
        for (const hint of settings.contentClassHints) {
          const match = await view.querySelector(`[class*="${hint}"]`);
          if (match) return match;
        }
        return null;
      }
    }
  ];
}

/**
 * Finds the toggle labelled `label`, expands it when `aria-expanded` is not
 * already "true", and resolves the container it reveals. Resolves `null` when
 * no trigger matches or no container strategy applies; never rejects.
 */
export async function locateDisclosure<E>(
  view: DocumentView<E>,
  label: string,
  settings: ExtractionSettings,
  messages: string[] = []
): Promise<DisclosureMatch<E> | null> {
  const onError = (message: string) => messages.push(message);

  const trigger = await runStrategyChain(triggerStrategies(view, label, settings), undefined, {
    onError
  });
  if (!trigger) {
    messages.push(`no disclosure trigger labelled "${label}"`);
    return null;
  }

  try {
    const expanded = await view.getAttribute(trigger.value, "aria-expanded");
    if (expanded !== "true") {
      await activate(view, trigger.value, messages);
      await view.waitForTimeout(settings.settleMs);
    }
  } catch (error) {
    onError(`expand: ${errorMessage(error)}`);
  }

  const container = await runStrategyChain(
    containerStrategies<E>(),
    { view, trigger: trigger.value, settings },
    { onError }
  );
  if (!container) {
    messages.push(`no container revealed by "${label}"`);
    return null;
  }

  return {
    trigger: trigger.value,
    container: container.value,
    triggerVia: trigger.strategy,
    containerVia: container.strategy
  };
}
