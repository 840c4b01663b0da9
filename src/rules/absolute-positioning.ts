import type { HtmlElementNode } from '../core/document.js';
import type { CssStyleRule } from '../css/css-parser.js';
import { attribute, classList, describeElement } from '../parser/html-utils.js';
import type { RuleContext } from './rule-context.js';
import type { LintRule, RuleFinding } from './rule-types.js';
import { lastDeclaration, readInlineStyle, styleSheetSkips } from './style-helpers.js';

/** Simple compound selector (`tag`, `.a`, `tag.a.b`) that can be matched statically. */
interface SelectorMatcher {
  selector: string;
  tag?: string;
  classes: string[];
}

const COMPOUND_PATTERN = /^([a-z][a-z0-9-]*|\*)?((?:\.[\w-]+)*)$/i;

/** Absolute positioning outside an intentional overlay component. */
export const absolutePositioningRule: LintRule = {
  id: 'absolute-positioning',
  defaultSeverity: 'info',
  description: 'position: absolute outside a container marked as an overlay (data-component="modal", ...).',
  check(ctx) {
    const findings: RuleFinding[] = styleSheetSkips(ctx.styleSheets);
    const matchers = collectAbsoluteMatchers(ctx);

    for (const element of ctx.elements) {
      const origin = absoluteOrigin(element, matchers, findings);
      if (!origin || isOverlay(ctx, element)) {
        continue;
      }

      findings.push({
        node: element,
        message: `<${describeElement(element)}> uses position: absolute (${origin}); lay it out with flex/grid or mark its container as an overlay component.`
      });
    }
    return findings;
  }
};

/**
 * Where the absolute positioning comes from, or `undefined` when it does not apply.
 * An inline `position` always wins over stylesheet rules.
 */
function absoluteOrigin(
  element: HtmlElementNode,
  matchers: readonly SelectorMatcher[],
  findings: RuleFinding[]
): string | undefined {
  const inline = readInlineStyle(element);
  if (inline.status === 'skipped') {
    findings.push(inline.finding);
  } else if (inline.status === 'parsed') {
    const position = lastDeclaration(inline.declarations, 'position');
    if (position) {
      return position.value.toLowerCase() === 'absolute' ? 'inline style' : undefined;
    }
  }

  const classes = new Set(classList(element));
  const matched = matchers.find(
    (matcher) =>
      (matcher.tag === undefined || matcher.tag === element.name) &&
      matcher.classes.every((name) => classes.has(name))
  );
  return matched ? `rule "${matched.selector}"` : undefined;
}

function isOverlay(ctx: RuleContext, element: HtmlElementNode): boolean {
  return [element, ctx.parentOf(element)].some((candidate) => {
    const component = attribute(candidate, 'data-component');
    return component !== undefined && ctx.options.overlayComponents.has(component.toLowerCase());
  });
}

function collectAbsoluteMatchers(ctx: RuleContext): SelectorMatcher[] {
  const rules: CssStyleRule[] = ctx.styleSheets.flatMap((entry) => (entry.result.ok ? entry.result.value : []));
  const matchers: SelectorMatcher[] = [];

  for (const rule of rules) {
    if (lastDeclaration(rule.declarations, 'position')?.value.toLowerCase() !== 'absolute') {
      continue;
    }
    for (const selector of rule.selectors) {
      const matcher = toSelectorMatcher(selector);
      if (matcher) {
        matchers.push(matcher);
      }
    }
  }
  return matchers;
}

/** Read the last compound of `selector`; pseudo-classes, ids and attributes opt out. */
export function toSelectorMatcher(selector: string): SelectorMatcher | undefined {
  const compounds = selector.split(/\s*[>+~]\s*|\s+/).filter((part) => part.length > 0);
  const last = compounds.at(-1);
  const match = last ? COMPOUND_PATTERN.exec(last) : null;
  if (!match) {
    return undefined;
  }

  const classes = (match[2] ?? '').split('.').filter((name) => name.length > 0);
  const tag = match[1]?.toLowerCase();
  if (tag === '*' && classes.length === 0) {
    return undefined;
  }
  return {
    selector,
    tag: tag === '*' ? undefined : tag,
    classes
  };
}
