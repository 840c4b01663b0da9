import type { HtmlElementNode } from '../core/document.js';
import { hasColorLiteral } from '../css/color.js';
import type { LintRule, RuleFinding } from './rule-types.js';
import { styleSheetSkips } from './style-helpers.js';

const ROOT_SELECTORS = new Set([':root', 'html']);

/** Root color tokens without any `[data-theme]`-scoped override. */
export const missingThemeSelectorRule: LintRule = {
  id: 'missing-theme-selector',
  defaultSeverity: 'info',
  description: 'Color custom properties defined at :root with no rule scoped under [data-theme=...].',
  check(ctx) {
    const findings: RuleFinding[] = styleSheetSkips(ctx.styleSheets);
    const tokenNames: string[] = [];
    let firstDefinition: HtmlElementNode | undefined;
    let themed = false;

    for (const entry of ctx.styleSheets) {
      if (!entry.result.ok) {
        continue;
      }
      for (const rule of entry.result.value) {
        if (rule.selectors.some((selector) => selector.toLowerCase().includes('[data-theme'))) {
          themed = true;
        }
        if (!rule.selectors.some((selector) => ROOT_SELECTORS.has(selector.toLowerCase()))) {
          continue;
        }
        for (const declaration of rule.declarations) {
          if (!declaration.property.startsWith('--') || !hasColorLiteral(declaration.value)) {
            continue;
          }
          firstDefinition ??= entry.element;
          if (!tokenNames.includes(declaration.property)) {
            tokenNames.push(declaration.property);
          }
        }
      }
    }

    if (firstDefinition && !themed) {
      findings.push({
        node: firstDefinition,
        message: `Color tokens (${tokenNames.join(', ')}) are defined at the root but no rule is scoped under [data-theme=...]; add theme overrides so each theme becomes a variable mode.`
      });
    }
    return findings;
  }
};
