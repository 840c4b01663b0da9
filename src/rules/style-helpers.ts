import type { HtmlElementNode } from '../core/document.js';
import { parseInlineStyle, type CssDeclaration } from '../css/css-parser.js';
import { attribute, describeElement } from '../parser/html-utils.js';
import type { StyleSheetEntry } from './rule-context.js';
import type { RuleFinding } from './rule-types.js';

/** Outcome of reading an element's `style` attribute on behalf of a rule. */
export type InlineStyleRead =
  | { status: 'absent' }
  | { status: 'parsed'; declarations: CssDeclaration[] }
  | { status: 'skipped'; finding: RuleFinding };

/** Parse `style`, turning malformed attributes into a skip finding for the caller. */
export function readInlineStyle(element: HtmlElementNode): InlineStyleRead {
  const style = attribute(element, 'style');
  if (style === undefined) {
    return { status: 'absent' };
  }

  const parsed = parseInlineStyle(style);
  if (!parsed.ok) {
    return {
      status: 'skipped',
      finding: {
        node: element,
        kind: 'skip',
        message: `Skipped <${describeElement(element)}>: style attribute could not be parsed (${parsed.reason}).`
      }
    };
  }
  return { status: 'parsed', declarations: parsed.value };
}

/** Skip findings for every `<style>` block that failed to parse. */
export function styleSheetSkips(entries: readonly StyleSheetEntry[]): RuleFinding[] {
  return entries.flatMap((entry) =>
    entry.result.ok
      ? []
      : [
          {
            node: entry.element,
            kind: 'skip' as const,
            message: `Skipped <style> block: stylesheet could not be parsed (${entry.result.reason}).`
          }
        ]
  );
}

/** Last declaration of `property`, matching cascade order within one block. */
export function lastDeclaration(declarations: readonly CssDeclaration[], property: string): CssDeclaration | undefined {
  for (let index = declarations.length - 1; index >= 0; index--) {
    const declaration = declarations[index];
    if (declaration?.property === property) {
      return declaration;
    }
  }
  return undefined;
}
