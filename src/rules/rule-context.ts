import type { HtmlDocument, HtmlElementNode } from '../core/document.js';
import type { ResolvedAnalyzeOptions } from '../core/options.js';
import { parseStylesheet, type CssParseResult, type CssStyleRule } from '../css/css-parser.js';
import { collectElements, textOf } from '../parser/html-utils.js';

/** One parsed `<style>` block and the element that holds it. */
export interface StyleSheetEntry {
  element: HtmlElementNode;
  result: CssParseResult<CssStyleRule[]>;
}

/** Read-only view of one analysis run shared by every rule. */
export interface RuleContext {
  readonly document: HtmlDocument;
  readonly options: ResolvedAnalyzeOptions;
  /** Live elements in document order; `<template>` content excluded. */
  readonly elements: readonly HtmlElementNode[];
  readonly styleSheets: readonly StyleSheetEntry[];
  parentOf(element: HtmlElementNode): HtmlElementNode | undefined;
}

/** Build the context for one run. Nothing in it is mutated after creation. */
export function createRuleContext(document: HtmlDocument, options: ResolvedAnalyzeOptions): RuleContext {
  const elements = collectElements(document);
  const styleSheets = elements
    .filter((element) => element.name === 'style')
    .map((element) => ({ element, result: parseStylesheet(textOf(element) ?? '') }));

  return {
    document,
    options,
    elements,
    styleSheets,
    parentOf: (element) => document.parents.get(element)
  };
}
