/** 1-based line/column origin plus the absolute source offset. */
export interface HtmlLocation {
  line: number;
  column: number;
  offset: number;
}

/** Text run between tags; whitespace-only runs are never materialized. */
export interface HtmlTextNode {
  kind: 'text';
  value: string;
  location: HtmlLocation;
}

/** Element node with lowercase name and attribute keys. */
export interface HtmlElementNode {
  kind: 'element';
  name: string;
  attributes: Record<string, string>;
  children: HtmlNode[];
  /** Inert subtree of a `<template>`; absent on every other element. */
  content?: HtmlNode[];
  location: HtmlLocation;
  path: string;
  /** Pre-order index across the whole document, template content included. */
  order: number;
  selfClosing: boolean;
}

export type HtmlNode = HtmlElementNode | HtmlTextNode;

/** Parsed document rooted at a synthetic `#document` element. */
export interface HtmlDocument {
  root: HtmlElementNode;
  sourceName?: string;
  elementCount: number;
  /** Parent back-references for traversal; the tree owns nothing through them. */
  parents: WeakMap<HtmlElementNode, HtmlElementNode>;
}

/** Name of the synthetic root element. */
export const DOCUMENT_NODE_NAME = '#document';
