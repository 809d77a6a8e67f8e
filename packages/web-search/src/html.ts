/**
 * Minimal DOM surface used by the HTML parsers, backed by linkedom.
 */

import { parseHTML } from "linkedom";

export interface HtmlElement {
  readonly textContent: string | null;
  readonly parentElement: HtmlElement | null;
  getAttribute(name: string): string | null;
  querySelector(selectors: string): HtmlElement | null;
  querySelectorAll(selectors: string): ArrayLike<HtmlElement>;
}

export interface HtmlDocument {
  querySelector(selectors: string): HtmlElement | null;
  querySelectorAll(selectors: string): ArrayLike<HtmlElement>;
}

export function parseDocument(html: string): HtmlDocument {
  const { document } = parseHTML(html);
  return document;
}

export function selectAll(root: HtmlDocument | HtmlElement, selectors: string): HtmlElement[] {
  return Array.from(root.querySelectorAll(selectors));
}

/** Trimmed text content, "" for a missing element */
export function textOf(element: HtmlElement | null | undefined): string {
  return element?.textContent?.trim() ?? "";
}
