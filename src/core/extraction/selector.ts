/**
 * Declarative node selectors
 *
 * A selector is an ordered list of match steps. Each step names a tag and,
 * optionally, an id, a set of classes and attribute values the element must
 * carry. `relation` ties a step to the one before it ("descendant" unless
 * stated); it is ignored on the first step.
 */

import type { Cheerio } from "cheerio";
import type { AnyNode, Element } from "domhandler";

export interface MatchStep {
  tag: string;
  id?: string;
  classes?: readonly string[];
  attributes?: Readonly<Record<string, string>>;
  relation?: "descendant" | "child";
}

export type NodeSelector = readonly MatchStep[];

const quote = (v: string) => `"${v.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

function stepToCss(step: MatchStep): string {
  let css = step.tag;
  if (step.id) css += `#${step.id}`;
  for (const c of step.classes ?? []) css += `.${c}`;
  for (const [name, value] of Object.entries(step.attributes ?? {})) {
    css += `[${name}=${quote(value)}]`;
  }
  return css;
}

/**
 * Compiles a selector into a CSS selector string
 * @throws Error if the selector has no steps
 */
export function toCss(selector: NodeSelector): string {
  if (selector.length === 0) throw new Error("Selector needs at least one step");
  return selector
    .map((step, i) => {
      const css = stepToCss(step);
      if (i === 0) return css;
      return step.relation === "child" ? `> ${css}` : css;
    })
    .join(" ");
}

/** All matches below `scope`, in document order */
export function queryAll<T extends AnyNode>(
  scope: Cheerio<T>,
  selector: NodeSelector,
): Cheerio<Element> {
  return scope.find(toCss(selector));
}

/** First match below `scope`, or null when nothing matches */
export function queryFirst<T extends AnyNode>(
  scope: Cheerio<T>,
  selector: NodeSelector,
): Cheerio<Element> | null {
  const hit = queryAll(scope, selector).first();
  return hit.length > 0 ? hit : null;
}

/** Attribute value, or null when the attribute is absent ("" when present but empty) */
export function attributeOf(node: Cheerio<Element>, name: string): string | null {
  return node.attr(name) ?? null;
}
