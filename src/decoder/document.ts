import * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import { createAttribute } from '../teletext/attribute.js';
import { MalformedPayloadError } from '../teletext/errors.js';
import type { DecodeContext } from './context.js';
import type { Attribute, FlagClasses, LinkRule, LinkTarget } from '../types/index.js';

export interface WalkState {
  attribute: Attribute;
  link?: LinkTarget;
  /** Text nodes only count inside content elements */
  collect: boolean;
  /** Decode text through the station's glyph font */
  glyphFont: boolean;
}

export interface WalkVisitor {
  enter(element: Element, state: WalkState): WalkState;
  text(data: string, state: WalkState): void;
  /** Called for `<br>`; without it line breaks are ignored */
  lineBreak?(): void;
}

function isCheerioApi(value: unknown): value is cheerio.CheerioAPI {
  return typeof value === 'function' && 'root' in value && typeof value.root === 'function';
}

export function loadDocument(payload: unknown, fixes?: ReadonlyArray<readonly [string, string]>): cheerio.CheerioAPI {
  if (isCheerioApi(payload)) return payload;
  if (typeof payload !== 'string') {
    throw new MalformedPayloadError(`Expected an HTML document, got ${typeof payload}`);
  }

  let markup = payload;
  for (const [wrong, correct] of fixes ?? []) {
    markup = markup.split(wrong).join(correct);
  }
  return cheerio.load(markup);
}

export function classList(element: Element): string[] {
  return (element.attribs.class ?? '').split(/\s+/).filter(Boolean);
}

export function applyFlagClasses(attribute: Attribute, classes: string[], flags: FlagClasses | undefined): Attribute {
  if (!flags) return attribute;
  const has = (name: string | undefined): boolean => name !== undefined && classes.includes(name);
  return createAttribute({
    ...attribute,
    doubleHeight: attribute.doubleHeight || has(flags.doubleHeight),
    flashing: attribute.flashing || has(flags.flashing),
    concealed: attribute.concealed || has(flags.concealed),
  });
}

export function isFlagClass(name: string, flags: FlagClasses | undefined): boolean {
  return flags !== undefined && (name === flags.doubleHeight || name === flags.flashing || name === flags.concealed);
}

/**
 * Resolve the link of an anchor element. Anchors without href keep the
 * surrounding state.
 */
export function anchorLink(
  element: Element,
  state: WalkState,
  context: DecodeContext,
  rule: LinkRule
): LinkTarget | undefined {
  const href = element.attribs.href;
  if (element.name !== 'a' || href === undefined) return state.link;
  return context.parseLink(href, rule);
}

export function walk(nodes: readonly AnyNode[], state: WalkState, visitor: WalkVisitor): void {
  for (const node of nodes) {
    if (isText(node)) {
      if (state.collect) visitor.text(node.data, state);
    } else if (isTag(node)) {
      if (node.name === 'br') {
        visitor.lineBreak?.();
        continue;
      }
      walk(node.children, visitor.enter(node, state), visitor);
    }
  }
}
