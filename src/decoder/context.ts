import { mapCharacter } from '../charset/table.js';
import { coalesceRow } from '../teletext/assembler.js';
import { UnmappedCharacterError, isTeletextError } from '../teletext/errors.js';
import { parseLinkTarget } from '../teletext/link.js';
import type {
  Attribute,
  CharsetId,
  DecodeOptions,
  DecodeWarning,
  LinkRule,
  LinkTarget,
  Row,
  Segment,
  UnmappedPolicy,
} from '../types/index.js';

/**
 * Collects the segments of one page while a decoder walks its payload.
 * Text containing line breaks starts new rows.
 */
export class DecodeContext {
  private readonly rows: Segment[][] = [];
  private readonly policy: UnmappedPolicy;
  private readonly placeholder: string;
  readonly warnings: DecodeWarning[] = [];

  constructor(options: DecodeOptions = {}) {
    this.policy = options.unmapped ?? 'fail';
    this.placeholder = options.placeholder ?? '?';
  }

  get rowIndex(): number {
    return Math.max(this.rows.length - 1, 0);
  }

  newRow(): void {
    this.rows.push([]);
  }

  append(text: string, attribute: Attribute, link?: LinkTarget): void {
    if (this.rows.length === 0) this.newRow();

    const lines = text.split('\n');
    lines.forEach((line, index) => {
      if (index > 0) this.newRow();
      if (line) {
        const segment: Segment = link === undefined ? { attribute, text: line } : { attribute, text: line, link };
        this.rows[this.rows.length - 1].push(segment);
      }
    });
  }

  /** Map a raw code, or apply the placeholder policy when it has no glyph */
  mapGlyph(charset: CharsetId, code: number): string {
    try {
      return String.fromCodePoint(mapCharacter(charset, code));
    } catch (error) {
      return this.unmapped(error);
    }
  }

  unmapped(error: unknown): string {
    if (this.policy === 'fail' || !(error instanceof UnmappedCharacterError)) {
      throw error;
    }
    this.warnings.push({ kind: 'UnmappedCharacter', message: error.message, row: this.rowIndex });
    return this.placeholder;
  }

  /** Parse a link target; an invalid one is recorded and the label stays plain text */
  parseLink(raw: string, rule: LinkRule = {}): LinkTarget | undefined {
    try {
      return parseLinkTarget(raw, rule.linkPattern, rule.linkSubPageOffset);
    } catch (error) {
      if (!isTeletextError(error, 'InvalidLinkTarget')) throw error;
      this.warnings.push({ kind: 'InvalidLinkTarget', message: error.message, row: this.rowIndex });
      return undefined;
    }
  }

  /**
   * Drop the empty row a trailing line break leaves behind. An empty
   * container leaves no rows at all.
   */
  trimTrailingRow(): void {
    const last = this.rows[this.rows.length - 1];
    if (last && last.length === 0) {
      this.rows.pop();
    }
  }

  build(): Row[] {
    return this.rows.map(coalesceRow);
  }
}
