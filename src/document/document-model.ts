/**
 * Queryable view of a fetched page: linkedom element tree plus the raw source
 * for inline SVG scanning.
 */
import { parseHTML } from 'linkedom';
import { logger, type Log } from '../logger.js';

/** Opening, closing or self-closing `<svg>` tag. */
const SVG_TAG = /<(\/)?svg\b[^>]*?(\/)?>/gi;

/** Share of U+FFFD characters above which a body is treated as undecodable binary. */
const MAX_REPLACEMENT_CHAR_RATIO = 0.1;

/**
 * Whether a body is worth handing to the parser: non-blank, not binary, and
 * containing at least one tag.
 */
export function looksLikeMarkup(body: string): boolean {
  if (!body.trim()) return false;
  if (body.includes('\u0000')) return false;

  const replacementChars = body.match(/\uFFFD/g)?.length ?? 0;
  if (replacementChars / body.length > MAX_REPLACEMENT_CHAR_RATIO) return false;

  return /<[a-z!/]/i.test(body);
}

/** Trimmed attribute value, or null when missing or blank. */
export function attrValue(element: Element, name: string): string | null {
  const value = element.getAttribute(name)?.trim();
  return value ? value : null;
}

/** Lower-cased class tokens of an element. */
export function classTokens(element: Element): string[] {
  return (attrValue(element, 'class') ?? '').toLowerCase().split(/\s+/).filter(Boolean);
}

/**
 * Raw text of every outermost `<svg>…</svg>` region, in document order.
 * Nested SVGs stay inside their parent's region; an unclosed region is dropped.
 */
export function outermostSvgBlocks(source: string): string[] {
  const blocks: string[] = [];
  let depth = 0;
  let start = 0;

  for (const match of source.matchAll(SVG_TAG)) {
    const [tag, closing, selfClosing] = match;
    const index = match.index ?? 0;

    if (closing) {
      if (depth === 0) continue;
      depth--;
      if (depth === 0) blocks.push(source.slice(start, index + tag.length));
    } else if (selfClosing) {
      if (depth === 0) blocks.push(tag);
    } else {
      if (depth === 0) start = index;
      depth++;
    }
  }

  return blocks;
}

export class DocumentModel {
  private constructor(
    private readonly document: Document | null,
    readonly source: string,
    private readonly log: Log = logger
  ) {}

  /**
   * Best-effort parse. Bodies that are empty, binary or markup-free, and any
   * parser failure, produce the empty model instead of an error.
   */
  static parse(body: string, log: Log = logger): DocumentModel {
    if (!looksLikeMarkup(body)) {
      log.debug({ bodyLength: body.length }, 'Body is not markup, using empty document');
      return DocumentModel.empty();
    }

    // Fragments get a full shell so head/body lookups behave the same as on real pages
    const html = /<html[\s>]/i.test(body)
      ? body
      : `<!DOCTYPE html><html><head></head><body>${body}</body></html>`;

    try {
      const { document } = parseHTML(html);
      if (!document.documentElement) return DocumentModel.empty();
      return new DocumentModel(document, body, log);
    } catch (e) {
      log.debug({ err: e }, 'HTML parse failed, using empty document');
      return DocumentModel.empty();
    }
  }

  static empty(): DocumentModel {
    return new DocumentModel(null, '');
  }

  get isEmpty(): boolean {
    return this.document === null;
  }

  /** All elements matching a CSS selector; an invalid selector matches nothing. */
  select(selector: string): Element[] {
    if (!this.document) return [];
    try {
      return Array.from(this.document.querySelectorAll(selector));
    } catch (e) {
      this.log.debug({ selector, err: e }, 'Invalid selector');
      return [];
    }
  }

  byTag(tag: string): Element[] {
    return this.select(tag);
  }

  /** Elements whose `attribute` contains `needle`, ignoring case. */
  byAttributeSubstring(attribute: string, needle: string, tag = '*'): Element[] {
    const lowered = needle.toLowerCase();
    return this.byTag(tag).filter((element) =>
      (element.getAttribute(attribute) ?? '').toLowerCase().includes(lowered)
    );
  }

  /** Serialized markup of a parsed SVG element. */
  svgMarkup(element: Element): string {
    return element.outerHTML;
  }

  /** Raw source text of every outermost inline SVG region, in document order. */
  rawSvgBlocks(): string[] {
    return outermostSvgBlocks(this.source);
  }
}

export function parseDocument(body: string, log?: Log): DocumentModel {
  return DocumentModel.parse(body, log);
}
