import { Marked } from 'marked';
import type { TokenizerAndRendererExtension, Tokens } from 'marked';
import { MarkupParseError } from './errors.js';
import { escapeHtml } from './templates.js';
import { ConversionResult } from './types.js';

/**
 * Cross references without an explicit URL point here, followed by the module name
 */
export const DEFAULT_EXTERNAL_BASE_URL = 'https://metacpan.org/pod/';

/**
 * Options for converting markup
 */
export interface ConverterOptions {
  /** Prefix for `L<Module::Name>` cross references */
  externalBaseUrl?: string;
}

export interface MarkupConverter {
  convert(markup: string): ConversionResult;
}

/**
 * Generate a URL-safe slug from text
 */
export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/<[^>]*>/g, '')  // Remove HTML tags
    .replace(/[^\w\s-]/g, '') // Remove non-word chars except spaces and hyphens
    .replace(/\s+/g, '-')     // Replace spaces with hyphens
    .replace(/-+/g, '-')      // Collapse multiple hyphens
    .replace(/^-|-$/g, '');
  return slug || 'section';
}

/**
 * Hands out slugs that are unique within one document
 */
export class Slugger {
  private readonly used = new Set<string>();

  /** Mark an id already present in the document as taken */
  reserve(id: string): void {
    this.used.add(id);
  }

  slug(text: string): string {
    const base = slugify(text);
    let candidate = base;
    for (let n = 1; this.used.has(candidate); n++) {
      candidate = `${base}-${n}`;
    }
    this.used.add(candidate);
    return candidate;
  }
}

/**
 * Remove the shortest leading whitespace shared by all non-blank lines
 */
export function stripIndentation(text: string): string {
  const lines = text.split('\n');
  let shortest: string | undefined;
  for (const line of lines) {
    if (line.trim() === '') {
      continue;
    }
    const leading = /^\s*/.exec(line)?.[0] ?? '';
    if (shortest === undefined || leading.length < shortest.length) {
      shortest = leading;
    }
  }
  if (!shortest) {
    return text;
  }
  const prefix = shortest;
  return lines
    .map(line => (line.startsWith(prefix) ? line.slice(prefix.length) : line.trimStart()))
    .join('\n');
}

/**
 * A resolved `L<...>` cross reference
 */
export interface CrossReference {
  text: string;
  href: string;
}

const URL_TARGET = /^[a-z][\w+.-]*:\/\//i;

/**
 * Resolve the inside of an `L<...>` cross reference.
 *
 * Forms: `Name`, `text|Name`, `Name/Section`, `/Section`, and `URL`
 * (each optionally with a `text|` prefix). Returns undefined when the
 * target is empty.
 */
export function resolveCrossReference(inner: string, baseUrl: string): CrossReference | undefined {
  const bar = inner.indexOf('|');
  const label = bar === -1 ? undefined : inner.slice(0, bar).trim() || undefined;
  const target = (bar === -1 ? inner : inner.slice(bar + 1)).trim();

  if (URL_TARGET.test(target)) {
    return { text: label ?? target, href: target };
  }

  const slash = target.indexOf('/');
  const name = (slash === -1 ? target : target.slice(0, slash)).trim();
  const section = slash === -1 ? '' : target.slice(slash + 1).trim().replace(/^"(.*)"$/, '$1');
  if (!name && !section) {
    return undefined;
  }

  const href = (name ? baseUrl + name : '') + (section ? `#${slugify(section)}` : '');
  let text = name;
  if (section) {
    text = name ? `"${section}" in ${name}` : `"${section}"`;
  }
  return { text: label ?? text, href };
}

const CROSS_REFERENCE_PATTERN = /^L<([^<>\n]*)>/;

/**
 * Inline `L<...>` syntax for linking to other documentation modules.
 * Problems are collected rather than thrown so the caller can report them.
 */
function crossReferenceExtension(baseUrl: string, problems: string[]): TokenizerAndRendererExtension {
  return {
    name: 'crossReference',
    level: 'inline',
    start(src: string) {
      const index = src.search(/(?<!\w)L</);
      return index === -1 ? undefined : index;
    },
    tokenizer(src: string) {
      const match = CROSS_REFERENCE_PATTERN.exec(src);
      if (!match) {
        return undefined;
      }
      const reference = resolveCrossReference(match[1], baseUrl);
      if (!reference) {
        problems.push(`Empty link target in ${match[0]}`);
      }
      return {
        type: 'crossReference',
        raw: match[0],
        text: reference?.text ?? match[0],
        href: reference?.href ?? ''
      };
    },
    renderer(token: Tokens.Generic) {
      const text: unknown = token.text;
      const href: unknown = token.href;
      if (typeof text !== 'string' || typeof href !== 'string') {
        return false;
      }
      if (!href) {
        return escapeHtml(text);
      }
      return `<a href="${escapeHtml(href)}">${escapeHtml(text)}</a>`;
    }
  };
}

/**
 * Create a configured marked instance for a single document
 */
function createMarkedInstance(externalBaseUrl: string, problems: string[]): Marked {
  const slugger = new Slugger();
  const marked = new Marked({
    gfm: true // GitHub Flavored Markdown
  });

  marked.use({
    extensions: [crossReferenceExtension(externalBaseUrl, problems)],
    walkTokens(token) {
      if (token.type === 'code' && typeof token.text === 'string') {
        token.text = stripIndentation(token.text);
      }
    },
    renderer: {
      heading({ tokens, depth, text }) {
        const id = slugger.slug(text);
        return `<h${depth} id="${id}">${this.parser.parseInline(tokens)}</h${depth}>\n`;
      }
    }
  });

  return marked;
}

function toParseError(err: unknown): MarkupParseError {
  if (err instanceof MarkupParseError) {
    return err;
  }
  return new MarkupParseError(err instanceof Error ? err.message : String(err));
}

/**
 * Create a Markdown to HTML converter. Conversion never throws.
 */
export function createConverter(options: ConverterOptions = {}): MarkupConverter {
  const externalBaseUrl = options.externalBaseUrl ?? DEFAULT_EXTERNAL_BASE_URL;

  return {
    convert(markup: string): ConversionResult {
      const problems: string[] = [];
      try {
        const html = createMarkedInstance(externalBaseUrl, problems).parse(markup, { async: false });
        if (problems.length > 0) {
          return { ok: false, error: new MarkupParseError(problems.join('\n')) };
        }
        return { ok: true, html };
      } catch (err) {
        return { ok: false, error: toParseError(err) };
      }
    }
  };
}

/**
 * Markup given directly, or produced by a content callback
 */
export type MarkupSource = string | (() => string | null | undefined) | null | undefined;

/**
 * Convert markup to HTML, substituting the escaped error message on failure
 */
export function markdownToHtml(source: MarkupSource, converter: MarkupConverter = createConverter()): string {
  const markup = typeof source === 'function' ? source() : source;
  if (markup === undefined || markup === null) {
    return '';
  }
  const result = converter.convert(markup);
  return result.ok ? result.html : escapeHtml(result.error.message);
}
