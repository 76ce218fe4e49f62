import type { MarkupParseError } from './errors.js';

/**
 * A documentation module name, e.g. `Guides::Rendering`.
 * Shown canonically with `::` and in URLs with `/`.
 */
export interface ModuleIdentifier {
  readonly segments: readonly string[];
}

/**
 * Patterns gating which modules are served locally.
 * A module is allowed when at least one pattern matches its canonical name.
 */
export type AllowList = readonly RegExp[];

/**
 * A single table of contents entry
 */
export interface TopicEntry {
  /** Heading text */
  text: string;
  /** In-page fragment link, e.g. `#options` */
  href: string;
}

/**
 * A top-level heading followed by its nested sub-headings, in document order
 */
export type TopicGroup = TopicEntry[];

export type TableOfContents = TopicGroup[];

/**
 * Result of post-processing a rendered documentation page
 */
export interface PageResult {
  /** The rewritten HTML */
  html: string;
  /** Page title, taken from the paragraph after the first h1 */
  title: string;
  toc: TableOfContents;
}

export type ConversionResult =
  | { ok: true; html: string }
  | { ok: false; error: MarkupParseError };
