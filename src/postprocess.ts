import { JSDOM } from 'jsdom';
import { isAllowed, parseExternalModuleLink, toCanonical } from './modules.js';
import { Slugger } from './renderer.js';
import { AllowList, ModuleIdentifier, PageResult, TableOfContents, TopicGroup } from './types.js';

export const DEFAULT_TITLE = 'Documentation';

/** Added to code samples for client-side syntax highlighting */
export const HIGHLIGHT_CLASS = 'prettyprint';

/**
 * Request context for post-processing a page
 */
export interface PageContext {
  /** The module being displayed */
  currentModule: ModuleIdentifier;
  /** Modules that may be linked locally */
  allowList: AllowList;
  /** Links starting with this prefix name a module */
  externalBaseUrl: string;
  /** Builds the local browser URL for a module */
  localUrl: (module: ModuleIdentifier) => string;
}

const TRANSCRIPT_PATTERN = /^\s*(?:\$|Usage:)\s+/m;
const SAMPLE_PATTERN = /[$@%]\w|-(?:>|&gt;)\w|^use\s+\w/m;

export type CodeBlockKind = 'transcript' | 'sample' | 'plain';

/**
 * Console transcripts win over code samples
 */
export function classifyCodeBlock(text: string): CodeBlockKind {
  if (TRANSCRIPT_PATTERN.test(text)) {
    return 'transcript';
  }
  return SAMPLE_PATTERN.test(text) ? 'sample' : 'plain';
}

function rewriteLinks(root: Element, ctx: PageContext): void {
  for (const anchor of Array.from(root.querySelectorAll('a[href]'))) {
    const href = anchor.getAttribute('href') ?? '';
    const link = parseExternalModuleLink(href, ctx.externalBaseUrl);
    if (!link || !isAllowed(link.module, ctx.allowList)) {
      continue;
    }
    if (toCanonical(link.module) === toCanonical(ctx.currentModule) && link.rest.startsWith('#')) {
      anchor.setAttribute('href', link.rest);
      continue;
    }
    anchor.setAttribute('href', ctx.localUrl(link.module) + link.rest);
  }
}

function tagCodeSamples(root: Element): void {
  for (const code of Array.from(root.querySelectorAll('pre > code'))) {
    if (classifyCodeBlock(code.textContent ?? '') === 'sample') {
      code.classList.add(HIGHLIGHT_CLASS);
    }
  }
}

function rewriteHeadings(root: Element): TableOfContents {
  const document = root.ownerDocument;
  const slugger = new Slugger();
  const headings = Array.from(root.querySelectorAll('h1, h2, h3, h4'));
  for (const heading of headings) {
    if (heading.id) {
      slugger.reserve(heading.id);
    }
  }

  const toc: TableOfContents = [];
  let group: TopicGroup | undefined;
  for (const heading of headings) {
    if (heading.tagName === 'H1' || !group) {
      group = [];
      toc.push(group);
    }
    if (!heading.id) {
      heading.id = slugger.slug(heading.textContent ?? '');
    }
    const text = heading.textContent ?? '';
    const href = `#${heading.id}`;
    group.push({ text, href });

    const permalink = document.createElement('a');
    permalink.setAttribute('href', href);
    permalink.setAttribute('class', 'permalink');
    permalink.textContent = '#';
    const backToToc = document.createElement('a');
    backToToc.setAttribute('href', '#toc');
    backToToc.textContent = text;
    heading.textContent = '';
    heading.append(permalink, backToToc);
  }
  return toc;
}

function findTitle(root: Element): string {
  const next = root.querySelector('h1')?.nextElementSibling;
  if (!next || next.tagName !== 'P') {
    return DEFAULT_TITLE;
  }
  return next.textContent?.trim() || DEFAULT_TITLE;
}

/**
 * Rewrite rendered documentation HTML for display in the browser:
 * local module links, highlighting hooks on code samples, heading
 * permalinks, plus the table of contents and page title.
 */
export function processPage(html: string, ctx: PageContext): PageResult {
  const { window } = new JSDOM('');
  try {
    const root = window.document.createElement('div');
    root.innerHTML = html;

    rewriteLinks(root, ctx);
    tagCodeSamples(root);
    const toc = rewriteHeadings(root);
    const title = findTitle(root);

    return { html: root.innerHTML, title, toc };
  } finally {
    window.close();
  }
}
