import { TableOfContents } from './types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Values available to the documentation page template
 */
export interface DocPageView {
  /** Current module, slash-joined */
  module: string;
  /** Builds the local URL for a slash-joined module path */
  urlFor: (modulePath: string, format?: 'txt') => string;
  /** The module's page on the external documentation site */
  externalUrl: string;
  toc: TableOfContents;
  /** Post-processed document HTML */
  content: string;
}

export type PageTemplate = (view: DocPageView) => string;

/**
 * Values available to a layout
 */
export interface LayoutView {
  title: string;
  /** Rendered page body */
  content: string;
}

export type Layout = (view: LayoutView) => string;

function link(href: string, text: string): string {
  return `<a href="${escapeHtml(href)}">${escapeHtml(text)}</a>`;
}

function renderCrumbs(view: DocPageView): string {
  const parts = view.module.split('/');
  const crumbs = parts.map((part, i) => link(view.urlFor(parts.slice(0, i + 1).join('/')), part));
  return `<div class="crumbs">
    ${crumbs.join('::')}
    <span class="more">
        (${link(view.urlFor(view.module, 'txt'), 'source')},
        ${link(view.externalUrl, 'external')})
    </span>
</div>`;
}

function renderToc(toc: TableOfContents): string {
  const items = toc.map(([first, ...rest]) => {
    if (!first) {
      return '';
    }
    const nested = rest.length > 0
      ? `\n<ul>\n${rest.map(entry => `<li>${link(entry.href, entry.text)}</li>`).join('\n')}\n</ul>`
      : '';
    return `<li>${link(first.href, first.text)}${nested}</li>`;
  });
  return `<ul>\n${items.join('\n')}\n</ul>`;
}

/**
 * Default page template: breadcrumbs, contents list, then the document
 */
export const renderDocPage: PageTemplate = view => `${renderCrumbs(view)}

<h1><a id="toc">CONTENTS</a></h1>
${renderToc(view.toc)}

${view.content}`;

export const docviewerLayout: Layout = ({ title, content }) => `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(title)}</title>
</head>
<body>
${content}
</body>
</html>`;

export const BUILTIN_LAYOUTS: Readonly<Record<string, Layout>> = {
  docviewer: docviewerLayout
};
