import { AllowList, ModuleIdentifier } from './types.js';

/**
 * Characters a module name segment may not contain.
 * Dots are excluded so `.txt`/`.html` suffixes and `..` never reach the filesystem.
 */
const INVALID_SEGMENT = /[.\\\0]/;

/**
 * Allow-list used when none is configured: matches every module
 */
export const ALLOW_ALL: AllowList = [/(?:)/];

function fromSegments(segments: string[]): ModuleIdentifier | undefined {
  if (segments.length === 0) {
    return undefined;
  }
  for (const segment of segments) {
    if (segment === '' || INVALID_SEGMENT.test(segment)) {
      return undefined;
    }
  }
  return { segments };
}

/**
 * Parse the slash-joined form used in URLs, e.g. `Guides/Rendering`.
 * Canonical `::` separators are accepted as well, so `Guides::Rendering`
 * names the same module.
 */
export function parseModulePath(modulePath: string): ModuleIdentifier | undefined {
  return fromSegments(modulePath.split(/\/|::/));
}

/**
 * Parse the canonical `::`-joined form, e.g. `Guides::Rendering`
 */
export function parseModuleName(name: string): ModuleIdentifier | undefined {
  return fromSegments(name.split('::'));
}

export function toCanonical(id: ModuleIdentifier): string {
  return id.segments.join('::');
}

export function toPathForm(id: ModuleIdentifier): string {
  return id.segments.join('/');
}

export function isAllowed(id: ModuleIdentifier, allowList: AllowList): boolean {
  const name = toCanonical(id);
  // search() ignores lastIndex, so /g patterns behave the same on every call
  return allowList.some(pattern => name.search(pattern) !== -1);
}

/**
 * A module reference found in a link to the external documentation site
 */
export interface ExternalModuleLink {
  module: ModuleIdentifier;
  /** Whatever followed the module name in the href (fragment, query) */
  rest: string;
}

const MODULE_LINK_SEGMENT = /^[\w:/]+/;

/**
 * Extract a module from an href of the form `<baseUrl><name><rest>`.
 *
 * The name is one or more `[\w:/]` characters and may be `::`-joined,
 * `/`-joined or a mix of both. Returns undefined for hrefs that do not
 * start with `baseUrl` or do not name a valid module.
 */
export function parseExternalModuleLink(href: string, baseUrl: string): ExternalModuleLink | undefined {
  if (!href.startsWith(baseUrl)) {
    return undefined;
  }
  const tail = href.slice(baseUrl.length);
  const match = MODULE_LINK_SEGMENT.exec(tail);
  if (!match) {
    return undefined;
  }
  const name = match[0].replace(/\/+$/, '');
  const module = fromSegments(name.split(/::|\//));
  if (!module) {
    return undefined;
  }
  return { module, rest: tail.slice(match[0].length) };
}
