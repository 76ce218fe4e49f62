import { Application, Request, Response, Router } from 'express';
import fs from 'fs-extra';
import { ConfigError } from './errors.js';
import { Logger, ModuleLocator } from './locator.js';
import { ALLOW_ALL, isAllowed, parseModuleName, parseModulePath, toCanonical, toPathForm } from './modules.js';
import { processPage } from './postprocess.js';
import { createConverter, DEFAULT_EXTERNAL_BASE_URL, markdownToHtml, MarkupConverter, MarkupSource } from './renderer.js';
import { BUILTIN_LAYOUTS, escapeHtml, Layout, PageTemplate, renderDocPage } from './templates.js';
import { AllowList, ModuleIdentifier } from './types.js';

/**
 * Runs over a Markdown view before conversion
 */
export type Preprocessor = (source: string, locals: object) => string;

export type PreprocessorName = 'interpolate' | 'none';

/**
 * Plugin options. Everything is resolved once, when the plugin is registered.
 */
export interface DocViewerOptions {
  /** View engine extension to register (default: md) */
  handlerName?: string;
  /** Preprocessing step for Markdown views (default: interpolate) */
  preprocess?: PreprocessorName | Preprocessor;
  /** Mount path, or an existing router to add the browser to (default: /perldoc) */
  routeMount?: string | Router;
  /** Module shown when none is requested (default: Guides) */
  defaultModule?: string;
  /** Modules served locally; others redirect to the external site (default: all) */
  allowModules?: AllowList;
  /** Layout name (default: docviewer) */
  layout?: string;
  /** Additional layouts by name; these override built-in layouts of the same name */
  layouts?: Record<string, Layout>;
  /** Replaces the built-in documentation page template */
  pageTemplate?: PageTemplate;
  /** Only register the view engine and helper */
  disableBrowser?: boolean;
  /** Documentation roots searched in order (default: the working directory) */
  roots?: readonly string[];
  /** External documentation site, followed by the canonical module name */
  externalBaseUrl?: string;
  logger?: Logger;
}

export const DEFAULT_HANDLER_NAME = 'md';
export const DEFAULT_ROUTE_MOUNT = '/perldoc';
export const DEFAULT_MODULE = 'Guides';
export const DEFAULT_LAYOUT = 'docviewer';

const INTERPOLATION_PATTERN = /\{\{\s*([\w$]+(?:\.[\w$]+)*)\s*\}\}/g;

function lookup(locals: object, keyPath: string): unknown {
  let value: unknown = locals;
  for (const key of keyPath.split('.')) {
    if (typeof value !== 'object' || value === null) {
      return undefined;
    }
    value = Reflect.get(value, key);
  }
  return value;
}

/**
 * Replaces `{{ name }}` and `{{ a.b }}` with the escaped value of a render local
 */
export const interpolate: Preprocessor = (source, locals) =>
  source.replace(INTERPOLATION_PATTERN, (_match, keyPath: string) => {
    const value = lookup(locals, keyPath);
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return escapeHtml(String(value));
    }
    return '';
  });

export const PREPROCESSORS: Readonly<Record<PreprocessorName, Preprocessor>> = {
  interpolate,
  none: source => source
};

function resolvePreprocessor(preprocess: DocViewerOptions['preprocess']): Preprocessor {
  if (typeof preprocess === 'function') {
    return preprocess;
  }
  const name = preprocess ?? 'interpolate';
  if (!Object.hasOwn(PREPROCESSORS, name)) {
    throw new ConfigError(`Unknown preprocessor: ${name}`);
  }
  return PREPROCESSORS[name];
}

function resolveLayout(name: string, extra: Record<string, Layout> = {}): Layout {
  const layouts: Record<string, Layout> = { ...BUILTIN_LAYOUTS, ...extra };
  const layout = layouts[name];
  if (!layout) {
    throw new ConfigError(`Unknown layout: ${name}`);
  }
  return layout;
}

/**
 * Express view engine for Markdown views
 */
export function createTemplateHandler(converter: MarkupConverter, preprocess: Preprocessor) {
  return (filePath: string, options: object, callback: (err: unknown, rendered?: string) => void): void => {
    void fs
      .readFile(filePath, 'utf-8')
      .then(source => markdownToHtml(preprocess(source, options), converter))
      .then(html => callback(null, html), (err: unknown) => callback(err));
  };
}

interface BrowserSettings {
  converter: MarkupConverter;
  locator: ModuleLocator;
  allowList: AllowList;
  defaultModule: ModuleIdentifier;
  externalBaseUrl: string;
  layout: Layout;
  pageTemplate: PageTemplate;
}

/**
 * `/<module path>` with an optional `.txt` or `.html` format suffix
 */
const BROWSER_ROUTE = /^(?:\/([^.]+?))?(?:\.(txt|html))?\/?$/;

function modulePathUrl(baseUrl: string, modulePath: string, format?: string): string {
  const encoded = modulePath.split('/').map(encodeURIComponent).join('/');
  return `${baseUrl}/${encoded}${format ? `.${format}` : ''}`;
}

function createBrowserHandler(settings: BrowserSettings) {
  const { converter, locator, allowList, externalBaseUrl, layout, pageTemplate } = settings;
  const defaultPath = toPathForm(settings.defaultModule);

  return (req: Request, res: Response): void => {
    const modulePath: string = req.params[0] || defaultPath;
    const format: string | undefined = req.params[1];
    const externalUrl = externalBaseUrl + modulePath.split('/').join('::');

    const module = parseModulePath(modulePath);
    if (!module || !isAllowed(module, allowList)) {
      res.redirect(externalUrl);
      return;
    }

    const found = locator.read(module);
    if (!found) {
      res.redirect(externalUrl);
      return;
    }

    const sendSource = (): void => {
      res.type('text/plain').send(found.source);
    };

    const sendPage = (): void => {
      const page = processPage(markdownToHtml(found.source, converter), {
        currentModule: module,
        allowList,
        externalBaseUrl,
        localUrl: target => modulePathUrl(req.baseUrl, toPathForm(target))
      });
      const content = pageTemplate({
        module: toPathForm(module),
        urlFor: (target, targetFormat) => modulePathUrl(req.baseUrl, target, targetFormat),
        externalUrl: externalBaseUrl + toCanonical(module),
        toc: page.toc,
        content: page.html
      });
      res.type('html').send(layout({ title: page.title, content }));
    };

    if (format === 'txt') {
      sendSource();
      return;
    }
    if (format === 'html') {
      sendPage();
      return;
    }
    res.format({ html: sendPage, text: sendSource, default: sendPage });
  };
}

/**
 * Register the Markdown view engine and `markdownToHtml` helper, and unless
 * disabled mount the documentation browser.
 *
 * Returns the router the browser was added to, or undefined without a browser.
 */
export function docViewer(app: Application, options: DocViewerOptions = {}): Router | undefined {
  const externalBaseUrl = options.externalBaseUrl ?? DEFAULT_EXTERNAL_BASE_URL;
  const converter = createConverter({ externalBaseUrl });
  const preprocess = resolvePreprocessor(options.preprocess);

  app.engine(options.handlerName ?? DEFAULT_HANDLER_NAME, createTemplateHandler(converter, preprocess));
  app.locals.markdownToHtml = (source: MarkupSource): string => markdownToHtml(source, converter);

  if (options.disableBrowser) {
    return undefined;
  }

  const defaultName = options.defaultModule ?? DEFAULT_MODULE;
  const defaultModule = parseModuleName(defaultName);
  if (!defaultModule) {
    throw new ConfigError(`Invalid default module: ${defaultName}`);
  }

  const handler = createBrowserHandler({
    converter,
    locator: new ModuleLocator({ roots: options.roots ?? [process.cwd()], logger: options.logger }),
    allowList: options.allowModules ?? ALLOW_ALL,
    defaultModule,
    externalBaseUrl,
    layout: resolveLayout(options.layout ?? DEFAULT_LAYOUT, options.layouts),
    pageTemplate: options.pageTemplate ?? renderDocPage
  });

  const mount = options.routeMount ?? DEFAULT_ROUTE_MOUNT;
  let router: Router;
  if (typeof mount === 'string') {
    router = Router();
    app.use(mount, router);
  } else {
    router = mount;
  }
  router.get(BROWSER_ROUTE, handler);
  return router;
}
