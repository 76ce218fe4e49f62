/**
 * Server configuration.
 *
 * Loads config/docviewer.json (or the file named by DOCVIEWER_CONFIG),
 * then applies PORT and DOCVIEWER_ROOTS from the environment.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DocViewerOptions } from './plugin.js';

const ConfigSchema = z.object({
  port: z.number().int().positive().default(3000),
  roots: z.array(z.string()).default(['docs']),
  mount: z.string().startsWith('/').default('/perldoc'),
  defaultModule: z.string().default('Guides'),
  allowModules: z.array(z.string()).default(['']),
  layout: z.string().default('docviewer'),
  externalBaseUrl: z.string().url().optional()
});

export type ServerConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG_FILE = path.join('config', 'docviewer.json');

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Config file path (default: DOCVIEWER_CONFIG or config/docviewer.json) */
  configFile?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse a port number given on the command line or in the environment
 */
export function parsePort(value: string, source = 'port'): number {
  const port = /^\d+$/.test(value) ? Number.parseInt(value, 10) : NaN;
  if (Number.isNaN(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`Invalid ${source}: ${value}`);
  }
  return port;
}

/**
 * Validate raw configuration values and apply environment overrides
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}, source = 'configuration'): ServerConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${describeIssues(result.error)}`);
  }
  const config = result.data;

  if (env.PORT) {
    config.port = parsePort(env.PORT, 'PORT');
  }
  if (env.DOCVIEWER_ROOTS) {
    config.roots = env.DOCVIEWER_ROOTS.split(path.delimiter).filter(Boolean);
  }
  return config;
}

/**
 * Load configuration from file. A missing file falls back to defaults.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ServerConfig> {
  const env = options.env ?? process.env;
  const configFile = path.resolve(options.configFile ?? env.DOCVIEWER_CONFIG ?? DEFAULT_CONFIG_FILE);

  if (!(await fs.pathExists(configFile))) {
    console.warn(`Config file ${configFile} not found, using defaults`);
    return parseConfig({}, env);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configFile);
  } catch (err) {
    throw new ConfigError(`Failed to read ${configFile}: ${err instanceof Error ? err.message : String(err)}`);
  }
  console.log(`Loaded config from ${configFile}`);
  return parseConfig(raw, env, configFile);
}

/**
 * Compile configured allow-list patterns
 */
export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map(pattern => {
    try {
      return new RegExp(pattern);
    } catch {
      throw new ConfigError(`Invalid module pattern: ${pattern}`);
    }
  });
}

/**
 * Plugin options for a server configuration. Relative roots resolve against baseDir.
 */
export function toPluginOptions(config: ServerConfig, baseDir = process.cwd()): DocViewerOptions {
  return {
    routeMount: config.mount,
    defaultModule: config.defaultModule,
    allowModules: compilePatterns(config.allowModules),
    layout: config.layout,
    roots: config.roots.map(root => path.resolve(baseDir, root)),
    externalBaseUrl: config.externalBaseUrl
  };
}
