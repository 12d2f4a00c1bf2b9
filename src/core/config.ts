/**
 * @fileOverview: Audit configuration schema and YAML loader
 * @module: Config
 * @keyFunctions:
 *   - RouteAuditConfigSchema: Zod schema for the on-disk configuration file
 *   - toCheckerOptions(): Convert validated config into the engine's set-based options
 *   - loadConfig(): Read, parse and validate a configuration file
 * @dependencies:
 *   - yaml: Parsing the configuration file
 *   - zod: Validating its shape
 * @context: The config file lives at the project root as `.route-audit.yml`; keys use
 *   snake_case on disk and camelCase in code
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, ErrorCode } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export const DEFAULT_CONFIG_FILE = '.route-audit.yml';
export const DEFAULT_ROUTES_FILE = 'tmp/routes.txt';

const NameListSchema = z.array(z.string().min(1)).default([]);

export const RouteAuditConfigSchema = z
  .object({
    ignored_controllers: NameListSchema,
    ignored_paths: NameListSchema,
    ignored_path_whitelist: z.record(z.string(), z.array(z.string().min(1))).default({}),
    routes_file: z.string().min(1).default(DEFAULT_ROUTES_FILE),
    manifest: z.string().min(1).optional(),
  })
  .strict()
  .describe('Route audit configuration');

export type RouteAuditConfig = z.infer<typeof RouteAuditConfigSchema>;

export interface CheckerOptions {
  ignoredControllers: ReadonlySet<string>;
  ignoredPaths: ReadonlySet<string>;
  /** Keyed by file path relative to the project root. */
  ignoredPathWhitelist: ReadonlyMap<string, ReadonlySet<string>>;
}

export interface CheckerOptionsInput {
  ignoredControllers?: Iterable<string>;
  ignoredPaths?: Iterable<string>;
  ignoredPathWhitelist?: Record<string, Iterable<string>>;
}

export function createCheckerOptions(input: CheckerOptionsInput = {}): CheckerOptions {
  const whitelist = new Map<string, ReadonlySet<string>>();
  for (const [filename, names] of Object.entries(input.ignoredPathWhitelist ?? {})) {
    whitelist.set(filename, new Set(names));
  }

  return {
    ignoredControllers: new Set(input.ignoredControllers ?? []),
    ignoredPaths: new Set(input.ignoredPaths ?? []),
    ignoredPathWhitelist: whitelist,
  };
}

export function toCheckerOptions(config: RouteAuditConfig): CheckerOptions {
  return createCheckerOptions({
    ignoredControllers: config.ignored_controllers,
    ignoredPaths: config.ignored_paths,
    ignoredPathWhitelist: config.ignored_path_whitelist,
  });
}

export function parseConfig(raw: unknown, configPath?: string): RouteAuditConfig {
  const result = RouteAuditConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${issues.join('; ')}`,
      configPath,
      { issues }
    );
  }
  return result.data;
}

/**
 * Load the configuration for a project. An explicit path must exist; the default file is
 * optional and its absence yields the defaults.
 */
export function loadConfig(projectRoot: string, explicitPath?: string): RouteAuditConfig {
  const configPath = explicitPath
    ? path.resolve(projectRoot, explicitPath)
    : path.join(projectRoot, DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) {
      throw new ConfigError(
        ErrorCode.MISSING_CONFIG,
        `Configuration file not found: ${configPath}`,
        configPath
      );
    }
    logger.debug('No configuration file, using defaults', { configPath });
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(
      ErrorCode.INVALID_CONFIG,
      `Could not parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath
    );
  }

  logger.debug('Loaded configuration', { configPath });
  return parseConfig(raw, configPath);
}
