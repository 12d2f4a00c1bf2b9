/**
 * @fileOverview: Wires configuration, application model, parsers and checker into one audit run
 * @module: Runner
 * @keyFunctions:
 *   - createApplicationModel(): Manifest model when configured, source-tree model otherwise
 *   - runAudit(): Run both checks and render the report
 * @context: Exit code 1 means findings; fatal errors are thrown for the CLI to map
 */

import { loadConfig, toCheckerOptions, type RouteAuditConfig } from './config';
import { FileDiscovery } from './fileDiscovery';
import { ManifestApplicationModel } from './appModel/manifestModel';
import { SourceTreeApplicationModel } from './appModel/sourceTreeModel';
import type { ApplicationModel } from './appModel/types';
import { RouteChecker } from './checker/routeChecker';
import { createDefaultParserFactories } from './parsers/adapters';
import { ParserLoader } from './parsers/loader';
import type { ParserFactory } from './parsers/types';
import { formatReport, violationCount, type AuditReport, type ReportFormat } from './report/formatters';
import { logger } from '../utils/logger';

export interface RunAuditOptions {
  projectPath: string;
  configPath?: string;
  /** Overrides `routes_file` from the config. */
  routesFile?: string;
  /** Overrides `manifest` from the config. */
  manifest?: string;
  format?: ReportFormat;
  parserFactories?: ParserFactory[];
}

export interface RunAuditResult {
  report: AuditReport;
  output: string;
  exitCode: 0 | 1;
}

export function createApplicationModel(
  discovery: FileDiscovery,
  config: Pick<RouteAuditConfig, 'routes_file' | 'manifest'>
): ApplicationModel {
  if (config.manifest) {
    logger.debug('Using manifest application model', { manifest: config.manifest });
    return ManifestApplicationModel.fromFile(discovery, config.manifest);
  }
  logger.debug('Using source tree application model', { routesFile: config.routes_file });
  return new SourceTreeApplicationModel(discovery, { routesFile: config.routes_file });
}

export function runAudit(options: RunAuditOptions): RunAuditResult {
  const discovery = new FileDiscovery(options.projectPath);
  const config = loadConfig(discovery.rootDir, options.configPath);

  const appModel = createApplicationModel(discovery, {
    routes_file: options.routesFile ?? config.routes_file,
    manifest: options.manifest ?? config.manifest,
  });
  const parserLoader = new ParserLoader(
    options.parserFactories ?? createDefaultParserFactories(filename => discovery.read(filename))
  );

  const checker = new RouteChecker({
    appModel,
    discovery,
    parserLoader,
    options: toCheckerOptions(config),
  });

  logger.info('Auditing routes', { projectPath: discovery.rootDir });
  const report: AuditReport = {
    routesWithoutActions: checker.routesWithoutActions(),
    undefinedPathMethodCalls: checker.undefinedPathMethodCalls(),
  };
  const total = violationCount(report);
  logger.info('Audit finished', {
    routesWithoutActions: report.routesWithoutActions.length,
    undefinedPathMethodCalls: report.undefinedPathMethodCalls.length,
  });

  return {
    report,
    output: formatReport(report, options.format ?? 'text'),
    exitCode: total > 0 ? 1 : 0,
  };
}
