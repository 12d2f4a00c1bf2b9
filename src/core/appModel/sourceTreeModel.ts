/**
 * @fileOverview: Application model derived statically from a Rails source tree
 * @module: SourceTreeApplicationModel
 * @keyFunctions:
 *   - routes(): Routes from the exported routes table
 *   - allRouteNames(): Named route prefixes from the same table
 *   - controllerInformation(): Actions, instance methods, helpers and template lookup per controller
 * @dependencies:
 *   - FileDiscovery: Globbing and reading project files
 *   - rubySource: Class and method extraction from controller, concern and helper files
 *   - routesTable: Parsing `bin/rails routes` output
 * @context: Stands in for booting the application. Controller ancestry is followed through app
 *   controllers only; framework base classes contribute nothing
 */

import type { FileDiscovery } from '../fileDiscovery';
import {
  CONCERNS_DIR,
  CONTROLLERS_DIR,
  FRAMEWORK_PATH_HELPERS,
  HELPERS_DIR,
  VIEWS_DIR,
  controllerNameFromConstant,
} from '../conventions';
import { AppModelError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import { parseRoutesTable, type RoutesTable } from './routesTable';
import { createRubySyntaxParser, type SyntaxParser } from '../parsers/treeSitter';
import { summarizeRubySource, type RubyClassSummary } from './rubySource';
import type { ApplicationModel, ControllerInfo, LookupContext, Route } from './types';

export interface SourceTreeModelOptions {
  /** Project-relative path of the `bin/rails routes` output. */
  routesFile: string;
}

const CONTROLLER_FILE = /^app\/controllers\/(.+)_controller\.rb$/;

function camelize(segment: string): string {
  return segment
    .split('_')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/**
 * `Foo` referenced inside `module Admin` may mean `Admin::Foo` or `Foo`.
 */
function constantCandidates(reference: string, namespace: string[]): string[] {
  if (reference.startsWith('::')) return [reference.slice(2)];
  const candidates: string[] = [];
  for (let depth = namespace.length; depth > 0; depth--) {
    candidates.push([...namespace.slice(0, depth), reference].join('::'));
  }
  candidates.push(reference);
  return candidates;
}

export class SourceTreeApplicationModel implements ApplicationModel {
  private table: RoutesTable | null = null;
  private controllers: Map<string, ControllerInfo> | null = null;
  private rubyParser: SyntaxParser | null = null;

  constructor(
    private readonly discovery: FileDiscovery,
    private readonly options: SourceTreeModelOptions
  ) {}

  routes(): Route[] {
    return this.routesTable().routes;
  }

  allRouteNames(): Set<string> {
    return this.routesTable().names;
  }

  controllerInformation(): Map<string, ControllerInfo> {
    if (!this.controllers) {
      this.controllers = this.buildControllerInformation();
    }
    return this.controllers;
  }

  private routesTable(): RoutesTable {
    if (this.table) return this.table;

    const { routesFile } = this.options;
    if (!this.discovery.exists(routesFile)) {
      throw new AppModelError(
        `Routes table not found at ${routesFile}. Export it with \`bin/rails routes > ${routesFile}\``,
        routesFile
      );
    }
    this.table = parseRoutesTable(this.discovery.read(routesFile), routesFile);
    logger.debug('Loaded routes table', {
      routesFile,
      routes: this.table.routes.length,
      names: this.table.names.size,
    });
    return this.table;
  }

  private buildControllerInformation(): Map<string, ControllerInfo> {
    const summaries = new Map<string, RubyClassSummary>();
    for (const file of this.discovery.glob([`${CONTROLLERS_DIR}/**/*_controller.rb`])) {
      const match = CONTROLLER_FILE.exec(file);
      if (!match || file.startsWith(`${CONCERNS_DIR}/`)) continue;
      summaries.set(match[1], this.summarize(file));
    }

    const concerns = this.loadConcerns();
    const viewHelpers = new Set<string>(FRAMEWORK_PATH_HELPERS);
    for (const file of this.discovery.glob([`${HELPERS_DIR}/**/*.rb`])) {
      for (const method of this.summarize(file).methods) {
        viewHelpers.add(method.name);
      }
    }

    const lookupContext: LookupContext = {
      templateExists: templatePath => this.discovery.existsWithAnyExtension(`${VIEWS_DIR}/${templatePath}`),
    };

    const info = new Map<string, ControllerInfo>();
    for (const name of summaries.keys()) {
      const chain = this.ancestry(name, summaries);
      const visibility = new Map<string, boolean>();
      const helpers = new Set(viewHelpers);

      // root first so a subclass can change an inherited method's visibility
      for (const summary of [...chain].reverse()) {
        const sources = [
          ...summary.includes
            .map(include => this.findConcern(include, summary.namespace, concerns))
            .filter((concern): concern is RubyClassSummary => concern !== undefined),
          summary,
        ];
        for (const source of sources) {
          for (const method of source.methods) {
            visibility.set(method.name, method.visibility === 'public');
          }
        }
        summary.helperMethods.forEach(helper => helpers.add(helper));
      }

      info.set(name, {
        actions: new Set([...visibility].filter(([, isPublic]) => isPublic).map(([method]) => method)),
        instanceMethods: new Set([...FRAMEWORK_PATH_HELPERS, ...visibility.keys()]),
        helpers,
        lookupContext,
      });
    }

    logger.debug('Built controller information', { controllers: info.size });
    return info;
  }

  private summarize(file: string): RubyClassSummary {
    if (!this.rubyParser) {
      try {
        this.rubyParser = createRubySyntaxParser();
      } catch (error) {
        throw new AppModelError('The Ruby grammar could not be loaded', file, {
          cause: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return summarizeRubySource(this.discovery.read(file), this.rubyParser);
  }

  /**
   * The controller followed by its app-defined ancestors.
   */
  private ancestry(name: string, summaries: Map<string, RubyClassSummary>): RubyClassSummary[] {
    const chain: RubyClassSummary[] = [];
    const visited = new Set<string>();
    let current: string | undefined = name;

    while (current && !visited.has(current)) {
      visited.add(current);
      const summary = summaries.get(current);
      if (!summary) break;
      chain.push(summary);

      const superclass = summary.superclass;
      current = superclass
        ? constantCandidates(superclass, summary.namespace)
            .map(controllerNameFromConstant)
            .find(candidate => candidate !== undefined && summaries.has(candidate))
        : undefined;
    }
    return chain;
  }

  private loadConcerns(): Map<string, RubyClassSummary> {
    const concerns = new Map<string, RubyClassSummary>();
    for (const file of this.discovery.glob([`${CONCERNS_DIR}/**/*.rb`])) {
      const constant = file
        .slice(CONCERNS_DIR.length + 1, -'.rb'.length)
        .split('/')
        .map(camelize)
        .join('::');
      concerns.set(constant, this.summarize(file));
    }
    return concerns;
  }

  private findConcern(
    reference: string,
    namespace: string[],
    concerns: Map<string, RubyClassSummary>
  ): RubyClassSummary | undefined {
    for (const candidate of constantCandidates(reference, namespace)) {
      const concern = concerns.get(candidate);
      if (concern) return concern;
    }
    return undefined;
  }
}
