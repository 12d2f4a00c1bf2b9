/**
 * @fileOverview: Cross-references routes, controllers and helper calls of a Rails project
 * @module: RouteChecker
 * @keyFunctions:
 *   - routesWithoutActions(): Routes whose action is neither defined nor implicitly rendered
 *   - undefinedPathMethodCalls(): `*_path`/`*_url` calls in views and controllers matching no route
 * @dependencies:
 *   - RunContext: Memoized application model reads for this run
 *   - ParserLoader: Adapters per dialect with availability probing
 *   - controllerResolver / invocationFilter: Ownership and per-call decisions
 * @context: A fresh checker recomputes everything; two runs over the same tree give the same lists
 */

import type { CheckerOptions } from '../config';
import type { ApplicationModel } from '../appModel/types';
import type { FileDiscovery } from '../fileDiscovery';
import type { ParserLoader } from '../parsers/loader';
import type { Dialect, HelperInvocation, InvocationFilter, ParserAdapter } from '../parsers/types';
import { ParseError, RouteAuditError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import {
  controllerFromSourceFile,
  controllerFromViewFile,
  type ResolvedController,
} from './controllerResolver';
import { buildInvocationFilter, type MemberKind } from './invocationFilter';
import { RunContext } from './runContext';

export interface MissingActionViolation {
  controller: string;
  action: string;
}

export interface UndefinedPathCall extends HelperInvocation {
  /** Project-relative path of the file containing the call. */
  file: string;
}

export interface RouteCheckerDeps {
  appModel: ApplicationModel;
  discovery: FileDiscovery;
  parserLoader: ParserLoader;
  options: CheckerOptions;
}

interface PassDefinition {
  dialect: Dialect;
  members: MemberKind;
  resolve: (context: RunContext, filename: string) => ResolvedController | undefined;
}

const PASSES: readonly PassDefinition[] = [
  { dialect: 'erb', members: 'helpers', resolve: controllerFromViewFile },
  { dialect: 'haml', members: 'helpers', resolve: controllerFromViewFile },
  { dialect: 'ruby', members: 'instanceMethods', resolve: controllerFromSourceFile },
];

export class RouteChecker {
  private readonly context: RunContext;
  private readonly parserLoader: ParserLoader;

  constructor(deps: RouteCheckerDeps) {
    this.context = new RunContext(deps.appModel, deps.options, deps.discovery);
    this.parserLoader = deps.parserLoader;
  }

  routesWithoutActions(): MissingActionViolation[] {
    const violations: MissingActionViolation[] = [];

    for (const route of this.context.routes()) {
      const { controller, action } = route;
      if (this.context.isIgnoredController(controller)) continue;
      if (this.controllerHasAction(controller, action)) continue;

      violations.push({ controller, action });
    }

    logger.debug('Checked routes against controller actions', {
      routes: this.context.routes().length,
      violations: violations.length,
    });
    return violations;
  }

  undefinedPathMethodCalls(): UndefinedPathCall[] {
    return PASSES.flatMap(pass => this.runPass(pass));
  }

  /**
   * Controllers missing from the (ignore-filtered) map are out of scope, so count as satisfied.
   */
  private controllerHasAction(controller: string, action: string): boolean {
    const info = this.context.controllerInformation().get(controller);
    if (!info) return true;
    if (info.actions.has(action)) return true;
    return info.lookupContext?.templateExists(`${controller}/${action}`) ?? false;
  }

  private runPass(pass: PassDefinition): UndefinedPathCall[] {
    const { dialect } = pass;
    const files = this.context.discovery.discover(dialect);

    switch (this.parserLoader.availability(dialect, files.length)) {
      case 'not-applicable':
        return [];
      case 'unavailable':
        if (this.parserLoader.isOptional(dialect)) {
          logger.warn(
            `There are ${dialect} files in the codebase, but the ${dialect} parser could not be loaded; skipping them`,
            { dialect, files: files.length }
          );
          return [];
        }
        break;
      case 'available':
        break;
    }

    // throws ParserUnavailableError for a required dialect that failed to load
    const parser = this.parserLoader.load(dialect);
    const routeNames = this.context.allRouteNames();
    const calls: UndefinedPathCall[] = [];

    for (const filename of files) {
      const controller = pass.resolve(this.context, filename);
      if (!controller) {
        logger.debug('Skipping file without a controller', { filename, dialect });
        continue;
      }

      const filter = buildInvocationFilter({
        filename,
        controller: controller.info,
        members: pass.members,
        routeNames,
        options: this.context.options,
      });

      for (const invocation of this.runParser(parser, filename, filter)) {
        calls.push({ file: filename, ...invocation });
      }
    }

    logger.debug('Scanned files for undefined path calls', {
      dialect,
      files: files.length,
      violations: calls.length,
    });
    return calls;
  }

  /**
   * Parser crashes propagate as ParseError; the caller decides how to report them.
   */
  private runParser(parser: ParserAdapter, filename: string, filter: InvocationFilter): HelperInvocation[] {
    try {
      return parser.run(filename, filter);
    } catch (error) {
      if (error instanceof RouteAuditError) throw error;
      throw new ParseError(filename, parser.dialect, error instanceof Error ? error.message : String(error));
    }
  }
}
