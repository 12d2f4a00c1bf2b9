/**
 * @fileOverview: Public API of rails-route-audit
 * @module: Index
 * @context: The CLI in ./cli is a thin wrapper around runAudit(); everything it uses is exported
 *   here for programmatic use and custom parser or application-model implementations
 */

export { runAudit, createApplicationModel, type RunAuditOptions, type RunAuditResult } from './core/runner';
export {
  RouteChecker,
  type RouteCheckerDeps,
  type MissingActionViolation,
  type UndefinedPathCall,
} from './core/checker/routeChecker';
export { RunContext } from './core/checker/runContext';
export {
  controllerNameFromViewFile,
  controllerNameFromSourceFile,
  controllerFromViewFile,
  controllerFromSourceFile,
  type ResolvedController,
} from './core/checker/controllerResolver';
export { buildInvocationFilter, isWhitelisted, type MemberKind } from './core/checker/invocationFilter';
export {
  loadConfig,
  parseConfig,
  createCheckerOptions,
  toCheckerOptions,
  RouteAuditConfigSchema,
  type CheckerOptions,
  type RouteAuditConfig,
} from './core/config';
export { FileDiscovery } from './core/fileDiscovery';
export * from './core/appModel';
export { ParserLoader } from './core/parsers/loader';
export { ErbParser, HamlParser, RubyParser, createDefaultParserFactories } from './core/parsers/adapters';
export { RouteHelperScanner } from './core/parsers/rubyScanner';
export { extractErbSegments, extractHamlSegments, type CodeSegment } from './core/parsers/templateSource';
export {
  createRubySyntaxParser,
  createErbSyntaxParser,
  type SyntaxNode,
  type SyntaxParser,
} from './core/parsers/treeSitter';
export type * from './core/parsers/types';
export { formatReport, formatText, formatJson, type AuditReport, type ReportFormat } from './core/report/formatters';
export {
  ErrorCode,
  RouteAuditError,
  ConfigError,
  AppModelError,
  ParserUnavailableError,
  ParseError,
} from './utils/errorHandler';
export { logger, Logger } from './utils/logger';
