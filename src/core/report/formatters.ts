/**
 * @fileOverview: Text and JSON renderings of an audit result
 * @module: ReportFormatters
 * @keyFunctions:
 *   - formatText(): Human-readable report
 *   - formatJson(): Machine-readable report with a summary block
 *   - formatReport(): Dispatch on the requested format
 */

import type { MissingActionViolation, UndefinedPathCall } from '../checker/routeChecker';

export type ReportFormat = 'text' | 'json';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json'];

export interface AuditReport {
  routesWithoutActions: MissingActionViolation[];
  undefinedPathMethodCalls: UndefinedPathCall[];
}

export function violationCount(report: AuditReport): number {
  return report.routesWithoutActions.length + report.undefinedPathMethodCalls.length;
}

function pluralize(count: number, singular: string, plural: string): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

export function formatText(report: AuditReport): string {
  const { routesWithoutActions, undefinedPathMethodCalls } = report;
  if (violationCount(report) === 0) {
    return 'No route drift found.\n';
  }

  const sections: string[] = [];

  if (routesWithoutActions.length > 0) {
    sections.push(
      [
        `The following ${pluralize(routesWithoutActions.length, 'route is', 'routes are')} defined, but ${
          routesWithoutActions.length === 1 ? 'has' : 'have'
        } no corresponding controller action or template:`,
        ...routesWithoutActions.map(({ controller, action }) => ` - ${controller}#${action}`),
      ].join('\n')
    );
  }

  if (undefinedPathMethodCalls.length > 0) {
    sections.push(
      [
        `The following ${pluralize(undefinedPathMethodCalls.length, 'path or url call does', 'path or url calls do')} not correspond to any route:`,
        ...undefinedPathMethodCalls.map(({ file, line, method }) => ` - ${file}:${line} - call to ${method}`),
      ].join('\n')
    );
  }

  return sections.join('\n\n') + '\n';
}

export function formatJson(report: AuditReport): string {
  return (
    JSON.stringify(
      {
        routesWithoutActions: report.routesWithoutActions,
        undefinedPathMethodCalls: report.undefinedPathMethodCalls,
        summary: {
          routesWithoutActions: report.routesWithoutActions.length,
          undefinedPathMethodCalls: report.undefinedPathMethodCalls.length,
          total: violationCount(report),
        },
      },
      null,
      2
    ) + '\n'
  );
}

export function formatReport(report: AuditReport, format: ReportFormat): string {
  return format === 'json' ? formatJson(report) : formatText(report);
}
