#!/usr/bin/env node

/**
 * rails-route-audit CLI
 *
 * Audits a Rails project for routes without actions and for path/url helper calls that match
 * no route. Exit codes: 0 clean, 1 findings, 2 fatal error.
 */

import * as fs from 'fs';
import * as path from 'path';
import { runAudit } from './core/runner';
import { REPORT_FORMATS, type ReportFormat } from './core/report/formatters';
import { ErrorHandler } from './utils/errorHandler';

export interface CliOptions {
  projectPath: string;
  configPath?: string;
  routesFile?: string;
  manifest?: string;
  format: ReportFormat;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const VALUE_FLAGS = ['--project-path', '--config', '--routes-file', '--manifest', '--format'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some(flag => flag === arg);
}

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some(format => format === value);
}

export function parseCliArgs(args: string[], cwd: string = process.cwd()): CliOptions {
  const options: CliOptions = {
    projectPath: process.env.WORKSPACE_FOLDER || cwd,
    format: 'text',
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--version' || arg === '-v') {
      options.version = true;
    } else if (isValueFlag(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError(`${arg} requires a value`);
      }
      i++;
      switch (arg) {
        case '--project-path':
          options.projectPath = path.resolve(cwd, value);
          break;
        case '--config':
          options.configPath = value;
          break;
        case '--routes-file':
          options.routesFile = value;
          break;
        case '--manifest':
          options.manifest = value;
          break;
        case '--format':
          if (!isReportFormat(value)) {
            throw new CliUsageError(`Unknown format "${value}". Use one of: ${REPORT_FORMATS.join(', ')}`);
          }
          options.format = value;
          break;
      }
    } else {
      throw new CliUsageError(`Unrecognized argument "${arg}". Use --help for usage information.`);
    }
  }

  return options;
}

function showHelp(): void {
  console.log('rails-route-audit');
  console.log('=================');
  console.log('');
  console.log('Finds routes whose controller action is missing and *_path / *_url calls that match no route.');
  console.log('');
  console.log('Usage:');
  console.log('  rails-route-audit [options]');
  console.log('');
  console.log('Options:');
  console.log('  --project-path DIR   Rails project root (default: current directory)');
  console.log('  --config FILE        Configuration file (default: .route-audit.yml)');
  console.log('  --routes-file FILE   Output of `bin/rails routes` (default: tmp/routes.txt)');
  console.log('  --manifest FILE      JSON application manifest; replaces the routes file');
  console.log('  --format FORMAT      text | json (default: text)');
  console.log('  -h, --help           Show this help');
  console.log('  -v, --version        Show the version');
  console.log('');
  console.log('Environment:');
  console.log('  LOG_LEVEL              debug | info | warn | error (default: info)');
  console.log('  ROUTE_AUDIT_LOG_FILE   Also append JSON log lines to this file');
}

function readVersion(): string {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    console.error('Could not read package.json:', error instanceof Error ? error.message : String(error));
  }
  return 'unknown';
}

/**
 * Run the CLI and return its exit code.
 */
export function main(args: string[]): number {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    showHelp();
    return 0;
  }
  if (options.version) {
    console.log(readVersion());
    return 0;
  }

  try {
    const result = runAudit({
      projectPath: options.projectPath,
      configPath: options.configPath,
      routesFile: options.routesFile,
      manifest: options.manifest,
      format: options.format,
    });
    process.stdout.write(result.output);
    return result.exitCode;
  } catch (error) {
    const auditError = ErrorHandler.handleError(
      error,
      { projectPath: options.projectPath },
      { rethrow: false, includeStack: process.env.LOG_LEVEL === 'debug' }
    );
    console.error(`${auditError.message}`);
    console.error(ErrorHandler.getUserFriendlyMessage(auditError));
    return 2;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
