/**
 * @fileOverview: Parser for the routes table printed by `bin/rails routes`
 * @module: RoutesTable
 * @keyFunctions:
 *   - parseRoutesTable(): Routes and route names from the default or `--expanded` layout
 * @context: Only the application's own routes are read; sections for mounted engines
 *   (`Routes for Foo::Engine:`) and targets without `controller#action` are left out
 */

import { AppModelError } from '../../utils/errorHandler';
import type { Route } from './types';

export interface RoutesTable {
  routes: Route[];
  names: Set<string>;
}

const VERB = /^[A-Z]+(?:\|[A-Z]+)*$/;
const HEADER = /^Prefix\s+Verb\s+URI Pattern\s+Controller#Action/;
const ENGINE_SECTION = /^Routes for .+:$/;
const EXPANDED_BLOCK = /^--\[ Route \d+ \]-*$/;

function splitTarget(target: string, source?: string): { controller: string; action: string } | null {
  const hash = target.indexOf('#');
  if (hash === -1) return null;

  const controller = target.slice(0, hash);
  const action = target.slice(hash + 1);
  if (!controller || !action) {
    throw new AppModelError(`Malformed route target "${target}"`, source, { target });
  }
  return { controller, action };
}

function addRoute(
  table: RoutesTable,
  fields: { name?: string; verb?: string; path?: string; target?: string },
  source?: string
): void {
  if (fields.name) {
    table.names.add(fields.name);
  }
  if (!fields.target) return;

  const target = splitTarget(fields.target, source);
  if (!target) return;

  table.routes.push({
    ...target,
    ...(fields.name ? { name: fields.name } : {}),
    ...(fields.verb ? { verb: fields.verb } : {}),
    ...(fields.path ? { path: fields.path } : {}),
  });
}

function parseDefaultLayout(lines: string[], table: RoutesTable, source?: string): void {
  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line || HEADER.test(line)) continue;
    if (ENGINE_SECTION.test(line)) break;

    const tokens = line.split(/\s+/);
    const uriIndex = tokens.findIndex(token => token.startsWith('/'));
    if (uriIndex === -1) continue;

    const before = tokens.slice(0, uriIndex);
    const verb = before.length > 0 && VERB.test(before[before.length - 1]) ? before.pop() : undefined;
    const name = before[0];

    addRoute(table, { name, verb, path: tokens[uriIndex], target: tokens[uriIndex + 1] }, source);
  }
}

function parseExpandedLayout(lines: string[], table: RoutesTable, source?: string): void {
  let block: Record<string, string> | null = null;

  const flush = () => {
    if (!block) return;
    addRoute(
      table,
      {
        name: block['Prefix'],
        verb: block['Verb'],
        path: block['URI'],
        target: block['Controller#Action'],
      },
      source
    );
    block = null;
  };

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (ENGINE_SECTION.test(line)) break;
    if (EXPANDED_BLOCK.test(line)) {
      flush();
      block = {};
      continue;
    }
    if (!block) continue;

    const separator = line.indexOf('|');
    if (separator === -1) continue;
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (value) {
      block[key] = value;
    }
  }
  flush();
}

/**
 * Parse routes table text. `source` is only used in error messages.
 */
export function parseRoutesTable(text: string, source?: string): RoutesTable {
  const table: RoutesTable = { routes: [], names: new Set() };
  const lines = text.split(/\r?\n/);

  if (lines.some(line => EXPANDED_BLOCK.test(line.trim()))) {
    parseExpandedLayout(lines, table, source);
  } else {
    parseDefaultLayout(lines, table, source);
  }
  return table;
}
