/**
 * @fileOverview: Decides whether one helper call found in a file is a violation
 * @module: InvocationFilter
 * @keyFunctions:
 *   - isWhitelisted(): Global ignore list and per-file whitelist
 *   - isDefinedRouteOrMember(): Known route name, or a helper/method of the owning controller
 *   - buildInvocationFilter(): Predicate handed to a parser adapter for one file
 * @context: Route names and ignore lists are matched without the `_path`/`_url` suffix; controller
 *   helpers and methods keep it, since that is how they are defined
 */

import type { CheckerOptions } from '../config';
import { possibleRouteName } from '../conventions';
import type { ControllerInfo } from '../appModel/types';
import type { InvocationFilter } from '../parsers/types';

/** Views see controller helpers; controllers see their own instance methods. */
export type MemberKind = 'helpers' | 'instanceMethods';

export interface InvocationFilterInput {
  filename: string;
  controller: ControllerInfo;
  members: MemberKind;
  routeNames: ReadonlySet<string>;
  options: CheckerOptions;
}

export function isWhitelisted(options: CheckerOptions, filename: string, pathOrUrl: string): boolean {
  const routeName = possibleRouteName(pathOrUrl);
  if (options.ignoredPaths.has(routeName)) return true;

  const whitelist = options.ignoredPathWhitelist.get(filename);
  return whitelist !== undefined && (whitelist.has(pathOrUrl) || whitelist.has(routeName));
}

export function isDefinedRouteOrMember(
  routeNames: ReadonlySet<string>,
  controller: ControllerInfo,
  members: MemberKind,
  pathOrUrl: string
): boolean {
  if (routeNames.has(possibleRouteName(pathOrUrl))) return true;
  return controller[members].has(pathOrUrl);
}

export function buildInvocationFilter(input: InvocationFilterInput): InvocationFilter {
  const { filename, controller, members, routeNames, options } = input;

  return pathOrUrl => {
    if (isWhitelisted(options, filename, pathOrUrl)) return false;
    if (isDefinedRouteOrMember(routeNames, controller, members, pathOrUrl)) return false;
    return true;
  };
}
