/**
 * @fileOverview: Maps a view or controller file to the controller that owns it
 * @module: ControllerResolver
 * @keyFunctions:
 *   - controllerNameFromViewFile(): Walk the view's directory from most to least specific
 *   - controllerNameFromSourceFile(): Take the name from an `app/controllers/*_controller.rb` path
 *   - controllerFromViewFile() / controllerFromSourceFile(): Same, returning the controller's info
 * @context: Resolution depends only on the path and which controller files exist. A name that
 *   resolves to an ignored controller has no info, and callers skip the file
 */

import { APP_ROOT_SEGMENT, BASE_CONTROLLER } from '../conventions';
import type { ControllerInfo } from '../appModel/types';
import type { RunContext } from './runContext';

export type ControllerExists = (name: string | undefined) => boolean;

export interface ResolvedController {
  name: string;
  info: ControllerInfo;
}

const CONTROLLER_SOURCE = /app\/controllers\/(.*)_controller\.rb/;

/**
 * `app/views/admin/users/index.html.erb` tries `admin/users`, then `admin`, then `application`.
 */
export function controllerNameFromViewFile(filename: string, exists: ControllerExists): string {
  const segments = filename.split('/');
  const appIndex = segments.indexOf(APP_ROOT_SEGMENT);
  let candidate = appIndex === -1 ? [] : segments.slice(appIndex + 2, -1);

  while (candidate.length > 0) {
    const name = candidate.join('/');
    if (exists(name)) return name;
    candidate = candidate.slice(0, -1);
  }
  return BASE_CONTROLLER;
}

export function controllerNameFromSourceFile(filename: string, exists: ControllerExists): string {
  const name = CONTROLLER_SOURCE.exec(filename)?.[1];
  return exists(name) && name !== undefined ? name : BASE_CONTROLLER;
}

function withInfo(context: RunContext, name: string): ResolvedController | undefined {
  const info = context.controllerInformation().get(name);
  return info ? { name, info } : undefined;
}

export function controllerFromViewFile(
  context: RunContext,
  filename: string
): ResolvedController | undefined {
  return withInfo(context, controllerNameFromViewFile(filename, name => context.controllerExists(name)));
}

export function controllerFromSourceFile(
  context: RunContext,
  filename: string
): ResolvedController | undefined {
  return withInfo(context, controllerNameFromSourceFile(filename, name => context.controllerExists(name)));
}
