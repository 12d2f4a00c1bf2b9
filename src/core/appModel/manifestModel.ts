/**
 * @fileOverview: Application model read from a JSON manifest exported by the application
 * @module: ManifestApplicationModel
 * @keyFunctions:
 *   - ManifestSchema: Zod schema of the manifest document
 *   - ManifestApplicationModel.fromFile(): Load and validate a manifest
 * @dependencies:
 *   - zod: Manifest validation
 * @context: A rake task in the host app can dump routes and controller reflection data; this is
 *   more precise than the source-tree model because it comes from the booted application
 */

import { z } from 'zod';
import type { FileDiscovery } from '../fileDiscovery';
import { AppModelError } from '../../utils/errorHandler';
import type { ApplicationModel, ControllerInfo, Route } from './types';

const NameList = z.array(z.string());

export const ManifestSchema = z.object({
  routes: z.array(
    z.object({
      controller: z.string().min(1),
      action: z.string().min(1),
      name: z.string().min(1).optional(),
      verb: z.string().optional(),
      path: z.string().optional(),
    })
  ),
  routeNames: NameList.optional(),
  controllers: z.record(
    z.string(),
    z.object({
      actions: NameList.default([]),
      instanceMethods: NameList.default([]),
      helpers: NameList.default([]),
      /** Templates available for implicit rendering, as `controller/action`. */
      templates: NameList.optional(),
    })
  ),
});

export type Manifest = z.infer<typeof ManifestSchema>;

export class ManifestApplicationModel implements ApplicationModel {
  private readonly routeList: Route[];
  private readonly routeNames: Set<string>;
  private readonly controllers: Map<string, ControllerInfo>;

  constructor(manifest: Manifest) {
    this.routeList = manifest.routes.map(route => ({ ...route }));
    this.routeNames = new Set(
      manifest.routeNames ??
        manifest.routes.flatMap(route => (route.name === undefined ? [] : [route.name]))
    );

    this.controllers = new Map();
    for (const [name, controller] of Object.entries(manifest.controllers)) {
      const templates = controller.templates ? new Set(controller.templates) : null;
      this.controllers.set(name, {
        actions: new Set(controller.actions),
        instanceMethods: new Set(controller.instanceMethods),
        helpers: new Set(controller.helpers),
        ...(templates && {
          lookupContext: { templateExists: (templatePath: string) => templates.has(templatePath) },
        }),
      });
    }
  }

  static fromFile(discovery: FileDiscovery, manifestPath: string): ManifestApplicationModel {
    if (!discovery.exists(manifestPath)) {
      throw new AppModelError(`Manifest not found at ${manifestPath}`, manifestPath);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(discovery.read(manifestPath));
    } catch (error) {
      throw new AppModelError(
        `Manifest ${manifestPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        manifestPath
      );
    }

    const result = ManifestSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new AppModelError(`Manifest ${manifestPath} is invalid: ${issues.join('; ')}`, manifestPath, {
        issues,
      });
    }
    return new ManifestApplicationModel(result.data);
  }

  routes(): Route[] {
    return this.routeList;
  }

  allRouteNames(): Set<string> {
    return this.routeNames;
  }

  controllerInformation(): Map<string, ControllerInfo> {
    return this.controllers;
  }
}
