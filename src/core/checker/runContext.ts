/**
 * @fileOverview: Per-run state shared by every resolution and filter of one audit
 * @module: RunContext
 * @keyFunctions:
 *   - routes() / allRouteNames(): Memoized reads of the application model
 *   - controllerInformation(): Controller map with ignored controllers removed
 *   - controllerExists(): On-disk existence of a controller's source file
 * @context: One instance per RouteChecker; nothing here outlives the checker that created it
 */

import type { CheckerOptions } from '../config';
import { controllerFilePath } from '../conventions';
import type { FileDiscovery } from '../fileDiscovery';
import type { ApplicationModel, ControllerInfo, Route } from '../appModel/types';

export class RunContext {
  private routeList: Route[] | null = null;
  private routeNames: Set<string> | null = null;
  private controllers: Map<string, ControllerInfo> | null = null;
  private readonly existence = new Map<string, boolean>();

  constructor(
    readonly appModel: ApplicationModel,
    readonly options: CheckerOptions,
    readonly discovery: FileDiscovery
  ) {}

  routes(): Route[] {
    if (!this.routeList) {
      this.routeList = this.appModel.routes();
    }
    return this.routeList;
  }

  allRouteNames(): Set<string> {
    if (!this.routeNames) {
      this.routeNames = this.appModel.allRouteNames();
    }
    return this.routeNames;
  }

  controllerInformation(): Map<string, ControllerInfo> {
    if (!this.controllers) {
      const { ignoredControllers } = this.options;
      this.controllers = new Map(
        [...this.appModel.controllerInformation()].filter(([name]) => !ignoredControllers.has(name))
      );
    }
    return this.controllers;
  }

  isIgnoredController(name: string): boolean {
    return this.options.ignoredControllers.has(name);
  }

  /**
   * Reads the disk, not the controller map, so ignored controllers still exist here.
   */
  controllerExists(name: string | undefined): boolean {
    if (!name) return false;

    const cached = this.existence.get(name);
    if (cached !== undefined) return cached;

    const exists = this.discovery.exists(controllerFilePath(name));
    this.existence.set(name, exists);
    return exists;
  }
}
