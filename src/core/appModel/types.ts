export interface Route {
  controller: string;
  action: string;
  /** Named route prefix, e.g. `edit_user`. */
  name?: string;
  verb?: string;
  path?: string;
}

export interface LookupContext {
  /** `path` is `controller/action`, e.g. `admin/users/index`. */
  templateExists(path: string): boolean;
}

export interface ControllerInfo {
  actions: ReadonlySet<string>;
  instanceMethods: ReadonlySet<string>;
  helpers: ReadonlySet<string>;
  lookupContext?: LookupContext;
}

export interface ApplicationModel {
  routes(): Route[];
  controllerInformation(): Map<string, ControllerInfo>;
  allRouteNames(): Set<string>;
}
