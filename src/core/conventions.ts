/**
 * @fileOverview: Rails directory and naming conventions shared by the model, parsers and checker
 * @module: Conventions
 */

export const APP_ROOT_SEGMENT = 'app';
export const CONTROLLERS_DIR = 'app/controllers';
export const HELPERS_DIR = 'app/helpers';
export const VIEWS_DIR = 'app/views';
export const CONCERNS_DIR = 'app/controllers/concerns';
export const CONTROLLER_SUFFIX = '_controller';
export const SOURCE_EXT = '.rb';

/** Controller every view or controller file falls back to. */
export const BASE_CONTROLLER = 'application';

/**
 * Route-helper-shaped methods Rails itself provides to views and controllers.
 */
export const FRAMEWORK_PATH_HELPERS: readonly string[] = [
  'asset_path',
  'asset_url',
  'audio_path',
  'audio_url',
  'font_path',
  'font_url',
  'image_path',
  'image_url',
  'javascript_path',
  'javascript_url',
  'stylesheet_path',
  'stylesheet_url',
  'video_path',
  'video_url',
  'polymorphic_path',
  'polymorphic_url',
  'edit_polymorphic_path',
  'edit_polymorphic_url',
  'new_polymorphic_path',
  'new_polymorphic_url',
  'rails_blob_path',
  'rails_blob_url',
  'rails_representation_path',
  'rails_representation_url',
];

const ROUTE_HELPER_SUFFIX = /_(?:url|path)$/;

/**
 * Strip a trailing `_path`/`_url`: `edit_user_path` -> `edit_user`.
 */
export function possibleRouteName(pathOrUrl: string): string {
  return pathOrUrl.replace(ROUTE_HELPER_SUFFIX, '');
}

export function isRouteHelperName(name: string): boolean {
  return ROUTE_HELPER_SUFFIX.test(name);
}

/**
 * Location of a controller's source file relative to the project root.
 */
export function controllerFilePath(controllerName: string): string {
  return `${CONTROLLERS_DIR}/${controllerName}${CONTROLLER_SUFFIX}${SOURCE_EXT}`;
}

/**
 * `Admin::UsersController` -> `admin/users`; returns undefined for non-controller constants.
 */
export function controllerNameFromConstant(constant: string): string | undefined {
  const match = constant.replace(/^::/, '').match(/^(.*)Controller$/);
  if (!match || !match[1]) return undefined;
  return match[1]
    .split('::')
    .map(underscore)
    .join('/');
}

/**
 * `UserSessions` -> `user_sessions`, `HTTPAuth` -> `http_auth`.
 */
export function underscore(word: string): string {
  return word
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .toLowerCase();
}
