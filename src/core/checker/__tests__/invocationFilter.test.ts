import { describe, expect, test } from '@jest/globals';
import { buildInvocationFilter, isDefinedRouteOrMember, isWhitelisted } from '../invocationFilter';
import { createCheckerOptions } from '../../config';
import { controllerInfo } from '../../../__tests__/utils/testHelpers';

const options = createCheckerOptions({
  ignoredPaths: ['legacy'],
  ignoredPathWhitelist: {
    'app/views/users/index.html.erb': ['beta_path', 'preview'],
  },
});

describe('isWhitelisted', () => {
  test('ignored paths match without the suffix in every file', () => {
    expect(isWhitelisted(options, 'app/views/any.html.erb', 'legacy_path')).toBe(true);
    expect(isWhitelisted(options, 'app/views/any.html.erb', 'legacy_url')).toBe(true);
  });

  test('the per-file whitelist accepts the call as written or its route name', () => {
    const file = 'app/views/users/index.html.erb';

    expect(isWhitelisted(options, file, 'beta_path')).toBe(true);
    expect(isWhitelisted(options, file, 'beta_url')).toBe(false);
    expect(isWhitelisted(options, file, 'preview_url')).toBe(true);
  });

  test('the whitelist applies only to its own file', () => {
    expect(isWhitelisted(options, 'app/views/users/show.html.erb', 'beta_path')).toBe(false);
  });
});

describe('isDefinedRouteOrMember', () => {
  const controller = controllerInfo({ helpers: ['avatar_url'], instanceMethods: ['back_path'] });
  const routeNames = new Set(['user']);

  test('matches route names without the suffix', () => {
    expect(isDefinedRouteOrMember(routeNames, controller, 'helpers', 'user_path')).toBe(true);
    expect(isDefinedRouteOrMember(routeNames, controller, 'helpers', 'user_url')).toBe(true);
  });

  test('matches members by their full name of the requested kind', () => {
    expect(isDefinedRouteOrMember(routeNames, controller, 'helpers', 'avatar_url')).toBe(true);
    expect(isDefinedRouteOrMember(routeNames, controller, 'helpers', 'back_path')).toBe(false);
    expect(isDefinedRouteOrMember(routeNames, controller, 'instanceMethods', 'back_path')).toBe(true);
  });
});

describe('buildInvocationFilter', () => {
  test('keeps only calls that are neither whitelisted nor defined', () => {
    const filter = buildInvocationFilter({
      filename: 'app/views/users/index.html.erb',
      controller: controllerInfo({ helpers: ['avatar_url'] }),
      members: 'helpers',
      routeNames: new Set(['user']),
      options,
    });

    expect(['user_path', 'avatar_url', 'legacy_path', 'beta_path', 'ghost_path'].filter(filter)).toEqual([
      'ghost_path',
    ]);
  });
});
