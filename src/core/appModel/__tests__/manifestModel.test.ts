import { afterEach, describe, expect, test } from '@jest/globals';
import { ManifestApplicationModel, ManifestSchema } from '../manifestModel';
import { FileDiscovery } from '../../fileDiscovery';
import { AppModelError } from '../../../utils/errorHandler';
import { createTestProject, type TestProject } from '../../../__tests__/utils/testHelpers';

const MANIFEST = {
  routes: [
    { controller: 'users', action: 'index', name: 'users', verb: 'GET', path: '/users(.:format)' },
    { controller: 'users', action: 'create', verb: 'POST', path: '/users(.:format)' },
  ],
  controllers: {
    users: { actions: ['index'], instanceMethods: ['index', 'load_user'], templates: ['users/new'] },
    application: {},
  },
};

describe('ManifestApplicationModel', () => {
  let project: TestProject | undefined;

  afterEach(() => {
    project?.cleanup();
    project = undefined;
  });

  test('derives route names from named routes', () => {
    const model = new ManifestApplicationModel(ManifestSchema.parse(MANIFEST));

    expect(model.routes()).toHaveLength(2);
    expect([...model.allRouteNames()]).toEqual(['users']);
  });

  test('prefers explicit route names', () => {
    const model = new ManifestApplicationModel(
      ManifestSchema.parse({ ...MANIFEST, routeNames: ['users', 'legacy'] })
    );

    expect([...model.allRouteNames()]).toEqual(['users', 'legacy']);
  });

  test('fills missing controller members with empty sets', () => {
    const model = new ManifestApplicationModel(ManifestSchema.parse(MANIFEST));
    const application = model.controllerInformation().get('application');

    expect(application?.actions.size).toBe(0);
    expect(application?.helpers.size).toBe(0);
    expect(application?.lookupContext).toBeUndefined();
  });

  test('answers template lookups from the templates list', () => {
    const model = new ManifestApplicationModel(ManifestSchema.parse(MANIFEST));
    const lookup = model.controllerInformation().get('users')?.lookupContext;

    expect(lookup?.templateExists('users/new')).toBe(true);
    expect(lookup?.templateExists('users/edit')).toBe(false);
  });

  test('fromFile loads and validates a manifest', () => {
    project = createTestProject({ 'tmp/manifest.json': JSON.stringify(MANIFEST) });
    const model = ManifestApplicationModel.fromFile(new FileDiscovery(project.path), 'tmp/manifest.json');

    expect(model.controllerInformation().get('users')?.instanceMethods.has('load_user')).toBe(true);
  });

  test('fromFile rejects a missing file, bad JSON and a bad shape', () => {
    project = createTestProject({
      'broken.json': '{ routes: ',
      'wrong.json': JSON.stringify({ routes: [{ controller: 'users' }], controllers: {} }),
    });
    const discovery = new FileDiscovery(project.path);

    expect(() => ManifestApplicationModel.fromFile(discovery, 'missing.json')).toThrow(
      'Manifest not found at missing.json'
    );
    expect(() => ManifestApplicationModel.fromFile(discovery, 'broken.json')).toThrow(AppModelError);
    expect(() => ManifestApplicationModel.fromFile(discovery, 'wrong.json')).toThrow(
      /^Manifest wrong\.json is invalid: routes\.0\.action: /
    );
  });
});
