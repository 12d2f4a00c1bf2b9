import { afterEach, describe, expect, test } from '@jest/globals';
import { runAudit } from '../runner';
import { AppModelError } from '../../utils/errorHandler';
import { createTestProject, type TestProject } from '../../__tests__/utils/testHelpers';

const PROJECT: Record<string, string> = {
  'tmp/routes.txt': [
    'Prefix Verb URI Pattern Controller#Action',
    '  root GET  /          home#index',
    ' about GET  /about(.:format) home#about',
  ].join('\n'),
  'app/controllers/application_controller.rb': 'class ApplicationController < ActionController::Base\nend\n',
  'app/controllers/home_controller.rb': [
    'class HomeController < ApplicationController',
    '  def index',
    '  end',
    'end',
  ].join('\n'),
  'app/views/home/index.html.erb': [
    "<%= link_to 'About', about_path %>",
    "<%= link_to 'Contact', contact_path %>",
  ].join('\n'),
};

describe('runAudit', () => {
  let project: TestProject | undefined;

  afterEach(() => {
    project?.cleanup();
    project = undefined;
  });

  test('reports drift and exits with 1', () => {
    project = createTestProject(PROJECT);
    const result = runAudit({ projectPath: project.path });

    expect(result.report).toEqual({
      routesWithoutActions: [{ controller: 'home', action: 'about' }],
      undefinedPathMethodCalls: [{ file: 'app/views/home/index.html.erb', method: 'contact_path', line: 2 }],
    });
    expect(result.exitCode).toBe(1);
    expect(result.output).toBe(
      [
        'The following 1 route is defined, but has no corresponding controller action or template:',
        ' - home#about',
        '',
        'The following 1 path or url call does not correspond to any route:',
        ' - app/views/home/index.html.erb:2 - call to contact_path',
        '',
      ].join('\n')
    );
  });

  test('applies the configuration file and exits with 0 when clean', () => {
    project = createTestProject({
      ...PROJECT,
      '.route-audit.yml': 'ignored_paths:\n  - contact\n',
      'app/views/home/about.html.erb': '<h1>About</h1>\n',
    });
    const result = runAudit({ projectPath: project.path });

    expect(result.exitCode).toBe(0);
    expect(result.output).toBe('No route drift found.\n');
  });

  test('renders JSON on request', () => {
    project = createTestProject(PROJECT);
    const result = runAudit({ projectPath: project.path, format: 'json' });
    const parsed: unknown = JSON.parse(result.output);

    expect(parsed).toMatchObject({ summary: { routesWithoutActions: 1, undefinedPathMethodCalls: 1, total: 2 } });
  });

  test('uses a manifest instead of the routes table when given', () => {
    project = createTestProject({
      'app/views/home/index.html.erb': "<%= link_to 'Contact', contact_path %>",
      'manifest.json': JSON.stringify({
        routes: [{ controller: 'home', action: 'index', name: 'root' }],
        routeNames: ['root', 'contact'],
        controllers: { home: { actions: ['index'] }, application: {} },
      }),
    });
    const result = runAudit({ projectPath: project.path, manifest: 'manifest.json' });

    expect(result.exitCode).toBe(0);
  });

  test('the routes file option overrides the configuration', () => {
    project = createTestProject(PROJECT);

    expect(() => runAudit({ projectPath: project?.path ?? '', routesFile: 'tmp/other.txt' })).toThrow(
      AppModelError
    );
  });
});
