import { describe, expect, test } from '@jest/globals';
import { summarizeRubySource } from '../rubySource';
import { createRubySyntaxParser } from '../../parsers/treeSitter';

const parser = createRubySyntaxParser();

describe('summarizeRubySource', () => {
  const controller = [
    'module Admin',
    '  class UsersController < BaseController',
    '    include Auditable',
    '    helper_method :current_admin, :admin_root_path',
    '    attr_reader :scope',
    '',
    '    def index; end',
    '',
    '    def show',
    '    end',
    '',
    '    private def secret; end',
    '',
    '    protected',
    '',
    '    def helper_thing',
    '    end',
    '',
    '    private',
    '',
    '    def load_user',
    '    end',
    '',
    '    public',
    '',
    '    def export',
    '    end',
    '',
    '    def self.policy',
    '    end',
    '',
    '    class << self',
    '      def finder',
    '      end',
    '    end',
    '  end',
    'end',
  ].join('\n');

  test('reads class name, superclass and namespace', () => {
    const summary = summarizeRubySource(controller, parser);

    expect(summary.className).toBe('Admin::UsersController');
    expect(summary.superclass).toBe('BaseController');
    expect(summary.namespace).toEqual(['Admin']);
  });

  test('tracks method visibility and skips class methods', () => {
    expect(summarizeRubySource(controller, parser).methods).toEqual([
      { name: 'scope', visibility: 'public' },
      { name: 'index', visibility: 'public' },
      { name: 'show', visibility: 'public' },
      { name: 'secret', visibility: 'private' },
      { name: 'helper_thing', visibility: 'protected' },
      { name: 'load_user', visibility: 'private' },
      { name: 'export', visibility: 'public' },
    ]);
  });

  test('collects helper_method declarations and includes', () => {
    const summary = summarizeRubySource(controller, parser);

    expect(summary.helperMethods).toEqual(['current_admin', 'admin_root_path']);
    expect(summary.includes).toEqual(['Auditable']);
  });

  test('applies visibility given after the definition', () => {
    const source = [
      'class PagesController < ApplicationController',
      '  def home; end',
      '  def about; end',
      '  private :about',
      'end',
    ].join('\n');

    expect(summarizeRubySource(source, parser).methods).toEqual([
      { name: 'home', visibility: 'public' },
      { name: 'about', visibility: 'private' },
    ]);
  });

  test('reads plain modules such as helpers', () => {
    const summary = summarizeRubySource('module UsersHelper\n  def avatar_url(user)\n  end\nend', parser);

    expect(summary.className).toBeUndefined();
    expect(summary.methods).toEqual([{ name: 'avatar_url', visibility: 'public' }]);
  });

  test('ignores methods defined in concern blocks and class methods', () => {
    const source = [
      'module Auditable',
      '  extend ActiveSupport::Concern',
      '',
      '  included do',
      '    def generated; end',
      '  end',
      '',
      '  class_methods do',
      '    def audited_by; end',
      '  end',
      '',
      '  def audit_trail; end',
      '',
      '  private',
      '',
      '  def audit_log; end',
      'end',
    ].join('\n');

    expect(summarizeRubySource(source, parser).methods).toEqual([
      { name: 'audit_trail', visibility: 'public' },
      { name: 'audit_log', visibility: 'private' },
    ]);
  });

  test('reads a class nested with a compact module path', () => {
    const summary = summarizeRubySource(
      'module Admin::Reports\n  class ExportsController < ::ApplicationController\n  end\nend',
      parser
    );

    expect(summary.className).toBe('Admin::Reports::ExportsController');
    expect(summary.namespace).toEqual(['Admin', 'Reports']);
    expect(summary.superclass).toBe('::ApplicationController');
  });
});
