import { describe, expect, test } from '@jest/globals';
import { RouteHelperScanner } from '../rubyScanner';
import { createRubySyntaxParser } from '../treeSitter';

const scanner = new RouteHelperScanner(createRubySyntaxParser());

function scan(source: string) {
  return scanner.scan(source);
}

function methods(source: string): string[] {
  return scan(source).map(invocation => invocation.method);
}

describe('RouteHelperScanner.scan', () => {
  test('reports a bare helper call with its line', () => {
    expect(scan("link_to 'Users', users_path")).toEqual([
      { method: 'users_path', line: 1 },
    ]);
  });

  test('ignores calls with an explicit receiver', () => {
    const source = ['@user.profile_path', 'Helpers::admin_path', 'obj&.edit_url'].join('\n');
    expect(scan(source)).toEqual([]);
  });

  test('ignores symbols, hash labels, strings and comments', () => {
    const source = [
      'redirect_to :back_path',
      'options = { home_path: 1 }',
      'msg = "see users_path"',
      '# root_path in comment',
      "x = 'new_user_url'",
    ].join('\n');
    expect(scan(source)).toEqual([]);
  });

  test('finds calls inside string interpolation', () => {
    const source = ['title = "Go to #{root_path}"', 'link = "x"', 'url = %Q(#{new_user_url})'].join('\n');
    expect(scan(source)).toEqual([
      { method: 'root_path', line: 1 },
      { method: 'new_user_url', line: 3 },
    ]);
  });

  test('does not report method parameters and local variables', () => {
    const source = [
      'def show(back_path, next_url: nil)',
      '  back_path',
      '  next_url',
      '  fallback_path = root_path',
      '  fallback_path',
      'end',
    ].join('\n');
    expect(scan(source)).toEqual([{ method: 'root_path', line: 4 }]);
  });

  test('does not report method definitions or heredoc bodies', () => {
    const source = [
      'def admin_path',
      '  <<~SQL',
      '    select users_path',
      '  SQL',
      'end',
      'help_url',
    ].join('\n');
    expect(scan(source)).toEqual([{ method: 'help_url', line: 6 }]);
  });

  test('treats block parameters as locals and skips =begin comments', () => {
    const source = [
      'items.each do |item_path|',
      '  item_path',
      'end',
      '=begin',
      'orders_path',
      '=end',
      'dashboard_path',
    ].join('\n');
    expect(scan(source)).toEqual([{ method: 'dashboard_path', line: 7 }]);
  });

  test('skips word arrays and regexp literals but not the modulo operator', () => {
    const source = [
      'names = %w[users_path admins_path]',
      'total = count % 2',
      'matcher = /edit_user_path/',
      'logout_path',
    ].join('\n');
    expect(scan(source)).toEqual([{ method: 'logout_path', line: 4 }]);
  });

  test('keeps duplicate calls', () => {
    expect(methods('root_path\nroot_path')).toEqual(['root_path', 'root_path']);
  });

  test('reports helpers used as arguments and in ternaries', () => {
    expect(methods('redirect_to(admin? ? admin_root_path : root_path)')).toEqual([
      'admin_root_path',
      'root_path',
    ]);
  });

  test('ignores names that merely contain path', () => {
    expect(methods('pathname = filepath\nurl_for(path)')).toEqual([]);
  });

  test('a local in one method does not hide the same call in another', () => {
    const source = [
      'def edit',
      '  back_path = params[:back]',
      '  redirect_to back_path',
      'end',
      '',
      'def update',
      '  redirect_to back_path',
      'end',
    ].join('\n');
    expect(scan(source)).toEqual([{ method: 'back_path', line: 7 }]);
  });

  test('block locals stay inside the block but see the enclosing locals', () => {
    const source = [
      'target_path = root_path',
      'items.each do |item|',
      '  next_path = target_path',
      '  next_path',
      'end',
      'next_path',
    ].join('\n');
    expect(scan(source)).toEqual([
      { method: 'root_path', line: 1 },
      { method: 'next_path', line: 6 },
    ]);
  });

  test('a call with arguments is reported even when a local shares its name', () => {
    expect(methods('user_path = 1\nuser_path(2)')).toEqual(['user_path']);
  });

  test('does not read a heredoc passed to a command call as code', () => {
    const source = ['logger.info <<~TXT', '  see old_thing_path', 'TXT', 'redirect_to real_path'].join('\n');
    expect(scan(source)).toEqual([{ method: 'real_path', line: 4 }]);
  });

  test('reports calls interpolated inside a heredoc', () => {
    const source = ['puts <<~TXT', '  Visit #{account_url}', 'TXT'].join('\n');
    expect(scan(source)).toEqual([{ method: 'account_url', line: 2 }]);
  });
});

describe('RouteHelperScanner.scanSegments', () => {
  test('maps lines back to the segment rows', () => {
    const found = scanner.scanSegments([
      { code: ' # note ', row: 0 },
      { code: ' link_to "x", ghost_path ', row: 0 },
      { code: 'if admin?\n  admin_url', row: 3 },
      { code: 'end', row: 5 },
    ]);
    expect(found).toEqual([
      { method: 'ghost_path', line: 1 },
      { method: 'admin_url', line: 5 },
    ]);
  });
});
