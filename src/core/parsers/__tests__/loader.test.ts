import { describe, expect, test } from '@jest/globals';
import { ParserLoader } from '../loader';
import { ErbParser, HamlParser, RubyParser, createDefaultParserFactories } from '../adapters';
import { RouteHelperScanner } from '../rubyScanner';
import { createErbSyntaxParser, createRubySyntaxParser } from '../treeSitter';
import type { ParserFactory } from '../types';
import { ErrorCode, ParserUnavailableError } from '../../../utils/errorHandler';

const SOURCES: Record<string, string> = {
  'app/views/users/index.html.erb': '<%= link_to "Users", users_path %>\n<%= stale_path %>',
  'app/views/users/show.html.haml': '%p= profile_url',
  'app/controllers/users_controller.rb': 'def index\n  redirect_to root_url\nend',
};

function read(filename: string): string {
  return SOURCES[filename] ?? '';
}

describe('parser adapters', () => {
  const scanner = new RouteHelperScanner(createRubySyntaxParser());

  test('ErbParser reports only what the filter keeps', () => {
    const parser = new ErbParser(read, scanner, createErbSyntaxParser());
    const found = parser.run('app/views/users/index.html.erb', method => method !== 'users_path');
    expect(found).toEqual([{ method: 'stale_path', line: 2 }]);
  });

  test('HamlParser scans script lines', () => {
    expect(new HamlParser(read, scanner).run('app/views/users/show.html.haml', () => true)).toEqual([
      { method: 'profile_url', line: 1 },
    ]);
  });

  test('RubyParser scans controller source as is', () => {
    expect(new RubyParser(read, scanner).run('app/controllers/users_controller.rb', () => true)).toEqual([
      { method: 'root_url', line: 2 },
    ]);
  });

  test('default factories load the grammars into working adapters', () => {
    const adapters = createDefaultParserFactories(read).map(factory => factory.load());

    expect(adapters.map(adapter => adapter.dialect)).toEqual(['erb', 'haml', 'ruby']);
    expect(adapters[1].run('app/views/users/show.html.haml', () => true)).toEqual([
      { method: 'profile_url', line: 1 },
    ]);
  });

  test('default factories mark only haml as optional', () => {
    const factories = createDefaultParserFactories(read);
    expect(factories.map(factory => [factory.dialect, factory.optional])).toEqual([
      ['erb', false],
      ['haml', true],
      ['ruby', false],
    ]);
  });
});

describe('ParserLoader', () => {
  function failingHaml(counter: { loads: number }): ParserFactory {
    return {
      dialect: 'haml',
      optional: true,
      load: () => {
        counter.loads++;
        throw new Error('haml support missing');
      },
    };
  }

  test('reports not-applicable without loading when there are no files', () => {
    const counter = { loads: 0 };
    const loader = new ParserLoader([failingHaml(counter)]);

    expect(loader.availability('haml', 0)).toBe('not-applicable');
    expect(counter.loads).toBe(0);
  });

  test('probes a failing dialect once', () => {
    const counter = { loads: 0 };
    const loader = new ParserLoader([failingHaml(counter)]);

    expect(loader.availability('haml', 2)).toBe('unavailable');
    expect(loader.probe('haml')).toBe(false);
    expect(counter.loads).toBe(1);
    expect(loader.isOptional('haml')).toBe(true);
  });

  test('load throws ParserUnavailableError for a dialect that failed', () => {
    const loader = new ParserLoader([failingHaml({ loads: 0 })]);

    expect(() => loader.load('haml')).toThrow(ParserUnavailableError);
    try {
      loader.load('haml');
    } catch (error) {
      expect(error).toBeInstanceOf(ParserUnavailableError);
      if (error instanceof ParserUnavailableError) {
        expect(error.code).toBe(ErrorCode.PARSER_UNAVAILABLE);
        expect(error.details).toEqual({ dialect: 'haml', cause: 'haml support missing' });
      }
    }
  });

  test('an unregistered dialect is unavailable and required', () => {
    const loader = new ParserLoader(createDefaultParserFactories(read).filter(f => f.dialect !== 'ruby'));

    expect(loader.availability('ruby', 1)).toBe('unavailable');
    expect(loader.isOptional('ruby')).toBe(false);
    expect(loader.availability('erb', 1)).toBe('available');
    expect(loader.load('erb')).toBeInstanceOf(ErbParser);
  });
});
