import { describe, expect, jest, test } from '@jest/globals';

jest.mock('tree-sitter-ruby', () => {
  throw new Error('native build missing');
});

import { ParserLoader } from '../loader';
import { createDefaultParserFactories } from '../adapters';
import { ParserUnavailableError } from '../../../utils/errorHandler';

describe('default parsers without the Ruby grammar', () => {
  test('haml is unavailable but optional', () => {
    const loader = new ParserLoader(createDefaultParserFactories(() => ''));

    expect(loader.availability('haml', 1)).toBe('unavailable');
    expect(loader.isOptional('haml')).toBe(true);
  });

  test('ruby fails to load with the module named in the cause', () => {
    const loader = new ParserLoader(createDefaultParserFactories(() => ''));

    let thrown: unknown;
    try {
      loader.load('ruby');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ParserUnavailableError);
    if (thrown instanceof ParserUnavailableError) {
      expect(thrown.details).toEqual({
        dialect: 'ruby',
        cause: 'tree-sitter-ruby could not be loaded: native build missing',
      });
    }
  });
});
