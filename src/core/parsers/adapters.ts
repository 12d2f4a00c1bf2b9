/**
 * @fileOverview: Parser adapters for ERB views, Haml views and Ruby controllers
 * @module: ParserAdapters
 * @keyFunctions:
 *   - ErbParser / HamlParser / RubyParser: run(filename, filter) over one file
 *   - createDefaultParserFactories(): Factories for the loader, bound to a source reader
 * @dependencies:
 *   - treeSitter: Ruby and ERB grammars, loaded when a factory is probed
 * @context: Adapters only report what the filter accepts; deciding what counts as a violation is
 *   the checker's job
 */

import { RouteHelperScanner } from './rubyScanner';
import { extractErbSegments, extractHamlSegments } from './templateSource';
import { createErbSyntaxParser, createRubySyntaxParser, type SyntaxParser } from './treeSitter';
import type {
  Dialect,
  HelperInvocation,
  InvocationFilter,
  ParserAdapter,
  ParserFactory,
} from './types';

/** Reads a project-relative file. */
export type SourceReader = (filename: string) => string;

abstract class RubyBackedParser implements ParserAdapter {
  abstract readonly dialect: Dialect;

  constructor(
    private readonly read: SourceReader,
    protected readonly scanner: RouteHelperScanner
  ) {}

  protected abstract scan(source: string): HelperInvocation[];

  run(filename: string, filter: InvocationFilter): HelperInvocation[] {
    return this.scan(this.read(filename)).filter(invocation => filter(invocation.method));
  }
}

export class ErbParser extends RubyBackedParser {
  readonly dialect = 'erb' as const;

  constructor(
    read: SourceReader,
    scanner: RouteHelperScanner,
    private readonly templateParser: SyntaxParser
  ) {
    super(read, scanner);
  }

  protected scan(source: string): HelperInvocation[] {
    return this.scanner.scanSegments(extractErbSegments(this.templateParser, source));
  }
}

export class HamlParser extends RubyBackedParser {
  readonly dialect = 'haml' as const;

  protected scan(source: string): HelperInvocation[] {
    return this.scanner.scanSegments(extractHamlSegments(source));
  }
}

export class RubyParser extends RubyBackedParser {
  readonly dialect = 'ruby' as const;

  protected scan(source: string): HelperInvocation[] {
    return this.scanner.scan(source);
  }
}

/**
 * Grammars are loaded inside `load()`, so a dialect whose native module is missing fails its probe
 * instead of the whole process.
 */
export function createDefaultParserFactories(read: SourceReader): ParserFactory[] {
  const rubyScanner = () => new RouteHelperScanner(createRubySyntaxParser());
  return [
    {
      dialect: 'erb',
      optional: false,
      load: () => new ErbParser(read, rubyScanner(), createErbSyntaxParser()),
    },
    { dialect: 'haml', optional: true, load: () => new HamlParser(read, rubyScanner()) },
    { dialect: 'ruby', optional: false, load: () => new RubyParser(read, rubyScanner()) },
  ];
}
