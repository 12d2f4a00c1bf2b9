/**
 * @fileOverview: Pulls the embedded Ruby out of ERB and Haml templates as code segments
 * @module: TemplateSource
 * @keyFunctions:
 *   - extractErbSegments(): Code of every `<% %>` and `<%= %>` tag, from the ERB syntax tree
 *   - extractHamlSegments(): Ruby from script lines, attribute hashes and interpolation, with the
 *     `end`s Haml infers from indentation
 *   - joinSegments(): One Ruby program from the segments plus a line map back to the template
 * @dependencies:
 *   - tree-sitter-embedded-template: ERB syntax tree
 * @context: Each segment becomes its own statement, so a comment in one tag cannot reach into the
 *   next one on the same template line
 */

import type { SyntaxNode, SyntaxParser } from './treeSitter';

export interface CodeSegment {
  code: string;
  /** 0-based template row the code starts on. */
  row: number;
}

export interface JoinedSegments {
  source: string;
  /** 1-based template line for each line of `source`. */
  lines: number[];
}

export function joinSegments(segments: CodeSegment[]): JoinedSegments {
  const lines: number[] = [];
  for (const segment of segments) {
    segment.code.split('\n').forEach((_, offset) => lines.push(segment.row + offset + 1));
  }
  return { source: segments.map(segment => segment.code).join('\n'), lines };
}

const ERB_CODE_TAGS = new Set(['directive', 'output_directive']);

export function extractErbSegments(parser: SyntaxParser, template: string): CodeSegment[] {
  const segments: CodeSegment[] = [];
  const visit = (node: SyntaxNode) => {
    for (const child of node.namedChildren) {
      if (child.type === 'code' && ERB_CODE_TAGS.has(node.type)) {
        segments.push({ code: child.text, row: child.startPosition.row });
      } else {
        visit(child);
      }
    }
  };
  visit(parser.parse(template).rootNode);
  return segments;
}

/**
 * Index of the character closing the bracket at `start`, skipping quoted strings, or -1.
 */
export function findClosing(text: string, start: number, open: string, close: string): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const end = skipString(text, i);
      if (end === -1) return -1;
      i = end;
      continue;
    }
    if (ch === open) depth++;
    if (ch === close && --depth === 0) return i;
  }
  return -1;
}

function skipString(text: string, start: number): number {
  const quote = text[start];
  for (let i = start + 1; i < text.length; i++) {
    if (text[i] === '\\') {
      i++;
      continue;
    }
    if (text[i] === quote) return i;
  }
  return -1;
}

/**
 * Bodies of every `#{...}` in plain template text.
 */
export function interpolations(text: string): string[] {
  const found: string[] = [];
  let i = 0;
  while (i < text.length) {
    const start = text.indexOf('#{', i);
    if (start === -1) break;
    if (start > 0 && text[start - 1] === '\\') {
      i = start + 2;
      continue;
    }
    const end = findClosing(text, start + 1, '{', '}');
    if (end === -1) break;
    found.push(text.slice(start + 2, end));
    i = end + 1;
  }
  return found;
}

const SCRIPT_MARKER = /^(?:!=|&=|=|~|-)/;
const TAG_HEAD = /^(?:[%.#][\w:-]+)+/;
const HTML_ATTR_VALUE = /[\w:-]+\s*=\s*([^\s"')]+)/g;
const TRAILING_COMMA = /,\s*$/;
const TRAILING_PIPE = /\|\s*$/;
const OPENS_WITH_DO = /\bdo(?:\s*\|[^|]*\|)?\s*$/;
const OPENS_WITH_KEYWORD = /^(?:if|unless|case|while|until|for|begin)\b/;
const CONTINUES_BLOCK = /^-\s*(?:else|elsif|when|in|rescue|ensure)\b/;

class HamlExtractor {
  private readonly lines: string[];
  private readonly segments: CodeSegment[] = [];
  /** Indentation of each script line whose block is still open. */
  private readonly openBlocks: number[] = [];
  private i = 0;
  private indent = 0;

  constructor(source: string) {
    this.lines = source.split('\n');
  }

  extract(): CodeSegment[] {
    let skipDeeperThan: number | null = null;
    let rubyDeeperThan: number | null = null;

    for (this.i = 0; this.i < this.lines.length; this.i++) {
      const raw = this.lines[this.i];
      const content = raw.trimStart();
      this.indent = raw.length - content.length;

      if (rubyDeeperThan !== null) {
        if (content.trim() === '') continue;
        if (this.indent > rubyDeeperThan) {
          this.emit(content);
          continue;
        }
        rubyDeeperThan = null;
      }
      if (skipDeeperThan !== null) {
        if (content.trim() === '' || this.indent > skipDeeperThan) continue;
        skipDeeperThan = null;
      }
      if (content.trim() === '') continue;

      this.closeBlocks(content);

      if (content.trim() === ':ruby') {
        rubyDeeperThan = this.indent;
        continue;
      }
      // `-#` comments and other `:filters` swallow their nested block
      if (content.startsWith('-#') || /^:[a-z]/.test(content)) {
        skipDeeperThan = this.indent;
        continue;
      }
      if (content.startsWith('/') || content.startsWith('!!!')) continue;
      if (content.startsWith('\\')) {
        this.emitInterpolations(content.slice(1));
        continue;
      }

      const script = SCRIPT_MARKER.exec(content);
      if (script) {
        this.emitScript(content.slice(script[0].length), script[0] === '-');
        continue;
      }

      if (TAG_HEAD.test(content)) {
        this.handleTag(content);
        continue;
      }

      this.emitInterpolations(content);
    }

    this.i = this.lines.length;
    this.indent = -1;
    this.closeBlocks('');
    return this.segments;
  }

  /**
   * Haml ends a Ruby block where the indentation drops back to the line that opened it.
   */
  private closeBlocks(content: string): void {
    while (this.openBlocks.length > 0) {
      const opened = this.openBlocks[this.openBlocks.length - 1];
      if (this.indent > opened) break;
      if (this.indent === opened && CONTINUES_BLOCK.test(content)) break;
      this.openBlocks.pop();
      this.segments.push({ code: 'end', row: Math.min(this.i, this.lines.length - 1) });
    }
  }

  private handleTag(content: string): void {
    const head = TAG_HEAD.exec(content);
    let rest = head ? content.slice(head[0].length) : content;

    for (;;) {
      const opener = rest[0];
      if (opener === '{' || opener === '[') {
        const closer = opener === '{' ? '}' : ']';
        rest = this.takeBracketed(rest, opener, closer, (body, row) => this.emit(`${opener}${body}${closer}`, row));
      } else if (opener === '(') {
        rest = this.takeBracketed(rest, '(', ')', (body, row) => {
          for (const match of body.matchAll(HTML_ATTR_VALUE)) {
            const offset = body.slice(0, match.index).split('\n').length - 1;
            this.emit(match[1], row + offset);
          }
          this.emitInterpolations(body, row);
        });
      } else {
        break;
      }
    }

    rest = rest.replace(/^[<>&!/]+(?=[=~\s]|$)/, '');
    const script = /^(?:!=|&=|=|~)/.exec(rest);
    if (script) {
      this.emitScript(rest.slice(script[0].length), false);
    } else {
      this.emitInterpolations(rest);
    }
  }

  /**
   * Consume a bracketed attribute section that may span lines; hands the inner text and its first
   * row to `onBody` while the current line advances, and returns what follows the closing bracket.
   */
  private takeBracketed(
    text: string,
    open: string,
    close: string,
    onBody: (body: string, row: number) => void
  ): string {
    const startLine = this.i;
    let buffer = text;
    let end = findClosing(buffer, 0, open, close);
    while (end === -1 && this.i + 1 < this.lines.length) {
      this.i++;
      buffer += '\n' + this.lines[this.i];
      end = findClosing(buffer, 0, open, close);
    }
    if (end === -1) {
      end = buffer.length;
    }

    onBody(buffer.slice(1, end), startLine);
    return buffer.slice(end + 1).split('\n').pop() ?? '';
  }

  /**
   * A trailing comma continues onto the next line; a `|` block runs while lines end in `|`.
   * A script ending in `do`, or a silent script opening a conditional or loop, starts a block.
   */
  private emitScript(code: string, silent: boolean): void {
    const row = this.i;
    const parts = [code];
    let last = code;
    let pipeRun = false;
    while (this.i + 1 < this.lines.length) {
      const following = this.lines[this.i + 1].trim();
      const byPipe = TRAILING_PIPE.test(last) && TRAILING_PIPE.test(following);
      if (!byPipe && !TRAILING_COMMA.test(last)) break;
      pipeRun = pipeRun || byPipe;
      this.i++;
      last = following;
      parts.push(following);
    }
    const lines = pipeRun ? parts.map(part => part.replace(TRAILING_PIPE, '')) : parts;
    this.emit(lines.join('\n'), row);

    const statement = code.trim();
    if (OPENS_WITH_DO.test(last) || (silent && OPENS_WITH_KEYWORD.test(statement))) {
      this.openBlocks.push(this.indent);
    }
  }

  private emitInterpolations(text: string, row: number = this.i): void {
    text.split('\n').forEach((line, offset) => {
      for (const body of interpolations(line)) {
        this.emit(body, row + offset);
      }
    });
  }

  private emit(code: string, row: number = this.i): void {
    if (code.trim() !== '') this.segments.push({ code, row });
  }
}

export function extractHamlSegments(source: string): CodeSegment[] {
  return new HamlExtractor(source).extract();
}
