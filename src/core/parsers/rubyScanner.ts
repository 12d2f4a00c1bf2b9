/**
 * @fileOverview: Finds receiver-less `*_path` / `*_url` calls in a Ruby syntax tree
 * @module: RubyScanner
 * @keyFunctions:
 *   - RouteHelperScanner.scan(): Bare route-helper calls in a Ruby source string
 *   - RouteHelperScanner.scanSegments(): Same for code pulled out of a template, on template lines
 * @dependencies:
 *   - tree-sitter-ruby: Parse tree for the scanned code
 * @context: A bare `foo_path` parses as an identifier, so locals are tracked per scope to tell a
 *   variable from a call. Methods, classes and modules open a fresh scope; blocks see their
 *   parent's locals but keep their own
 */

import { isRouteHelperName } from '../conventions';
import { joinSegments, type CodeSegment } from './templateSource';
import { isSameNode, type SyntaxNode, type SyntaxParser } from './treeSitter';
import type { HelperInvocation } from './types';

const SCOPE_NODES = new Set(['method', 'singleton_method', 'class', 'module', 'singleton_class']);
const BLOCK_NODES = new Set(['block', 'do_block', 'lambda']);

// every identifier directly inside these declares a local
const DECLARING_PARENTS = new Set([
  'method_parameters',
  'block_parameters',
  'lambda_parameters',
  'splat_parameter',
  'hash_splat_parameter',
  'block_parameter',
  'destructured_parameter',
  'left_assignment_list',
  'destructured_left_assignment',
  'rest_assignment',
  'exception_variable',
]);

// declare a local only through the named field
const DECLARING_FIELDS: Record<string, string> = {
  assignment: 'left',
  operator_assignment: 'left',
  optional_parameter: 'name',
  keyword_parameter: 'name',
  for: 'pattern',
};

const NAMING_PARENTS = new Set(['alias', 'undef', 'scope_resolution']);

class CallCollector {
  private readonly found: HelperInvocation[] = [];

  collect(root: SyntaxNode): HelperInvocation[] {
    this.visit(root, new Set());
    return this.found;
  }

  private visit(node: SyntaxNode, locals: Set<string>): void {
    if (SCOPE_NODES.has(node.type)) {
      this.visitChildren(node, new Set());
      return;
    }
    if (BLOCK_NODES.has(node.type)) {
      this.visitChildren(node, new Set(locals));
      return;
    }
    if (node.type === 'call') {
      this.visitCall(node, locals);
      return;
    }
    if (node.type === 'identifier') {
      this.visitIdentifier(node, locals);
      return;
    }
    this.visitChildren(node, locals);
  }

  private visitChildren(node: SyntaxNode, locals: Set<string>): void {
    for (const child of node.namedChildren) {
      this.visit(child, locals);
    }
  }

  private visitCall(node: SyntaxNode, locals: Set<string>): void {
    const receiver = node.childForFieldName('receiver');
    const method = node.childForFieldName('method');

    for (const child of node.namedChildren) {
      if (method && isSameNode(method, child)) {
        // `foo_path(...)` is a call even where a local shares the name
        if (!receiver && method.type === 'identifier') this.report(method);
        continue;
      }
      this.visit(child, locals);
    }
  }

  private visitIdentifier(node: SyntaxNode, locals: Set<string>): void {
    const parent = node.parent;
    if (parent) {
      if (DECLARING_PARENTS.has(parent.type)) {
        locals.add(node.text);
        return;
      }
      const field = DECLARING_FIELDS[parent.type];
      if (field && isSameNode(parent.childForFieldName(field), node)) {
        locals.add(node.text);
        return;
      }
      if (NAMING_PARENTS.has(parent.type)) return;
      if (SCOPE_NODES.has(parent.type) && isSameNode(parent.childForFieldName('name'), node)) return;
    }

    if (!locals.has(node.text)) this.report(node);
  }

  private report(node: SyntaxNode): void {
    if (isRouteHelperName(node.text)) {
      this.found.push({ method: node.text, line: node.startPosition.row + 1 });
    }
  }
}

export class RouteHelperScanner {
  constructor(private readonly parser: SyntaxParser) {}

  scan(source: string): HelperInvocation[] {
    return new CallCollector().collect(this.parser.parse(source).rootNode);
  }

  /**
   * Scans template code segments as one program and reports lines in the template.
   */
  scanSegments(segments: CodeSegment[]): HelperInvocation[] {
    const { source, lines } = joinSegments(segments);
    return this.scan(source).map(invocation => ({
      method: invocation.method,
      line: lines[invocation.line - 1] ?? invocation.line,
    }));
  }
}
