/**
 * @fileOverview: Summary of a Ruby class or module file from its syntax tree
 * @module: RubySource
 * @keyFunctions:
 *   - summarizeRubySource(): Class name, superclass, instance methods with visibility, helper_method
 *     declarations and included modules
 * @dependencies:
 *   - tree-sitter-ruby: Parse tree of the file
 * @context: Only the first class in a file is read. A file without a class, such as a helper or
 *   concern, contributes the methods defined directly in its modules
 */

import type { SyntaxNode, SyntaxParser } from '../parsers/treeSitter';

export type Visibility = 'public' | 'protected' | 'private';

export interface RubyMethodDef {
  name: string;
  visibility: Visibility;
}

export interface RubyClassSummary {
  /** Fully qualified, e.g. `Admin::UsersController`. */
  className?: string;
  /** As written in the file, e.g. `BaseController` or `::ApplicationController`. */
  superclass?: string;
  /** Namespace the class was declared in, used to resolve a relative superclass. */
  namespace: string[];
  methods: RubyMethodDef[];
  helperMethods: string[];
  includes: string[];
}

const VISIBILITIES: readonly Visibility[] = ['public', 'protected', 'private'];
const ATTRIBUTE_MACROS = new Set(['attr_reader', 'attr_writer', 'attr_accessor']);
const CONSTANT_NODES = new Set(['constant', 'scope_resolution']);

function toVisibility(word: string): Visibility | undefined {
  return VISIBILITIES.find(visibility => visibility === word);
}

function symbolName(node: SyntaxNode | null | undefined): string | undefined {
  if (!node) return undefined;
  if (node.type === 'simple_symbol') return node.text.slice(1);
  if (node.type === 'identifier') return node.text;
  return undefined;
}

/**
 * Statements of a program, class or module body.
 */
function statements(node: SyntaxNode): SyntaxNode[] {
  if (node.type === 'program') return node.namedChildren;
  const body = node.childForFieldName('body');
  return body ? body.namedChildren : [];
}

class SummaryBuilder {
  private readonly summary: RubyClassSummary = {
    namespace: [],
    methods: [],
    helperMethods: [],
    includes: [],
  };

  build(root: SyntaxNode): RubyClassSummary {
    if (!this.findClass(root, [])) {
      this.readModules(root);
    }
    return this.summary;
  }

  private findClass(container: SyntaxNode, modules: string[]): boolean {
    for (const node of statements(container)) {
      const name = node.childForFieldName('name')?.text;
      if (!name) continue;

      if (node.type === 'class') {
        this.summary.namespace = modules;
        this.summary.className = [...modules, name].join('::');
        this.summary.superclass = node.childForFieldName('superclass')?.namedChildren[0]?.text;
        this.readBody(node);
        return true;
      }
      if (node.type === 'module' && this.findClass(node, [...modules, ...name.split('::')])) {
        return true;
      }
    }
    return false;
  }

  private readModules(container: SyntaxNode): void {
    for (const node of statements(container)) {
      if (node.type === 'module') {
        this.readBody(node);
        this.readModules(node);
      }
    }
  }

  private readBody(container: SyntaxNode): void {
    let visibility: Visibility = 'public';

    for (const node of statements(container)) {
      if (node.type === 'method') {
        this.addMethod(node.childForFieldName('name')?.text, visibility);
      } else if (node.type === 'identifier') {
        visibility = toVisibility(node.text) ?? visibility;
      } else if (node.type === 'alias') {
        this.addMethod(symbolName(node.childForFieldName('name')), visibility);
      } else if (node.type === 'call' && !node.childForFieldName('receiver')) {
        visibility = this.readMacro(node, visibility);
      }
    }
  }

  /**
   * Class-level macros; returns the visibility in effect afterwards.
   */
  private readMacro(call: SyntaxNode, visibility: Visibility): Visibility {
    const macro = call.childForFieldName('method')?.text ?? '';
    const args = call.childForFieldName('arguments')?.namedChildren ?? [];

    const explicit = toVisibility(macro);
    if (explicit) {
      if (args.length === 0) return explicit;
      for (const arg of args) {
        const name = arg.type === 'method' ? arg.childForFieldName('name')?.text : symbolName(arg);
        this.addMethod(name, explicit);
      }
      return visibility;
    }

    if (macro === 'helper_method') {
      for (const arg of args) {
        const name = symbolName(arg);
        if (name) this.summary.helperMethods.push(name);
      }
    } else if (macro === 'include') {
      for (const arg of args) {
        if (CONSTANT_NODES.has(arg.type)) this.summary.includes.push(arg.text);
      }
    } else if (ATTRIBUTE_MACROS.has(macro)) {
      for (const arg of args) {
        const name = symbolName(arg);
        if (!name) continue;
        if (macro !== 'attr_writer') this.addMethod(name, visibility);
        if (macro !== 'attr_reader') this.addMethod(`${name}=`, visibility);
      }
    } else if (macro === 'alias_method') {
      this.addMethod(symbolName(args[0]), visibility);
    }
    return visibility;
  }

  private addMethod(name: string | undefined, visibility: Visibility): void {
    if (!name) return;
    const existing = this.summary.methods.find(method => method.name === name);
    if (existing) {
      existing.visibility = visibility;
    } else {
      this.summary.methods.push({ name, visibility });
    }
  }
}

export function summarizeRubySource(source: string, parser: SyntaxParser): RubyClassSummary {
  return new SummaryBuilder().build(parser.parse(source).rootNode);
}
