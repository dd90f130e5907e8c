import { ParamNode, findKey, getNodeInput, renderValue } from './params';
import { formatDirective } from './strftime';
import { Template, Token } from './template';
import { TemplateResolutionIssue } from './errors';
import { stripModelExtension } from '../utils/sanitize';

export type ResolvedValues = ReadonlyMap<Token, string | undefined>;

/**
 * Turns template tokens into values for one save event.
 *
 * Tree lookups are cached per tree object; date directives are always
 * formatted against the timestamp passed in.
 */
export class TemplateResolver {
  private cache = new WeakMap<ParamNode, Map<string, string | undefined>>();

  resolve(tokens: Template, tree: ParamNode, timestamp: Date): ResolvedValues {
    const resolved = new Map<Token, string | undefined>();
    for (const token of tokens) {
      resolved.set(token, this.resolveToken(token, tree, timestamp));
    }
    return resolved;
  }

  resolveToken(token: Token, tree: ParamNode, timestamp: Date): string | undefined {
    switch (token.kind) {
      case 'date': {
        const result = formatDirective(token.raw, timestamp);
        return result.ok ? result.value : undefined;
      }
      case 'path':
        return token.segment;
      case 'node':
      case 'literal':
        return this.lookup(token, tree);
    }
  }

  /** Explain every token that would contribute nothing. */
  diagnose(tokens: Template, tree: ParamNode, timestamp: Date): TemplateResolutionIssue[] {
    const issues: TemplateResolutionIssue[] = [];

    for (const token of tokens) {
      if (token.kind === 'path') continue;

      if (token.kind === 'date') {
        const result = formatDirective(token.raw, timestamp);
        if (!result.ok) {
          issues.push({ token: token.raw, kind: 'invalid-date-directive', message: result.error });
        }
        continue;
      }

      if (this.lookup(token, tree) !== undefined) continue;

      if (token.kind === 'node') {
        issues.push({
          token: token.raw,
          kind: 'unresolved-node-reference',
          message: `No input "${token.param}" on node ${token.nodeId}`
        });
      } else {
        issues.push({
          token: token.raw,
          kind: 'unresolved-literal',
          message: `Key "${token.raw}" not found in parameters`
        });
      }
    }

    return issues;
  }

  clearCache(): void {
    this.cache = new WeakMap();
  }

  private lookup(token: Extract<Token, { kind: 'node' | 'literal' }>, tree: ParamNode): string | undefined {
    let perTree = this.cache.get(tree);
    if (!perTree) {
      perTree = new Map();
      this.cache.set(tree, perTree);
    }
    if (perTree.has(token.raw)) {
      return perTree.get(token.raw);
    }

    const node = token.kind === 'node'
      ? getNodeInput(tree, token.nodeId, token.param)
      : findKey(tree, token.raw);
    const rendered = node ? renderValue(node) : undefined;
    const value = rendered === undefined ? undefined : stripModelExtension(rendered);

    perTree.set(token.raw, value);
    return value;
  }
}
