/**
 * Parameter tree model.
 *
 * The host pipeline hands over the generation graph as plain JSON. It is
 * converted once into a tagged union so every lookup walks one well-typed
 * structure instead of probing `unknown` values.
 */

export type ParamNode =
  | { kind: 'null' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'array'; items: readonly ParamNode[] }
  | { kind: 'object'; entries: ReadonlyMap<string, ParamNode> };

export type ParamObject = Extract<ParamNode, { kind: 'object' }>;

export class ParameterTreeError extends Error {
  readonly code = 'INVALID_PARAMETER_TREE';

  constructor(message: string, readonly path: string) {
    super(`${message} at ${path || '<root>'}`);
    this.name = 'ParameterTreeError';
  }
}

export function toParamTree(value: unknown, path = ''): ParamNode {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }

  switch (typeof value) {
    case 'boolean':
      return { kind: 'bool', value };
    case 'number':
      if (!Number.isFinite(value)) {
        throw new ParameterTreeError('Non-finite number', path);
      }
      return { kind: 'number', value };
    case 'string':
      return { kind: 'string', value };
    case 'object':
      break;
    default:
      throw new ParameterTreeError(`Unsupported value of type ${typeof value}`, path);
  }

  if (Array.isArray(value)) {
    const items = value.map((item: unknown, index) => toParamTree(item, `${path}[${index}]`));
    return { kind: 'array', items };
  }

  const entries = new Map<string, ParamNode>();
  for (const [key, child] of Object.entries(value)) {
    entries.set(key, toParamTree(child, path ? `${path}.${key}` : key));
  }
  return { kind: 'object', entries };
}

/** Render a node the way it appears inside a file name. `null` has no rendering. */
export function renderValue(node: ParamNode): string | undefined {
  switch (node.kind) {
    case 'null':
      return undefined;
    case 'bool':
      return node.value ? 'true' : 'false';
    case 'number':
      return String(node.value);
    case 'string':
      return node.value;
    case 'array':
    case 'object':
      return JSON.stringify(toPlain(node));
  }
}

export function toPlain(node: ParamNode): unknown {
  switch (node.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'string':
      return node.value;
    case 'array':
      return node.items.map(toPlain);
    case 'object': {
      const out: Record<string, unknown> = {};
      for (const [key, child] of node.entries) {
        out[key] = toPlain(child);
      }
      return out;
    }
  }
}

/**
 * Pre-order depth-first search. Visits objects in entry order and arrays in
 * index order, returning the first value the visitor produces.
 */
export function findFirst<T>(node: ParamNode, visit: (obj: ParamObject) => T | undefined): T | undefined {
  if (node.kind === 'object') {
    const hit = visit(node);
    if (hit !== undefined) return hit;

    for (const child of node.entries.values()) {
      const found = findFirst(child, visit);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  if (node.kind === 'array') {
    for (const item of node.items) {
      const found = findFirst(item, visit);
      if (found !== undefined) return found;
    }
  }

  return undefined;
}

/** First value stored under `key` anywhere in the tree. */
export function findKey(tree: ParamNode, key: string): ParamNode | undefined {
  return findFirst(tree, (obj) => obj.entries.get(key));
}

export function getChild(node: ParamNode, key: string): ParamNode | undefined {
  return node.kind === 'object' ? node.entries.get(key) : undefined;
}

/** `tree[nodeId].inputs[name]`, or undefined when any step is missing. */
export function getNodeInput(tree: ParamNode, nodeId: string, name: string): ParamNode | undefined {
  const node = getChild(tree, nodeId);
  if (!node) return undefined;
  const inputs = getChild(node, 'inputs');
  if (!inputs) return undefined;
  return getChild(inputs, name);
}
