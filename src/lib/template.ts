export type Token =
  | { kind: 'date'; raw: string }
  | { kind: 'node'; raw: string; nodeId: string; param: string }
  | { kind: 'path'; raw: string; segment: string }
  | { kind: 'literal'; raw: string };

export type Template = readonly Token[];

const NODE_REFERENCE = /^(\d+)\.([A-Za-z_][A-Za-z0-9_]*)$/;
const PATH_MARKERS = ['../', './'];

export function parseToken(raw: string): Token {
  if (raw.startsWith('%')) {
    return { kind: 'date', raw };
  }

  const marker = PATH_MARKERS.find(m => raw.startsWith(m));
  if (marker) {
    return { kind: 'path', raw, segment: raw.slice(marker.length) };
  }

  const match = NODE_REFERENCE.exec(raw);
  if (match) {
    return { kind: 'node', raw, nodeId: match[1], param: match[2] };
  }

  return { kind: 'literal', raw };
}

/** Split a comma-separated template string into frozen tokens. */
export function parseTemplate(source: string): Template {
  const tokens = source
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(parseToken);

  return Object.freeze(tokens);
}

export function templateToString(template: Template): string {
  return template.map(token => token.raw).join(', ');
}
