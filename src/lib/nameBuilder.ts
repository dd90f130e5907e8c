import { Template } from './template';
import { ResolvedValues } from './resolver';
import { sanitizeSegment, trimEdges } from '../utils/sanitize';

export type CounterPosition = 'first' | 'last';

export const PATH_SEPARATOR = '/';
export const DEFAULT_NAME = 'image';

/**
 * Assemble a base name (or a `/`-separated folder spec) from resolved tokens.
 * Unresolved tokens leave no trace: no value and no delimiter. An empty
 * result becomes `fallback`.
 */
export function buildName(
  tokens: Template,
  resolved: ResolvedValues,
  prefix: string,
  delimiter: string,
  fallback: string = DEFAULT_NAME
): string {
  let name = prefix;

  for (const token of tokens) {
    const value = resolved.get(token);
    if (value === undefined) continue;

    const segment = sanitizeSegment(value);
    if (!segment) continue;

    if (token.kind === 'path') {
      if (name && !name.endsWith(PATH_SEPARATOR)) {
        name += PATH_SEPARATOR;
      }
    } else if (name && !name.endsWith(PATH_SEPARATOR)) {
      name += delimiter;
    }
    name += segment;
  }

  const cleaned = trimEdges(name, [delimiter, '.', PATH_SEPARATOR]);
  return cleaned || fallback;
}

export function formatCounter(counter: number, digits: number): string {
  return String(counter).padStart(digits, '0');
}

export function buildFilename(
  baseName: string,
  counter: number,
  digits: number,
  position: CounterPosition,
  extension: string,
  delimiter: string
): string {
  const counterStr = formatCounter(counter, digits);
  const stem = position === 'first'
    ? `${counterStr}${delimiter}${baseName}`
    : `${baseName}${delimiter}${counterStr}`;
  return `${stem}${extension}`;
}
