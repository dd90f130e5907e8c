export const PLACEHOLDER_CHAR = '_';
export const MAX_SEGMENT_LENGTH = 200;

const RESERVED_NAMES = new Set([
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'
]);

// Windows-forbidden characters, the POSIX separator and control characters
const FORBIDDEN_CHARS = /[<>:"|?*\\/\u0000-\u001F\u007F]/g;

// half of a surrogate pair with no partner; not representable in a file name
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

const EDGE_JUNK = /^[\s.]+|[\s.]+$/g;
const TRAILING_JUNK = /[\s.]+$/;

const MODEL_EXTENSIONS = ['.safetensors', '.ckpt', '.pt', '.bin', '.pth'];

/**
 * Normalize one path or name segment into a portable filesystem name.
 * Never applied to delimiters or separators. Idempotent.
 */
export function sanitizeSegment(segment: string): string {
  let clean = segment
    .replace(FORBIDDEN_CHARS, PLACEHOLDER_CHAR)
    .replace(LONE_SURROGATE, PLACEHOLDER_CHAR)
    .replace(EDGE_JUNK, '');

  // length is counted in code points so a cut never splits a surrogate pair
  const codePoints = Array.from(clean);
  if (codePoints.length > MAX_SEGMENT_LENGTH) {
    // the cut can expose a trailing dot or space
    clean = codePoints.slice(0, MAX_SEGMENT_LENGTH).join('').replace(TRAILING_JUNK, '');
  }

  if (RESERVED_NAMES.has(clean.toUpperCase())) {
    clean = `_${clean}`;
  }

  return clean;
}

export function isReservedName(name: string): boolean {
  return RESERVED_NAMES.has(name.toUpperCase());
}

/**
 * Drop a model-file extension (e.g. `sd_xl_base.safetensors` -> `sd_xl_base`).
 * Only the outermost one is removed.
 */
export function stripModelExtension(value: string): string {
  const lower = value.toLowerCase();
  for (const ext of MODEL_EXTENSIONS) {
    if (lower.endsWith(ext)) {
      return value.substring(0, value.length - ext.length);
    }
  }
  return value;
}

/**
 * Trim any run of the given characters from both ends of `value`.
 * Multi-character delimiters are matched as whole units.
 */
export function trimEdges(value: string, units: string[]): string {
  const parts = units.filter(Boolean);
  let start = 0;
  let end = value.length;
  let changed = true;

  while (changed && start < end) {
    changed = false;
    for (const unit of parts) {
      if (value.startsWith(unit, start) && start + unit.length <= end) {
        start += unit.length;
        changed = true;
      }
      if (end - unit.length >= start && value.substring(end - unit.length, end) === unit) {
        end -= unit.length;
        changed = true;
      }
    }
  }

  return value.substring(start, end);
}
