export type IssueKind =
  | 'invalid-date-directive'
  | 'unresolved-node-reference'
  | 'unresolved-literal';

/** A token that produced no value. Reported by diagnostics, never thrown. */
export interface TemplateResolutionIssue {
  token: string;
  kind: IssueKind;
  message: string;
}

export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG';

  constructor(message: string, readonly details: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Unrecoverable write failure (disk full, read-only filesystem...).
 * Aborts the current save event; images written before the failure are
 * listed in `saved`.
 */
export class FatalStorageError<T = unknown> extends Error {
  readonly code = 'STORAGE_FAILURE';

  constructor(
    message: string,
    readonly filePath: string,
    readonly saved: T[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FatalStorageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
