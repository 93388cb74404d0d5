export type PersistenceErrorKind =
  | 'not_found'
  | 'invalid_format'
  | 'read_failed'
  | 'write_failed';

export const PERSISTENCE_ERROR_KIND_MEANINGS: Record<PersistenceErrorKind, { summary: string }> = {
  not_found: { summary: 'The document path does not exist.' },
  invalid_format: { summary: 'The document exists but does not parse or validate.' },
  read_failed: { summary: 'The document exists but could not be read.' },
  write_failed: { summary: 'The document could not be serialized or written.' },
};

export class PersistenceError extends Error {
  readonly kind: PersistenceErrorKind;
  readonly path?: string;

  constructor(kind: PersistenceErrorKind, message: string, opts?: { path?: string; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'PersistenceError';
    this.kind = kind;
    if (opts?.path !== undefined) {
      this.path = opts.path;
    }
  }
}

export class TrajectoryError extends PersistenceError {
  constructor(kind: PersistenceErrorKind, message: string, opts?: { path?: string; cause?: unknown }) {
    super(kind, message, opts);
    this.name = 'TrajectoryError';
  }
}

export class SnapshotError extends PersistenceError {
  constructor(kind: PersistenceErrorKind, message: string, opts?: { path?: string; cause?: unknown }) {
    super(kind, message, opts);
    this.name = 'SnapshotError';
  }
}

export const isTrajectoryError = (value: unknown): value is TrajectoryError =>
  value instanceof TrajectoryError;

export const isSnapshotError = (value: unknown): value is SnapshotError =>
  value instanceof SnapshotError;

export const isMissingFileError = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);
