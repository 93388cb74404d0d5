export type SetupErrorKind =
  | 'unsupported_provider'
  | 'missing_credential'
  | 'missing_base_url';

export class SetupError extends Error {
  readonly kind: SetupErrorKind;

  constructor(kind: SetupErrorKind, message: string) {
    super(message);
    this.name = 'SetupError';
    this.kind = kind;
  }
}

export const isSetupError = (value: unknown): value is SetupError => value instanceof SetupError;
