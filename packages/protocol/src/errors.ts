export type ProtocolErrorKind = 'Decode' | 'Encode' | 'UnsupportedProtocol' | 'InvalidFormat' | 'Io' | 'Json' | 'Http';

const CLIENT_ERRORS: ReadonlySet<ProtocolErrorKind> = new Set(['Decode', 'InvalidFormat', 'Json']);

export class ProtocolError extends Error {
  readonly status: number;

  constructor(
    readonly kind: ProtocolErrorKind,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = 'ProtocolError';
    this.status = CLIENT_ERRORS.has(kind) ? 400 : 500;
  }
}

export class HandlerNotFoundError extends Error {
  readonly status = 404;

  constructor(
    readonly method: string,
    readonly path: string
  ) {
    super(`No handler for ${method} ${path}`);
    this.name = 'HandlerNotFoundError';
  }
}
