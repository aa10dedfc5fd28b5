/**
 * Error taxonomy for collection.
 *
 * ConfigError is a caller mistake (unknown sport or book, missing option) and
 * always propagates. FetchError and DecodeError are per-book failures that the
 * market service logs and absorbs.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class FetchError extends Error {
  override readonly name = 'FetchError';
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, url: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.url = url;
    this.status = options?.status ?? null;
  }
}

export class DecodeError extends Error {
  override readonly name = 'DecodeError';
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.url = url;
  }
}
