export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Raised before any I/O when a caller passes an empty artist or title.
export class InvalidTrackQueryError extends Error {
  public readonly field: 'artist' | 'title';
  constructor(field: 'artist' | 'title') {
    super(`Track query requires a non-empty ${field}.`);
    this.name = 'InvalidTrackQueryError';
    this.field = field;
  }
}

export class HttpTransportError extends Error {
  public readonly url: string;
  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${reason}`, { cause });
    this.name = 'HttpTransportError';
    this.url = url;
  }
}

export class HttpStatusError extends Error {
  public readonly url: string;
  public readonly status: number;
  constructor(url: string, status: number) {
    super(`Request to ${url} returned HTTP ${status}`);
    this.name = 'HttpStatusError';
    this.url = url;
    this.status = status;
  }
}
