export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

export class TooManyIdentifiersError extends Error {
  override readonly name = "TooManyIdentifiersError";

  constructor(
    readonly count: number,
    readonly limit: number
  ) {
    super(`Too many track IDs provided (${count}). Maximum allowed: ${limit}`);
  }
}

/**
 * Any failure talking to the catalog: HTTP errors, network errors,
 * expired credentials, malformed payloads.
 */
export class CatalogError extends Error {
  override readonly name = "CatalogError";
  readonly status: number | undefined;
  readonly endpoint: string | undefined;

  constructor(
    message: string,
    details: { status?: number | undefined; endpoint?: string | undefined } = {}
  ) {
    super(message);
    this.status = details.status;
    this.endpoint = details.endpoint;
  }
}

export class OutputError extends Error {
  override readonly name = "OutputError";

  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
