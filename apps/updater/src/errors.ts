/** Base class for every failure that aborts a README update. */
export class UpdaterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The HTTP layer answered with a non-success status, or never answered at
 * all (`status` is null).
 */
export class TransportError extends UpdaterError {
  readonly status: number | null;
  readonly body: string;

  constructor(status: number | null, body: string) {
    super(
      status === null
        ? `GraphQL request failed: ${body}`
        : `GraphQL request failed (${status}): ${body}`
    );
    this.status = status;
    this.body = body;
  }
}

/** The API answered, but with an `errors` payload or an unexpected shape. */
export class ApiError extends UpdaterError {
  readonly errors: unknown;

  constructor(message: string, errors?: unknown) {
    super(message);
    this.errors = errors;
  }
}

/** The queried account does not exist. */
export class NotFoundError extends UpdaterError {
  readonly login: string;

  constructor(login: string, context: string) {
    super(`User '${login}' not found when ${context}.`);
    this.login = login;
  }
}

/** A required credential, login or flag is missing or malformed. */
export class ConfigurationError extends UpdaterError {}
