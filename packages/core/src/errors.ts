/**
 * Error types shared across svcsync.
 *
 * Three families:
 * - Contract signals raised by authenticators and consumed by the
 *   orchestration in `Authenticator.initialize` and `SessionManager`.
 * - Configuration errors, fatal to the requested operation.
 * - Invalid-state errors carrying structured details for diagnosis.
 */

/**
 * Base class for every error raised by svcsync.
 */
export class SvcsyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Safely extract an error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// =============================================================================
// Contract signals
// =============================================================================

/** Nothing has been stored for this session yet. */
export class AuthenticationRequiredError extends SvcsyncError {}

/** The stored session cannot be used and a new login is needed. */
export class ReauthenticationRequiredError extends SvcsyncError {
  readonly configChanged: boolean;

  constructor(message: string, configChanged = false) {
    super(message);
    this.configChanged = configChanged;
  }
}

export class NoRefreshTokenError extends SvcsyncError {
  constructor() {
    super("No refresh token");
  }
}

/**
 * The authenticator does not support the requested operation.
 * Callers treat this as a successful no-op.
 */
export class FeatureNotAvailableError extends SvcsyncError {
  constructor(feature?: string) {
    super(feature ? `Feature not available: ${feature}` : "Feature not available");
  }
}

/** Raised when the user interrupts an interactive step. */
export class AuthenticationInterruptedError extends SvcsyncError {
  constructor(message = "Authentication was interrupted") {
    super(message);
  }
}

// =============================================================================
// Configuration errors
// =============================================================================

export class UnknownEventTypeError extends SvcsyncError {
  readonly eventType: string;

  constructor(eventType: string, expected: readonly string[]) {
    super(`Given ${eventType}, but expected ${expected.join(", ")}`);
    this.eventType = eventType;
  }
}

export class InvalidServiceRegistryError extends SvcsyncError {}

export class ServiceListingError extends SvcsyncError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class RegistryNotFoundError extends SvcsyncError {
  constructor(registryId: string) {
    super(`Registry "${registryId}" was not found in this context.`);
  }
}

export class EndpointAlreadyExistsError extends SvcsyncError {}

export class EndpointNotFoundError extends SvcsyncError {
  constructor(endpointId: string) {
    super(`Endpoint "${endpointId}" was not found.`);
  }
}

export class UnsupportedAuthenticationError extends SvcsyncError {
  constructor(type: string) {
    super(`Unsupported authentication type "${type}".`);
  }
}

export class OAuth2MisconfigurationError extends SvcsyncError {}

export class ContextNotFoundError extends SvcsyncError {
  constructor(contextName: string) {
    super(`Context "${contextName}" does not exist.`);
  }
}

export class ContextAlreadyExistsError extends SvcsyncError {
  constructor(contextName: string) {
    super(`Context "${contextName}" already exists.`);
  }
}

export class InvalidCatalogError extends SvcsyncError {}

export class PropertySyntaxError extends SvcsyncError {
  constructor(line: string) {
    super(
      `Invalid property (${line}). The valid form is "key0[.key1[...]]=value".`
    );
  }
}

export class DuplicatedPropertyError extends SvcsyncError {
  constructor(key: string) {
    super(`Duplicated property (${key})`);
  }
}

export class AmbiguousPropertyStructureError extends SvcsyncError {
  constructor(key: string, conflictingPath: string) {
    super(
      `The property "${key}" changes the structure at "${conflictingPath}".`
    );
  }
}

// =============================================================================
// Invalid state
// =============================================================================

/**
 * Fatal error with structured details.
 * The message renders every non-null detail as sorted JSON.
 */
export class InvalidStateError extends SvcsyncError {
  readonly summary: string;
  readonly details: Record<string, unknown>;

  constructor(summary: string, details: Record<string, unknown>) {
    super(formatInvalidState(summary, details));
    this.summary = summary;
    this.details = details;
  }
}

function formatInvalidState(
  summary: string,
  details: Record<string, unknown>
): string {
  const defined = Object.keys(details)
    .sort()
    .filter((key) => details[key] !== null && details[key] !== undefined);

  if (defined.length === 0) {
    return summary;
  }

  const rendered: Record<string, unknown> = {};
  for (const key of defined) {
    rendered[key] = details[key];
  }

  try {
    return `${summary} (${JSON.stringify(rendered)})`;
  } catch {
    return summary;
  }
}
