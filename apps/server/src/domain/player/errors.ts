/**
 * Error types for the playback engine
 */

/**
 * Player process lifecycle error types
 */
export type SupervisorError =
  | 'STARTUP_FAILED'
  | 'SHUTTING_DOWN';

/**
 * Resolver error types
 */
export type ResolutionError =
  | 'INVALID_QUERY'
  | 'HTTP_ERROR'
  | 'SERVER_ERROR'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'CERTIFICATE_ERROR'
  | 'MALFORMED_RESPONSE';

/**
 * Failures after which the resolver's cookie/credential material is probably stale
 */
const STALE_CREDENTIAL_ERRORS: ReadonlySet<ResolutionError> = new Set<ResolutionError>([
  'SERVER_ERROR',
  'TIMEOUT',
  'NETWORK_ERROR',
  'CERTIFICATE_ERROR'
]);

export function signalsStaleCredentials(error: ResolutionError): boolean {
  return STALE_CREDENTIAL_ERRORS.has(error);
}

/**
 * Error details with context information
 */
export interface PlayerErrorDetails {
  readonly code: string;
  readonly message: string;
  readonly context?: Record<string, unknown>;
  readonly suggestion?: string;
}

/**
 * Error factory for creating consistent playback error responses
 */
export class PlayerErrorFactory {
  static createResolutionError(error: ResolutionError, context?: Record<string, unknown>): PlayerErrorDetails {
    const messages: Record<ResolutionError, string> = {
      INVALID_QUERY: 'Search text must be a non-empty string',
      HTTP_ERROR: 'The resolver rejected the request',
      SERVER_ERROR: 'The resolver failed internally',
      TIMEOUT: 'The resolver did not answer in time',
      NETWORK_ERROR: 'Could not connect to the resolver',
      CERTIFICATE_ERROR: 'TLS negotiation with the resolver failed',
      MALFORMED_RESPONSE: 'The resolver answered with an unexpected body'
    };

    return {
      code: error,
      message: messages[error],
      context,
      suggestion: signalsStaleCredentials(error)
        ? 'Refresh the resolver cookies, then submit the URL again'
        : 'Check the URL and submit it again'
    };
  }

  static createSupervisorError(error: SupervisorError, context?: Record<string, unknown>): PlayerErrorDetails {
    const messages: Record<SupervisorError, string> = {
      STARTUP_FAILED: 'The media player could not be started',
      SHUTTING_DOWN: 'The media player is shutting down'
    };

    return {
      code: error,
      message: messages[error],
      context,
      suggestion: error === 'STARTUP_FAILED'
        ? 'Check that mpv is installed and the user can open an audio device'
        : undefined
    };
  }
}
