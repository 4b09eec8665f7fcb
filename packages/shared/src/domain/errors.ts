/**
 * Error codes shared by the engine and its transport
 */

/**
 * Queue operation error types
 */
export type QueueError =
  | 'NOT_FOUND'
  | 'NOT_READY'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVALID_URL';

/**
 * Error details with context information
 */
export interface ErrorDetails {
  code: string;
  message: string;
  context?: Record<string, unknown> | undefined;
  suggestion?: string | undefined;
}

/**
 * Error factory for creating consistent error responses
 */
export class ErrorFactory {
  static createQueueError(error: QueueError, context?: Record<string, unknown> | undefined): ErrorDetails {
    const messages: Record<QueueError, string> = {
      NOT_FOUND: 'No queue item with that id',
      NOT_READY: 'The queue item has not been resolved yet',
      INDEX_OUT_OF_RANGE: 'Queue index is out of range',
      INVALID_URL: 'An absolute http(s) URL is required'
    };

    const suggestions: Record<QueueError, string> = {
      NOT_FOUND: 'Refresh the queue; the item may have been removed or started playing',
      NOT_READY: 'Wait for the item to finish resolving',
      INDEX_OUT_OF_RANGE: 'Refresh the queue and retry with current positions',
      INVALID_URL: 'Paste a media URL and try again'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: suggestions[error]
    };
  }
}
