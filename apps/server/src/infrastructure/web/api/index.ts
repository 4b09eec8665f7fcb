/**
 * API Infrastructure Exports
 */

export type {
  APIError,
  APIResponse,
} from './types';

export {
  HTTP_STATUS,
  API_ERROR_CODES,
} from './types';

export {
  createSecurityHeadersMiddleware,
  createErrorHandlingMiddleware,
  registerAPIMiddleware,
} from './middleware';

export {
  registerAPIRoutes,
} from './routes';
export type { APIRouteDependencies } from './routes';
