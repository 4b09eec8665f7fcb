/**
 * API Types and Interfaces
 *
 * Common request/response shapes for the REST API.
 */

import { RouteGenericInterface } from 'fastify';

/**
 * Standard API error response format
 */
export interface APIError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp?: string;
}

/**
 * Standard API response envelope
 */
export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: APIError;
  timestamp: string;
}

/**
 * HTTP status codes used by the API
 */
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
} as const;

/**
 * API error codes
 */
export const API_ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_JSON: 'INVALID_JSON',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  NOT_READY: 'NOT_READY',
  INDEX_OUT_OF_RANGE: 'INDEX_OUT_OF_RANGE',
  INVALID_URL: 'INVALID_URL',
  PLAYER_UNAVAILABLE: 'PLAYER_UNAVAILABLE',
  RESOLVER_ERROR: 'RESOLVER_ERROR',
} as const;

/**
 * Route interfaces for Fastify typing
 */
export interface SubmitRouteInterface extends RouteGenericInterface {
  Body: { url?: unknown };
}

export interface ItemRouteInterface extends RouteGenericInterface {
  Params: { id: string };
}

export interface ReorderRouteInterface extends RouteGenericInterface {
  Body: { oldIndex?: unknown; newIndex?: unknown };
}

export interface VolumeRouteInterface extends RouteGenericInterface {
  Body: { volume?: unknown };
}

export interface SeekRouteInterface extends RouteGenericInterface {
  Body: { position?: unknown };
}

export interface SearchRouteInterface extends RouteGenericInterface {
  Querystring: { q?: string };
}
