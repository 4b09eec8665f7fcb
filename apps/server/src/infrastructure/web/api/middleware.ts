/**
 * API Middleware Components
 *
 * Security headers and consistent error responses for the REST API.
 */

import { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { APIError, APIResponse, HTTP_STATUS, API_ERROR_CODES } from './types';

/**
 * Security headers middleware
 */
export function createSecurityHeadersMiddleware() {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Status changes every poll tick
    reply.header('Cache-Control', 'no-store, no-cache, must-revalidate');
  };
}

/**
 * Error handling middleware
 */
export function createErrorHandlingMiddleware() {
  return (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    console.error('API Error:', {
      error: error.message,
      url: request.url,
      method: request.method,
    });

    const timestamp = new Date().toISOString();

    if (error.code === 'FST_ERR_CTP_INVALID_JSON_BODY' || error instanceof SyntaxError) {
      const apiError: APIError = {
        code: API_ERROR_CODES.INVALID_JSON,
        message: 'Invalid JSON in request body',
        timestamp,
      };
      reply.code(HTTP_STATUS.BAD_REQUEST).send(envelope(apiError, timestamp));
      return;
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      const apiError: APIError = {
        code: API_ERROR_CODES.VALIDATION_FAILED,
        message: error.message,
        timestamp,
      };
      reply.code(error.statusCode).send(envelope(apiError, timestamp));
      return;
    }

    const apiError: APIError = {
      code: API_ERROR_CODES.INTERNAL_ERROR,
      message: 'Internal server error',
      timestamp,
    };
    reply.code(HTTP_STATUS.INTERNAL_SERVER_ERROR).send(envelope(apiError, timestamp));
  };
}

function envelope(error: APIError, timestamp: string): APIResponse {
  return { success: false, error, timestamp };
}

/**
 * Register all API middleware with a Fastify instance
 */
export function registerAPIMiddleware(fastify: FastifyInstance): void {
  fastify.addHook('preHandler', createSecurityHeadersMiddleware());
  fastify.setErrorHandler(createErrorHandlingMiddleware());
}
