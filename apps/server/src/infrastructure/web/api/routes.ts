/**
 * API Route Registration
 *
 * Registers the control surface under the `/api` prefix: queue editing, playback
 * control, autoplay, search and the debug snapshot.
 */

import { FastifyInstance, FastifyReply } from 'fastify';
import { ErrorFactory, QueueError } from '@queuecast/shared';
import { IPlayerService } from '../../../application/PlayerService';
import { PlayerErrorFactory, ResolutionError } from '../../../domain/player';
import {
  APIError,
  APIResponse,
  HTTP_STATUS,
  API_ERROR_CODES,
  ItemRouteInterface,
  ReorderRouteInterface,
  SearchRouteInterface,
  SeekRouteInterface,
  SubmitRouteInterface,
  VolumeRouteInterface,
} from './types';
import { registerAPIMiddleware } from './middleware';

export interface APIRouteDependencies {
  playerService: IPlayerService;
}

const QUEUE_ERROR_STATUS: Record<QueueError, number> = {
  NOT_FOUND: HTTP_STATUS.NOT_FOUND,
  NOT_READY: HTTP_STATUS.CONFLICT,
  INDEX_OUT_OF_RANGE: HTTP_STATUS.BAD_REQUEST,
  INVALID_URL: HTTP_STATUS.BAD_REQUEST,
};

/**
 * Register all API routes with the Fastify instance
 */
export async function registerAPIRoutes(
  fastify: FastifyInstance,
  dependencies: APIRouteDependencies
): Promise<void> {
  const { playerService } = dependencies;

  await fastify.register(async (api) => {
    registerAPIMiddleware(api);

    api.get('/status', async (_request, reply) => {
      return sendSuccess(reply, {
        status: 'operational',
        endpoints: {
          queue: '/api/queue',
          playback: '/api/playback',
          autoplay: '/api/autoplay',
          search: '/api/search',
        },
      });
    });

    // Queue
    api.get('/queue', async (_request, reply) => {
      return sendSuccess(reply, { items: playerService.getQueue() });
    });

    api.post<SubmitRouteInterface>('/queue', async (request, reply) => {
      const url = request.body?.url;
      if (typeof url !== 'string') {
        return sendValidationError(reply, 'url', 'Field "url" must be a string');
      }

      const result = playerService.submit(url);
      if (!result.success) {
        return sendQueueError(reply, result.error, { url });
      }
      return sendSuccess(reply, { item: result.value }, HTTP_STATUS.CREATED);
    });

    api.delete('/queue', async (_request, reply) => {
      await playerService.clearQueue();
      return sendSuccess(reply, { cleared: true });
    });

    api.delete<ItemRouteInterface>('/queue/:id', async (request, reply) => {
      const result = playerService.remove(request.params.id);
      if (!result.success) {
        return sendQueueError(reply, result.error, { id: request.params.id });
      }
      return sendSuccess(reply, { removed: result.value });
    });

    api.post<ItemRouteInterface>('/queue/:id/play-now', async (request, reply) => {
      const result = await playerService.playNow(request.params.id);
      if (!result.success) {
        return sendQueueError(reply, result.error, { id: request.params.id });
      }
      if (!result.value) {
        return sendError(reply, HTTP_STATUS.SERVICE_UNAVAILABLE, {
          code: API_ERROR_CODES.PLAYER_UNAVAILABLE,
          message: 'The player did not accept the track',
          details: { id: request.params.id },
        });
      }
      return sendSuccess(reply, { playing: request.params.id });
    });

    api.post<ItemRouteInterface>('/queue/:id/move-up', async (request, reply) => {
      const result = playerService.moveUp(request.params.id);
      if (!result.success) {
        return sendQueueError(reply, result.error, { id: request.params.id });
      }
      return sendSuccess(reply, { items: playerService.getQueue() });
    });

    api.post<ItemRouteInterface>('/queue/:id/move-down', async (request, reply) => {
      const result = playerService.moveDown(request.params.id);
      if (!result.success) {
        return sendQueueError(reply, result.error, { id: request.params.id });
      }
      return sendSuccess(reply, { items: playerService.getQueue() });
    });

    api.post<ReorderRouteInterface>('/queue/reorder', async (request, reply) => {
      const oldIndex = toInteger(request.body?.oldIndex);
      const newIndex = toInteger(request.body?.newIndex);
      if (oldIndex === null || newIndex === null) {
        return sendValidationError(reply, 'oldIndex/newIndex', 'Both indices must be integers');
      }

      const result = playerService.reorder(oldIndex, newIndex);
      if (!result.success) {
        return sendQueueError(reply, result.error, { oldIndex, newIndex });
      }
      return sendSuccess(reply, { items: playerService.getQueue() });
    });

    api.post('/queue/shuffle', async (_request, reply) => {
      playerService.shuffle();
      return sendSuccess(reply, { items: playerService.getQueue() });
    });

    // Playback
    api.get('/playback/status', async (_request, reply) => {
      return sendSuccess(reply, playerService.getStatus());
    });

    api.post('/playback/toggle-pause', async (_request, reply) => {
      const accepted = await playerService.togglePause();
      return sendSuccess(reply, { accepted });
    });

    api.post('/playback/stop', async (_request, reply) => {
      await playerService.stop();
      return sendSuccess(reply, playerService.getStatus());
    });

    api.post('/playback/skip', async (_request, reply) => {
      await playerService.skip();
      return sendSuccess(reply, playerService.getStatus());
    });

    api.post<VolumeRouteInterface>('/playback/volume', async (request, reply) => {
      const volume = toFiniteNumber(request.body?.volume);
      if (volume === null) {
        return sendValidationError(reply, 'volume', 'Volume must be a number between 0 and 100');
      }
      return sendSuccess(reply, { volume: await playerService.setVolume(volume) });
    });

    api.post<SeekRouteInterface>('/playback/seek', async (request, reply) => {
      const position = toFiniteNumber(request.body?.position);
      if (position === null) {
        return sendValidationError(reply, 'position', 'Position must be a percentage between 0 and 100');
      }
      return sendSuccess(reply, { position: await playerService.seek(position) });
    });

    // Autoplay
    api.get('/autoplay', async (_request, reply) => {
      return sendSuccess(reply, { enabled: playerService.isAutoplayEnabled() });
    });

    api.post('/autoplay/toggle', async (_request, reply) => {
      return sendSuccess(reply, { enabled: playerService.toggleAutoplay() });
    });

    // Search
    api.get<SearchRouteInterface>('/search', async (request, reply) => {
      const query = request.query.q;
      if (typeof query !== 'string' || !query.trim()) {
        return sendValidationError(reply, 'q', 'Search query is required and must be a non-empty string');
      }

      const result = await playerService.search(query.trim().substring(0, 200));
      if (!result.success) {
        return sendResolutionError(reply, result.error);
      }
      return sendSuccess(reply, { results: result.value });
    });

    api.get('/debug', async (_request, reply) => {
      return sendSuccess(reply, playerService.getDebugSnapshot());
    });
  }, { prefix: '/api' });
}

function toInteger(value: unknown): number | null {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) ? parsed : null;
}

function toFiniteNumber(value: unknown): number | null {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : null;
}

function sendSuccess<T>(reply: FastifyReply, data: T, status: number = HTTP_STATUS.OK): FastifyReply {
  const response: APIResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
  return reply.code(status).send(response);
}

function sendError(reply: FastifyReply, status: number, error: APIError): FastifyReply {
  const timestamp = new Date().toISOString();
  const response: APIResponse = {
    success: false,
    error: { ...error, timestamp },
    timestamp,
  };
  return reply.code(status).send(response);
}

function sendValidationError(reply: FastifyReply, field: string, message: string): FastifyReply {
  return sendError(reply, HTTP_STATUS.BAD_REQUEST, {
    code: API_ERROR_CODES.VALIDATION_FAILED,
    message,
    details: { field },
  });
}

function sendQueueError(
  reply: FastifyReply,
  error: QueueError,
  context: Record<string, unknown>
): FastifyReply {
  const details = ErrorFactory.createQueueError(error, context);
  return sendError(reply, QUEUE_ERROR_STATUS[error], {
    code: details.code,
    message: details.message,
    details: { ...context, suggestion: details.suggestion },
  });
}

function sendResolutionError(reply: FastifyReply, error: ResolutionError): FastifyReply {
  const details = PlayerErrorFactory.createResolutionError(error);
  const status = error === 'INVALID_QUERY' ? HTTP_STATUS.BAD_REQUEST : HTTP_STATUS.BAD_GATEWAY;
  return sendError(reply, status, {
    code: error === 'INVALID_QUERY' ? API_ERROR_CODES.VALIDATION_FAILED : API_ERROR_CODES.RESOLVER_ERROR,
    message: details.message,
    details: { reason: error, suggestion: details.suggestion },
  });
}
