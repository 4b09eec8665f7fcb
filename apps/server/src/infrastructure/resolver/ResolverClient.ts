/**
 * HTTP client for the remote URL resolver
 *
 * POSTs `{ url }` to turn a media page into a playable stream, or `{ query }` to
 * search. Every failure is categorized into a ResolutionError; nothing throws.
 */

import { Result, ResolvedMedia, ResolvedMediaValidator } from '@queuecast/shared';
import { IResolverClient } from '../../domain/player/interfaces';
import { SearchResult } from '../../domain/player/types';
import { ResolutionError } from '../../domain/player/errors';

export interface ResolverClientOptions {
  readonly endpoint: string;
  readonly timeoutMs: number;
}

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Label a media source from its URL host, e.g. `www.example.com` → `example.com`
 */
export function sourceLabelFor(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '') || 'unknown';
  } catch {
    return 'unknown';
  }
}

/**
 * Turn one search hit into a SearchResult; null when it has no title or url
 */
export function toSearchResult(entry: unknown): SearchResult | null {
  if (!isRecord(entry) || typeof entry.title !== 'string' || typeof entry.url !== 'string') {
    return null;
  }

  return {
    title: entry.title,
    url: entry.url,
    ...(typeof entry.uploader === 'string' ? { uploader: entry.uploader } : {}),
    ...(typeof entry.duration === 'number' ? { duration: entry.duration } : {}),
    ...(typeof entry.thumbnail === 'string' ? { thumbnail: entry.thumbnail } : {})
  };
}

/**
 * Map a thrown fetch error to a ResolutionError
 */
export function categorizeFailure(error: unknown): ResolutionError {
  const name = error instanceof Error ? error.name : '';
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  const cause = error instanceof Error && isRecord(error.cause) ? error.cause : null;
  const code = cause && typeof cause.code === 'string' ? cause.code : '';
  const causeMessage = cause && typeof cause.message === 'string' ? cause.message.toLowerCase() : '';

  if (name === 'TimeoutError' || name === 'AbortError' || message.includes('timeout') || message.includes('timed out')) {
    return 'TIMEOUT';
  }

  if (code.includes('CERT') || code.startsWith('ERR_TLS') || code.includes('SSL')
    || /ssl|certificate/.test(message) || /ssl|certificate/.test(causeMessage)) {
    return 'CERTIFICATE_ERROR';
  }

  if (CONNECTION_CODES.has(code) || message.includes('connection') || message.includes('fetch failed')) {
    return 'NETWORK_ERROR';
  }

  return 'HTTP_ERROR';
}

export class ResolverClient implements IResolverClient {
  constructor(private readonly options: ResolverClientOptions) {}

  async resolve(url: string): Promise<Result<ResolvedMedia, ResolutionError>> {
    const body = await this.post({ url });
    if (!body.success) {
      return body;
    }

    const media = ResolvedMediaValidator.fromPayload(body.value, sourceLabelFor(url));
    if (!media.success) {
      console.error(`Resolver returned an unusable body for ${url}`);
      return { success: false, error: 'MALFORMED_RESPONSE' };
    }
    return media;
  }

  async search(query: string): Promise<Result<SearchResult[], ResolutionError>> {
    const trimmed = typeof query === 'string' ? query.trim() : '';
    if (!trimmed) {
      return { success: false, error: 'INVALID_QUERY' };
    }

    const body = await this.post({ query: trimmed });
    if (!body.success) {
      return body;
    }

    if (!isRecord(body.value) || !Array.isArray(body.value.results)) {
      return { success: false, error: 'MALFORMED_RESPONSE' };
    }

    const results: SearchResult[] = [];
    for (const entry of body.value.results) {
      const result = toSearchResult(entry);
      if (result) {
        results.push(result);
      }
    }
    return { success: true, value: results };
  }

  private async post(payload: Record<string, string>): Promise<Result<unknown, ResolutionError>> {
    let response: Response;
    try {
      response = await fetch(this.options.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (error) {
      const category = categorizeFailure(error);
      console.error(`Resolver request failed (${category}):`, error instanceof Error ? error.message : error);
      return { success: false, error: category };
    }

    if (response.status === 500) {
      console.error('Resolver reported an internal error');
      return { success: false, error: 'SERVER_ERROR' };
    }

    if (response.status !== 200) {
      console.error(`Resolver answered HTTP ${response.status}`);
      return { success: false, error: 'HTTP_ERROR' };
    }

    try {
      const parsed: unknown = await response.json();
      return { success: true, value: parsed };
    } catch (error) {
      const category = categorizeFailure(error);
      if (category === 'TIMEOUT') {
        return { success: false, error: category };
      }
      return { success: false, error: 'MALFORMED_RESPONSE' };
    }
  }
}
