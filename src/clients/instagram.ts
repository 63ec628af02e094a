import { z } from 'zod';
import type { InstagramConfig } from '../config/index.js';
import { HttpError, getJson, postForm } from '../http/client.js';
import { createChildLogger } from '../logging/index.js';
import {
  MediaNotReadyError,
  PermanentProviderError,
  TransientProviderError,
} from '../shared/errors.js';
import type { AccountInfo, IAccountReader, ISocialPublisher, MediaSummary } from './types.js';

const instagramLogger = createChildLogger('INSTAGRAM');

export const GRAPH_API_BASE = 'https://graph.facebook.com';
const PROVIDER = 'instagram';
const REQUEST_TIMEOUT_MS = 30000;

/** Graph error codes that describe throttling or a provider-side hiccup. */
const TRANSIENT_ERROR_CODES = new Set([1, 2, 4, 17, 32, 341]);

/** Subcodes raised while the provider is still fetching the container's image. */
const MEDIA_NOT_READY_SUBCODES = new Set([2207027, 2207006]);

const graphErrorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    type: z.string().optional(),
    code: z.number().optional(),
    error_subcode: z.number().optional(),
    is_transient: z.boolean().optional(),
    error_user_msg: z.string().optional(),
  }),
});

const idResponseSchema = z.object({ id: z.string() });
const permalinkResponseSchema = z.object({ permalink: z.string().optional() });

const accountResponseSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  username: z.string().optional(),
  followers_count: z.number().optional(),
  media_count: z.number().optional(),
});

const mediaListResponseSchema = z.object({
  data: z.array(z.object({
    id: z.string(),
    media_type: z.string().optional(),
    caption: z.string().optional(),
    permalink: z.string().optional(),
    timestamp: z.string().optional(),
  })),
});

/**
 * Map a failed Graph API call onto the provider error taxonomy.
 * Errors that did not come from an HTTP exchange pass through.
 */
export function classifyGraphError(error: unknown): Error {
  if (!(error instanceof HttpError)) {
    return error instanceof Error ? error : new Error(String(error));
  }
  if (error.isNetworkError) {
    return new TransientProviderError(error.message, PROVIDER, 0);
  }

  let parsedBody: unknown = null;
  try {
    parsedBody = JSON.parse(error.body);
  } catch {
    parsedBody = null;
  }
  const parsed = graphErrorBodySchema.safeParse(parsedBody);
  const detail = parsed.success ? parsed.data.error : undefined;

  const message = detail?.error_user_msg || detail?.message || error.message;
  const code = detail?.code;
  const subcode = detail?.error_subcode;
  const description = `${message}${code !== undefined ? ` (code ${code}${subcode !== undefined ? `, subcode ${subcode}` : ''})` : ''}`;

  if ((subcode !== undefined && MEDIA_NOT_READY_SUBCODES.has(subcode)) || /media (is )?not ready/i.test(message)) {
    return new MediaNotReadyError(description, PROVIDER, error.status, code);
  }

  const transient = detail?.is_transient === true
    || (code !== undefined && TRANSIENT_ERROR_CODES.has(code))
    || error.status === 429
    || error.status >= 500;

  return transient
    ? new TransientProviderError(description, PROVIDER, error.status, code)
    : new PermanentProviderError(description, PROVIDER, error.status, code);
}

/**
 * Instagram content publishing through the Facebook Graph API.
 */
export class InstagramGraphPublisher implements ISocialPublisher, IAccountReader {
  private readonly baseUrl: string;

  constructor(private readonly config: InstagramConfig) {
    this.baseUrl = `${GRAPH_API_BASE}/${config.graphApiVersion}`;
  }

  async createContainer(imageUrl: string, caption: string, signal?: AbortSignal): Promise<string> {
    const { id } = await this.call('create_container', () => postForm(
      `${this.baseUrl}/${this.config.businessAccountId}/media`,
      { image_url: imageUrl, caption, access_token: this.config.accessToken },
      idResponseSchema,
      { timeoutMs: REQUEST_TIMEOUT_MS, maxRetries: 0, signal, context: { operation: 'media' } }
    ));
    instagramLogger.info({ containerId: id }, 'Created media container');
    return id;
  }

  async publishContainer(containerId: string, signal?: AbortSignal): Promise<string> {
    const { id } = await this.call('publish_container', () => postForm(
      `${this.baseUrl}/${this.config.businessAccountId}/media_publish`,
      { creation_id: containerId, access_token: this.config.accessToken },
      idResponseSchema,
      { timeoutMs: REQUEST_TIMEOUT_MS, maxRetries: 0, signal, context: { operation: 'media_publish' } }
    ));
    instagramLogger.info({ containerId, mediaId: id }, 'Published media container');
    return id;
  }

  async getPermalink(mediaId: string): Promise<string> {
    const query = new URLSearchParams({ fields: 'permalink', access_token: this.config.accessToken });
    const { permalink } = await this.call('get_permalink', () => getJson(
      `${this.baseUrl}/${mediaId}?${query.toString()}`,
      permalinkResponseSchema,
      { timeoutMs: REQUEST_TIMEOUT_MS, maxRetries: 0, context: { operation: 'permalink' } }
    ));
    if (!permalink) {
      throw new PermanentProviderError(`No permalink returned for media ${mediaId}`, PROVIDER);
    }
    return permalink;
  }

  async getAccountInfo(): Promise<AccountInfo> {
    const query = new URLSearchParams({
      fields: 'name,username,followers_count,media_count',
      access_token: this.config.accessToken,
    });
    const account = await this.call('account_info', () => getJson(
      `${this.baseUrl}/${this.config.businessAccountId}?${query.toString()}`,
      accountResponseSchema,
      { timeoutMs: REQUEST_TIMEOUT_MS, maxRetries: 1, context: { operation: 'account' } }
    ));
    return {
      id: account.id,
      name: account.name,
      username: account.username,
      followersCount: account.followers_count,
      mediaCount: account.media_count,
    };
  }

  async listRecentMedia(limit: number): Promise<MediaSummary[]> {
    const query = new URLSearchParams({
      fields: 'id,caption,media_type,permalink,timestamp',
      limit: String(limit),
      access_token: this.config.accessToken,
    });
    const { data } = await this.call('recent_media', () => getJson(
      `${this.baseUrl}/${this.config.businessAccountId}/media?${query.toString()}`,
      mediaListResponseSchema,
      { timeoutMs: REQUEST_TIMEOUT_MS, maxRetries: 1, context: { operation: 'media_list' } }
    ));
    return data.map(item => ({
      id: item.id,
      mediaType: item.media_type,
      caption: item.caption,
      permalink: item.permalink,
      timestamp: item.timestamp,
    }));
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      const classified = classifyGraphError(error);
      instagramLogger.debug(
        { operation, errorType: classified.name, error: classified.message },
        `Graph API ${operation} failed`
      );
      throw classified;
    }
  }
}
