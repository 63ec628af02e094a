import { readFile } from 'fs/promises';
import { basename } from 'path';
import { z } from 'zod';
import type { DropboxConfig } from '../config/index.js';
import { HttpError, postBytes, postForm, postJson } from '../http/client.js';
import { createChildLogger } from '../logging/index.js';
import type { IStorageUploader } from './types.js';

const dropboxLogger = createChildLogger('DROPBOX');

const TOKEN_URL = 'https://api.dropboxapi.com/oauth2/token';
const API_URL = 'https://api.dropboxapi.com/2';
const CONTENT_URL = 'https://content.dropboxapi.com/2';

const UPLOAD_TIMEOUT_MS = 60000;
const API_TIMEOUT_MS = 15000;
// Refresh a little before the provider's stated expiry
const TOKEN_EXPIRY_MARGIN_MS = 60000;

const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().optional(),
});

const fileMetadataSchema = z.object({
  path_display: z.string().optional(),
  path_lower: z.string().optional(),
});

const sharedLinkSchema = z.object({ url: z.string() });

const listSharedLinksSchema = z.object({
  links: z.array(sharedLinkSchema),
});

/**
 * JSON for the Dropbox-API-Arg header: HTTP headers must be ASCII, so
 * every character from 0x7f up is escaped.
 */
export function headerSafeJson(value: unknown): string {
  return JSON.stringify(value).replace(/[\u007f-\uffff]/g, (ch) =>
    `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/**
 * Turn a shared-link page URL into one that serves the file bytes.
 */
export function toDirectContentUrl(sharedUrl: string): string {
  const url = new URL(sharedUrl);
  if (url.hostname === 'www.dropbox.com' || url.hostname === 'dropbox.com') {
    url.hostname = 'dl.dropboxusercontent.com';
  }
  url.searchParams.delete('dl');
  url.searchParams.set('raw', '1');
  return url.toString();
}

export function remotePathFor(folderPath: string, localPath: string): string {
  const folder = folderPath.replace(/\/+$/, '');
  return `${folder}/${basename(localPath)}`.replace(/^(?!\/)/, '/');
}

function isSharedLinkAlreadyExists(error: unknown): boolean {
  return error instanceof HttpError && error.status === 409 && error.body.includes('shared_link_already_exists');
}

/**
 * Dropbox storage through the HTTP API, authenticated with a long-lived
 * refresh token exchanged for short-lived access tokens.
 */
export class DropboxUploader implements IStorageUploader {
  private accessToken: string | null = null;
  private accessTokenExpiresAt = 0;

  constructor(
    private readonly config: DropboxConfig,
    private readonly now: () => number = Date.now
  ) { }

  async upload(localPath: string, signal?: AbortSignal): Promise<string> {
    const remotePath = remotePathFor(this.config.folderPath, localPath);
    const bytes = await readFile(localPath, { signal });
    const token = await this.getAccessToken(signal);

    const metadata = await postBytes(`${CONTENT_URL}/files/upload`, bytes, fileMetadataSchema, {
      timeoutMs: UPLOAD_TIMEOUT_MS,
      maxRetries: 0,
      headers: {
        Authorization: `Bearer ${token}`,
        'Dropbox-API-Arg': headerSafeJson({ path: remotePath, mode: 'overwrite', autorename: false, mute: true }),
      },
      signal,
      context: { operation: 'files/upload', remotePath },
    });

    const uploadedPath = metadata.path_display ?? metadata.path_lower ?? remotePath;
    dropboxLogger.info({ remotePath: uploadedPath, bytes: bytes.length }, 'Uploaded file');

    const sharedUrl = await this.getSharedLink(uploadedPath, token, signal);
    return toDirectContentUrl(sharedUrl);
  }

  private async getSharedLink(path: string, token: string, signal?: AbortSignal): Promise<string> {
    const headers = { Authorization: `Bearer ${token}` };
    try {
      const link = await postJson(
        `${API_URL}/sharing/create_shared_link_with_settings`,
        { path, settings: { requested_visibility: 'public' } },
        sharedLinkSchema,
        { timeoutMs: API_TIMEOUT_MS, maxRetries: 0, headers, signal, context: { operation: 'create_shared_link' } }
      );
      return link.url;
    } catch (error) {
      if (!isSharedLinkAlreadyExists(error)) {
        throw error;
      }
    }

    const existing = await postJson(
      `${API_URL}/sharing/list_shared_links`,
      { path, direct_only: true },
      listSharedLinksSchema,
      { timeoutMs: API_TIMEOUT_MS, maxRetries: 0, headers, signal, context: { operation: 'list_shared_links' } }
    );
    const first = existing.links[0];
    if (!first) {
      throw new Error(`Dropbox reported an existing shared link for ${path} but listed none`);
    }
    return first.url;
  }

  private async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.accessToken && this.now() < this.accessTokenExpiresAt) {
      return this.accessToken;
    }

    const response = await postForm(
      TOKEN_URL,
      {
        grant_type: 'refresh_token',
        refresh_token: this.config.refreshToken,
        client_id: this.config.appKey,
        client_secret: this.config.appSecret,
      },
      tokenResponseSchema,
      { timeoutMs: API_TIMEOUT_MS, maxRetries: 1, signal, context: { operation: 'oauth2/token' } }
    );

    const lifetimeMs = (response.expires_in ?? 4 * 3600) * 1000;
    this.accessToken = response.access_token;
    this.accessTokenExpiresAt = this.now() + Math.max(0, lifetimeMs - TOKEN_EXPIRY_MARGIN_MS);
    dropboxLogger.debug({ expiresInMs: lifetimeMs }, 'Refreshed Dropbox access token');
    return this.accessToken;
  }
}
