/**
 * Publish pipeline
 *
 * caption -> upload (bounded) -> container -> publish (not-ready retry)
 * -> permalink (with fallback). The post step as a whole is retried for
 * transient failures and bounded by an overall timeout.
 */

import type { ISocialPublisher, IStorageUploader } from '../clients/types.js';
import type { ScheduleEntry } from '../data/types/scheduleEntry.js';
import { publishLogger, serializeError } from '../logging/index.js';
import { MediaNotReadyError, UploadError } from '../shared/errors.js';
import { DelayUtils } from '../worker/DelayUtils.js';
import { resolveCaption, type CaptionSource } from './caption.js';
import { getImageInfo } from './imageValidation.js';
import {
  PUBLISH_BACKOFF,
  isTransientFailure,
  retryWithBackoff,
  throwIfAborted,
  withTimeout,
  type BackoffPolicy,
  type Sleep,
} from './retry.js';

export const UPLOAD_TIMEOUT_MS = 60000;
export const POST_TIMEOUT_MS = 180000;

export interface PublishResult {
  publishedUrl: string;
  completedAt: Date;
  mediaId: string;
  captionSource: CaptionSource;
}

export interface PublishPipelineDeps {
  uploader: IStorageUploader;
  publisher: ISocialPublisher;
  sleep?: Sleep;
  clock?: () => Date;
  readEmbeddedCaption?: (imagePath: string) => Promise<string | null>;
  backoff?: BackoffPolicy;
  uploadTimeoutMs?: number;
  postTimeoutMs?: number;
}

export function fallbackPermalink(mediaId: string): string {
  return `https://www.instagram.com/p/${mediaId}/`;
}

export class PublishPipeline {
  private readonly sleep: Sleep;
  private readonly clock: () => Date;
  private readonly backoff: BackoffPolicy;

  constructor(private readonly deps: PublishPipelineDeps) {
    this.sleep = deps.sleep ?? ((ms, signal) => DelayUtils.sleep(ms, signal));
    this.clock = deps.clock ?? (() => new Date());
    this.backoff = deps.backoff ?? PUBLISH_BACKOFF;
  }

  /**
   * @throws UploadError when the upload fails or times out (nothing was posted)
   * @throws RetryExhaustedError when transient failures outlast the backoff policy
   * @throws PermanentProviderError for failures a retry cannot fix
   * @throws TimeoutError when the post step exceeds its budget; the step
   * is cancelled before it can create or publish another container
   */
  async publish(entry: ScheduleEntry): Promise<PublishResult> {
    const { filename, originalPath } = entry;

    if (publishLogger.isLevelEnabled('debug')) {
      const info = await getImageInfo(originalPath);
      publishLogger.debug({ filename, ...info }, 'Publishing image');
    }

    const caption = await resolveCaption(originalPath, entry.caption, this.deps.readEmbeddedCaption);
    publishLogger.info({ filename, captionSource: caption.source, captionLength: caption.text.length }, 'Resolved caption');

    let imageUrl: string;
    try {
      imageUrl = await withTimeout(
        signal => this.deps.uploader.upload(originalPath, signal),
        this.deps.uploadTimeoutMs ?? UPLOAD_TIMEOUT_MS,
        'upload'
      );
    } catch (error) {
      throw new UploadError(
        `Upload failed for ${filename}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    publishLogger.info({ filename }, 'Uploaded to storage');

    const mediaId = await withTimeout(
      signal => retryWithBackoff('post', () => this.postOnce(filename, imageUrl, caption.text, signal), {
        policy: this.backoff,
        shouldRetry: isTransientFailure,
        sleep: this.sleep,
        signal,
      }),
      this.deps.postTimeoutMs ?? POST_TIMEOUT_MS,
      'post'
    );

    const publishedUrl = await this.resolvePermalink(filename, mediaId);
    return { publishedUrl, completedAt: this.clock(), mediaId, captionSource: caption.source };
  }

  private async postOnce(filename: string, imageUrl: string, caption: string, signal: AbortSignal): Promise<string> {
    const { publisher } = this.deps;
    throwIfAborted(signal);
    const containerId = await publisher.createContainer(imageUrl, caption, signal);
    publishLogger.debug({ filename, containerId }, 'Media container created');

    throwIfAborted(signal);
    return retryWithBackoff('publish_container', () => publisher.publishContainer(containerId, signal), {
      policy: this.backoff,
      shouldRetry: (error) => error instanceof MediaNotReadyError,
      sleep: this.sleep,
      signal,
    });
  }

  private async resolvePermalink(filename: string, mediaId: string): Promise<string> {
    try {
      return await this.deps.publisher.getPermalink(mediaId);
    } catch (error) {
      const fallback = fallbackPermalink(mediaId);
      publishLogger.warn({ filename, mediaId, fallback, error: serializeError(error) }, 'Permalink lookup failed, using constructed URL');
      return fallback;
    }
  }
}
