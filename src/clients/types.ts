/**
 * Provider Client Interfaces
 *
 * The publish pipeline talks to storage and the social network only through
 * these contracts. Production wires the Dropbox and Instagram Graph clients;
 * tests supply in-process fakes.
 */

/**
 * Uploads a local file and returns a publicly fetchable direct-content URL
 */
export interface IStorageUploader {
  upload(localPath: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Two-step social publishing: stage a container, then publish it
 */
export interface ISocialPublisher {
  /**
   * Stage a media container referencing `imageUrl`
   *
   * @returns container id
   */
  createContainer(imageUrl: string, caption: string, signal?: AbortSignal): Promise<string>;

  /**
   * Publish a staged container.
   *
   * Throws MediaNotReadyError while the provider is still fetching the image;
   * other TransientProviderErrors for rate limits and outages; and
   * PermanentProviderError for anything a retry cannot fix.
   *
   * @returns published media id
   */
  publishContainer(containerId: string, signal?: AbortSignal): Promise<string>;

  getPermalink(mediaId: string): Promise<string>;
}

export interface AccountInfo {
  id: string;
  username?: string;
  name?: string;
  followersCount?: number;
  mediaCount?: number;
}

export interface MediaSummary {
  id: string;
  mediaType?: string;
  caption?: string;
  permalink?: string;
  /** Provider timestamp, e.g. "2026-10-26T11:00:42+0000" */
  timestamp?: string;
}

/**
 * Read-only account queries for operators
 */
export interface IAccountReader {
  getAccountInfo(): Promise<AccountInfo>;
  listRecentMedia(limit: number): Promise<MediaSummary[]>;
}
