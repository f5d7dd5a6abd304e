import type { Channel } from '../config.js';
import { PermanentFetchError, type FetchError } from '../core/errors.js';
import { withRetry, type RetryOptions } from '../core/rateLimit.js';
import { err, ok, type Result } from '../core/result.js';
import type { YouTubeClient } from './client.js';
import {
  channelListSchema,
  commentThreadsSchema,
  playlistItemsSchema,
  videoListSchema,
  type AnyPage,
  type CommentsCursor,
  type CommentsPage,
  type Cursor,
  type DataKind,
  type FetchedComment,
  type FetchedMetric,
  type FetchedVideo,
  type MetricsCursor,
  type MetricsPage,
  type VideoListResponse,
  type VideosCursor,
  type VideosPage,
} from './types.js';

export interface FetcherOptions {
  pageSize: number;
  commentPageSize: number;
  retry: RetryOptions;
}

type VideoResource = VideoListResponse['items'][number];

function parseCount(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const n = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : null;
}

function toFetchedVideo(item: VideoResource): FetchedVideo {
  return {
    kind: 'videos',
    externalId: item.id ?? null,
    channelId: item.snippet?.channelId ?? null,
    title: item.snippet?.title ?? null,
    publishedAt: item.snippet?.publishedAt ?? null,
    duration: item.contentDetails?.duration ?? null,
    payload: item,
  };
}

function toFetchedMetric(item: VideoResource): FetchedMetric {
  return {
    kind: 'metrics',
    externalId: item.id ?? null,
    viewCount: parseCount(item.statistics?.viewCount),
    likeCount: parseCount(item.statistics?.likeCount),
    commentCount: parseCount(item.statistics?.commentCount),
    payload: item,
  };
}

/** Keeps the order of the ids we asked for; the API does not promise it. */
function inRequestOrder(ids: readonly string[], items: VideoResource[]): VideoResource[] {
  const position = new Map(ids.map((id, index) => [id, index]));
  return [...items].sort((a, b) =>
    (position.get(a.id ?? '') ?? Number.MAX_SAFE_INTEGER) - (position.get(b.id ?? '') ?? Number.MAX_SAFE_INTEGER));
}

/**
 * Paginated reads of one channel's videos, metric snapshots and comments.
 * Every HTTP call goes through the shared retry helper, so transient errors
 * are retried here and everything else comes back to the caller as a value.
 */
export class QuotaAwareFetcher {
  constructor(
    private readonly client: YouTubeClient,
    private readonly options: FetcherOptions,
  ) {}

  fetch(channel: Channel, kind: 'videos', cursor: VideosCursor | null): Promise<Result<VideosPage, FetchError>>;
  fetch(channel: Channel, kind: 'metrics', cursor: MetricsCursor | null): Promise<Result<MetricsPage, FetchError>>;
  fetch(channel: Channel, kind: 'comments', cursor: CommentsCursor | null): Promise<Result<CommentsPage, FetchError>>;
  fetch(channel: Channel, kind: DataKind, cursor: Cursor | null): Promise<Result<AnyPage, FetchError>>;
  async fetch(channel: Channel, kind: DataKind, cursor: Cursor | null): Promise<Result<AnyPage, FetchError>> {
    if (cursor && cursor.kind !== kind) {
      throw new Error(`Cursor for ${cursor.kind} passed to a ${kind} fetch`);
    }
    switch (kind) {
      case 'videos':
        return this.fetchVideos(channel, cursor?.kind === 'videos' ? cursor : null);
      case 'metrics':
        return this.fetchMetrics(cursor?.kind === 'metrics' ? cursor : null);
      case 'comments':
        return this.fetchComments(channel, cursor?.kind === 'comments' ? cursor : null);
    }
  }

  private call<T>(label: string, request: () => Promise<Result<T, FetchError>>): Promise<Result<T, FetchError>> {
    return withRetry(() => request(), { ...this.options.retry, label });
  }

  private async resolveUploadsPlaylist(channel: Channel): Promise<Result<string, FetchError>> {
    const response = await this.call(`channels.list ${channel.id}`, () =>
      this.client.get('channels', { id: channel.id, part: 'contentDetails' }, channelListSchema));
    if (!response.ok) return response;

    const uploads = response.value.items[0]?.contentDetails?.relatedPlaylists?.uploads;
    if (response.value.items.length === 0) {
      return err(new PermanentFetchError(`Channel ${channel.id} not found`, null, { channelId: channel.id }));
    }
    if (!uploads) {
      return err(new PermanentFetchError(`Channel ${channel.id} has no uploads playlist`, null, { channelId: channel.id }));
    }
    return ok(uploads);
  }

  private async fetchVideos(channel: Channel, cursor: VideosCursor | null): Promise<Result<VideosPage, FetchError>> {
    let requestCount = 0;
    let playlistId = cursor?.uploadsPlaylistId;

    if (!playlistId) {
      const uploads = await this.resolveUploadsPlaylist(channel);
      requestCount++;
      if (!uploads.ok) return uploads;
      playlistId = uploads.value;
    }

    const params: Record<string, string> = {
      playlistId,
      part: 'contentDetails',
      maxResults: String(this.options.pageSize),
    };
    if (cursor?.pageToken) params.pageToken = cursor.pageToken;

    const listing = await this.call(`playlistItems.list ${playlistId}`, () =>
      this.client.get('playlistItems', params, playlistItemsSchema));
    requestCount++;
    if (!listing.ok) return listing;

    const ids = listing.value.items
      .map(item => item.contentDetails?.videoId)
      .filter((id): id is string => typeof id === 'string' && id.length > 0);

    let items: FetchedVideo[] = [];
    if (ids.length > 0) {
      const details = await this.call(`videos.list ${channel.id}`, () =>
        this.client.get('videos', { id: ids.join(','), part: 'snippet,contentDetails' }, videoListSchema));
      requestCount++;
      if (!details.ok) return details;
      items = inRequestOrder(ids, details.value.items).map(toFetchedVideo);
    }

    const nextToken = listing.value.nextPageToken;
    return ok({
      items,
      itemCount: items.length,
      next: nextToken ? { kind: 'videos', uploadsPlaylistId: playlistId, pageToken: nextToken } : null,
      requestCount,
    });
  }

  /** A null cursor means no known videos: an empty, terminal page. */
  private async fetchMetrics(cursor: MetricsCursor | null): Promise<Result<MetricsPage, FetchError>> {
    const videoIds = cursor?.videoIds ?? [];
    const offset = cursor?.offset ?? 0;
    const ids = videoIds.slice(offset, offset + this.options.pageSize);

    if (ids.length === 0) {
      return ok({ items: [], itemCount: 0, next: null, requestCount: 0 });
    }

    const details = await this.call(`videos.list statistics@${offset}`, () =>
      this.client.get('videos', { id: ids.join(','), part: 'statistics' }, videoListSchema));
    if (!details.ok) return details;

    const items = inRequestOrder(ids, details.value.items).map(toFetchedMetric);
    const nextOffset = offset + ids.length;
    return ok({
      items,
      itemCount: items.length,
      next: nextOffset < videoIds.length ? { kind: 'metrics', videoIds, offset: nextOffset } : null,
      requestCount: 1,
    });
  }

  private async fetchComments(channel: Channel, cursor: CommentsCursor | null): Promise<Result<CommentsPage, FetchError>> {
    const params: Record<string, string> = {
      allThreadsRelatedToChannelId: channel.id,
      part: 'snippet',
      order: 'time',
      textFormat: 'plainText',
      maxResults: String(this.options.commentPageSize),
    };
    if (cursor?.pageToken) params.pageToken = cursor.pageToken;

    const response = await this.call(`commentThreads.list ${channel.id}`, () =>
      this.client.get('commentThreads', params, commentThreadsSchema));
    if (!response.ok) return response;

    const items = response.value.items.map((thread): FetchedComment => {
      const top = thread.snippet?.topLevelComment;
      const snippet = top?.snippet;
      return {
        kind: 'comments',
        externalId: top?.id ?? thread.id ?? null,
        videoId: thread.snippet?.videoId ?? null,
        channelId: thread.snippet?.channelId ?? channel.id,
        authorId: snippet?.authorChannelId?.value ?? null,
        authorName: snippet?.authorDisplayName ?? null,
        text: snippet?.textOriginal ?? snippet?.textDisplay ?? null,
        postedAt: snippet?.publishedAt ?? null,
        likeCount: snippet?.likeCount ?? 0,
        payload: thread,
      };
    });

    const nextToken = response.value.nextPageToken;
    return ok({
      items,
      itemCount: items.length,
      next: nextToken ? { kind: 'comments', pageToken: nextToken } : null,
      requestCount: 1,
    });
  }
}
