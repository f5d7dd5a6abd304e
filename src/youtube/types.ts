import { z } from 'zod';

export const DATA_KINDS = ['videos', 'metrics', 'comments'] as const;
export type DataKind = (typeof DATA_KINDS)[number];

export function isDataKind(value: string): value is DataKind {
  return (DATA_KINDS as readonly string[]).includes(value);
}

// ============================================================================
// API RESPONSE SHAPES (only the fields we rely on; everything else is kept)
// ============================================================================

const loose = <T extends z.ZodRawShape>(shape: T) => z.object(shape).passthrough();

export const apiErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional(), message: z.string().optional() })).optional(),
  }),
});

export const channelListSchema = loose({
  items: z.array(loose({
    id: z.string(),
    contentDetails: loose({
      relatedPlaylists: loose({ uploads: z.string().optional() }).optional(),
    }).optional(),
  })).default([]),
});

export const playlistItemsSchema = loose({
  nextPageToken: z.string().optional(),
  items: z.array(loose({
    contentDetails: loose({ videoId: z.string().optional() }).optional(),
  })).default([]),
});

const countString = z.union([z.string(), z.number()]).optional();

export const videoListSchema = loose({
  items: z.array(loose({
    id: z.string().optional(),
    snippet: loose({
      channelId: z.string().optional(),
      title: z.string().optional(),
      publishedAt: z.string().optional(),
    }).optional(),
    contentDetails: loose({ duration: z.string().optional() }).optional(),
    statistics: loose({
      viewCount: countString,
      likeCount: countString,
      commentCount: countString,
    }).optional(),
  })).default([]),
});

export const commentThreadsSchema = loose({
  nextPageToken: z.string().optional(),
  items: z.array(loose({
    id: z.string().optional(),
    snippet: loose({
      videoId: z.string().optional(),
      channelId: z.string().optional(),
      topLevelComment: loose({
        id: z.string().optional(),
        snippet: loose({
          authorChannelId: loose({ value: z.string().optional() }).optional(),
          authorDisplayName: z.string().optional(),
          textOriginal: z.string().optional(),
          textDisplay: z.string().optional(),
          publishedAt: z.string().optional(),
          likeCount: z.number().optional(),
        }).optional(),
      }).optional(),
    }).optional(),
  })).default([]),
});

export type ChannelListResponse = z.infer<typeof channelListSchema>;
export type PlaylistItemsResponse = z.infer<typeof playlistItemsSchema>;
export type VideoListResponse = z.infer<typeof videoListSchema>;
export type CommentThreadsResponse = z.infer<typeof commentThreadsSchema>;

// ============================================================================
// NORMALIZED ITEMS
// Critical fields stay nullable here; rejecting them is the writer's job so the
// quality gate can count them.
// ============================================================================

export interface FetchedVideo {
  kind: 'videos';
  externalId: string | null;
  channelId: string | null;
  title: string | null;
  publishedAt: string | null;
  duration: string | null;
  payload: unknown;
}

export interface FetchedMetric {
  kind: 'metrics';
  externalId: string | null;
  viewCount: number | null;
  likeCount: number | null;
  commentCount: number | null;
  payload: unknown;
}

export interface FetchedComment {
  kind: 'comments';
  externalId: string | null;
  videoId: string | null;
  channelId: string | null;
  authorId: string | null;
  authorName: string | null;
  text: string | null;
  postedAt: string | null;
  likeCount: number;
  payload: unknown;
}

export type FetchedItem = FetchedVideo | FetchedMetric | FetchedComment;

export interface VideosCursor {
  kind: 'videos';
  uploadsPlaylistId: string;
  pageToken: string | null;
}

export interface MetricsCursor {
  kind: 'metrics';
  videoIds: readonly string[];
  offset: number;
}

export interface CommentsCursor {
  kind: 'comments';
  pageToken: string | null;
}

export type Cursor = VideosCursor | MetricsCursor | CommentsCursor;

export interface Page<I extends FetchedItem, C extends Cursor> {
  items: I[];
  itemCount: number;
  /** null once the stream is exhausted */
  next: C | null;
  requestCount: number;
}

export type VideosPage = Page<FetchedVideo, VideosCursor>;
export type MetricsPage = Page<FetchedMetric, MetricsCursor>;
export type CommentsPage = Page<FetchedComment, CommentsCursor>;
export type AnyPage = VideosPage | MetricsPage | CommentsPage;
