import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { FatalError, FatalReason, TransientError } from './errors.js';
import { ILogger } from './interfaces/logger.js';
import { IProfileSource, PostsPage, PostsPageRequest } from './interfaces/profile-source.js';
import { MediaType, PostRecord, ProfileMetadata } from './types.js';
import { extractHashtags } from './analytics/hashtags.js';
import { parseTimestamp } from './analytics/time.js';

export const DEFAULT_GRAPH_API_VERSION = 'v19.0';

const PROFILE_FIELDS = [
  'username',
  'name',
  'biography',
  'website',
  'followers_count',
  'follows_count',
  'media_count',
  'profile_picture_url',
  'ig_id',
].join(',');

const MEDIA_FIELDS = ['id', 'caption', 'like_count', 'comments_count', 'timestamp', 'permalink', 'media_type'].join(',');

// Throttling and temporary server-side failures.
// https://developers.facebook.com/docs/graph-api/guides/error-handling
const TRANSIENT_GRAPH_CODES = new Set([1, 2, 4, 17, 32, 341, 613]);
const PERMISSION_GRAPH_CODES = new Set([3, 10]);
const USER_NOT_FOUND_SUBCODE = 2207013;

const countSchema = z.number().int().nonnegative().catch(0);

const profileSchema = z.object({
  username: z.string(),
  name: z.string().optional(),
  biography: z.string().optional(),
  website: z.string().optional(),
  followers_count: countSchema.default(0),
  follows_count: countSchema.default(0),
  media_count: countSchema.default(0),
  profile_picture_url: z.string().optional(),
  ig_id: z.union([z.number(), z.string()]).optional(),
});

const mediaSchema = z.object({
  id: z.string(),
  caption: z.string().optional(),
  like_count: countSchema.default(0),
  comments_count: countSchema.default(0),
  timestamp: z.string(),
  permalink: z.string().optional(),
  media_type: z.string().optional(),
});

const profileResponseSchema = z.object({
  business_discovery: profileSchema.optional(),
});

const mediaResponseSchema = z.object({
  business_discovery: z
    .object({
      media: z
        .object({
          data: z.array(mediaSchema),
          paging: z
            .object({
              cursors: z.object({ after: z.string().optional() }).optional(),
              next: z.string().optional(),
            })
            .optional(),
        })
        .optional(),
    })
    .optional(),
});

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    type: z.string().optional(),
    code: z.number().optional(),
    error_subcode: z.number().optional(),
  }),
});

const usageSchema = z.record(
  z.array(
    z.object({
      estimated_time_to_regain_access: z.number().optional(),
    })
  )
);

export interface GraphApiClientOptions {
  accessToken: string;
  /** Instagram user id of the professional account the token belongs to. */
  igUserId: string;
  apiVersion?: string;
  baseUrl?: string;
  timeout?: number;
  httpClient?: AxiosInstance;
  logger?: ILogger;
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (!headers || typeof headers !== 'object') return undefined;
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Retry hint from `Retry-After` (seconds or HTTP date) or the business use case
 * usage header (`estimated_time_to_regain_access`, minutes).
 */
export function retryAfterFromHeaders(headers: unknown, now: number = Date.now()): number | undefined {
  const retryAfter = headerValue(headers, 'retry-after');
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) {
      return Math.max(0, seconds * 1000);
    }
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) {
      return Math.max(0, date - now);
    }
  }

  const usage = headerValue(headers, 'x-business-use-case-usage');
  return usage ? regainAccessMs(usage) : undefined;
}

function regainAccessMs(usage: string): number | undefined {
  let json: unknown;
  try {
    json = JSON.parse(usage);
  } catch {
    return undefined;
  }

  const parsed = usageSchema.safeParse(json);
  if (!parsed.success) {
    return undefined;
  }
  const minutes = Object.values(parsed.data)
    .flat()
    .map(entry => entry.estimated_time_to_regain_access ?? 0);
  const longest = Math.max(0, ...minutes);
  return longest > 0 ? longest * 60 * 1000 : undefined;
}

/**
 * Map any failure of a Graph API call onto the transient/fatal split.
 */
export function classifyGraphError(error: unknown): TransientError | FatalError {
  if (error instanceof TransientError || error instanceof FatalError) {
    return error;
  }

  if (!axios.isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new FatalError(`Unexpected Graph API failure: ${message}`, { cause: error });
  }

  const response = error.response;
  if (!response) {
    // No response: the request timed out or the connection failed.
    return new TransientError(`Network error: ${error.code ?? error.message}`, { cause: error });
  }

  const status = response.status;
  const parsed = graphErrorSchema.safeParse(response.data);
  const graphError = parsed.success ? parsed.data.error : undefined;
  const code = graphError?.code;
  const message = graphError?.message ?? error.message;
  const detail = code !== undefined ? `${message} (code ${code})` : message;

  const isThrottle = status === 429 || (code !== undefined && (TRANSIENT_GRAPH_CODES.has(code) || (code >= 80001 && code <= 80009)));
  if (isThrottle || status >= 500) {
    return new TransientError(detail, {
      status,
      retryAfterMs: retryAfterFromHeaders(response.headers),
      cause: error,
    });
  }

  let reason: FatalReason = 'unknown';
  if (code === 190 || status === 401) {
    reason = 'auth';
  } else if ((code !== undefined && (PERMISSION_GRAPH_CODES.has(code) || (code >= 200 && code <= 299))) || status === 403) {
    reason = 'permission';
  } else if (graphError?.error_subcode === USER_NOT_FOUND_SUBCODE || status === 404) {
    reason = 'not-found';
  } else if (status === 400 || code === 100 || code === 110) {
    reason = 'invalid-request';
  }

  return new FatalError(detail, { reason, status, cause: error });
}

function toMediaType(value: string | undefined): MediaType {
  switch (value) {
    case 'IMAGE':
    case 'VIDEO':
    case 'CAROUSEL_ALBUM':
    case 'REELS':
      return value;
    default:
      return 'UNKNOWN';
  }
}

/**
 * Instagram Graph API client reading public professional accounts through the
 * business discovery edge.
 */
export class GraphApiClient implements IProfileSource {
  private client: AxiosInstance;
  private accessToken: string;
  private igUserId: string;
  private logger?: ILogger;

  constructor(options: GraphApiClientOptions) {
    const version = options.apiVersion || DEFAULT_GRAPH_API_VERSION;
    const baseUrl = options.baseUrl || `https://graph.facebook.com/${version}`;

    this.accessToken = options.accessToken;
    this.igUserId = options.igUserId;
    this.logger = options.logger;
    this.client =
      options.httpClient ??
      axios.create({
        baseURL: baseUrl,
        headers: {
          Accept: 'application/json',
        },
        timeout: options.timeout ?? 30000,
      });
  }

  async getProfile(username: string, signal?: AbortSignal): Promise<ProfileMetadata> {
    this.logger?.debug(`Fetching profile: ${username}`);
    const data = await this.request(`business_discovery.username(${username}){${PROFILE_FIELDS}}`, signal);

    const parsed = profileResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new FatalError(`Malformed profile response for ${username}`, { cause: parsed.error });
    }

    const profile = parsed.data.business_discovery;
    if (!profile) {
      throw new FatalError(`Profile ${username} not found or not a professional account`, { reason: 'not-found' });
    }

    return {
      username: profile.username,
      name: profile.name ?? '',
      biography: profile.biography ?? '',
      website: profile.website ?? null,
      followersCount: profile.followers_count,
      followsCount: profile.follows_count,
      mediaCount: profile.media_count,
      profilePictureUrl: profile.profile_picture_url ?? null,
      igId: profile.ig_id !== undefined ? String(profile.ig_id) : null,
      // Business discovery only reaches public professional accounts and
      // does not expose verification.
      isVerified: null,
      isPrivate: false,
      isBusiness: true,
    };
  }

  async getPostsPage(username: string, request: PostsPageRequest): Promise<PostsPage> {
    const limit = Math.max(1, Math.floor(request.limit));
    const after = request.after ? `.after(${request.after})` : '';
    this.logger?.debug(`Fetching posts of ${username}`, { limit, after: request.after ?? null });

    const data = await this.request(
      `business_discovery.username(${username}){media.limit(${limit})${after}{${MEDIA_FIELDS}}}`,
      request.signal
    );

    const parsed = mediaResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new FatalError(`Malformed media response for ${username}`, { cause: parsed.error });
    }

    const media = parsed.data.business_discovery?.media;
    if (!media) {
      return { posts: [], nextCursor: null };
    }

    const posts: PostRecord[] = [];
    for (const item of media.data) {
      try {
        const { timestamp, utcOffsetMinutes } = parseTimestamp(item.timestamp);
        posts.push({
          id: item.id,
          timestamp,
          utcOffsetMinutes,
          likeCount: item.like_count,
          commentCount: item.comments_count,
          hashtags: extractHashtags(item.caption),
          caption: item.caption ? item.caption.slice(0, 500) : undefined,
          permalink: item.permalink,
          mediaType: toMediaType(item.media_type),
        });
      } catch (error) {
        this.logger?.warn(`Failed to process post ${item.id}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const nextCursor = media.paging?.next ? media.paging.cursors?.after ?? null : null;
    return { posts, nextCursor };
  }

  private async request(fields: string, signal?: AbortSignal): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>(`/${this.igUserId}`, {
        params: {
          fields,
          access_token: this.accessToken,
        },
        signal,
      });
      return response.data;
    } catch (error) {
      throw classifyGraphError(error);
    }
  }
}
