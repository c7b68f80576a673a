import { PostRecord, ProfileMetadata } from '../types.js';

export interface PostsPage {
  posts: PostRecord[];
  nextCursor: string | null;
}

export interface PostsPageRequest {
  limit: number;
  after?: string | null;
  signal?: AbortSignal;
}

/**
 * Remote source of profile data. Implementations throw TransientError or FatalError
 * so the request governor can tell retryable failures apart.
 */
export interface IProfileSource {
  getProfile(username: string, signal?: AbortSignal): Promise<ProfileMetadata>;
  getPostsPage(username: string, request: PostsPageRequest): Promise<PostsPage>;
}
