import { IProfileSource, PostsPage } from './interfaces/profile-source.js';
import { IProgressReporter } from './interfaces/progress-reporter.js';
import { ILogger } from './interfaces/logger.js';
import { RequestGovernor, unwrapResult } from './governance/request-governor.js';
import { GovernorError } from './errors.js';
import { PostRecord, ProfileSnapshot } from './types.js';

const PAGE_SIZE = 50;

export interface ProfileCollectorOptions {
  source: IProfileSource;
  governor: RequestGovernor;
  progressReporter?: IProgressReporter;
  logger?: ILogger;
}

export interface CollectOptions {
  maxPosts: number;
  signal?: AbortSignal;
}

/**
 * Fetches a profile and its most recent posts, every remote call going through
 * the request governor.
 */
export class ProfileCollector {
  private source: IProfileSource;
  private governor: RequestGovernor;
  private progressReporter?: IProgressReporter;
  private logger?: ILogger;

  constructor(options: ProfileCollectorOptions) {
    this.source = options.source;
    this.governor = options.governor;
    this.progressReporter = options.progressReporter;
    this.logger = options.logger;
  }

  async collect(username: string, options: CollectOptions): Promise<ProfileSnapshot> {
    const { signal } = options;
    const maxPosts = Math.max(0, Math.floor(options.maxPosts));

    this.logger?.info(`Collecting profile: ${username}`, { maxPosts });
    this.progressReporter?.start(`Fetching profile @${username}`);

    const profileResult = await this.governor.execute(() => this.source.getProfile(username, signal), {
      signal,
      label: `profile ${username}`,
    });

    if (profileResult.status !== 'success') {
      this.progressReporter?.fail(`Could not fetch profile @${username}`);
    }
    const profile = unwrapResult(profileResult, `Profile fetch for ${username}`);

    this.progressReporter?.succeed(`Profile @${username}: ${profile.followersCount} followers`);

    const posts: PostRecord[] = [];
    let cursor: string | null = null;
    let page = 0;

    if (maxPosts > 0) {
      this.progressReporter?.start(`Fetching posts (0/${maxPosts})`);
    }

    while (posts.length < maxPosts) {
      page++;
      const limit = Math.min(PAGE_SIZE, maxPosts - posts.length);
      const after = cursor;
      const result = await this.governor.execute(
        (): Promise<PostsPage> => this.source.getPostsPage(username, { limit, after, signal }),
        { signal, label: `posts page ${page}` }
      );

      if (result.status === 'cancelled' || (result.status !== 'success' && posts.length === 0)) {
        this.progressReporter?.fail(`Fetching posts failed on page ${page}`);
        unwrapResult(result, `Posts page ${page} for ${username}`);
        break;
      }

      if (result.status !== 'success') {
        this.logger?.warn(`Stopped paging after ${posts.length} posts: ${result.error.message}`);
        this.progressReporter?.warn(`Kept ${posts.length} posts; page ${page} failed`);
        break;
      }

      posts.push(...result.value.posts.slice(0, maxPosts - posts.length));
      cursor = result.value.nextCursor;
      this.progressReporter?.update(`Fetching posts (${posts.length}/${maxPosts})`, posts.length, maxPosts);

      if (!cursor || result.value.posts.length === 0) {
        break;
      }
    }

    if (maxPosts > 0 && posts.length > 0) {
      this.progressReporter?.succeed(`Fetched ${posts.length} posts`);
    } else if (maxPosts > 0) {
      this.progressReporter?.info('No posts found');
    }
    this.logger?.info(`Collected ${posts.length} posts for ${username}`, { pages: page });

    return { profile, posts };
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof GovernorError && error.kind === 'cancelled';
}
