import { EngagementReport, FrequencyEntry, PostRecord, TopPost, Weekday } from '../types.js';
import { DEFAULT_GOVERNANCE_CONFIG } from '../governance/config.js';
import { localHour, localWeekday } from './time.js';

const HOUR_MS = 60 * 60 * 1000;
const TOP_POSTS = 5;

export interface AnalyzeOptions {
  /** Length of the hashtag and location rankings. */
  topN?: number;
}

function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

function emptyDayDistribution(): Record<Weekday, number> {
  return {
    Monday: 0,
    Tuesday: 0,
    Wednesday: 0,
    Thursday: 0,
    Friday: 0,
    Saturday: 0,
    Sunday: 0,
  };
}

/**
 * Count values and rank them by count, descending. Ties keep first-seen order
 * (Map iteration order plus a stable sort).
 */
export function rankFrequencies(values: Iterable<string>, limit: number): FrequencyEntry[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

function sortChronologically(posts: readonly PostRecord[]): PostRecord[] {
  return [...posts].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Engagement and temporal statistics for a set of posts.
 *
 * Pure: the input is not mutated and equal input gives equal output.
 */
export function analyzeEngagement(
  posts: readonly PostRecord[],
  followerCount: number,
  options: AnalyzeOptions = {}
): EngagementReport {
  const topN = options.topN ?? DEFAULT_GOVERNANCE_CONFIG.topN;
  const ordered = sortChronologically(posts);
  const hourDistribution: number[] = new Array<number>(24).fill(0);
  const dayDistribution = emptyDayDistribution();
  const followersKnown = followerCount > 0;

  if (ordered.length === 0) {
    return {
      postsAnalyzed: 0,
      totalLikes: 0,
      totalComments: 0,
      avgLikes: 0,
      avgComments: 0,
      engagementRate: 0,
      peakPostingHour: null,
      hourDistribution,
      dayDistribution,
      avgPostIntervalHours: null,
      topHashtags: [],
      topLocations: [],
      topPosts: [],
      sampleEmpty: true,
      lowConfidence: true,
    };
  }

  let totalLikes = 0;
  let totalComments = 0;
  for (const post of ordered) {
    totalLikes += post.likeCount;
    totalComments += post.commentCount;
    hourDistribution[localHour(post.timestamp, post.utcOffsetMinutes)]++;
    dayDistribution[localWeekday(post.timestamp, post.utcOffsetMinutes)]++;
  }

  const avgLikes = totalLikes / ordered.length;
  const avgComments = totalComments / ordered.length;
  const engagementRate = ((avgLikes + avgComments) / Math.max(1, followerCount)) * 100;

  // Strict comparison keeps the earliest hour on ties.
  let peakPostingHour = 0;
  for (let hour = 1; hour < 24; hour++) {
    if (hourDistribution[hour] > hourDistribution[peakPostingHour]) {
      peakPostingHour = hour;
    }
  }

  let avgPostIntervalHours: number | null = null;
  if (ordered.length >= 2) {
    const span = ordered[ordered.length - 1].timestamp.getTime() - ordered[0].timestamp.getTime();
    avgPostIntervalHours = round(span / (ordered.length - 1) / HOUR_MS, 2);
  }

  const topPosts: TopPost[] = ordered
    .map(post => ({
      id: post.id,
      permalink: post.permalink ?? null,
      likes: post.likeCount,
      comments: post.commentCount,
      engagement: post.likeCount + post.commentCount,
    }))
    .sort((a, b) => b.engagement - a.engagement)
    .slice(0, TOP_POSTS);

  return {
    postsAnalyzed: ordered.length,
    totalLikes,
    totalComments,
    avgLikes: round(avgLikes, 2),
    avgComments: round(avgComments, 2),
    engagementRate: round(engagementRate, 3),
    peakPostingHour,
    hourDistribution,
    dayDistribution,
    avgPostIntervalHours,
    topHashtags: rankFrequencies(
      ordered.flatMap(post => [...new Set(post.hashtags)]),
      topN
    ),
    topLocations: rankFrequencies(
      ordered.flatMap(post => (post.location ? [post.location] : [])),
      topN
    ),
    topPosts,
    sampleEmpty: false,
    lowConfidence: !followersKnown,
  };
}
