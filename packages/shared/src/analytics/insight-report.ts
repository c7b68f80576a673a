import { InsightReport, ProfileSnapshot } from '../types.js';
import { LimiterStats } from '../interfaces/rate-limiter.js';
import { AnalyzeOptions, analyzeEngagement } from './engagement-analyzer.js';

export interface InsightReportContext extends AnalyzeOptions {
  startedAt: Date;
  finishedAt: Date;
  maxPosts: number;
  rateLimit: LimiterStats;
}

export function buildInsightReport(username: string, snapshot: ProfileSnapshot, context: InsightReportContext): InsightReport {
  const { profile, posts } = snapshot;
  const engagement = analyzeEngagement(posts, profile.followersCount, { topN: context.topN });
  const durationSeconds = (context.finishedAt.getTime() - context.startedAt.getTime()) / 1000;

  return {
    username,
    profile,
    posts,
    engagement,
    riskIndicators: {
      isPrivate: profile.isPrivate,
      isVerified: profile.isVerified,
      followerFollowingRatio: Math.round((profile.followersCount / Math.max(profile.followsCount, 1)) * 100) / 100,
      engagementRate: engagement.engagementRate,
    },
    metadata: {
      generatedAt: context.finishedAt.toISOString(),
      durationSeconds: Math.round(durationSeconds * 100) / 100,
      postsAnalyzed: posts.length,
      maxPosts: context.maxPosts,
      rateLimit: context.rateLimit,
    },
  };
}
