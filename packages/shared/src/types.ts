import { LimiterStats } from './interfaces/rate-limiter.js';

export type MediaType = 'IMAGE' | 'VIDEO' | 'CAROUSEL_ALBUM' | 'REELS' | 'UNKNOWN';

export interface ProfileMetadata {
  username: string;
  name: string;
  biography: string;
  website: string | null;
  followersCount: number;
  followsCount: number;
  mediaCount: number;
  profilePictureUrl: string | null;
  igId: string | null;
  /** Null when the source does not expose verification. */
  isVerified: boolean | null;
  isPrivate: boolean;
  isBusiness: boolean;
}

export interface PostRecord {
  id: string;
  timestamp: Date;
  /** Offset of the timezone the post was published in, e.g. 120 for +02:00. */
  utcOffsetMinutes: number;
  likeCount: number;
  commentCount: number;
  /** Unique, in order of first appearance. */
  hashtags: string[];
  location?: string;
  caption?: string;
  permalink?: string;
  mediaType?: MediaType;
}

export interface ProfileSnapshot {
  profile: ProfileMetadata;
  posts: PostRecord[];
}

export interface FrequencyEntry {
  value: string;
  count: number;
}

export interface TopPost {
  id: string;
  permalink: string | null;
  likes: number;
  comments: number;
  engagement: number;
}

export type Weekday = 'Monday' | 'Tuesday' | 'Wednesday' | 'Thursday' | 'Friday' | 'Saturday' | 'Sunday';

export interface EngagementReport {
  postsAnalyzed: number;
  totalLikes: number;
  totalComments: number;
  avgLikes: number;
  avgComments: number;
  /** Percentage, three decimals. */
  engagementRate: number;
  peakPostingHour: number | null;
  /** Index = hour of day (0-23) in the posts' own timezone. */
  hourDistribution: number[];
  dayDistribution: Record<Weekday, number>;
  avgPostIntervalHours: number | null;
  topHashtags: FrequencyEntry[];
  topLocations: FrequencyEntry[];
  topPosts: TopPost[];
  sampleEmpty: boolean;
  lowConfidence: boolean;
}

export interface RiskIndicators {
  isPrivate: boolean;
  isVerified: boolean | null;
  followerFollowingRatio: number;
  engagementRate: number;
}

export interface ReportMetadata {
  generatedAt: string;
  durationSeconds: number;
  postsAnalyzed: number;
  maxPosts: number;
  rateLimit: LimiterStats;
}

export interface InsightReport {
  username: string;
  profile: ProfileMetadata;
  posts: PostRecord[];
  engagement: EngagementReport;
  riskIndicators: RiskIndicators;
  metadata: ReportMetadata;
}

export const WEEKDAYS: Weekday[] = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];
