import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { InsightReport, PostRecord, ProfileMetadata } from '../types.js';
import { formatTimestamp, parseTimestamp } from '../analytics/time.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `instagram_<username>_<yyyyMMdd_HHmmss>.<extension>`, local time.
 */
export function reportFileName(username: string, extension: string, now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `instagram_${username}_${date}_${time}.${extension}`;
}

export async function writeReportFile(outputDir: string, fileName: string, contents: string): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  const filePath = path.join(outputDir, fileName);
  await fs.writeFile(filePath, contents, 'utf-8');
  return filePath;
}

/**
 * Plain JSON shape of a report. Post timestamps keep the offset they were published in.
 */
export function toSerializable(report: InsightReport) {
  return {
    ...report,
    posts: report.posts.map(post => ({
      ...post,
      timestamp: formatTimestamp(post.timestamp, post.utcOffsetMinutes),
    })),
  };
}

const savedProfileSchema = z.object({
  username: z.string(),
  name: z.string().default(''),
  biography: z.string().default(''),
  website: z.string().nullable().default(null),
  followersCount: z.number().int().nonnegative(),
  followsCount: z.number().int().nonnegative(),
  mediaCount: z.number().int().nonnegative(),
  profilePictureUrl: z.string().nullable().default(null),
  igId: z.string().nullable().default(null),
  isVerified: z.boolean().nullable().default(null),
  isPrivate: z.boolean().default(false),
  isBusiness: z.boolean().default(false),
});

const savedPostSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  likeCount: z.number().int().nonnegative(),
  commentCount: z.number().int().nonnegative(),
  hashtags: z.array(z.string()).default([]),
  location: z.string().optional(),
  caption: z.string().optional(),
  permalink: z.string().optional(),
  mediaType: z.enum(['IMAGE', 'VIDEO', 'CAROUSEL_ALBUM', 'REELS', 'UNKNOWN']).optional(),
});

const savedReportSchema = z.object({
  username: z.string(),
  profile: savedProfileSchema,
  posts: z.array(savedPostSchema),
  metadata: z
    .object({
      generatedAt: z.string(),
    })
    .partial()
    .optional(),
});

export interface SavedReport {
  username: string;
  profile: ProfileMetadata;
  posts: PostRecord[];
  generatedAt: string | null;
}

/**
 * Read a JSON report written by JsonReportExporter back into posts and profile.
 */
export async function readJsonReport(filePath: string): Promise<SavedReport> {
  const raw = await fs.readFile(filePath, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`${filePath} is not valid JSON`, { cause: error });
  }

  const parsed = savedReportSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`${filePath} is not a profile report: ${issues}`);
  }

  const posts = parsed.data.posts.map(({ timestamp, ...post }) => ({
    ...post,
    ...parseTimestamp(timestamp),
  }));

  return {
    username: parsed.data.username,
    profile: parsed.data.profile,
    posts,
    generatedAt: parsed.data.metadata?.generatedAt ?? null,
  };
}
