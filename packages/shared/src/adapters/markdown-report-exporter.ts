import { IReportExporter } from '../interfaces/report-exporter.js';
import { ILogger } from '../interfaces/logger.js';
import { InsightReport, WEEKDAYS } from '../types.js';
import { reportFileName, writeReportFile } from './report-file.js';

export const NO_LOCATIONS_NOTE =
  'No location data. The Graph API business discovery edge does not expose post locations.';

export const REPORT_DISCLAIMER =
  'This report only covers publicly available data of professional accounts. Respect privacy laws and the platform terms of use.';

function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

function flag(value: boolean | null): string {
  if (value === null) return 'unknown';
  return value ? 'yes' : 'no';
}

export function renderMarkdownReport(report: InsightReport): string {
  const { profile, engagement, metadata } = report;
  const lines: string[] = [];

  lines.push('# Profile Insight Report', '');
  lines.push(`**Account:** @${report.username}`, '');
  lines.push(`**Generated:** ${metadata.generatedAt}`, '');
  lines.push('---', '');

  lines.push('## Profile', '');
  lines.push(`- **Name:** ${profile.name || 'N/A'}`);
  lines.push(`- **Bio:** ${profile.biography ? profile.biography.slice(0, 200) : 'N/A'}`);
  if (profile.website) {
    lines.push(`- **Website:** ${profile.website}`);
  }
  lines.push(`- **Followers:** ${formatCount(profile.followersCount)}`);
  lines.push(`- **Following:** ${formatCount(profile.followsCount)}`);
  lines.push(`- **Posts:** ${formatCount(profile.mediaCount)}`);
  lines.push(`- **Verified:** ${flag(profile.isVerified)}`);
  lines.push(`- **Business:** ${flag(profile.isBusiness)}`);
  lines.push(`- **Follower/following ratio:** ${report.riskIndicators.followerFollowingRatio}`, '');

  lines.push('## Engagement', '');
  if (engagement.sampleEmpty) {
    lines.push('No posts were available to analyze.', '');
  } else {
    lines.push(`- **Posts analyzed:** ${engagement.postsAnalyzed}`);
    lines.push(`- **Average likes:** ${engagement.avgLikes.toFixed(1)}`);
    lines.push(`- **Average comments:** ${engagement.avgComments.toFixed(1)}`);
    lines.push(`- **Engagement rate:** ${engagement.engagementRate.toFixed(3)}%`);
    if (engagement.lowConfidence) {
      lines.push('- **Note:** follower count unknown, engagement rate is not meaningful');
    }
    lines.push('');

    if (engagement.topPosts.length > 0) {
      lines.push('### Top posts', '');
      engagement.topPosts.forEach((post, index) => {
        const target = post.permalink ? `[${post.engagement} engagement](${post.permalink})` : `${post.engagement} engagement (${post.id})`;
        lines.push(`${index + 1}. ${target}`);
      });
      lines.push('');
    }
  }

  lines.push('## Posting times', '');
  if (engagement.peakPostingHour !== null) {
    lines.push(`- **Peak hour:** ${String(engagement.peakPostingHour).padStart(2, '0')}:00`);
  }
  if (engagement.avgPostIntervalHours !== null) {
    lines.push(`- **Average interval:** ${engagement.avgPostIntervalHours.toFixed(1)} hours`);
  }
  const busyDays = WEEKDAYS.filter(day => engagement.dayDistribution[day] > 0);
  if (busyDays.length > 0) {
    lines.push(`- **Posts per weekday:** ${busyDays.map(day => `${day} ${engagement.dayDistribution[day]}`).join(', ')}`);
  }
  if (engagement.sampleEmpty) {
    lines.push('No posting times to report.');
  }
  lines.push('');

  if (engagement.topHashtags.length > 0) {
    lines.push('## Top hashtags', '');
    for (const entry of engagement.topHashtags) {
      lines.push(`- #${entry.value}: ${entry.count} ${entry.count === 1 ? 'post' : 'posts'}`);
    }
    lines.push('');
  }

  lines.push('## Top locations', '');
  if (engagement.topLocations.length === 0) {
    lines.push(NO_LOCATIONS_NOTE);
  }
  for (const entry of engagement.topLocations) {
    lines.push(`- ${entry.value}: ${entry.count} ${entry.count === 1 ? 'post' : 'posts'}`);
  }
  lines.push('');

  lines.push('## Run', '');
  lines.push(`- **Duration:** ${metadata.durationSeconds.toFixed(1)}s`);
  lines.push(`- **Posts requested:** ${metadata.maxPosts}`);
  lines.push(`- **API calls in window:** ${metadata.rateLimit.inWindow}/${metadata.rateLimit.limit}`);
  lines.push(`- **Quota utilization:** ${metadata.rateLimit.utilization}%`, '');

  lines.push('---', '');
  lines.push(`*${REPORT_DISCLAIMER}*`, '');

  return lines.join('\n');
}

export class MarkdownReportExporter implements IReportExporter {
  readonly extension = 'md';

  constructor(private logger?: ILogger) {}

  async export(report: InsightReport, outputDir: string, now: Date = new Date()): Promise<string> {
    const filePath = await writeReportFile(
      outputDir,
      reportFileName(report.username, this.extension, now),
      renderMarkdownReport(report)
    );
    this.logger?.info(`Markdown report saved: ${filePath}`);
    return filePath;
  }
}
