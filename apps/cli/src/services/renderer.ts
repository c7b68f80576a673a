import chalk from 'chalk';
import Table from 'cli-table3';
import { EngagementReport, InsightReport, LimiterStats, ProfileMetadata, WEEKDAYS } from '@profile-pulse/shared';

const PLAIN_TABLE = {
  chars: {
    top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
    bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
    left: '', 'left-mid': '', mid: '', 'mid-mid': '',
    right: '', 'right-mid': '', middle: ' ',
  },
  style: { 'padding-left': 0, 'padding-right': 2 },
};

function count(value: number): string {
  return value.toLocaleString('en-US');
}

export function printBanner(): void {
  console.log(chalk.cyan(`
╔═══════════════════════════════════════╗
║        Profile Pulse Analytics        ║
╚═══════════════════════════════════════╝
`));
}

export function printProfile(profile: ProfileMetadata): void {
  console.log(chalk.bold(`\n@${profile.username}`));
  if (profile.name) {
    console.log(chalk.gray(profile.name));
  }
  console.log(`\n${profile.biography ? profile.biography.slice(0, 150) : chalk.gray('No bio')}\n`);
  console.log(
    `${chalk.white('Followers:')} ${chalk.green(count(profile.followersCount))}  |  ` +
      `${chalk.white('Following:')} ${chalk.blue(count(profile.followsCount))}  |  ` +
      `${chalk.white('Posts:')} ${chalk.yellow(count(profile.mediaCount))}`
  );

  const badges: string[] = [];
  if (profile.isVerified) badges.push(chalk.blue('✓ Verified'));
  if (profile.isPrivate) badges.push(chalk.yellow('🔒 Private'));
  if (profile.isBusiness) badges.push(chalk.magenta('💼 Business'));
  if (badges.length > 0) {
    console.log(`\n${badges.join(' | ')}`);
  }
}

export function printEngagement(engagement: EngagementReport): void {
  console.log(chalk.cyan('\n📊 Engagement'));
  console.log(chalk.gray('─'.repeat(50)));

  if (engagement.sampleEmpty) {
    console.log(chalk.yellow('No posts to analyze'));
    return;
  }

  const overview = new Table(PLAIN_TABLE);
  overview.push(
    [chalk.gray('Posts analyzed:'), chalk.white(String(engagement.postsAnalyzed))],
    [chalk.gray('Avg likes:'), chalk.white(engagement.avgLikes.toFixed(0))],
    [chalk.gray('Avg comments:'), chalk.white(engagement.avgComments.toFixed(0))],
    [chalk.gray('Engagement rate:'), chalk.green(`${engagement.engagementRate.toFixed(3)}%`)],
    [
      chalk.gray('Peak hour:'),
      chalk.white(engagement.peakPostingHour !== null ? `${String(engagement.peakPostingHour).padStart(2, '0')}:00` : 'N/A'),
    ],
    [
      chalk.gray('Avg interval:'),
      chalk.white(engagement.avgPostIntervalHours !== null ? `${engagement.avgPostIntervalHours.toFixed(1)}h` : 'N/A'),
    ]
  );
  console.log(overview.toString());

  if (engagement.lowConfidence) {
    console.log(chalk.yellow('Follower count unknown: engagement rate is not meaningful'));
  }

  const days = new Table({ head: WEEKDAYS.map(day => day.slice(0, 3)), style: { head: ['cyan'] } });
  days.push(WEEKDAYS.map(day => String(engagement.dayDistribution[day])));
  console.log(chalk.cyan('\n📅 Posts per weekday'));
  console.log(days.toString());

  if (engagement.topPosts.length > 0) {
    const top = new Table({ head: ['#', 'Likes', 'Comments', 'Link'], style: { head: ['cyan'] } });
    engagement.topPosts.forEach((post, index) => {
      top.push([String(index + 1), count(post.likes), count(post.comments), post.permalink ?? post.id]);
    });
    console.log(chalk.cyan('\n🏆 Top posts'));
    console.log(top.toString());
  }

  if (engagement.topHashtags.length > 0) {
    console.log(chalk.cyan('\n#️⃣  Top hashtags'));
    console.log(`  ${engagement.topHashtags.map(entry => `#${entry.value} (${entry.count})`).join(', ')}`);
  }

  if (engagement.topLocations.length > 0) {
    console.log(chalk.cyan('\n📍 Top locations'));
    console.log(`  ${engagement.topLocations.map(entry => `${entry.value} (${entry.count})`).join(', ')}`);
  }
}

export function printSummary(report: InsightReport): void {
  console.log(chalk.cyan(`\n╔${'═'.repeat(58)}╗`));
  console.log(chalk.cyan(`║${chalk.bold('PROFILE INSIGHT REPORT'.padStart(40).padEnd(58))}║`));
  console.log(chalk.cyan(`╚${'═'.repeat(58)}╝`));

  printProfile(report.profile);
  printEngagement(report.engagement);
  console.log(chalk.cyan(`\n${'─'.repeat(60)}\n`));
}

export function printRateLimit(stats: LimiterStats): void {
  const cooldown = stats.coolingDown ? `, cooling down ${Math.ceil(stats.cooldownRemainingMs / 1000)}s` : '';
  console.log(chalk.gray(`Rate limit: ${stats.inWindow}/${stats.limit} (${stats.utilization}%${cooldown})`));
}

export function printDisclaimer(): void {
  console.log(chalk.yellow('\n⚠️  Disclaimer:'));
  console.log(chalk.gray('Only publicly available data of professional accounts is collected.'));
  console.log(chalk.gray("Always respect privacy laws and the platform's terms of use.\n"));
}
