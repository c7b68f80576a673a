import { describe, it, expect } from 'vitest';
import { analyzeEngagement, rankFrequencies } from '@profile-pulse/shared';
import { makePost } from './helpers/posts.js';

describe('analyzeEngagement', () => {
  it('reports an empty sample without failing', () => {
    const report = analyzeEngagement([], 5000);

    expect(report).toMatchObject({
      postsAnalyzed: 0,
      totalLikes: 0,
      avgLikes: 0,
      avgComments: 0,
      engagementRate: 0,
      peakPostingHour: null,
      avgPostIntervalHours: null,
      topHashtags: [],
      topLocations: [],
      topPosts: [],
      sampleEmpty: true,
      lowConfidence: true,
    });
    expect(report.hourDistribution).toEqual(new Array(24).fill(0));
  });

  it('analyzes a single post', () => {
    const post = makePost('p1', '2024-05-01T18:30:00+0000', 100, 10, { permalink: 'https://example.com/p/p1' });

    const report = analyzeEngagement([post], 1000);

    expect(report.postsAnalyzed).toBe(1);
    expect(report.avgLikes).toBe(100);
    expect(report.avgComments).toBe(10);
    expect(report.engagementRate).toBe(11);
    expect(report.peakPostingHour).toBe(18);
    expect(report.hourDistribution[18]).toBe(1);
    expect(report.dayDistribution.Wednesday).toBe(1);
    expect(report.avgPostIntervalHours).toBeNull();
    expect(report.topPosts).toEqual([
      { id: 'p1', permalink: 'https://example.com/p/p1', likes: 100, comments: 10, engagement: 110 },
    ]);
    expect(report.sampleEmpty).toBe(false);
    expect(report.lowConfidence).toBe(false);
  });

  it('buckets posts by the hour and weekday of their own timezone', () => {
    // 01:30 UTC on Thursday, but 23:30 on Wednesday where it was posted
    const post = makePost('p1', '2024-05-01T23:30:00-02:00', 5, 0);

    const report = analyzeEngagement([post], 100);

    expect(report.peakPostingHour).toBe(23);
    expect(report.dayDistribution.Wednesday).toBe(1);
    expect(report.dayDistribution.Thursday).toBe(0);
  });

  it('picks the earliest hour when several share the highest count', () => {
    const posts = [
      makePost('a', '2024-05-01T14:00:00+0000', 1, 0),
      makePost('b', '2024-05-02T09:00:00+0000', 1, 0),
      makePost('c', '2024-05-03T20:00:00+0000', 1, 0),
    ];

    expect(analyzeEngagement(posts, 100).peakPostingHour).toBe(9);
  });

  it('averages the interval between consecutive posts regardless of input order', () => {
    const posts = [
      makePost('c', '2024-05-01T18:00:00+0000', 1, 0),
      makePost('a', '2024-05-01T00:00:00+0000', 1, 0),
      makePost('b', '2024-05-01T06:00:00+0000', 1, 0),
    ];

    expect(analyzeEngagement(posts, 100).avgPostIntervalHours).toBe(9);
  });

  it('rounds averages to two decimals and the rate to three', () => {
    const posts = [
      makePost('a', '2024-05-01T10:00:00+0000', 1, 0),
      makePost('b', '2024-05-01T11:00:00+0000', 1, 0),
      makePost('c', '2024-05-01T12:00:00+0000', 2, 1),
    ];

    const report = analyzeEngagement(posts, 3);

    expect(report.avgLikes).toBe(1.33);
    expect(report.avgComments).toBe(0.33);
    // (4/3 + 1/3) / 3 * 100 = 55.555...
    expect(report.engagementRate).toBe(55.556);
    expect(report.totalLikes).toBe(4);
    expect(report.totalComments).toBe(1);
  });

  it('flags low confidence when the follower count is unknown', () => {
    const report = analyzeEngagement([makePost('a', '2024-05-01T10:00:00Z', 3, 1)], 0);

    expect(report.lowConfidence).toBe(true);
    expect(report.engagementRate).toBe(400);
  });

  it('ranks hashtags by the number of posts using them', () => {
    const posts = [
      makePost('a', '2024-05-01T10:00:00Z', 1, 0, { hashtags: ['travel', 'food'] }),
      makePost('b', '2024-05-02T10:00:00Z', 1, 0, { hashtags: ['food', 'sea'] }),
      makePost('c', '2024-05-03T10:00:00Z', 1, 0, { hashtags: ['sea', 'food'] }),
    ];

    expect(analyzeEngagement(posts, 10).topHashtags).toEqual([
      { value: 'food', count: 3 },
      { value: 'sea', count: 2 },
      { value: 'travel', count: 1 },
    ]);
  });

  it('orders tied hashtags by first appearance and honours the ranking length', () => {
    const posts = [
      makePost('late', '2024-05-03T10:00:00Z', 1, 0, { hashtags: ['zeta'] }),
      makePost('early', '2024-05-01T10:00:00Z', 1, 0, { hashtags: ['omega'] }),
      makePost('middle', '2024-05-02T10:00:00Z', 1, 0, { hashtags: ['alpha'] }),
    ];

    expect(analyzeEngagement(posts, 10, { topN: 2 }).topHashtags).toEqual([
      { value: 'omega', count: 1 },
      { value: 'alpha', count: 1 },
    ]);
  });

  it('ranks locations of the posts that have one', () => {
    const posts = [
      makePost('a', '2024-05-01T10:00:00Z', 1, 0, { location: 'Lisbon' }),
      makePost('b', '2024-05-02T10:00:00Z', 1, 0),
      makePost('c', '2024-05-03T10:00:00Z', 1, 0, { location: 'Porto' }),
      makePost('d', '2024-05-04T10:00:00Z', 1, 0, { location: 'Porto' }),
    ];

    expect(analyzeEngagement(posts, 10).topLocations).toEqual([
      { value: 'Porto', count: 2 },
      { value: 'Lisbon', count: 1 },
    ]);
  });

  it('keeps the five most engaging posts, oldest first on ties', () => {
    const posts = [
      makePost('p1', '2024-05-01T10:00:00Z', 10, 0),
      makePost('p2', '2024-05-02T10:00:00Z', 50, 5),
      makePost('p3', '2024-05-03T10:00:00Z', 8, 2),
      makePost('p4', '2024-05-04T10:00:00Z', 1, 0),
      makePost('p5', '2024-05-05T10:00:00Z', 30, 0),
      makePost('p6', '2024-05-06T10:00:00Z', 2, 0),
    ];

    const report = analyzeEngagement(posts, 100);

    expect(report.topPosts.map(post => post.id)).toEqual(['p2', 'p5', 'p1', 'p3', 'p6']);
    expect(report.topPosts[0]).toEqual({ id: 'p2', permalink: null, likes: 50, comments: 5, engagement: 55 });
  });

  it('is idempotent and leaves its input untouched', () => {
    const posts = [
      makePost('b', '2024-05-02T10:00:00Z', 4, 1, { hashtags: ['x'] }),
      makePost('a', '2024-05-01T10:00:00Z', 3, 2, { hashtags: ['y'] }),
    ];
    const before = posts.map(post => post.id);

    const first = analyzeEngagement(posts, 50);
    const second = analyzeEngagement(posts, 50);

    expect(second).toEqual(first);
    expect(posts.map(post => post.id)).toEqual(before);
  });

  it('counts posts per weekday', () => {
    const posts = [
      makePost('mon', '2024-04-29T10:00:00Z', 1, 0),
      makePost('sun', '2024-05-05T10:00:00Z', 1, 0),
      makePost('sun2', '2024-05-12T10:00:00Z', 1, 0),
    ];

    expect(analyzeEngagement(posts, 10).dayDistribution).toEqual({
      Monday: 1,
      Tuesday: 0,
      Wednesday: 0,
      Thursday: 0,
      Friday: 0,
      Saturday: 0,
      Sunday: 2,
    });
  });
});

describe('rankFrequencies', () => {
  it('counts repeated values', () => {
    expect(rankFrequencies(['a', 'b', 'a', 'c', 'b', 'a'], 2)).toEqual([
      { value: 'a', count: 3 },
      { value: 'b', count: 2 },
    ]);
  });
});
