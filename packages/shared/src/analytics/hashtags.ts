const HASHTAG_PATTERN = /#([\p{L}\p{N}_]+)/gu;

/**
 * Hashtags in a caption, without the leading `#`, first occurrence of each.
 */
export function extractHashtags(caption: string | null | undefined): string[] {
  if (!caption) return [];

  const seen = new Set<string>();
  for (const match of caption.matchAll(HASHTAG_PATTERN)) {
    seen.add(match[1]);
  }
  return [...seen];
}
