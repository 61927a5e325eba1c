import { isRecord, readNumber, readStringList, readText } from './fields.js';
import type { RawRecord } from './types.js';

export type AudienceStats =
  | { platform: 'instagram'; avg_likes: number; avg_comments: number; unique_hashtags: number }
  | { platform: 'linkedin'; industries: string[]; avg_connections: number }
  | { platform: 'facebook'; categories: string[]; avg_likes: number; avg_followers: number }
  | { platform: string; records: number };

function average(values: number[]): number {
  if (values.length === 0) return 0;
  const sum = values.reduce((acc, value) => acc + value, 0);
  return Math.round((sum / values.length) * 100) / 100;
}

function distinct(values: string[]): string[] {
  return [...new Set(values.filter(Boolean))];
}

/** Aggregate view over a client's stored records, shaped per platform. */
export function computeAudienceStats(platform: string, records: readonly RawRecord[]): AudienceStats {
  const rows = records.filter(isRecord);
  switch (platform) {
    case 'instagram':
      return {
        platform,
        avg_likes: average(rows.map((row) => readNumber(row, 'likesCount', 'likes'))),
        avg_comments: average(rows.map((row) => readNumber(row, 'commentsCount', 'comments'))),
        unique_hashtags: distinct(rows.flatMap((row) => readStringList(row, 'hashtags').map((tag) => tag.toLowerCase()))).length,
      };
    case 'linkedin':
      return {
        platform,
        industries: distinct(rows.map((row) => readText(row, 'industry'))),
        avg_connections: average(rows.map((row) => readNumber(row, 'connectionsCount', 'connections'))),
      };
    case 'facebook':
      return {
        platform,
        categories: distinct(rows.flatMap((row) => readStringList(row, 'categories'))),
        avg_likes: average(rows.map((row) => readNumber(row, 'likes'))),
        avg_followers: average(rows.map((row) => readNumber(row, 'followers'))),
      };
    default:
      return { platform, records: rows.length };
  }
}
