import {
  countListMatches,
  countMatches,
  normalizeTerms,
  readList,
  readNumber,
  readStringList,
  readText,
} from './fields.js';
import type { RawRecord, ScoredCandidate } from './types.js';

type Scorer = (record: RawRecord, terms: string[]) => number;

const RECENT_EXPERIENCE_WINDOW = 3;

const scoreInstagram: Scorer = (record, terms) => {
  let score = 3 * countListMatches(readStringList(record, 'hashtags'), terms);
  score += 2 * countMatches(readText(record, 'caption'), terms);
  if (readNumber(record, 'likesCount', 'likes') > 10) score += 1;
  if (readNumber(record, 'commentsCount', 'comments') > 2) score += 1;
  return score;
};

const scoreLinkedIn: Scorer = (record, terms) => {
  let score = 4 * countMatches(readText(record, 'headline'), terms);
  score += 3 * countMatches(readText(record, 'summary'), terms);
  score += 2 * countMatches(readText(record, 'industry'), terms);

  const recent = readList(record, 'experience', 'experiences')
    .slice(0, RECENT_EXPERIENCE_WINDOW)
    .map((entry) => (typeof entry === 'string' ? entry : JSON.stringify(entry)).toLowerCase());
  score += 2 * terms.filter((term) => recent.some((entry) => entry.includes(term))).length;

  if (readNumber(record, 'connectionsCount', 'connections') > 500) score += 1;
  return score;
};

const scoreFacebook: Scorer = (record, terms) => {
  let score = 4 * countListMatches(readStringList(record, 'categories'), terms);
  score += 3 * countMatches(readStringList(record, 'info').join(' '), terms);
  score += 2 * countMatches(readText(record, 'title'), terms);
  score += 3 * countMatches(readText(record, 'about'), terms);
  score += Math.floor(readNumber(record, 'likes') / 100);
  score += Math.floor(readNumber(record, 'followers') / 100);
  score += Math.round(readNumber(record, 'ratingOverall'));
  return score;
};

const scoreGeneric: Scorer = (record, terms) =>
  2 * terms.filter((term) =>
    ['username', 'bio', 'caption'].some((field) => readText(record, field).toLowerCase().includes(term)),
  ).length;

const SCORERS: Record<string, Scorer> = {
  instagram: scoreInstagram,
  linkedin: scoreLinkedIn,
  facebook: scoreFacebook,
};

export function scoreRecord(platform: string, record: RawRecord, searchTerms: readonly string[]): number {
  const terms = normalizeTerms(searchTerms);
  if (terms.length === 0) return 0;
  return (SCORERS[platform] ?? scoreGeneric)(record, terms);
}

/**
 * Scores candidates and orders them best first. Ties keep retrieval order;
 * with no usable search terms every score is 0 and the order is unchanged.
 */
export function scoreCandidates(
  platform: string,
  candidates: readonly RawRecord[],
  searchTerms: readonly string[],
): ScoredCandidate[] {
  const terms = normalizeTerms(searchTerms);
  if (terms.length === 0) {
    return candidates.map((record) => ({ record, relevance_score: 0 }));
  }

  const scorer = SCORERS[platform] ?? scoreGeneric;
  return candidates
    .map((record, index) => ({ record, relevance_score: scorer(record, terms), index }))
    .sort((a, b) => b.relevance_score - a.relevance_score || a.index - b.index)
    .map(({ record, relevance_score }) => ({ record, relevance_score }));
}
