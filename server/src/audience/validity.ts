import { readList, readNumber, readStringList, readText } from './fields.js';
import type { RawRecord } from './types.js';

const LINKEDIN_PLACEHOLDER_NAME = 'linkedin user';

export function linkedinDisplayName(record: RawRecord): string {
  const fullName = readText(record, 'fullName');
  if (fullName) return fullName;
  const joined = `${readText(record, 'firstName')} ${readText(record, 'lastName')}`.trim();
  return joined || readText(record, 'name');
}

function instagramIsValid(record: RawRecord): boolean {
  return Boolean(readText(record, 'caption'))
    || readStringList(record, 'hashtags').length > 0
    || Boolean(readText(record, 'ownerId', 'ownerUsername'));
}

function linkedinIsValid(record: RawRecord): boolean {
  const name = linkedinDisplayName(record);
  if (!name || name.toLowerCase() === LINKEDIN_PLACEHOLDER_NAME) return false;
  return Boolean(readText(record, 'headline', 'summary', 'about'))
    || readList(record, 'experience', 'experiences').length > 0;
}

function facebookIsValid(record: RawRecord): boolean {
  return readStringList(record, 'categories').length > 0
    || readStringList(record, 'info').length > 0
    || Boolean(readText(record, 'about'))
    || readNumber(record, 'likes') !== 0
    || readNumber(record, 'followers') !== 0;
}

function genericIsValid(record: RawRecord): boolean {
  return Boolean(readText(record, 'username', 'bio', 'caption'));
}

/**
 * Whether a raw record carries enough signal to be ranked. Records that fail
 * are dropped before scoring.
 */
export function hasValidContent(platform: string, record: RawRecord): boolean {
  switch (platform) {
    case 'instagram':
      return instagramIsValid(record);
    case 'linkedin':
      return linkedinIsValid(record);
    case 'facebook':
      return facebookIsValid(record);
    default:
      return genericIsValid(record);
  }
}

export function filterValid(platform: string, records: readonly RawRecord[]): RawRecord[] {
  return records.filter((record) => hasValidContent(platform, record));
}
