import type { CanonicalProfile } from '../audience/types.js';
import type { GenerationRequirements } from './types.js';

export const PLATFORM_GUIDELINES: Record<string, string> = {
  instagram: 'Casual and warm, 2-3 sentences. One or two emojis are welcome.',
  linkedin: 'Professional and concise, 3-4 sentences. No emojis.',
  facebook: 'Friendly and conversational, 2-4 sentences.',
  generic: 'Friendly and brief, 2-3 sentences.',
};

const PLATFORM_LABELS: Record<string, string> = {
  instagram: 'Instagram direct message',
  linkedin: 'LinkedIn connection message',
  facebook: 'Facebook message',
  generic: 'outreach message',
};

export const SYSTEM_PROMPT = `You write short, personalized outreach messages for social platforms.
Every message must mention at least one concrete detail from the recipient's profile.
Never invent facts about the recipient and never leave template placeholders in the message.
Return ONLY a JSON object, no markdown fences, no explanation.`;

export const MESSAGE_TEMPLATE = `Write a personalized {{platform_label}} from {{sender}} to the person below.

Sender is looking for: {{search_terms}}
{{focus_lines}}
Recipient: {{username}}
{{profile_lines}}

Style: {{guideline}}
Address the recipient as {{username}}.

Return JSON with this exact shape:
{"message": "the message text", "reasoning": "one sentence naming the profile details you used"}`;

/** Replaces `{{key}}` markers; unknown keys render empty. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_, key: string) => values[key] ?? '');
}

export interface ProfileFacts {
  lines: string[];
  fields_used: string[];
}

function describeEntry(entry: Record<string, unknown> | string): string {
  if (typeof entry === 'string') return entry;
  const title = typeof entry.title === 'string' ? entry.title : '';
  const company = typeof entry.companyName === 'string'
    ? entry.companyName
    : (typeof entry.company === 'string' ? entry.company : '');
  return [title, company].filter(Boolean).join(' at ');
}

/** Profile details handed to the engine, and the names of the fields they came from. */
export function profileFacts(profile: CanonicalProfile): ProfileFacts {
  const lines: string[] = [];
  const fields: string[] = [];
  const add = (field: string, label: string, value: string) => {
    if (!value.trim()) return;
    lines.push(`- ${label}: ${value}`);
    fields.push(field);
  };

  switch (profile.platform) {
    case 'instagram':
      add('bio', 'Bio', profile.bio);
      add('hashtags', 'Hashtags', profile.details.hashtags.map((tag) => `#${tag.replace(/^#/, '')}`).join(' '));
      add('recent_post.caption', 'Recent post', profile.details.recent_post.caption);
      break;
    case 'linkedin':
      add('headline', 'Headline', profile.details.headline ?? profile.bio);
      add('experience', 'Experience', profile.details.experience.map(describeEntry).filter(Boolean).join('; '));
      add('industry', 'Industry', profile.details.industry ?? '');
      break;
    case 'facebook':
      add('categories', 'Page categories', profile.details.categories.join(', '));
      add('about', 'About', profile.details.about ?? profile.bio);
      add('page.title', 'Page title', profile.details.page.title ?? '');
      break;
    case 'generic':
      add('bio', 'Bio', profile.bio);
      add('hashtags', 'Hashtags', profile.details.hashtags.join(' '));
      break;
  }

  return { lines, fields_used: fields };
}

export function buildMessagePrompt(requirements: GenerationRequirements, profile: CanonicalProfile, facts: ProfileFacts): string {
  const focus = [
    requirements.preferred_profession ? `Profession focus: ${requirements.preferred_profession}` : '',
    requirements.preferred_location ? `Location focus: ${requirements.preferred_location}` : '',
  ].filter(Boolean);

  return fillTemplate(MESSAGE_TEMPLATE, {
    platform_label: PLATFORM_LABELS[profile.platform] ?? PLATFORM_LABELS.generic,
    sender: requirements.client_role
      ? `${requirements.client_name} (${requirements.client_role})`
      : requirements.client_name,
    search_terms: requirements.search_terms.join(', ') || 'relevant creators',
    focus_lines: focus.join('\n'),
    username: profile.username,
    profile_lines: facts.lines.join('\n'),
    guideline: PLATFORM_GUIDELINES[profile.platform] ?? PLATFORM_GUIDELINES.generic,
  });
}
