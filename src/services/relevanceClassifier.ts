import type { Classification } from '../types';

/**
 * Keywords per distraction category. Matching is a plain substring test
 * against the lowercased context, so entries must be lowercase.
 */
export const BLOCKLIST_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  social: ['twitter', 'x.com', 'facebook', 'instagram', 'tiktok', 'reddit'],
  nsfw: ['porn', 'nsfw', 'xxx'],
  games: ['steam', 'epicgames', 'roblox', 'league of legends', 'valorant'],
};

const MIN_GOAL_WORD_LENGTH = 4;

// Unicode whitespace plus the ASCII file/group/record/unit separators
const WORD_SEPARATORS =
  /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

export function keywordsFor(category: string): readonly string[] {
  return Object.hasOwn(BLOCKLIST_KEYWORDS, category) ? BLOCKLIST_KEYWORDS[category] : [];
}

/**
 * Decides whether the observed window/tab fits the session goal.
 *
 * Blocked keywords of the enabled categories win over everything; the first
 * match in category order, then keyword order, is reported. Otherwise the
 * context is relevant, with the reason saying whether any goal word
 * (longer than three characters) was seen.
 */
export function classify(
  goal: string,
  observedTitle: string | null | undefined,
  observedUrl: string | null | undefined,
  blockedCategories: readonly string[]
): Classification {
  const text = [goal, observedTitle ?? '', observedUrl ?? '']
    .map((field) => field.toLowerCase())
    .join(' ');

  for (const category of blockedCategories) {
    for (const keyword of keywordsFor(category)) {
      if (text.includes(keyword)) {
        return {
          decision: 'irrelevant',
          reason: `Matched blocked keyword '${keyword}' in category '${category}'`,
        };
      }
    }
  }

  const goalWords = goal
    .toLowerCase()
    .split(WORD_SEPARATORS)
    // counted in code points, so an emoji is one character
    .filter((word) => [...word].length >= MIN_GOAL_WORD_LENGTH);

  if (goalWords.some((word) => text.includes(word))) {
    return { decision: 'relevant', reason: 'Goal keywords found in current context' };
  }

  return { decision: 'relevant', reason: 'No blocklisted signals detected' };
}
