/**
 * Title/description phrases that mark a posting as part of the QA and test
 * automation role family.
 */
export const DEFAULT_ROLE_KEYWORDS: readonly string[] = [
  'qa automation',
  'test automation',
  'sdet',
  'quality assurance',
  'selenium',
  'playwright',
  'cypress',
  'software tester',
];

/**
 * Short role words accepted anywhere in a title. Card-only sources carry no
 * description, so "QA Engineer" or "Quality Engineer" must pass on title alone.
 */
export const DEFAULT_TITLE_WORDS: readonly string[] = ['qa', 'test', 'quality', 'sdet', 'automation'];

function containsAny(text: string, needles: readonly string[]): boolean {
  return needles.some((needle) => {
    const normalized = needle.toLowerCase().trim();
    return normalized.length > 0 && text.includes(normalized);
  });
}

export function matchesRoleFamily(
  title: string,
  description: string | undefined,
  keywords: readonly string[],
  titleWords: readonly string[] = DEFAULT_TITLE_WORDS,
): boolean {
  const loweredTitle = title.toLowerCase();
  if (containsAny(loweredTitle, titleWords) || containsAny(loweredTitle, keywords)) {
    return true;
  }

  return description !== undefined && containsAny(description.toLowerCase(), keywords);
}
