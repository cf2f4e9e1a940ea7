import type { PostingCategory } from './types.js';

export const CATEGORY_LABELS: Record<PostingCategory, string> = {
  sponsorship_abroad: 'Outside Home Country (Sponsorship)',
  home_country_remote: 'Home Country Remote',
  worldwide_remote: 'Remote Worldwide',
};

export function categoryLabel(category: PostingCategory): string {
  return CATEGORY_LABELS[category];
}

export function emptyBuckets<T>(): Record<PostingCategory, T[]> {
  return {
    sponsorship_abroad: [],
    home_country_remote: [],
    worldwide_remote: [],
  };
}
