import { XMLParser } from 'fast-xml-parser';
import {
  defineAdapter,
  fetchText,
  runSourceQueries,
  type FetchContext,
  type FetchResult,
  type RawPosting,
  type SourceQueryTask,
} from '@jobhound/parser-sdk';

const FEED_BASE_URL = 'https://weworkremotely.com/categories';
const CATEGORY_FEEDS = ['remote-programming-jobs', 'remote-qa-jobs'];
const MAX_ITEMS_PER_FEED = 30;

type FeedItem = Record<string, unknown>;

function isFeedItem(value: unknown): value is FeedItem {
  return typeof value === 'object' && value !== null;
}

function text(item: FeedItem, key: string): string | undefined {
  const value = item[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

// Feed titles read "Company: Role"; items without the separator are not job posts.
const TITLE_PATTERN = /^([^:]+):(.+)$/s;

function isoDay(value: string | undefined): string | undefined {
  const time = value ? Date.parse(value) : Number.NaN;
  return Number.isNaN(time) ? undefined : new Date(time).toISOString().slice(0, 10);
}

function itemTags(item: FeedItem): string[] | undefined {
  const skills = (text(item, 'skills') ?? '').split(',').map((skill) => skill.trim());
  const tags = [...skills, text(item, 'category') ?? ''].filter((tag) => tag.length > 0);
  return tags.length > 0 ? tags : undefined;
}

function itemToPosting(item: FeedItem): RawPosting | null {
  const heading = text(item, 'title');
  const link = text(item, 'link') ?? text(item, 'guid');
  const match = heading ? TITLE_PATTERN.exec(heading) : null;
  const company = match?.[1]?.trim();
  const title = match?.[2]?.trim();
  if (!link || !company || !title) {
    return null;
  }

  const slug = link.split('/remote-jobs/')[1] ?? link;

  return {
    sourceId: 'weworkremotely',
    id: `weworkremotely:${slug}`,
    url: link,
    title,
    company,
    category: 'worldwide_remote',
    location: text(item, 'region') ?? 'Worldwide',
    description: typeof item.description === 'string' ? item.description : '',
    postedAt: isoDay(text(item, 'pubDate')),
    tags: itemTags(item),
  };
}

const xmlParser = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: '@_', parseTagValue: false });

export function parseFeed(xml: string): RawPosting[] {
  const feed: unknown = xmlParser.parse(xml);
  const rss = isFeedItem(feed) ? feed.rss : undefined;
  const channel = isFeedItem(rss) ? rss.channel : undefined;
  const raw = isFeedItem(channel) ? channel.item : undefined;
  const items = (Array.isArray(raw) ? raw : raw === undefined ? [] : [raw]).slice(0, MAX_ITEMS_PER_FEED);

  const postings: RawPosting[] = [];
  for (const item of items) {
    const posting = isFeedItem(item) ? itemToPosting(item) : null;
    if (posting) {
      postings.push(posting);
    }
  }
  return postings;
}

function feedTask(feed: string): SourceQueryTask {
  return {
    label: `feed ${feed}`,
    run: async (fetchImpl) => {
      const xml = await fetchText(`${FEED_BASE_URL}/${feed}.rss`, { label: 'WeWorkRemotely RSS', fetchImpl });
      return parseFeed(xml);
    },
  };
}

export async function fetchWeWorkRemotely(context: FetchContext): Promise<FetchResult> {
  return runSourceQueries('weworkremotely', CATEGORY_FEEDS.map(feedTask), context);
}

export const weWorkRemotelyAdapter = defineAdapter({
  manifest: {
    id: 'weworkremotely',
    name: 'We Work Remotely',
    version: '0.1.0',
    categories: ['worldwide_remote'],
  },
  fetch: fetchWeWorkRemotely,
});
