/**
 * Activity Feed Source
 *
 * Reads the paginated JSON activity stream of the name-authority service.
 * Page N lives at `<baseUrl>/<N>.json`; each entry in `orderedItems` names an
 * authority record (by URI), the date it was updated, and the date the feed
 * published the activity.
 *
 * A 404 past the first page is the end of the feed. Any other failure, and
 * any page whose body does not match the activity-stream shape, is a
 * FeedFetchError.
 */

import { z } from 'zod';
import { FeedFetchError, errorMessage } from '../core/errors.js';
import { HTTPClient, HTTPError } from '../core/http-client.js';
import { createActivityTuple } from '../core/types.js';
import type { ActivityTuple } from '../core/types.js';

// ============================================================================
// Contract
// ============================================================================

/**
 * One parsed feed page, entries in feed order
 */
export interface FeedPage {
  readonly pageNumber: number;
  readonly tuples: readonly ActivityTuple[];
}

/**
 * Paginated activity feed
 */
export interface FeedSource {
  /**
   * Fetch and parse page `pageNumber` (1-based)
   *
   * @returns The page, or null when the feed has no such page
   * @throws {FeedFetchError} If the page is unreachable or malformed
   */
  fetchPage(pageNumber: number): Promise<FeedPage | null>;
}

// ============================================================================
// Wire Format
// ============================================================================

const ActivityItemSchema = z.object({
  published: z.string().min(1),
  object: z
    .object({
      id: z.string().min(1),
      updated: z.string().min(1).optional(),
      // Older feed pages spell the field without the trailing "d"
      update: z.string().min(1).optional(),
    })
    .passthrough(),
});

const ActivityPageSchema = z.object({
  orderedItems: z.array(ActivityItemSchema).default([]),
});

export type ActivityItem = z.infer<typeof ActivityItemSchema>;

export interface ActivityParseOptions {
  /** Rewrite http:// record locators to https:// (default: true) */
  readonly forceHttps?: boolean;
}

/**
 * Authority id = last path segment of the authority URI
 */
export function authorityIdFromUri(uri: string): string {
  const segments = uri.replace(/\/+$/, '').split('/');
  return segments[segments.length - 1] ?? '';
}

/**
 * Parse one activity-stream page body into tuples
 *
 * @throws {FeedFetchError} If the body does not match the activity-stream shape
 */
export function parseActivityPage(
  pageNumber: number,
  body: unknown,
  options: ActivityParseOptions = {}
): FeedPage {
  const parsed = ActivityPageSchema.safeParse(body);
  if (!parsed.success) {
    throw new FeedFetchError(pageNumber, `unexpected page shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const forceHttps = options.forceHttps ?? true;

  const tuples = parsed.data.orderedItems.map((item, index) => {
    const updateDate = item.object.updated ?? item.object.update;
    if (updateDate === undefined) {
      throw new FeedFetchError(pageNumber, `entry ${index} (${item.object.id}) has no update date`);
    }

    const authorityId = authorityIdFromUri(item.object.id);
    if (authorityId === '') {
      throw new FeedFetchError(pageNumber, `entry ${index} has no authority id in ${item.object.id}`);
    }

    const recordUri = `${item.object.id}.marcxml.xml`;

    return createActivityTuple({
      authorityId,
      updateDate,
      publishedDate: item.published,
      recordRef: forceHttps ? recordUri.replace(/^http:\/\//, 'https://') : recordUri,
    });
  });

  return { pageNumber, tuples };
}

// ============================================================================
// HTTP Source
// ============================================================================

export interface ActivityFeedSourceConfig extends ActivityParseOptions {
  /** Feed base URL, without trailing slash */
  readonly baseUrl: string;
  readonly httpClient: HTTPClient;
}

/**
 * Activity feed served over HTTP
 *
 * @example
 * ```typescript
 * const source = new ActivityFeedSource({
 *   baseUrl: 'https://id.loc.gov/authorities/names/activitystreams/feed',
 *   httpClient: createHTTPClient(),
 * });
 * const page = await source.fetchPage(1);
 * ```
 */
export class ActivityFeedSource implements FeedSource {
  constructor(private readonly config: ActivityFeedSourceConfig) {}

  pageUrl(pageNumber: number): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/${pageNumber}.json`;
  }

  async fetchPage(pageNumber: number): Promise<FeedPage | null> {
    const url = this.pageUrl(pageNumber);
    let body: unknown;

    try {
      body = await this.config.httpClient.fetchJSON(url);
    } catch (error) {
      if (error instanceof HTTPError && error.statusCode === 404 && pageNumber > 1) {
        return null;
      }
      throw new FeedFetchError(pageNumber, errorMessage(error), { cause: error });
    }

    return parseActivityPage(pageNumber, body, { forceHttps: this.config.forceHttps });
  }
}
