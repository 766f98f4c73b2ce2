/**
 * Activity Feed Tests
 *
 * Page parsing and the HTTP source's end-of-feed / failure mapping.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ActivityFeedSource,
  authorityIdFromUri,
  parseActivityPage,
} from '../../../acquisition/activity-feed.js';
import { FeedFetchError } from '../../../core/errors.js';
import { HTTPClient, HTTPError } from '../../../core/http-client.js';

function item(id: string, updated: string, published: string): unknown {
  return { type: 'Update', published, object: { id, type: 'madsrdf:Authority', updated } };
}

describe('authorityIdFromUri', () => {
  it('should take the last path segment', () => {
    expect(authorityIdFromUri('http://id.example.org/authorities/names/n79021164')).toBe('n79021164');
  });

  it('should ignore a trailing slash', () => {
    expect(authorityIdFromUri('http://id.example.org/authorities/names/no2023000111/')).toBe('no2023000111');
  });
});

describe('parseActivityPage', () => {
  it('should build tuples in feed order', () => {
    const page = parseActivityPage(1, {
      orderedItems: [
        item('http://id.example.org/authorities/names/n79021164', '2024-05-01', '2024-05-02T10:00:00Z'),
        item('http://id.example.org/authorities/names/no2023000111', '2024-04-30', '2024-05-01T09:00:00Z'),
      ],
    });

    expect(page.pageNumber).toBe(1);
    expect(page.tuples).toEqual([
      {
        authorityId: 'n79021164',
        updateDate: '2024-05-01',
        publishedDate: '2024-05-02T10:00:00Z',
        recordRef: 'https://id.example.org/authorities/names/n79021164.marcxml.xml',
        uniqueId: 'n79021164-2024-05-01-2024-05-02T10:00:00Z',
      },
      {
        authorityId: 'no2023000111',
        updateDate: '2024-04-30',
        publishedDate: '2024-05-01T09:00:00Z',
        recordRef: 'https://id.example.org/authorities/names/no2023000111.marcxml.xml',
        uniqueId: 'no2023000111-2024-04-30-2024-05-01T09:00:00Z',
      },
    ]);
  });

  it('should keep http record refs when forceHttps is off', () => {
    const page = parseActivityPage(
      1,
      { orderedItems: [item('http://id.example.org/authorities/names/n1', '2024-05-01', '2024-05-02')] },
      { forceHttps: false }
    );

    expect(page.tuples[0]?.recordRef).toBe('http://id.example.org/authorities/names/n1.marcxml.xml');
  });

  it('should accept the "update" spelling of the update date', () => {
    const page = parseActivityPage(3, {
      orderedItems: [
        { published: '2024-05-02', object: { id: 'https://id.example.org/authorities/names/n1', update: '2024-05-01' } },
      ],
    });

    expect(page.tuples[0]?.uniqueId).toBe('n1-2024-05-01-2024-05-02');
  });

  it('should treat a page without orderedItems as empty', () => {
    expect(parseActivityPage(4, {}).tuples).toEqual([]);
  });

  it('should reject a body that is not an activity page', () => {
    expect(() => parseActivityPage(2, { orderedItems: 'nope' })).toThrow(FeedFetchError);
    expect(() => parseActivityPage(2, null)).toThrow(FeedFetchError);
  });

  it('should reject an entry without an update date', () => {
    expect(() =>
      parseActivityPage(2, {
        orderedItems: [{ published: '2024-05-02', object: { id: 'https://id.example.org/authorities/names/n1' } }],
      })
    ).toThrow('Feed page 2: entry 0 (https://id.example.org/authorities/names/n1) has no update date');
  });
});

describe('ActivityFeedSource', () => {
  const baseUrl = 'https://id.example.org/authorities/names/activitystreams/feed/';

  function source() {
    const httpClient = new HTTPClient({ maxRetries: 0 });
    const fetchJSON = vi.spyOn(httpClient, 'fetchJSON');
    return { feed: new ActivityFeedSource({ baseUrl, httpClient }), fetchJSON };
  }

  it('should request <base>/<n>.json', async () => {
    const { feed, fetchJSON } = source();
    fetchJSON.mockResolvedValue({ orderedItems: [] });

    await feed.fetchPage(7);

    expect(fetchJSON).toHaveBeenCalledWith(
      'https://id.example.org/authorities/names/activitystreams/feed/7.json'
    );
  });

  it('should parse the fetched page', async () => {
    const { feed, fetchJSON } = source();
    fetchJSON.mockResolvedValue({
      orderedItems: [item('http://id.example.org/authorities/names/n1', '2024-05-01', '2024-05-02')],
    });

    const page = await feed.fetchPage(1);

    expect(page?.tuples.map((t) => t.uniqueId)).toEqual(['n1-2024-05-01-2024-05-02']);
  });

  it('should report the end of the feed on 404 past page 1', async () => {
    const { feed, fetchJSON } = source();
    fetchJSON.mockRejectedValue(new HTTPError('HTTP 404: Not Found', 404, `${baseUrl}9.json`));

    expect(await feed.fetchPage(9)).toBeNull();
  });

  it('should fail on 404 for page 1', async () => {
    const { feed, fetchJSON } = source();
    fetchJSON.mockRejectedValue(new HTTPError('HTTP 404: Not Found', 404, `${baseUrl}1.json`));

    await expect(feed.fetchPage(1)).rejects.toBeInstanceOf(FeedFetchError);
  });

  it('should fail on server errors', async () => {
    const { feed, fetchJSON } = source();
    fetchJSON.mockRejectedValue(new HTTPError('HTTP 503: Service Unavailable', 503, `${baseUrl}2.json`));

    await expect(feed.fetchPage(2)).rejects.toThrow('Feed page 2: HTTP 503: Service Unavailable');
  });
});
