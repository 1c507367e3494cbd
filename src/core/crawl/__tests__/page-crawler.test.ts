import { promises as fs } from 'fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { withBrowserSession } from '../../browser/session';
import { ConfigurationError, NavigationError, PaginationError } from '../../errors/index';
import { PageStore } from '../../storage/page-store';
import { FakeSession } from '../../__tests__/fake-session';
import { PageCrawler } from '../page-crawler';

const NEXT = 'head > link[rel=next]';

const chain = {
  'https://shop.test/list': { html: '<p>1</p>', next: 'https://shop.test/list?p=2' },
  'https://shop.test/list?p=2': { html: '<p>2</p>', next: '/list?p=3' },
  'https://shop.test/list?p=3': { html: '<p>3</p>' },
};

describe('PageCrawler', () => {
  let root: string;
  let store: PageStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'crawler-'));
    store = new PageStore(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  test('follows next links until the last page and stores every page', async () => {
    const session = new FakeSession(chain);
    const crawler = new PageCrawler({ session, store, nextPageSelector: NEXT });

    const summary = await crawler.crawl('https://shop.test/list');

    expect(session.visited).toEqual([
      'https://shop.test/list',
      'https://shop.test/list?p=2',
      'https://shop.test/list?p=3',
    ]);
    expect(summary.pagesVisited).toBe(3);
    expect(summary.skipped).toEqual([]);
    expect(summary.captures.map((c) => c.fileName)).toEqual([
      'https__shop.test__443__slash_list.html',
      'https__shop.test__443__slash_list__p_eq_2.html',
      'https__shop.test__443__slash_list__p_eq_3.html',
    ]);
    expect(await store.list()).toHaveLength(3);
    expect(await fs.readFile(path.join(root, 'https__shop.test__443__slash_list__p_eq_3.html'), 'utf8')).toBe(
      '<p>3</p>',
    );
  });

  test('rejects an unparseable start URL before navigating', async () => {
    const session = new FakeSession(chain);
    const crawler = new PageCrawler({ session, store, nextPageSelector: NEXT });

    await expect(crawler.crawl('not a url')).rejects.toBeInstanceOf(ConfigurationError);
    expect(session.visited).toEqual([]);
  });

  test('stops on a navigation failure and keeps earlier captures', async () => {
    const session = new FakeSession({
      'https://shop.test/list': { html: '<p>1</p>', next: 'https://shop.test/gone' },
    });
    const crawler = new PageCrawler({ session, store, nextPageSelector: NEXT });

    await expect(crawler.crawl('https://shop.test/list')).rejects.toBeInstanceOf(NavigationError);
    expect(await store.list()).toEqual([path.join(root, 'https__shop.test__443__slash_list.html')]);
  });

  test('aborts when the next link cannot be parsed', async () => {
    const session = new FakeSession({
      'https://shop.test/list': { html: '<p>1</p>', next: 'http://[broken' },
    });
    const crawler = new PageCrawler({ session, store, nextPageSelector: NEXT });

    const error = await crawler.crawl('https://shop.test/list').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PaginationError);
    expect(error).toMatchObject({ href: 'http://[broken', pageUrl: 'https://shop.test/list' });
  });

  test('aborts when the next link has no href', async () => {
    const session = new FakeSession({
      'https://shop.test/list': { html: '<p>1</p>', next: null },
    });
    const crawler = new PageCrawler({ session, store, nextPageSelector: NEXT });

    await expect(crawler.crawl('https://shop.test/list')).rejects.toBeInstanceOf(PaginationError);
  });

  test('skips saving pages it cannot name and keeps crawling', async () => {
    const session = new FakeSession({
      'custom://shop/list': { html: '<p>1</p>', next: 'https://shop.test/list?p=3' },
      'https://shop.test/list?p=3': { html: '<p>3</p>' },
    });
    const crawler = new PageCrawler({ session, store, nextPageSelector: NEXT });

    const summary = await crawler.crawl('custom://shop/list');

    expect(summary.pagesVisited).toBe(2);
    expect(summary.skipped).toEqual(['custom://shop/list']);
    expect(summary.captures.map((c) => c.sourceUrl)).toEqual(['https://shop.test/list?p=3']);
  });
});

describe('withBrowserSession', () => {
  test('closes the session after success', async () => {
    const session = new FakeSession({});
    await expect(withBrowserSession(async () => session, async () => 'ok')).resolves.toBe('ok');
    expect(session.closed).toBe(true);
  });

  test('closes the session when the work fails', async () => {
    const session = new FakeSession({});
    await expect(
      withBrowserSession(
        async () => session,
        (s) => s.navigate('https://shop.test/missing'),
      ),
    ).rejects.toBeInstanceOf(NavigationError);
    expect(session.closed).toBe(true);
  });
});
