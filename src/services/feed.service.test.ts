import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { FeedConfig } from '../config/constants';
import { FeedFetchError } from '../utils/errors';
import { FeedService, cleanHtml } from './feed.service';

const mocks = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock('axios', () => ({
  default: { get: mocks.get }
}));

const nikkei: FeedConfig = { source: 'nikkei', name: '日経新聞・速報', url: 'https://feeds.example.com/nikkei.rdf' };
const reuters: FeedConfig = { source: 'reuters', name: 'ロイター日本語', url: 'https://feeds.example.com/reuters.xml' };
const yahoo: FeedConfig = { source: 'yahoo', name: 'Yahoo!ニュース', url: 'https://feeds.example.com/yahoo.xml' };

const fetchedAt = new Date('2026-10-18T03:00:00Z');

function rss(items: Array<{ title: string; link: string }>): string {
  const body = items
    .map(item => `<item><title>${item.title}</title><link>${item.link}</link></item>`)
    .join('');
  return `<?xml version="1.0" encoding="UTF-8"?><rss version="2.0"><channel><title>test</title><link>https://example.com/</link>${body}</channel></rss>`;
}

describe('FeedService.parseFeed', () => {
  const service = new FeedService([]);

  it('RSS 2.0 を解析する', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>テスト</title>
    <link>https://example.com/</link>
    <item>
      <title>  首相が
        会見 </title>
      <link>https://example.com/a</link>
      <description>&lt;p&gt;国会で答弁&lt;/p&gt;</description>
      <pubDate>Sun, 18 Oct 2026 10:00:00 +0900</pubDate>
    </item>
    <item>
      <title></title>
      <link>https://example.com/b</link>
    </item>
  </channel>
</rss>`;

    const items = service.parseFeed(xml, reuters, fetchedAt);

    expect(items).toHaveLength(1);
    expect(items[0]).toEqual({
      title: '首相が 会見',
      link: 'https://example.com/a',
      source: 'reuters',
      sourceName: 'ロイター日本語',
      description: '国会で答弁',
      publishedAt: new Date('2026-10-18T01:00:00Z')
    });
  });

  it('RSS 1.0 (RDF) を解析し、link がなければ rdf:about を使う', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns="http://purl.org/rss/1.0/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel rdf:about="https://example.com/">
    <title>テスト</title>
    <link>https://example.com/</link>
  </channel>
  <item rdf:about="https://example.com/rdf-1">
    <title>内閣改造へ</title>
    <link>https://example.com/rdf-1</link>
    <dc:date>2026-10-18T09:30:00+09:00</dc:date>
  </item>
  <item rdf:about="https://example.com/rdf-2">
    <title>日程未定</title>
    <dc:date>unknown</dc:date>
  </item>
</rdf:RDF>`;

    const items = service.parseFeed(xml, nikkei, fetchedAt);

    expect(items.map(item => item.link)).toEqual(['https://example.com/rdf-1', 'https://example.com/rdf-2']);
    expect(items[0].publishedAt).toEqual(new Date('2026-10-18T00:30:00Z'));
    expect(items[1].publishedAt).toBe(fetchedAt);
    expect(items[1].description).toBe('');
  });

  it('Atom を解析し alternate リンクを使う', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>テスト</title>
  <link href="https://example.com/"/>
  <entry>
    <title>選挙の日程決まる</title>
    <link rel="enclosure" href="https://example.com/image.jpg"/>
    <link rel="alternate" href="https://example.com/atom-1"/>
    <updated>2026-10-18T00:00:00Z</updated>
    <summary>衆院選</summary>
  </entry>
</feed>`;

    const items = service.parseFeed(xml, yahoo, fetchedAt);

    expect(items).toHaveLength(1);
    expect(items[0].link).toBe('https://example.com/atom-1');
    expect(items[0].description).toBe('衆院選');
    expect(items[0].publishedAt).toEqual(new Date('2026-10-18T00:00:00Z'));
  });

  it('フィードごとの最大件数で打ち切る', () => {
    const xml = rss([
      { title: '一', link: 'https://example.com/1' },
      { title: '二', link: 'https://example.com/2' },
      { title: '三', link: 'https://example.com/3' }
    ]);

    const items = new FeedService([], 2).parseFeed(xml, nikkei, fetchedAt);

    expect(items.map(item => item.title)).toEqual(['一', '二']);
  });
});

describe('FeedService.fetchAll', () => {
  beforeEach(() => {
    mocks.get.mockReset();
  });

  it('失敗したフィードを飛ばし、フィード間で重複したリンクを除く', async () => {
    mocks.get.mockImplementation(async (url: string) => {
      if (url === nikkei.url) {
        return { status: 200, data: rss([{ title: '首相が会見', link: 'https://example.com/x' }]) };
      }
      if (url === reuters.url) {
        throw new Error('timeout of 15000ms exceeded');
      }
      return {
        status: 200,
        data: rss([
          { title: '首相が会見', link: 'https://example.com/x' },
          { title: '国会が閉会', link: 'https://example.com/y' }
        ])
      };
    });

    const items = await new FeedService([nikkei, reuters, yahoo]).fetchAll();

    expect(items.map(item => [item.source, item.link])).toEqual([
      ['nikkei', 'https://example.com/x'],
      ['yahoo', 'https://example.com/y']
    ]);
    expect(mocks.get).toHaveBeenCalledTimes(3);
    expect(mocks.get).toHaveBeenCalledWith(nikkei.url, expect.objectContaining({ timeout: 15000, responseType: 'text' }));
  });

  it('フラグメントだけが異なるリンクは同じ記事として1件にする', async () => {
    mocks.get.mockResolvedValueOnce({
      status: 200,
      data: rss([
        { title: '首相が会見', link: 'https://example.com/a#x' },
        { title: '首相が会見', link: 'https://example.com/a' }
      ])
    });

    const items = await new FeedService([nikkei]).fetchAll();

    expect(items.map(item => item.link)).toEqual(['https://example.com/a#x']);
  });

  it('全てのフィードが失敗したら FeedFetchError', async () => {
    mocks.get.mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));

    await expect(new FeedService([nikkei, reuters]).fetchAll()).rejects.toBeInstanceOf(FeedFetchError);
  });

  it('200 以外のステータスは失敗として扱う', async () => {
    mocks.get.mockResolvedValue({ status: 304, data: '' });

    await expect(new FeedService([nikkei]).fetchAll()).rejects.toBeInstanceOf(FeedFetchError);
  });
});

describe('cleanHtml', () => {
  it('タグとエンティティを除去して空白を詰める', () => {
    expect(cleanHtml('<p>与党&amp;野党</p>\n<br/>&quot;協議&quot;&nbsp;続く')).toBe('与党&野党 "協議" 続く');
  });
});
