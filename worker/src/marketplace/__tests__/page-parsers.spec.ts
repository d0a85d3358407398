import { describe, it, expect } from 'vitest';
import { CollectionKind, FetchFailure, FetchFailureReason } from '@crate-digger/shared';
import { parseFanPage, parseItemId, parseSupporters, parseTags, toItem } from '../page-parsers';
import { blobDiv, fanPage, itemPage } from './fixtures';

const BASE = 'https://bandcamp.com';
const TARGET = 'https://label.example.com/album/seed';

describe('parseSupporters', () => {
  it('should read usernames from the collectors blob in order, without duplicates', () => {
    const html = itemPage({ supporters: ['ana', 'ben', 'ana', 'compliments', 'cy'] });

    expect(parseSupporters(html, TARGET, BASE)).toEqual(['ana', 'ben', 'cy']);
  });

  it('should fall back to fan picture links', () => {
    const html = itemPage({
      extra: [
        '<a class="fan pic" href="https://bandcamp.com/dora?from=fanthanks">x</a>',
        '<a class="pic fan-link" href="https://bandcamp.com/eli">x</a>',
        '<a class="fan pic" href="https://bandcamp.com/help">x</a>',
        '<a class="other" href="https://bandcamp.com/ignored">x</a>',
      ].join(''),
    });

    expect(parseSupporters(html, TARGET, BASE)).toEqual(['dora', 'eli']);
  });

  it('should fall back to links wrapping thumbnails', () => {
    const html = itemPage({
      extra: '<a href="https://bandcamp.com/fay"><img alt="fay thumbnail" src="x.jpg"></a>',
    });

    expect(parseSupporters(html, TARGET, BASE)).toEqual(['fay']);
  });

  it('should return nothing for a page without supporters', () => {
    expect(parseSupporters('<html><body></body></html>', TARGET, BASE)).toEqual([]);
  });

  it('should raise a parse failure for a malformed blob', () => {
    const html = '<div id="collectors-data" data-blob="{not json"></div>';

    try {
      parseSupporters(html, TARGET, BASE);
      expect.fail('expected a FetchFailure');
    } catch (error) {
      expect(error).toBeInstanceOf(FetchFailure);
      expect((error as FetchFailure).reason).toBe(FetchFailureReason.PARSE);
    }
  });
});

describe('parseItemId', () => {
  it('should prefer tralbum_data', () => {
    expect(parseItemId(itemPage({ itemId: 123 }), TARGET)).toBe('123');
  });

  it('should fall back to fan_tralbum_data then album_id', () => {
    expect(parseItemId(blobDiv('pagedata', { fan_tralbum_data: { tralbum_id: 9 } }), TARGET)).toBe('9');
    expect(parseItemId(blobDiv('pagedata', { album_id: 77 }), TARGET)).toBe('77');
  });

  it('should return null when the page has no id', () => {
    expect(parseItemId('<html></html>', TARGET)).toBeNull();
    expect(parseItemId(blobDiv('pagedata', {}), TARGET)).toBeNull();
  });
});

describe('parseTags', () => {
  it('should collect tag link texts, one per normalized tag', () => {
    const html = itemPage({ tags: ['Rock', 'rock', 'UK', 'u.k.', 'Shoegaze'] });

    expect(parseTags(html)).toEqual(['Rock', 'UK', 'Shoegaze']);
  });
});

describe('parseFanPage', () => {
  it('should resolve the first page through the item cache', () => {
    const html = fanPage({
      fanId: 42,
      collection: [{ id: 1 }, { id: 2 }],
      wishlist: [{ id: 3 }],
      itemCount: 5,
      lastToken: '1700000000::a::',
    });

    const purchases = parseFanPage(html, CollectionKind.PURCHASES, TARGET);
    expect(purchases.fanId).toBe(42);
    expect(purchases.firstPage.map((item) => item.tralbum_id)).toEqual(['1', '2']);
    expect(purchases.itemCount).toBe(5);
    expect(purchases.lastToken).toBe('1700000000::a::');

    const wishlist = parseFanPage(html, CollectionKind.WISHLIST, TARGET);
    expect(wishlist.firstPage.map((item) => item.tralbum_id)).toEqual(['3']);
  });

  it('should fail to parse a page without page data', () => {
    expect(() => parseFanPage('<html></html>', CollectionKind.PURCHASES, TARGET)).toThrow(FetchFailure);
  });
});

describe('toItem', () => {
  it('should default missing metadata', () => {
    expect(toItem({ tralbum_id: '55' }, BASE)).toEqual({
      id: '55',
      url: 'https://bandcamp.com/album/55',
      title: 'Unknown Title',
      artist: 'Unknown Artist',
      tags: [],
    });
  });

  it('should drop entries without an id', () => {
    expect(toItem({ item_title: 'Loose' }, BASE)).toBeNull();
  });
});
