import { selectItemsByAttrs, sortItemsByAttrs } from '../../items/filterUtils';
import { DefaultItemPreprocessor } from '../../items/itemPreprocessor';
import { Item } from '../../types/types';

const videos: Item[] = [
  { id: 'v1', channel: 'b', views: 10, live: false },
  { id: 'v2', channel: 'a', views: 30 },
  { id: 'v3', channel: 'b', views: 20, live: true },
  { id: 'v4', views: 5 },
];

describe('selectItemsByAttrs', () => {
  it('keeps only the listed attributes', () => {
    expect(selectItemsByAttrs(videos, ['id', 'views'])).toEqual([
      { id: 'v1', views: 10 },
      { id: 'v2', views: 30 },
      { id: 'v3', views: 20 },
      { id: 'v4', views: 5 },
    ]);
  });

  it('leaves out attributes an item does not have', () => {
    const selected = selectItemsByAttrs(videos, ['channel']);

    expect(selected[3]).toEqual({});
    expect('channel' in selected[3]).toBe(false);
  });

  it('does not modify the input items', () => {
    selectItemsByAttrs(videos, ['id']);

    expect(videos[0]).toEqual({ id: 'v1', channel: 'b', views: 10, live: false });
  });
});

describe('sortItemsByAttrs', () => {
  const ids = (items: Item[]) => items.map(item => item.id);

  it('sorts numbers ascending and descending', () => {
    expect(ids(sortItemsByAttrs(videos, [['views', 'asc']]))).toEqual(['v4', 'v1', 'v3', 'v2']);
    expect(ids(sortItemsByAttrs(videos, [['views', 'desc']]))).toEqual(['v2', 'v3', 'v1', 'v4']);
  });

  it('uses later attributes to break ties', () => {
    expect(
      ids(sortItemsByAttrs(videos, [['channel', 'asc'], ['views', 'desc']]))
    ).toEqual(['v2', 'v3', 'v1', 'v4']);
  });

  it('puts items without the attribute last in either direction', () => {
    expect(ids(sortItemsByAttrs(videos, [['channel', 'desc']]))).toEqual(['v1', 'v3', 'v2', 'v4']);
    expect(ids(sortItemsByAttrs(videos, [['live', 'asc']]))).toEqual(['v1', 'v3', 'v2', 'v4']);
  });

  it('keeps the input order of equal items', () => {
    const items: Item[] = [
      { id: 'x', rank: 1 },
      { id: 'y', rank: 1 },
      { id: 'z', rank: 0 },
    ];

    expect(ids(sortItemsByAttrs(items, [['rank', 'asc']]))).toEqual(['z', 'x', 'y']);
  });

  it('returns a new array', () => {
    const sorted = sortItemsByAttrs(videos, [['views', 'asc']]);

    expect(sorted).not.toBe(videos);
    expect(ids(videos)).toEqual(['v1', 'v2', 'v3', 'v4']);
  });
});

describe('DefaultItemPreprocessor', () => {
  const preprocessor = new DefaultItemPreprocessor();

  it('drops undefined attributes', () => {
    expect(preprocessor.preprocess({ id: 'v1', title: undefined, views: 0 })).toEqual({
      id: 'v1',
      views: 0,
    });
  });

  it('keeps null, empty and falsy values', () => {
    const item: Item = { id: 'v1', note: null, tags: [], live: false, title: '' };

    expect(preprocessor.preprocess(item)).toEqual(item);
  });

  it('does not modify its input', () => {
    const item: Item = { id: 'v1', title: undefined };

    preprocessor.preprocess(item);

    expect(Object.keys(item)).toEqual(['id', 'title']);
  });
});
