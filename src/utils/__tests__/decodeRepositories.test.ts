import { decodeSearchResponse } from '../decodeRepositories';
import { DecodeError } from '@/services/errors';
import { makeRawItem } from '@/test/factories';

/**
 * Search response decoder GWT Tests
 */

describe('decodeSearchResponse', () => {
  it('GIVEN a well-formed item WHEN decoded THEN maps every field', () => {
    const { records, totalCount } = decodeSearchResponse({
      total_count: 42,
      items: [makeRawItem({ score: 9.21, stargazers_count: 12 })],
    });

    expect(totalCount).toBe(42);
    expect(records).toEqual([
      {
        id: 1,
        name: 'sample-repo',
        fullName: 'octo/sample-repo',
        owner: { name: 'octo', avatarUrl: 'https://avatars.example.com/u/1' },
        url: 'https://github.com/octo/sample-repo',
        lastUpdated: 1538998604,
        description: 'A sample repository',
        language: 'Elm',
        score: 9.21,
        stars: 12,
      },
    ]);
  });

  it('GIVEN a null language WHEN decoded THEN uses the NO LANGUAGE sentinel', () => {
    const { records } = decodeSearchResponse({ items: [makeRawItem({ language: null })] });

    expect(records[0].language).toBe('NO LANGUAGE');
  });

  it('GIVEN optional fields missing WHEN decoded THEN falls back', () => {
    const { full_name, score, stargazers_count, language, ...item } = makeRawItem();

    const { records, totalCount } = decodeSearchResponse({ items: [item] });

    expect(totalCount).toBe(1);
    expect(records[0]).toMatchObject({
      fullName: 'octo/sample-repo',
      score: null,
      stars: 0,
      language: 'NO LANGUAGE',
    });
  });

  it('GIVEN a null description WHEN decoded THEN keeps null', () => {
    const { records } = decodeSearchResponse({ items: [makeRawItem({ description: null })] });

    expect(records[0].description).toBeNull();
  });

  it('GIVEN an item missing owner.login WHEN decoded THEN the whole batch fails naming the field', () => {
    const bad = { ...makeRawItem({ id: 2 }), owner: { avatar_url: 'https://avatars.example.com/u/2' } };

    const decode = () => decodeSearchResponse({ items: [makeRawItem(), bad] });

    let caught: unknown;
    try {
      decode();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DecodeError);
    expect(caught).toMatchObject({ field: 'items.1.owner.login' });
  });

  it('GIVEN an unparseable timestamp WHEN decoded THEN fails on updated_at', () => {
    expect(() => decodeSearchResponse({ items: [makeRawItem({ updated_at: 'yesterday' })] })).toThrow(
      /items\.0\.updated_at/
    );
  });

  it('GIVEN a body without items WHEN decoded THEN fails on items', () => {
    expect(() => decodeSearchResponse({ message: 'Validation Failed' })).toThrow(/"items"/);
  });
});
