import { FieldExtractor } from '../../../src/application/services/FieldExtractor';
import { defineSchema } from '../../../src/domain/extraction/ExtractionRule';
import { ExtractionError } from '../../../src/domain/errors/HarvestErrors';
import { FakeElement, FakePage, el } from '../../helpers/FakeBrowser';

function post(author: string | null, text: string, href: string): FakeElement {
  const children: Record<string, FakeElement[]> = {
    '.text': [el(text)],
    a: [el('', { href })],
  };
  if (author !== null) {
    children['.author'] = [el(author)];
  }
  return new FakeElement({ children });
}

describe('FieldExtractor', () => {
  let extractor: FieldExtractor;
  let page: FakePage;

  beforeEach(() => {
    extractor = new FieldExtractor();
    page = new FakePage({
      h1: [el('  Quarterly Report  ')],
      'a.more': [el('More', { href: '/reports/q3' })],
      '.tag': [el('a'), el('b'), el('c')],
      '.views': [el('1.2K views')],
      '.order': [el('Order #4821')],
    });
  });

  it('should resolve every rule kind into one record', async () => {
    const schema = defineSchema({
      title: { rule: { kind: 'text', selector: 'h1' }, required: true },
      more: { rule: { kind: 'attribute', selector: 'a.more', attribute: 'href', resolveUrl: true } },
      tagCount: { rule: { kind: 'computed', selector: '.tag', transform: { type: 'count' } } },
      views: { rule: { kind: 'computed', selector: '.views', transform: { type: 'number' } } },
      orderId: {
        rule: {
          kind: 'computed',
          selector: '.order',
          transform: { type: 'match', pattern: '#(\\d+)' },
        },
      },
    });

    const outcome = await extractor.extract(page, schema, 'https://example.test/news/today');

    expect(outcome.record).toEqual({
      title: 'Quarterly Report',
      more: 'https://example.test/reports/q3',
      tagCount: 3,
      views: 1200,
      orderId: '4821',
    });
    expect(outcome.unresolved).toEqual([]);
  });

  it('should omit an optional field that is not on the page', async () => {
    const schema = defineSchema([
      { name: 'title', rule: { kind: 'text', selector: 'h1' }, required: true },
      { name: 'subtitle', rule: { kind: 'text', selector: 'h2' } },
    ]);

    const outcome = await extractor.extract(page, schema, 'https://example.test/');

    expect(outcome.record).toEqual({ title: 'Quarterly Report' });
    expect('subtitle' in outcome.record).toBe(false);
    expect(outcome.unresolved).toEqual(['subtitle']);
  });

  it('should fail with the unresolved fields and the partial record', async () => {
    const schema = defineSchema([
      { name: 'title', rule: { kind: 'text', selector: 'h1' }, required: true },
      { name: 'subtitle', rule: { kind: 'text', selector: 'h2' } },
      { name: 'price', rule: { kind: 'text', selector: '.price' }, required: true },
      { name: 'views', rule: { kind: 'computed', selector: '.views', transform: { type: 'number' } } },
    ]);

    const error = await extractor
      .extract(page, schema, 'https://example.test/')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({
      unresolvedFields: ['subtitle', 'price'],
      partialRecord: { title: 'Quarterly Report' },
    });
  });

  it('should keep attribute values raw unless asked to resolve them', async () => {
    const schema = defineSchema({
      more: { rule: { kind: 'attribute', selector: 'a.more', attribute: 'href' } },
      missing: { rule: { kind: 'attribute', selector: 'a.more', attribute: 'data-id' } },
    });

    const outcome = await extractor.extract(page, schema, 'https://example.test/');

    expect(outcome.record).toEqual({ more: '/reports/q3' });
    expect(outcome.unresolved).toEqual(['missing']);
  });

  it('should keep the raw value when the page URL cannot serve as a base', async () => {
    const schema = defineSchema({
      more: {
        rule: { kind: 'attribute', selector: 'a.more', attribute: 'href', resolveUrl: true },
      },
    });

    const outcome = await extractor.extract(page, schema, 'about:blank');

    expect(outcome.record).toEqual({ more: '/reports/q3' });
  });

  it('should treat a zero count as a value and a failed match as unresolved', async () => {
    const schema = defineSchema({
      comments: { rule: { kind: 'computed', selector: '.comment', transform: { type: 'count' } } },
      sku: {
        rule: {
          kind: 'computed',
          selector: '.order',
          transform: { type: 'match', pattern: 'SKU-(\\w+)' },
        },
      },
      digits: {
        rule: { kind: 'computed', selector: '.order', transform: { type: 'match', pattern: '\\d+' } },
      },
    });

    const outcome = await extractor.extract(page, schema, 'https://example.test/');

    expect(outcome.record).toEqual({ comments: 0, digits: '4821' });
    expect(outcome.unresolved).toEqual(['sku']);
  });

  describe('list rules', () => {
    beforeEach(() => {
      page.elements['.post'] = [
        post('ana', 'hello', '/p/1'),
        post('bob', 'Buy now', '/p/2'),
        post('ana', 'hello again', '/p/1'),
        post(null, 'anonymous', '/p/4'),
        post('cy', 'hi', '/p/5'),
        post('dee', 'late', '/p/6'),
      ];
    });

    it('should scope fields to each item and apply filters, dedupe and limit', async () => {
      const schema = defineSchema({
        posts: {
          rule: {
            kind: 'list',
            itemSelector: '.post',
            fields: [
              { name: 'author', rule: { kind: 'text', selector: '.author' }, required: true },
              { name: 'text', rule: { kind: 'text', selector: '.text' } },
              {
                name: 'link',
                rule: { kind: 'attribute', selector: 'a', attribute: 'href', resolveUrl: true },
              },
            ],
            uniqueBy: 'link',
            where: [{ field: 'text', pattern: 'buy', flags: 'i', negate: true }],
            limit: 2,
          },
          required: true,
        },
      });

      const outcome = await extractor.extract(page, schema, 'https://example.test/feed');

      expect(outcome.record).toEqual({
        posts: [
          { author: 'ana', text: 'hello', link: 'https://example.test/p/1' },
          { author: 'cy', text: 'hi', link: 'https://example.test/p/5' },
        ],
      });
    });

    it('should treat an empty list as unresolved', async () => {
      const schema = defineSchema({
        posts: {
          rule: {
            kind: 'list',
            itemSelector: '.missing',
            fields: [{ name: 'text', rule: { kind: 'text', selector: '.text' } }],
          },
          required: true,
        },
      });

      await expect(extractor.extract(page, schema, 'https://example.test/')).rejects.toMatchObject({
        kind: 'ExtractionError',
        unresolvedFields: ['posts'],
      });
    });
  });
});
