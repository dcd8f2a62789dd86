import { describe, it, expect } from 'vitest';
import { enrichColumn, extractField } from './column-enricher.js';
import { EnrichmentMetrics } from '../observability/metrics.js';
import { FakeWebEngine } from '../testing/fake-web-engine.js';
import { articleHtml } from '../testing/article-html.js';
import type { Table } from '../table/types.js';

const pages = {
  'https://alpha.example/one': articleHtml({ title: 'Alpha One - Alpha Daily' }),
  'https://beta.example/two': articleHtml({ title: 'Beta Two' }),
  'https://www.gamma.example/three': articleHtml({ title: 'Gamma Three - Gamma' }),
};

describe('extractField', () => {
  it('resolves, fetches and extracts a document field', async () => {
    const engine = new FakeWebEngine({ pages });

    const value = await extractField('alpha.example/one', 'title', engine);

    expect(value).toBe('Alpha One');
    expect(engine.resolveCalls).toEqual(['alpha.example/one']);
    expect(engine.fetchCalls).toEqual(['https://alpha.example/one']);
  });

  it('derives media name from the resolved URL without fetching', async () => {
    const engine = new FakeWebEngine({ pages });

    const value = await extractField('www.gamma.example/three', 'media_name', engine);

    expect(value).toBe('gamma.example');
    expect(engine.fetchCalls).toEqual([]);
  });

  it('returns null for unresolvable URLs without fetching', async () => {
    const engine = new FakeWebEngine({ pages, unresolvable: ['offline.example'] });

    expect(await extractField('offline.example', 'title', engine)).toBeNull();
    expect(await extractField('offline.example', 'media_name', engine)).toBeNull();
    expect(engine.fetchCalls).toEqual([]);
  });

  it('returns null for empty and missing cells', async () => {
    const engine = new FakeWebEngine({ pages });

    expect(await extractField(null, 'content', engine)).toBeNull();
    expect(await extractField(undefined, 'content', engine)).toBeNull();
    expect(await extractField('', 'content', engine)).toBeNull();
  });

  it('returns null when the fetch fails', async () => {
    const engine = new FakeWebEngine({ pages });

    expect(await extractField('https://missing.example/x', 'title', engine)).toBeNull();
  });

  it('counts hits and misses per field', async () => {
    const metrics = new EnrichmentMetrics();
    const engine = new FakeWebEngine({ pages });

    await extractField('alpha.example/one', 'title', engine, metrics);
    await extractField('alpha.example/one', 'journalist_name', engine, metrics);

    expect(metrics.count('extract.hit.title')).toBe(1);
    expect(metrics.count('extract.miss.journalist_name')).toBe(1);
  });
});

describe('enrichColumn', () => {
  it('returns one value per row in row order', async () => {
    const engine = new FakeWebEngine({
      pages,
      delaysMs: { 'https://alpha.example/one': 15 },
    });
    const table: Table = {
      columns: ['page_link', 'source'],
      rows: [
        { page_link: 'alpha.example/one', source: 'a' },
        { page_link: 'https://missing.example/x', source: 'b' },
        { page_link: 'beta.example/two', source: 'c' },
      ],
    };

    const values = await enrichColumn(table, 'title', {
      engine,
      urlColumn: 'page_link',
      progressStep: 10,
    });

    expect(values).toEqual(['Alpha One', null, 'Beta Two']);
  });

  it('processes rows one at a time', async () => {
    const engine = new FakeWebEngine({ pages });
    const table: Table = {
      columns: ['page_link'],
      rows: [{ page_link: 'beta.example/two' }, { page_link: 'alpha.example/one' }],
    };

    await enrichColumn(table, 'content', { engine, urlColumn: 'page_link', progressStep: 50 });

    expect(engine.fetchCalls).toEqual([
      'https://beta.example/two',
      'https://alpha.example/one',
    ]);
  });

  it('does not modify the input table', async () => {
    const engine = new FakeWebEngine({ pages });
    const table: Table = {
      columns: ['page_link'],
      rows: [{ page_link: 'alpha.example/one' }],
    };
    const before = structuredClone(table);

    await enrichColumn(table, 'title', { engine, urlColumn: 'page_link', progressStep: 10 });

    expect(table).toEqual(before);
  });

  it('returns an empty column for an empty table', async () => {
    const engine = new FakeWebEngine({ pages });

    const values = await enrichColumn(
      { columns: ['page_link'], rows: [] },
      'date',
      { engine, urlColumn: 'page_link', progressStep: 10 },
    );

    expect(values).toEqual([]);
  });
});
