import { describe, it, expect, vi } from 'vitest';
import { EmptyResultError } from '../../errors/index.js';
import { MemoryStream } from '../../test-utils/index.js';
import { OutputRenderer, applyPagination, buildListEnvelope, isEmptyValue } from '../render.js';
import type { QueryEngine } from '../query.js';
import type { RenderOptions, TableSpec } from '../types.js';

interface Person {
  Id: number;
  Name: string;
}

const PEOPLE: Person[] = [
  { Id: 1, Name: 'Ana' },
  { Id: 2, Name: 'Bo' },
];

const TABLE: TableSpec<Person> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'NAME', key: 'name' },
  ],
  row: (person) => ({ id: person.Id, name: person.Name }),
};

const TEXT: RenderOptions = { mode: 'text', raw: false, failOnEmpty: false, noColor: true };
const JSON_MODE: RenderOptions = { mode: 'json', raw: false, failOnEmpty: false, noColor: true };
const RAW: RenderOptions = { mode: 'json', raw: true, failOnEmpty: false, noColor: true };

function fakeEngine(results: unknown[]) {
  const evaluate = vi.fn<QueryEngine['evaluate']>(async () => results);
  return { engine: { evaluate }, evaluate };
}

function setup(results: unknown[] = []) {
  const out = new MemoryStream();
  const { engine, evaluate } = fakeEngine(results);
  return { out, evaluate, renderer: new OutputRenderer(out, engine) };
}

describe('OutputRenderer', () => {
  describe('renderList', () => {
    it('renders a table in text mode', async () => {
      const { out, renderer } = setup();

      await renderer.renderList(TEXT, PEOPLE, TABLE);

      expect(out.text).toBe('ID  NAME\n1   Ana\n2   Bo\n');
    });

    it('ignores fail-empty in text mode', async () => {
      const { out, renderer } = setup();

      await renderer.renderList({ ...TEXT, failOnEmpty: true }, [], TABLE);

      expect(out.text).toBe('ID  NAME\n');
    });

    it('writes a pretty envelope in JSON mode', async () => {
      const { out, renderer } = setup();

      await renderer.renderList(JSON_MODE, PEOPLE, TABLE);

      expect(out.text).toBe(JSON.stringify({ items: PEOPLE, meta: { count: 2 } }, null, 2) + '\n');
    });

    it('includes requested limit and offset in the metadata', async () => {
      const { out, renderer } = setup();

      await renderer.renderList({ ...JSON_MODE, limit: 2, offset: 4 }, PEOPLE, TABLE);

      expect(JSON.parse(out.text)).toEqual({ items: PEOPLE, meta: { count: 2, limit: 2, offset: 4 } });
    });

    it('writes an empty envelope without fail-empty', async () => {
      const { out, renderer } = setup();

      await renderer.renderList(JSON_MODE, [], TABLE);

      expect(JSON.parse(out.text)).toEqual({ items: [], meta: { count: 0 } });
    });

    it('throws the empty-result sentinel before writing', async () => {
      const { out, renderer } = setup();

      await expect(renderer.renderList({ ...JSON_MODE, failOnEmpty: true }, [], TABLE)).rejects.toBeInstanceOf(
        EmptyResultError
      );
      expect(out.text).toBe('');
    });

    it('writes JSON Lines in raw mode', async () => {
      const { out, renderer } = setup();

      await renderer.renderList(RAW, PEOPLE, TABLE);

      expect(out.lines).toEqual(['{"Id":1,"Name":"Ana"}', '{"Id":2,"Name":"Bo"}']);
    });

    it('writes nothing for an empty raw list', async () => {
      const { out, renderer } = setup();

      await renderer.renderList(RAW, [], TABLE);

      expect(out.text).toBe('');
    });

    it('queries the envelope in JSON mode', async () => {
      const { out, renderer, evaluate } = setup([{ Id: 1, Name: 'Ana' }]);

      await renderer.renderList({ ...JSON_MODE, query: '.items[0]' }, PEOPLE, TABLE);

      expect(evaluate).toHaveBeenCalledWith({ items: PEOPLE, meta: { count: 2 } }, '.items[0]');
      expect(out.text).toBe('{\n  "Id": 1,\n  "Name": "Ana"\n}\n');
    });

    it('queries the bare items in raw mode and writes compact results', async () => {
      const { out, renderer, evaluate } = setup(['Ana', 'Bo']);

      await renderer.renderList({ ...RAW, query: '.[].Name' }, PEOPLE, TABLE);

      expect(evaluate).toHaveBeenCalledWith(PEOPLE, '.[].Name');
      expect(out.lines).toEqual(['"Ana"', '"Bo"']);
    });

    it('does not query in text mode', async () => {
      const { renderer, evaluate } = setup();

      await renderer.renderList({ ...TEXT, query: '.items' }, PEOPLE, TABLE);

      expect(evaluate).not.toHaveBeenCalled();
    });
  });

  describe('renderSingle', () => {
    const person: Person = { Id: 1, Name: 'Ana' };

    it('uses the text formatter in text mode', async () => {
      const { out, renderer } = setup();

      await renderer.renderSingle(TEXT, person, (value) => `Name: ${value.Name}`);

      expect(out.text).toBe('Name: Ana\n');
    });

    it('writes pretty JSON, or compact JSON in raw mode', async () => {
      const pretty = setup();
      await pretty.renderer.renderSingle(JSON_MODE, person, () => '');
      expect(pretty.out.text).toBe('{\n  "Id": 1,\n  "Name": "Ana"\n}\n');

      const raw = setup();
      await raw.renderer.renderSingle(RAW, person, () => '');
      expect(raw.out.text).toBe('{"Id":1,"Name":"Ana"}\n');
    });

    it('throws for an empty object with fail-empty', async () => {
      const { out, renderer } = setup();

      await expect(renderer.renderSingle({ ...JSON_MODE, failOnEmpty: true }, {}, () => '')).rejects.toBeInstanceOf(
        EmptyResultError
      );
      expect(out.text).toBe('');
    });

    it('applies the query to the value', async () => {
      const { out, renderer, evaluate } = setup(['Ana']);

      await renderer.renderSingle({ ...JSON_MODE, query: '.Name' }, person, () => '');

      expect(evaluate).toHaveBeenCalledWith(person, '.Name');
      expect(out.text).toBe('"Ana"\n');
    });
  });

  it('writeText writes a line in any mode', () => {
    const { out, renderer } = setup();

    renderer.writeText('done');

    expect(out.text).toBe('done\n');
  });
});

describe('applyPagination', () => {
  const items = [1, 2, 3, 4, 5];

  it('returns everything without limit or offset', () => {
    expect(applyPagination(items, 0, 0)).toEqual([1, 2, 3, 4, 5]);
  });

  it('skips and limits', () => {
    expect(applyPagination(items, 1, 2)).toEqual([2, 3]);
    expect(applyPagination(items, 3, 10)).toEqual([4, 5]);
  });

  it('returns an empty list for an offset past the end', () => {
    expect(applyPagination(items, 5, 0)).toEqual([]);
  });
});

describe('buildListEnvelope', () => {
  it('omits unrequested paging fields', () => {
    expect(buildListEnvelope(['a'], { limit: 0 })).toEqual({ items: ['a'], meta: { count: 1 } });
  });
});

describe('isEmptyValue', () => {
  it.each([
    [null, true],
    [undefined, true],
    [[], true],
    [{}, true],
    [[0], false],
    [{ Id: 1 }, false],
    [0, false],
    ['', false],
  ])('%j -> %s', (value, expected) => {
    expect(isEmptyValue(value)).toBe(expected);
  });
});
