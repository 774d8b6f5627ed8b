/**
 * Tests for table formatting utility
 *
 * Tests cover:
 * - Basic table rendering
 * - Column alignment and minimum widths
 * - Empty data handling
 * - ANSI color code handling
 * - Key-value blocks
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { formatKeyValue, formatTable, stripAnsi, type Column, type Row } from '../table.js';

describe('formatTable', () => {
  describe('basic rendering', () => {
    it('aligns columns with a two-space gap', () => {
      const columns: Column[] = [
        { header: 'ID', key: 'id' },
        { header: 'NAME', key: 'name' },
      ];
      const rows: Row[] = [
        { id: 7, name: 'Ana Lee' },
        { id: 12, name: 'Bo' },
      ];

      expect(formatTable(columns, rows, { noColor: true })).toBe('ID  NAME\n7   Ana Lee\n12  Bo');
    });

    it('renders only the header for no rows', () => {
      const columns: Column[] = [
        { header: 'ID', key: 'id' },
        { header: 'NAME', key: 'name' },
      ];

      expect(formatTable(columns, [], { noColor: true })).toBe('ID  NAME');
    });

    it('returns empty string for no columns', () => {
      expect(formatTable([], [{ id: 1 }])).toBe('');
    });

    it('renders null cells as blanks and trims trailing space', () => {
      const columns: Column[] = [
        { header: 'ID', key: 'id' },
        { header: 'EMAIL', key: 'email' },
      ];

      expect(formatTable(columns, [{ id: 1, email: null }], { noColor: true })).toBe('ID  EMAIL\n1');
    });
  });

  describe('alignment', () => {
    it('right-aligns numeric columns', () => {
      const columns: Column[] = [
        { header: 'NAME', key: 'name' },
        { header: 'HOURS', key: 'hours', align: 'right' },
      ];
      const rows: Row[] = [
        { name: 'Ana', hours: '7.5' },
        { name: 'Bo', hours: '12.0' },
      ];

      expect(formatTable(columns, rows, { noColor: true })).toBe('NAME  HOURS\nAna     7.5\nBo     12.0');
    });

    it('respects minimum width', () => {
      const columns: Column[] = [
        { header: 'ID', key: 'id', minWidth: 4 },
        { header: 'NAME', key: 'name' },
      ];

      expect(formatTable(columns, [{ id: 1, name: 'x' }], { noColor: true })).toBe('ID    NAME\n1     x');
    });
  });

  describe('ANSI handling', () => {
    it('measures colored cells by their visible width', () => {
      const paint = new Chalk({ level: 1 });
      const columns: Column[] = [
        { header: 'STATUS', key: 'status' },
        { header: 'ID', key: 'id' },
      ];

      const result = formatTable(columns, [{ status: paint.green('ok'), id: 3 }], { noColor: true });

      expect(stripAnsi(result)).toBe('STATUS  ID\nok      3');
    });

    it('stripAnsi removes escape codes', () => {
      expect(stripAnsi('\u001b[1mID\u001b[22m')).toBe('ID');
    });
  });
});

describe('formatKeyValue', () => {
  it('aligns values after the longest label', () => {
    const result = formatKeyValue(
      [
        ['ID', 7],
        ['First Name', 'Ana'],
      ],
      { noColor: true }
    );

    expect(result).toBe('ID:         7\nFirst Name: Ana');
  });

  it('leaves empty values blank', () => {
    expect(formatKeyValue([['Email', null]], { noColor: true })).toBe('Email:');
  });
});
