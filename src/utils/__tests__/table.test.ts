/**
 * Tests for table formatting utility
 */

import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { formatTable, type Column, type Row } from '../table.js';

// Header cells are bolded; strip colors so rows can be compared exactly
function plain(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1B\[[0-9;]*m/g, '');
}

describe('formatTable', () => {
  const columns: Column[] = [
    { header: 'ID', key: 'id', align: 'right' },
    { header: 'Name', key: 'name' },
  ];

  it('renders borders, header and rows', () => {
    const rows: Row[] = [{ id: 1, name: 'guide.md' }];

    expect(plain(formatTable(columns, rows)).split('\n')).toEqual([
      '┌────┬──────────┐',
      '│ ID │ Name     │',
      '├────┼──────────┤',
      '│  1 │ guide.md │',
      '└────┴──────────┘',
    ]);
  });

  it('renders only the header when there are no rows', () => {
    const lines = plain(formatTable(columns, [])).split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe('│ ID │ Name │');
  });

  it('returns an empty string without columns', () => {
    expect(formatTable([], [{ id: 1 }])).toBe('');
  });

  it('renders null and undefined as empty cells', () => {
    const lines = plain(formatTable(columns, [{ id: null, name: undefined }])).split('\n');

    expect(lines[3]).toBe('│    │      │');
  });

  it('truncates cells longer than maxWidth', () => {
    const narrow: Column[] = [{ header: 'Path', key: 'path', maxWidth: 6 }];
    const lines = plain(formatTable(narrow, [{ path: '/very/long/path.md' }])).split('\n');

    expect(lines[3]).toBe('│ /very… │');
  });

  it('ignores ANSI codes when measuring widths', () => {
    const lines = plain(
      formatTable([{ header: 'Name', key: 'name' }], [{ name: chalk.green('ab') }])
    ).split('\n');

    expect(lines[3]).toBe('│ ab   │');
  });
});
