import { describe, expect, test } from 'vitest';
import { KeyValueTextTable, padEndToWidth } from './text-table';

describe('padEndToWidth', () => {
  test('pads ascii text to the requested width', () => {
    expect(padEndToWidth('abc', 6)).toBe('abc   ');
  });

  test('counts wide characters as two columns', () => {
    expect(padEndToWidth('名前', 6)).toBe('名前  ');
  });

  test('leaves text that is already wide enough untouched', () => {
    expect(padEndToWidth('abcdef', 3)).toBe('abcdef');
  });
});

describe('KeyValueTextTable', () => {
  test('aligns values on the widest key', () => {
    const table = new KeyValueTextTable()
      .addRow('Message', 'boom')
      .addRow('Name', 'Error');

    expect(table.toString()).toBe('Message | boom\nName    | Error');
  });

  test('continues multi-line values under the value column', () => {
    const table = new KeyValueTextTable().addRow('Key', 'one\ntwo');

    expect(table.toString()).toBe('Key | one\n    | two');
  });

  test('renders block rows below their key and indented', () => {
    const table = new KeyValueTextTable()
      .addRow('Name', 'Error')
      .addValueOnSeparateRow('Stack', 'line one\n\nline two');

    expect(table.toString()).toBe(
      'Name | Error\nStack:\n    line one\n\n    line two',
    );
  });

  test('supports a custom separator', () => {
    const table = new KeyValueTextTable({ separator: ': ' }).addRow('a', 'b');

    expect(table.toString()).toBe('a: b');
  });

  test('tracks the row count', () => {
    const table = new KeyValueTextTable();
    expect(table.rowCount).toBe(0);

    table.addRow('a', '1').addValueOnSeparateRow('b', '2');
    expect(table.rowCount).toBe(2);
  });
});
