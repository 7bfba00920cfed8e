import stringWidth from 'string-width';
import { EOL, INDENT } from './constants';

type TableRow =
  | { layout: 'inline'; key: string; value: string }
  | { layout: 'block'; key: string; value: string };

/**
 * Pads `text` with spaces until it occupies `width` terminal columns.
 * Wide characters (CJK, emoji) count as two columns.
 */
export function padEndToWidth(text: string, width: number): string {
  const missing = width - stringWidth(text);
  return missing > 0 ? text + ' '.repeat(missing) : text;
}

/**
 * Two-column key/value text table used to render errors and assertion
 * details in log output.
 *
 * ```text
 * Message | Component "x" failed
 * Name    | LifecycleInvocationError
 * Stack:
 *     Error: ...
 * ```
 */
export class KeyValueTextTable {
  private readonly rows: TableRow[] = [];
  private readonly separator: string;

  constructor(options: { separator?: string } = {}) {
    this.separator = options.separator ?? ' | ';
  }

  public get rowCount(): number {
    return this.rows.length;
  }

  public addRow(key: string, value: string): this {
    this.rows.push({ layout: 'inline', key, value });
    return this;
  }

  /**
   * Long or multi-line values (stacks, nested tables) go below their key,
   * indented, instead of beside it.
   */
  public addValueOnSeparateRow(key: string, value: string): this {
    this.rows.push({ layout: 'block', key, value });
    return this;
  }

  public toString(): string {
    const keyWidth = this.rows.reduce(
      (width, row) =>
        row.layout === 'inline' ? Math.max(width, stringWidth(row.key)) : width,
      0,
    );

    const lines: string[] = [];

    for (const row of this.rows) {
      const valueLines = row.value.split(EOL);

      if (row.layout === 'block') {
        lines.push(`${row.key}:`);

        for (const line of valueLines) {
          lines.push(line.length > 0 ? INDENT + line : '');
        }

        continue;
      }

      valueLines.forEach((line, index) => {
        const key = index === 0 ? row.key : '';
        lines.push(padEndToWidth(key, keyWidth) + this.separator + line);
      });
    }

    return lines.join(EOL);
  }
}
