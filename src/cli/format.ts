import { LibraryError } from '../shared/errors';

/**
 * Render rows as ` | `-separated columns sized to their widest cell, with a
 * dashed rule under the header.
 */
export function formatTable(headers: string[], rows: Array<Array<string | number>>): string[] {
    const cells = rows.map((row) => row.map(String));
    const widths = headers.map((header, i) =>
        Math.max(header.length, ...cells.map((row) => (row[i] ?? '').length)),
    );
    const line = (row: string[]) => row.map((cell, i) => cell.padEnd(widths[i])).join(' | ').trimEnd();
    const ruleWidth = widths.reduce((sum, width) => sum + width, 0) + 3 * (widths.length - 1);

    return [line(headers), '-'.repeat(ruleWidth), ...cells.map(line)];
}

export function formatFailure(error: LibraryError): string {
    return `Error [${error.kind}]: ${error.message}`;
}
