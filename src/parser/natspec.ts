/**
 * Recovery of NatSpec comments from the source text. The grammar library
 * drops comments, so documentation is found by scanning backwards from the
 * start of the documented node.
 */

export interface DocComment {
    text: string;
    start: number;
    end: number;
}

const SPDX_PATTERN = /SPDX-License-Identifier:\s*([^\s*]+)/;

/**
 * Find the documentation comment that directly precedes `offset`:
 * either one `/** ... *\/` block or a run of `///` comments, the first of
 * which may follow code on its line.
 */
export function findDocComment(source: string, offset: number): DocComment | null {
    let cursor = offset;
    while (cursor > 0 && /\s/.test(source[cursor - 1])) {
        cursor--;
    }
    if (cursor === 0) {
        return null;
    }

    if (source.endsWith('*/', cursor)) {
        const open = source.lastIndexOf('/**', cursor - 2);
        if (open === -1 || source.startsWith('/**/', open)) {
            return null;
        }
        const body = source.slice(open + 3, cursor - 2);
        if (body.includes('*/')) {
            return null;
        }
        return { text: stripBlockComment(body), start: open, end: cursor };
    }

    const lines: string[] = [];
    let start = -1;
    let lineEnd = cursor;
    while (lineEnd > 0) {
        const lineStart = source.lastIndexOf('\n', lineEnd - 1) + 1;
        const line = source.slice(lineStart, lineEnd);
        const marker = line.indexOf('///');
        if (marker === -1 || line.slice(0, marker).includes('//')) {
            break;
        }
        lines.unshift(line.slice(marker + 3).trim());
        start = lineStart + marker;
        // Code before the marker ends the run
        if (line.slice(0, marker).trim() !== '' || lineStart === 0) {
            break;
        }
        lineEnd = lineStart - 1;
    }
    if (start === -1) {
        return null;
    }
    return { text: lines.join('\n'), start, end: cursor };
}

/**
 * SPDX license identifier mentioned anywhere in the source, if any
 */
export function findLicense(source: string): string | null {
    const match = SPDX_PATTERN.exec(source);
    return match ? match[1] : null;
}

function stripBlockComment(body: string): string {
    return body
        .split('\n')
        .map(line => line.trim().replace(/^\*\s?/, '').trim())
        .filter((line, index, all) => line !== '' || (index > 0 && index < all.length - 1))
        .join('\n');
}
