import type { GuideBuffer, LevelLocation, Position } from './dataStructures';
import { indentationWidth, isBlankLine, visualWidth } from './textBuffer';

/**
 * Locating the indentation level that encloses the cursor
 */

/**
 * Regex sources matching every whitespace prefix of visual width 0..maxWidth
 *
 * A prefix of width w is w / tabWidth full tab cells followed by w % tabWidth
 * spaces. A full cell is either tabWidth spaces or up to tabWidth - 1 spaces
 * closed by a tab, so tab and space encodings of the same column all match.
 * Exported for testing purposes
 */
export function indentationCandidates(maxWidth: number, tabWidth: number): string[] {
	const cell = `(?: {0,${tabWidth - 1}}\\t| {${tabWidth}})`;
	const candidates: string[] = [];

	for (let width = 0; width <= maxWidth; width++) {
		const cells = Math.floor(width / tabWidth);
		const spaces = width % tabWidth;
		const head = cells > 0 ? `${cell}{${cells}}` : '';
		candidates.push(head + ' '.repeat(spaces));
	}

	return candidates;
}

/**
 * Pattern for a line indented by strictly less than `column` that contains code
 * Group 1 is the indentation
 */
export function openerPattern(column: number, tabWidth: number): RegExp {
	const alternatives = indentationCandidates(column - 1, tabWidth)
		.map(candidate => `(?:${candidate})`)
		.join('|');
	return new RegExp(`^(${alternatives})[^\\s]`);
}

/**
 * Indentation column in effect at `line`
 * Blank lines take the deeper of their nearest non-blank neighbours
 */
export function levelColumn(buffer: GuideBuffer, line: number): number {
	const text = buffer.lineAt(line);
	if (!isBlankLine(text)) {
		return indentationWidth(text, buffer.tabWidth);
	}

	let forward = 0;
	for (let next = line + 1; next <= buffer.lineCount; next++) {
		const candidate = buffer.lineAt(next);
		if (!isBlankLine(candidate)) {
			forward = indentationWidth(candidate, buffer.tabWidth);
			break;
		}
	}

	let backward = 0;
	for (let previous = line - 1; previous >= 1; previous--) {
		const candidate = buffer.lineAt(previous);
		if (!isBlankLine(candidate)) {
			backward = indentationWidth(candidate, buffer.tabWidth);
			break;
		}
	}

	return Math.max(forward, backward);
}

/**
 * Find the column of the block around `cursor` and the line that opens it
 */
export function locate(buffer: GuideBuffer, cursor: Position): LevelLocation {
	const line = Math.min(Math.max(cursor.line, 1), buffer.lineCount);
	const column = levelColumn(buffer, line);

	if (column === 0) {
		return { column: 0, startLine: line, anchorColumn: 0, startOffset: 0 };
	}

	const pattern = openerPattern(column, buffer.tabWidth);
	for (let previous = line - 1; previous >= 1; previous--) {
		const match = pattern.exec(buffer.lineAt(previous));
		if (match) {
			const indentation = match[1];
			return {
				column,
				startLine: previous,
				anchorColumn: visualWidth(indentation, buffer.tabWidth),
				startOffset: indentation.length
			};
		}
	}

	// No opener above: the block starts at the top of the buffer
	return { column, startLine: 0, anchorColumn: 0, startOffset: 0 };
}
