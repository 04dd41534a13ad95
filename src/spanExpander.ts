import type { GuideBuffer, GuideSpan, LevelLocation, Viewport } from './dataStructures';
import { indentationWidth, isBlankLine } from './textBuffer';

/**
 * Finding how far down the located block reaches on screen
 */

function belongsToBlock(text: string, column: number, tabWidth: number): boolean {
	return isBlankLine(text) || indentationWidth(text, tabWidth) >= column;
}

/**
 * First line the guide may cover
 */
export function firstSpanLine(startLine: number, viewport: Viewport): number {
	return Math.max(startLine + 1, viewport.firstLine, 1);
}

/**
 * Last line of the block that starts below `startLine`
 *
 * The scan never leaves the viewport. When it ends inside the buffer on a
 * shallower line (or at the end of the buffer) trailing blank lines are
 * dropped, but never above `cursorLine` so the caret's line stays covered.
 * A result below firstSpanLine() means there is nothing to draw.
 */
export function expand(
	buffer: GuideBuffer,
	column: number,
	startLine: number,
	viewport: Viewport,
	cursorLine?: number
): number {
	const first = firstSpanLine(startLine, viewport);
	const last = Math.min(viewport.lastLine, buffer.lineCount);

	let line = first;
	while (line <= last && belongsToBlock(buffer.lineAt(line), column, buffer.tabWidth)) {
		line++;
	}

	// Ran off the bottom of the viewport while still inside the block
	if (line > last && last < buffer.lineCount) {
		return last;
	}

	let end = line - 1;
	const floor = Math.max(first, cursorLine ?? first);
	while (end > floor && isBlankLine(buffer.lineAt(end))) {
		end--;
	}
	return end;
}

/**
 * Build the span for a located level, or undefined when nothing is visible
 */
export function spanFor(
	buffer: GuideBuffer,
	location: LevelLocation,
	viewport: Viewport,
	cursorLine?: number
): GuideSpan | undefined {
	const startLine = firstSpanLine(location.startLine, viewport);
	const endLine = expand(buffer, location.column, location.startLine, viewport, cursorLine);

	if (endLine < startLine) {
		return undefined;
	}

	return {
		startLine,
		endLine,
		column: location.column,
		anchorColumn: location.anchorColumn
	};
}
