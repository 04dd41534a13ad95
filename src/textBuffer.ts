import type { GuideBuffer } from './dataStructures';

/**
 * Column arithmetic shared by the locator, expander and renderer
 */

/**
 * Column reached after a character starting at `column`
 */
export function nextColumn(char: string, column: number, tabWidth: number): number {
	if (char === '\t') {
		return column + tabWidth - (column % tabWidth);
	}
	return column + 1;
}

/**
 * Visual width of a string after tab expansion
 */
export function visualWidth(text: string, tabWidth: number): number {
	let column = 0;
	for (const char of text) {
		column = nextColumn(char, column, tabWidth);
	}
	return column;
}

export function isIndentChar(char: string): boolean {
	return char === ' ' || char === '\t';
}

/**
 * Number of leading space/tab characters
 */
export function indentationLength(text: string): number {
	let index = 0;
	while (index < text.length && isIndentChar(text[index])) {
		index++;
	}
	return index;
}

/**
 * Visual column of the first non-whitespace character
 */
export function indentationWidth(text: string, tabWidth: number): number {
	return visualWidth(text.slice(0, indentationLength(text)), tabWidth);
}

export function isBlankLine(text: string): boolean {
	return text.trim().length === 0;
}

/**
 * Character offset of the character covering `column`
 * Returns the line length when the column is past the end
 */
export function columnToOffset(text: string, column: number, tabWidth: number): number {
	let current = 0;
	for (let index = 0; index < text.length; index++) {
		const next = nextColumn(text[index], current, tabWidth);
		if (column < next) {
			return index;
		}
		current = next;
	}
	return text.length;
}

/**
 * Immutable in-memory buffer
 */
export class TextBuffer implements GuideBuffer {
	private readonly lines: string[];

	constructor(lines: readonly string[], public readonly tabWidth: number = 8) {
		if (!Number.isInteger(tabWidth) || tabWidth < 1) {
			throw new RangeError(`Tab width must be a positive integer, got ${tabWidth}`);
		}
		this.lines = lines.length > 0 ? [...lines] : [''];
	}

	static fromText(text: string, tabWidth?: number): TextBuffer {
		return new TextBuffer(text.split(/\r?\n/), tabWidth);
	}

	get lineCount(): number {
		return this.lines.length;
	}

	lineAt(line: number): string {
		if (line < 1 || line > this.lines.length) {
			throw new RangeError(`Line ${line} is outside 1..${this.lines.length}`);
		}
		return this.lines[line - 1];
	}
}
