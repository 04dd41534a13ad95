/**
 * Data structures shared by the guide pipeline
 *
 * Everything here is derived per command cycle and thrown away at the start
 * of the next one, except cached glyphs.
 */

/**
 * Read-only view of a text buffer
 * Lines are 1-based; a buffer always has at least one line
 */
export interface GuideBuffer {
	readonly lineCount: number;
	readonly tabWidth: number;
	lineAt(line: number): string;
}

/**
 * A caret position, column is visual (tabs expanded)
 */
export interface Position {
	line: number;
	column: number;
}

/**
 * First and last visible lines, both inclusive
 */
export interface Viewport {
	firstLine: number;
	lastLine: number;
}

/**
 * Result of locating the enclosing indentation level
 */
export interface LevelLocation {
	column: number;
	startLine: number;      // line opening the block, 0 when it starts at the top of the buffer
	anchorColumn: number;   // visual column right after the opener's indentation
	startOffset: number;    // character offset of that column within the opener line
}

/**
 * The contiguous vertical run of lines to annotate
 */
export interface GuideSpan {
	startLine: number;
	endLine: number;
	column: number;
	anchorColumn: number;
}

export type RenderMode = 'after' | 'replace';

export interface TextGlyph {
	kind: 'text';
	text: string;
	color: string;
}

export interface ImageGlyph {
	kind: 'image';
	width: number;
	height: number;
	barOffset: number;
	color: string;
	xpm: string;
}

export type Glyph = TextGlyph | ImageGlyph;

/**
 * One guide segment attached to a buffer offset
 * `replace` covers the character at `offset`, `after` is appended at the line end
 */
export interface GuideAnnotation {
	line: number;
	offset: number;
	mode: RenderMode;
	glyph: Glyph;
}

/**
 * Pixel size of one character cell
 */
export interface CellMetrics {
	width: number;
	height: number;
}

/**
 * Cell size is either pinned by configuration or measured from the host
 */
export type CellSize =
	| { kind: 'fixed'; value: number }
	| { kind: 'derived' };

export type GlyphStrategy = 'text' | 'image';

export type ControllerState = 'idle' | 'pendingRedraw' | 'drawn';

export interface Disposable {
	dispose(): void;
}
