import type {
	CellMetrics,
	Glyph,
	GlyphStrategy,
	GuideAnnotation,
	GuideBuffer,
	Position,
	RenderMode
} from './dataStructures';
import type { GuideConfig } from './configuration';
import type { GlyphCache } from './glyphCache';
import { columnToOffset, nextColumn } from './textBuffer';

/**
 * Per-line guide placement and glyph geometry
 */

/**
 * Where on a line the bar goes and how many cells its glyph spans
 */
export interface GuidePlacement {
	offset: number;
	mode: RenderMode;
	cells: number;
	barCell: number;
}

/**
 * Glyph geometry resolved once per render pass
 * Text glyphs are measured in cells, so cell size is 1x1 there
 */
export interface GlyphGeometry {
	strategy: GlyphStrategy;
	cellWidth: number;
	cellHeight: number;
	leftMargin: number;
}

export const TEXT_GEOMETRY: GlyphGeometry = {
	strategy: 'text',
	cellWidth: 1,
	cellHeight: 1,
	leftMargin: 0
};

/**
 * Decide how the bar at `targetColumn` is shown on `text`
 *
 * - past the end of the line: padding appended after the last character
 * - inside or on a tab: the tab is replaced by a glyph of its expanded width
 * - on a space: that one cell is replaced
 * Code is never painted over, undefined is returned instead.
 */
export function placeGuide(text: string, targetColumn: number, tabWidth: number): GuidePlacement | undefined {
	let column = 0;

	for (let index = 0; index < text.length; index++) {
		const char = text[index];
		const next = nextColumn(char, column, tabWidth);

		if (targetColumn < next) {
			if (char === '\t') {
				return { offset: index, mode: 'replace', cells: next - column, barCell: targetColumn - column };
			}
			if (char === ' ') {
				return { offset: index, mode: 'replace', cells: 1, barCell: 0 };
			}
			return undefined;
		}

		column = next;
	}

	return {
		offset: text.length,
		mode: 'after',
		cells: targetColumn - column + 1,
		barCell: targetColumn - column
	};
}

/**
 * Pick the glyph strategy and cell size for one render pass
 * `measured` is the host's rendered size of the cursor line, when fully visible
 */
export function resolveGeometry(
	config: GuideConfig,
	imagesSupported: boolean,
	nominal: CellMetrics,
	measured?: CellMetrics
): GlyphGeometry {
	if (!imagesSupported || !config.richGlyphsEnabled) {
		return TEXT_GEOMETRY;
	}

	const metrics = measured ?? nominal;
	const width = config.characterWidth.kind === 'fixed' ? config.characterWidth.value : metrics.width;
	const height = config.characterHeight.kind === 'fixed' ? config.characterHeight.value : metrics.height;

	return {
		strategy: 'image',
		cellWidth: Math.round(width),
		cellHeight: Math.round(height + config.heightAdjustment),
		leftMargin: Math.round(config.leftMargin)
	};
}

/**
 * Turns guide placements into annotations, one line at a time
 */
export class LineRenderer {
	constructor(
		private readonly buffer: GuideBuffer,
		private readonly cache: GlyphCache,
		private readonly geometry: GlyphGeometry = TEXT_GEOMETRY
	) {}

	/**
	 * Annotation for the bar at `targetColumn` on `line`
	 * A replacement that would cover the caret's character is dropped
	 */
	public render(line: number, targetColumn: number, caret?: Position): GuideAnnotation | undefined {
		const text = this.buffer.lineAt(line);
		const placement = placeGuide(text, targetColumn, this.buffer.tabWidth);
		if (!placement) {
			return undefined;
		}

		if (caret && caret.line === line && placement.mode === 'replace' &&
			placement.offset === columnToOffset(text, caret.column, this.buffer.tabWidth)) {
			return undefined;
		}

		return {
			line,
			offset: placement.offset,
			mode: placement.mode,
			glyph: this.glyphFor(placement)
		};
	}

	private glyphFor(placement: GuidePlacement): Glyph {
		const { strategy, cellWidth, cellHeight, leftMargin } = this.geometry;
		if (strategy === 'text') {
			return this.cache.get(placement.cells, 1, placement.barCell);
		}

		const width = placement.cells * cellWidth;
		const barOffset = Math.min(placement.barCell * cellWidth + leftMargin, width - 1);
		return this.cache.get(width, cellHeight, barOffset, {
			cells: placement.cells,
			barCell: placement.barCell
		});
	}
}
