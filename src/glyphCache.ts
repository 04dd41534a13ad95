import type { Glyph, GlyphStrategy, ImageGlyph, TextGlyph } from './dataStructures';

/**
 * Appearance shared by every glyph the cache produces
 */
export interface GlyphStyle {
    color: string;
    lineChar: string;
    dashLength: number | null;
}

/**
 * Cell geometry used when an image glyph cannot be built
 */
export interface TextFallback {
    cells: number;
    barCell: number;
}

/**
 * Build a text glyph: spaces with the bar character at `barOffset`
 */
export function makeTextGlyph(width: number, barOffset: number, style: GlyphStyle): TextGlyph {
    const cells = Math.max(1, Math.floor(width));
    const bar = Math.min(Math.max(0, Math.floor(barOffset)), cells - 1);
    return {
        kind: 'text',
        text: ' '.repeat(bar) + style.lineChar + ' '.repeat(cells - bar - 1),
        color: style.color
    };
}

/**
 * Whether row `row` of a dashed bar is left blank
 */
export function isGapRow(row: number, dashLength: number | null): boolean {
    if (dashLength === null || dashLength <= 0) {
        return false;
    }
    return (row + 1) % (dashLength + 1) === 0;
}

/**
 * Build a `width` x `height` bitmap with a one pixel bar, serialized as XPM
 * Throws on geometry that cannot be drawn
 */
export function makeImageGlyph(width: number, height: number, barOffset: number, style: GlyphStyle): ImageGlyph {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new RangeError(`Cannot draw a ${width}x${height} guide image`);
    }
    if (!Number.isInteger(barOffset) || barOffset < 0 || barOffset >= width) {
        throw new RangeError(`Bar offset ${barOffset} is outside a ${width} pixel wide image`);
    }

    const blank = ' '.repeat(width);
    const drawn = ' '.repeat(barOffset) + '.' + ' '.repeat(width - barOffset - 1);
    const rows: string[] = [];
    for (let row = 0; row < height; row++) {
        rows.push(isGapRow(row, style.dashLength) ? blank : drawn);
    }

    const xpm = [
        '/* XPM */',
        'static char * guide_xpm[] = {',
        `"${width} ${height} 2 1",`,
        '"  c None",',
        `". c ${style.color}",`,
        ...rows.map((row, index) => `"${row}"${index < rows.length - 1 ? ',' : ''}`),
        '};'
    ].join('\n');

    return { kind: 'image', width, height, barOffset, color: style.color, xpm };
}

/**
 * Memoizes guide glyphs by (width, height, bar offset)
 *
 * Width and offset are cells for the text strategy and pixels for the image
 * strategy. Entries live until clearCache() or a strategy/style change.
 */
export class GlyphCache {
    private entries: Map<string, Glyph> = new Map();

    constructor(private style: GlyphStyle, private strategy: GlyphStrategy = 'text') {}

    public get(width: number, height: number, barOffset: number, fallback?: TextFallback): Glyph {
        const key = `${width}x${height}@${barOffset}`;
        const cached = this.entries.get(key);
        if (cached) {
            return cached;
        }

        const glyph = this.render(width, height, barOffset, fallback);
        this.entries.set(key, glyph);
        return glyph;
    }

    public getStrategy(): GlyphStrategy {
        return this.strategy;
    }

    public setStrategy(strategy: GlyphStrategy): void {
        if (strategy !== this.strategy) {
            this.strategy = strategy;
            this.clearCache();
        }
    }

    public setStyle(style: GlyphStyle): void {
        this.style = { ...style };
        this.clearCache();
    }

    public clearCache(): void {
        this.entries.clear();
    }

    public get size(): number {
        return this.entries.size;
    }

    private render(width: number, height: number, barOffset: number, fallback?: TextFallback): Glyph {
        if (this.strategy === 'text') {
            return makeTextGlyph(width, barOffset, this.style);
        }

        try {
            return makeImageGlyph(width, height, barOffset, this.style);
        } catch (error) {
            console.warn('Falling back to text guide glyph:', error instanceof Error ? error.message : error);
            const cells = fallback ?? { cells: 1, barCell: 0 };
            return makeTextGlyph(cells.cells, cells.barCell, this.style);
        }
    }
}
