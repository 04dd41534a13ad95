import type {
    CellMetrics,
    ControllerState,
    GuideAnnotation,
    GuideBuffer,
    GuideSpan,
    Position,
    Viewport
} from './dataStructures';
import { createContextPredicate, type GuideConfig } from './configuration';
import { GlyphCache, type GlyphStyle } from './glyphCache';
import { locate } from './levelLocator';
import { spanFor } from './spanExpander';
import { LineRenderer, resolveGeometry } from './lineRenderer';

/**
 * What the controller needs from the editor it draws into
 */
export interface EditorHost {
    getBuffer(): GuideBuffer;
    getCursor(): Position;
    getViewport(): Viewport;
    isInputPromptActive(): boolean;
    getContextId(): string | undefined;
    supportsImages(): boolean;
    getFontMetrics(): CellMetrics;
    /** Rendered cell size of a line, undefined when the line is not fully visible */
    getLineMetrics(line: number): CellMetrics | undefined;
    installAnnotations(annotations: readonly GuideAnnotation[]): void;
    removeAnnotations(annotations: readonly GuideAnnotation[]): void;
}

export interface GuideControllerOptions {
    /** Overrides the excludedContexts check */
    isEligible?: (host: EditorHost) => boolean;
    cache?: GlyphCache;
}

/**
 * Spans for the level around `cursor`, innermost first
 * With `recursive` every enclosing level above the threshold is added
 */
export function computeGuideSpans(
    buffer: GuideBuffer,
    cursor: Position,
    viewport: Viewport,
    threshold: number,
    recursive: boolean
): GuideSpan[] {
    const spans: GuideSpan[] = [];
    const floor = Math.max(threshold, 0);
    let location = locate(buffer, cursor);

    while (location.column > floor) {
        const span = spanFor(buffer, location, viewport, cursor.line);
        if (span) {
            spans.push(span);
        }
        if (!recursive || location.startLine < 1) {
            break;
        }
        location = locate(buffer, { line: location.startLine, column: location.anchorColumn });
    }

    return spans;
}

/**
 * Draws guides for the block around the cursor once per command cycle
 *
 * idle --post-command--> drawn, or pendingRedraw when a delay is configured
 * pendingRedraw --timer--> drawn
 * any --pre-command--> idle
 */
export class GuideController {
    private state: ControllerState = 'idle';
    private annotations: GuideAnnotation[] = [];
    private spans: GuideSpan[] = [];
    private pendingTimer: NodeJS.Timeout | undefined;
    private readonly cache: GlyphCache;
    private isEligible: (host: EditorHost) => boolean;

    constructor(
        private readonly host: EditorHost,
        private config: GuideConfig,
        private readonly options: GuideControllerOptions = {}
    ) {
        this.cache = options.cache ?? new GlyphCache(styleOf(config));
        this.isEligible = options.isEligible ?? contextCheck(config);
    }

    /**
     * Command-loop entry: drop everything drawn or scheduled
     */
    public handlePreCommand(): void {
        this.clear();
    }

    /**
     * Command-loop exit: redraw now, or after the configured delay
     */
    public handlePostCommand(): void {
        if (this.annotations.length > 0) {
            this.cancelPendingRedraw();
            this.state = 'drawn';
            return;
        }
        if (this.config.redrawDelayMs === null) {
            this.show();
            return;
        }
        this.scheduleRedraw(this.config.redrawDelayMs);
    }

    /**
     * Compute and install guides for the current cursor position
     * Returns whether anything was drawn
     */
    public show(): boolean {
        if (this.annotations.length > 0) {
            this.state = 'drawn';
            return false;
        }
        if (this.host.isInputPromptActive() || !this.isEligible(this.host)) {
            this.state = 'idle';
            return false;
        }

        try {
            const buffer = this.host.getBuffer();
            const cursor = this.host.getCursor();
            const spans = computeGuideSpans(
                buffer,
                cursor,
                this.host.getViewport(),
                this.config.threshold,
                this.config.recursive
            );
            if (spans.length === 0) {
                this.state = 'idle';
                return false;
            }

            const geometry = resolveGeometry(
                this.config,
                this.host.supportsImages(),
                this.host.getFontMetrics(),
                this.host.getLineMetrics(cursor.line)
            );
            this.cache.setStrategy(geometry.strategy);
            const renderer = new LineRenderer(buffer, this.cache, geometry);

            const annotations: GuideAnnotation[] = [];
            for (const span of spans) {
                for (let line = span.startLine; line <= span.endLine; line++) {
                    const annotation = renderer.render(line, span.anchorColumn, cursor);
                    if (annotation) {
                        annotations.push(annotation);
                    }
                }
            }

            // A failed install may already have put some of these on screen
            this.annotations = annotations;
            this.spans = spans;
            this.host.installAnnotations(annotations);
            this.state = 'drawn';
            return true;
        } catch (error) {
            console.error('Failed to draw indent guides:', error);
            this.clear();
            return false;
        }
    }

    /**
     * Remove installed guides and cancel a pending redraw
     */
    public clear(): void {
        this.cancelPendingRedraw();

        if (this.annotations.length > 0) {
            const installed = this.annotations;
            this.annotations = [];
            try {
                this.host.removeAnnotations(installed);
            } catch (error) {
                console.error('Failed to remove indent guides:', error);
            }
        }

        this.spans = [];
        this.state = 'idle';
    }

    /**
     * Forget every cached glyph, e.g. after a font or theme change
     */
    public clearCache(): void {
        console.log(`Clearing ${this.cache.size} cached guide glyphs`);
        this.cache.clearCache();
    }

    /**
     * Swap in new configuration; guides are cleared and drawn again on the next cycle
     */
    public updateConfig(config: GuideConfig): void {
        this.clear();
        this.config = config;
        this.cache.setStyle(styleOf(config));
        this.isEligible = this.options.isEligible ?? contextCheck(config);
        console.log('Updated indent guide configuration');
    }

    public getState(): ControllerState {
        return this.state;
    }

    public getAnnotations(): readonly GuideAnnotation[] {
        return [...this.annotations];
    }

    public getLastSpans(): readonly GuideSpan[] {
        return this.spans;
    }

    public dispose(): void {
        this.clear();
        this.cache.clearCache();
    }

    private scheduleRedraw(delayMs: number): void {
        this.cancelPendingRedraw();

        const handle = setTimeout(() => {
            // A newer command replaced or cancelled this timer
            if (this.pendingTimer !== handle) {
                return;
            }
            this.pendingTimer = undefined;
            this.show();
        }, delayMs);

        this.pendingTimer = handle;
        this.state = 'pendingRedraw';
    }

    private cancelPendingRedraw(): void {
        if (this.pendingTimer) {
            clearTimeout(this.pendingTimer);
            this.pendingTimer = undefined;
        }
    }
}

function styleOf(config: GuideConfig): GlyphStyle {
    return { color: config.color, lineChar: config.lineChar, dashLength: config.dashLength };
}

function contextCheck(config: GuideConfig): (host: EditorHost) => boolean {
    const isEligibleContext = createContextPredicate(config.excludedContexts);
    return (host) => isEligibleContext(host.getContextId());
}
