import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import type { CellSize } from './dataStructures';

/**
 * Utility functions for handling guide configuration
 */

export const CONFIG_FILE_NAME = '.indent-guides.json';

/**
 * Configuration as written in the JSON file
 */
export interface GuideConfigFile {
    color: string;
    lineChar: string;
    richGlyphsEnabled: boolean;
    characterWidth: number | 'derived';
    characterHeight: number | 'derived';
    leftMargin: number;
    heightAdjustment: number;
    dashLength: number | null;
    threshold: number;
    redrawDelaySeconds: number | null;
    excludedContexts: string[];
    recursive: boolean;
    version: string;
}

/**
 * Configuration in the shape the controller consumes
 */
export interface GuideConfig {
    color: string;
    lineChar: string;
    richGlyphsEnabled: boolean;
    characterWidth: CellSize;
    characterHeight: CellSize;
    leftMargin: number;
    heightAdjustment: number;
    dashLength: number | null;
    threshold: number;
    redrawDelayMs: number | null;
    excludedContexts: string[];
    recursive: boolean;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: GuideConfigFile = {
    color: '#535353',
    lineChar: '|',
    richGlyphsEnabled: false,
    characterWidth: 'derived',
    characterHeight: 'derived',
    leftMargin: 0,
    heightAdjustment: 0,
    dashLength: null,
    threshold: 0,
    redrawDelaySeconds: null,
    excludedContexts: [],
    recursive: false,
    version: '1.0.0'
};

/**
 * Get the path to the configuration file
 */
export function getConfigFilePath(workspaceRoot: string): string {
    return path.join(workspaceRoot, CONFIG_FILE_NAME);
}

// Cached configuration per workspace root to avoid repeated file reads
const cachedConfigs: Map<string, GuideConfigFile> = new Map();

/**
 * Load configuration from JSON file (with caching)
 */
export function loadConfig(workspaceRoot: string): GuideConfigFile {
    const cached = cachedConfigs.get(workspaceRoot);
    if (cached) {
        return cached;
    }

    const config = loadConfigFromFile(workspaceRoot);
    cachedConfigs.set(workspaceRoot, config);
    return config;
}

/**
 * Load configuration from JSON file without caching
 */
function loadConfigFromFile(workspaceRoot: string): GuideConfigFile {
    const configPath = getConfigFilePath(workspaceRoot);
    if (!fs.existsSync(configPath)) {
        console.log('Configuration file not found, using defaults');
        return cloneDefaults();
    }

    try {
        const configData = fs.readFileSync(configPath, 'utf8');
        const config = mergeWithDefaults(JSON.parse(configData));
        console.log(`Loaded configuration from: ${configPath}`);
        return config;
    } catch (error) {
        console.error('Failed to load configuration, using defaults:', error);
        return cloneDefaults();
    }
}

/**
 * Refresh the cached configuration by reloading from file
 */
export function refreshConfigCache(workspaceRoot: string): GuideConfigFile {
    console.log('Refreshing configuration cache');
    const config = loadConfigFromFile(workspaceRoot);
    cachedConfigs.set(workspaceRoot, config);
    return config;
}

/**
 * Save configuration to JSON file
 */
export function saveConfig(workspaceRoot: string, config: GuideConfigFile): boolean {
    const configPath = getConfigFilePath(workspaceRoot);

    try {
        if (!fs.existsSync(workspaceRoot)) {
            fs.mkdirSync(workspaceRoot, { recursive: true });
        }

        fs.writeFileSync(configPath, JSON.stringify(config, null, 2));
        cachedConfigs.set(workspaceRoot, { ...config, excludedContexts: [...config.excludedContexts] });

        console.log(`Configuration saved to: ${configPath}`);
        return true;
    } catch (error) {
        console.error('Failed to save configuration:', error);
        return false;
    }
}

/**
 * Initialize configuration file with defaults if it doesn't exist
 */
export function initializeConfigFile(workspaceRoot: string): boolean {
    if (fs.existsSync(getConfigFilePath(workspaceRoot))) {
        console.log('Configuration file already exists');
        return true;
    }

    return saveConfig(workspaceRoot, cloneDefaults());
}

/**
 * Fallback for a field whose value fails validation
 */
function rejected<T>(key: keyof GuideConfigFile, fallback: () => T): (ctx: { input: unknown }) => T {
    return ({ input }) => {
        console.warn(`Ignoring invalid configuration value for "${key}":`, input);
        return fallback();
    };
}

const cellSizeSchema = z.union([z.literal('derived'), z.number().finite().positive()]);

/**
 * File schema; an invalid field falls back to its own default
 */
const configFileSchema = z.object({
    color: z.string().min(1)
        .default(DEFAULT_CONFIG.color)
        .catch(rejected('color', () => DEFAULT_CONFIG.color)),
    lineChar: z.string().min(1)
        .default(DEFAULT_CONFIG.lineChar)
        .catch(rejected('lineChar', () => DEFAULT_CONFIG.lineChar)),
    richGlyphsEnabled: z.boolean()
        .default(DEFAULT_CONFIG.richGlyphsEnabled)
        .catch(rejected('richGlyphsEnabled', () => DEFAULT_CONFIG.richGlyphsEnabled)),
    characterWidth: cellSizeSchema
        .default(DEFAULT_CONFIG.characterWidth)
        .catch(rejected('characterWidth', () => DEFAULT_CONFIG.characterWidth)),
    characterHeight: cellSizeSchema
        .default(DEFAULT_CONFIG.characterHeight)
        .catch(rejected('characterHeight', () => DEFAULT_CONFIG.characterHeight)),
    leftMargin: z.number().finite()
        .default(DEFAULT_CONFIG.leftMargin)
        .catch(rejected('leftMargin', () => DEFAULT_CONFIG.leftMargin)),
    heightAdjustment: z.number().finite()
        .default(DEFAULT_CONFIG.heightAdjustment)
        .catch(rejected('heightAdjustment', () => DEFAULT_CONFIG.heightAdjustment)),
    dashLength: z.number().finite().min(0).nullable()
        .default(DEFAULT_CONFIG.dashLength)
        .catch(rejected('dashLength', () => DEFAULT_CONFIG.dashLength)),
    threshold: z.number().finite()
        .default(DEFAULT_CONFIG.threshold)
        .catch(rejected('threshold', () => DEFAULT_CONFIG.threshold)),
    redrawDelaySeconds: z.number().finite().min(0).nullable()
        .default(DEFAULT_CONFIG.redrawDelaySeconds)
        .catch(rejected('redrawDelaySeconds', () => DEFAULT_CONFIG.redrawDelaySeconds)),
    excludedContexts: z.array(z.string())
        .default(() => [...DEFAULT_CONFIG.excludedContexts])
        .catch(rejected('excludedContexts', () => [...DEFAULT_CONFIG.excludedContexts])),
    recursive: z.boolean()
        .default(DEFAULT_CONFIG.recursive)
        .catch(rejected('recursive', () => DEFAULT_CONFIG.recursive)),
    version: z.string().min(1)
        .default(DEFAULT_CONFIG.version)
        .catch(rejected('version', () => DEFAULT_CONFIG.version))
});

/**
 * Merge parsed JSON over the defaults, keeping only well-typed fields
 * Exported for testing purposes
 */
export function mergeWithDefaults(raw: unknown): GuideConfigFile {
    const result = configFileSchema.safeParse(raw);
    if (!result.success) {
        console.warn('Configuration is not a JSON object, using defaults');
        return cloneDefaults();
    }

    const config: GuideConfigFile = result.data;

    // lineChar must occupy exactly one cell
    config.lineChar = Array.from(config.lineChar)[0] ?? DEFAULT_CONFIG.lineChar;

    return config;
}

/**
 * Convert the file shape to the runtime shape
 */
export function normalizeConfig(config: GuideConfigFile): GuideConfig {
    return {
        color: config.color,
        lineChar: config.lineChar,
        richGlyphsEnabled: config.richGlyphsEnabled,
        characterWidth: toCellSize(config.characterWidth),
        characterHeight: toCellSize(config.characterHeight),
        leftMargin: config.leftMargin,
        heightAdjustment: config.heightAdjustment,
        dashLength: config.dashLength === null ? null : Math.floor(config.dashLength),
        threshold: config.threshold,
        redrawDelayMs: config.redrawDelaySeconds === null ? null : Math.round(config.redrawDelaySeconds * 1000),
        excludedContexts: [...config.excludedContexts],
        recursive: config.recursive
    };
}

/**
 * Build the eligibility predicate for context identifiers
 */
export function createContextPredicate(excludedContexts: readonly string[]): (contextId: string | undefined) => boolean {
    const excluded = new Set(excludedContexts);
    return (contextId) => contextId === undefined || !excluded.has(contextId);
}

function toCellSize(value: number | 'derived'): CellSize {
    return value === 'derived' ? { kind: 'derived' } : { kind: 'fixed', value };
}

function cloneDefaults(): GuideConfigFile {
    return { ...DEFAULT_CONFIG, excludedContexts: [...DEFAULT_CONFIG.excludedContexts] };
}
