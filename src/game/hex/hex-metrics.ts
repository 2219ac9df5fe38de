/**
 * Grid-wide hexagon constants.
 *
 * Metrics are plain frozen records handed to every coordinate operation that
 * needs them, so maps with different sizes or wrap settings can coexist.
 */

import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('HexMetrics');

/** Ratio between a hexagon's inner and outer radius (sqrt(3) / 2) */
export const OUTER_TO_INNER = 0.866025404;

export interface HexMetrics {
    /** Whether the map wraps horizontally (cylindrical topology) */
    readonly wrapping: boolean;
    /** Width of the wrap band, in columns */
    readonly wrapSize: number;
    /** Width of a storage/render chunk, in columns */
    readonly chunkSizeX: number;
    /** Row spacing factor, applied to Z when projecting to world space */
    readonly outerToInner: number;
    readonly outerRadius: number;
    readonly innerRadius: number;
    readonly innerDiameter: number;
}

export type HexMetricsOptions = Partial<HexMetrics>;

export class HexMetricsError extends Error {
    public readonly field: keyof HexMetrics;

    constructor(field: keyof HexMetrics, msg: string) {
        super(msg);
        this.name = 'HexMetricsError';
        this.field = field;

        Object.seal(this);
    }
}

const DEFAULT_OUTER_RADIUS = 10;

export const DEFAULT_HEX_METRICS: HexMetrics = Object.freeze({
    wrapping: false,
    wrapSize: 0,
    chunkSizeX: 5,
    outerToInner: OUTER_TO_INNER,
    outerRadius: DEFAULT_OUTER_RADIUS,
    innerRadius: DEFAULT_OUTER_RADIUS * OUTER_TO_INNER,
    innerDiameter: DEFAULT_OUTER_RADIUS * OUTER_TO_INNER * 2,
});

/**
 * Build metrics from defaults and overrides.
 * innerRadius and innerDiameter follow outerRadius unless given explicitly.
 * @throws HexMetricsError when a value is out of range
 */
export function createHexMetrics(options: HexMetricsOptions = {}): HexMetrics {
    const outerToInner = options.outerToInner ?? DEFAULT_HEX_METRICS.outerToInner;
    const outerRadius = options.outerRadius ?? DEFAULT_HEX_METRICS.outerRadius;
    const innerRadius = options.innerRadius ?? outerRadius * outerToInner;

    const metrics: HexMetrics = {
        wrapping: options.wrapping ?? DEFAULT_HEX_METRICS.wrapping,
        wrapSize: options.wrapSize ?? DEFAULT_HEX_METRICS.wrapSize,
        chunkSizeX: options.chunkSizeX ?? DEFAULT_HEX_METRICS.chunkSizeX,
        outerToInner,
        outerRadius,
        innerRadius,
        innerDiameter: options.innerDiameter ?? innerRadius * 2,
    };

    try {
        validateHexMetrics(metrics);
    } catch (e) {
        if (e instanceof HexMetricsError) {
            log.error('Invalid hex metrics: ' + e.message);
        }
        throw e;
    }

    log.debug(metrics.wrapping
        ? `Created wrapping metrics: wrapSize=${metrics.wrapSize}, chunkSizeX=${metrics.chunkSizeX}`
        : `Created metrics: chunkSizeX=${metrics.chunkSizeX}`);

    return Object.freeze(metrics);
}

function validateHexMetrics(metrics: HexMetrics): void {
    if (!Number.isInteger(metrics.wrapSize) || metrics.wrapSize < 0) {
        throw new HexMetricsError('wrapSize', `wrapSize must be a non-negative integer, got ${metrics.wrapSize}`);
    }
    if (metrics.wrapping && metrics.wrapSize < 1) {
        throw new HexMetricsError('wrapSize', 'wrapSize must be at least 1 when wrapping is enabled');
    }
    if (!Number.isInteger(metrics.chunkSizeX) || metrics.chunkSizeX < 1) {
        throw new HexMetricsError('chunkSizeX', `chunkSizeX must be a positive integer, got ${metrics.chunkSizeX}`);
    }

    const positive: Array<keyof HexMetrics> = ['outerToInner', 'outerRadius', 'innerRadius', 'innerDiameter'];
    for (const field of positive) {
        const value = metrics[field];
        if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
            throw new HexMetricsError(field, `${field} must be a finite positive number, got ${value}`);
        }
    }
}
