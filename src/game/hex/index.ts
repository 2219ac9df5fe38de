/**
 * Hex Coordinates Module
 *
 * Cube coordinates for a brick-layout hex map with optional horizontal wrap.
 *
 * Public API:
 * - Value: HexCoordinates (create, fromOffsetCoordinates, fromPosition, load)
 * - Directions: HexDirection, HEX_DIRECTIONS, opposite, next, previous
 * - Config: HexMetrics, createHexMetrics, DEFAULT_HEX_METRICS, HexMetricsError
 */

export { HexCoordinates } from './hex-coordinates';
export type { Vector3 } from './hex-coordinates';
export { HexDirection, HEX_DIRECTIONS, opposite, next, previous } from './hex-direction';
export {
    createHexMetrics,
    DEFAULT_HEX_METRICS,
    HexMetricsError,
    OUTER_TO_INNER,
} from './hex-metrics';
export type { HexMetrics, HexMetricsOptions } from './hex-metrics';
