/**
 * Immutable cube coordinates of a hex cell.
 *
 * Only X and Z are stored; Y is always -X - Z, so X + Y + Z == 0 holds for every
 * instance. Rows use a "brick" layout: odd Z rows are shifted half a cell east.
 *
 * All divisions by two truncate toward zero (-1 / 2 == 0), which is what the
 * persisted maps and offset arrays were produced with.
 */

import type { BinaryReader } from '@/resources/file/binary-reader';
import type { BinaryWriter } from '@/resources/file/binary-writer';
import { HexDirection } from './hex-direction';
import type { HexMetrics } from './hex-metrics';

export interface Vector3 {
    x: number;
    y: number;
    z: number;
}

/** Integer division truncating toward zero, without producing -0 */
function truncDiv(a: number, b: number): number {
    return (a / b) | 0;
}

/** Round to nearest integer, ties to even */
function roundToInt(value: number): number {
    const floor = Math.floor(value);
    const fraction = value - floor;
    if (fraction > 0.5) {
        return (floor + 1) | 0;
    }
    if (fraction < 0.5) {
        return floor | 0;
    }
    return (floor % 2 === 0 ? floor : floor + 1) | 0;
}

/** |a.x - b.x| + |a.y - b.y| for the cube coordinates (ax, -ax - az) and (bx, -bx - bz) */
function xyDistance(ax: number, az: number, bx: number, bz: number): number {
    const dx = ax - bx;
    const dy = (-ax - az) - (-bx - bz);
    return Math.abs(dx) + Math.abs(dy);
}

export class HexCoordinates {
    public readonly x: number;
    public readonly z: number;

    private constructor(x: number, z: number) {
        this.x = x | 0;
        this.z = z | 0;

        Object.freeze(this);
    }

    /**
     * Create coordinates, moving X back into the wrap band when the map wraps.
     * Inputs must lie within one wrapSize of the band.
     */
    public static create(x: number, z: number, metrics: HexMetrics): HexCoordinates {
        if (metrics.wrapping) {
            const offsetX = x + truncDiv(z, 2);
            if (offsetX < 0) {
                x += metrics.wrapSize;
            } else if (offsetX >= metrics.wrapSize) {
                x -= metrics.wrapSize;
            }
        }
        return new HexCoordinates(x, z);
    }

    /** Create coordinates from array offset coordinates (column, row) */
    public static fromOffsetCoordinates(offsetX: number, offsetZ: number, metrics: HexMetrics): HexCoordinates {
        return HexCoordinates.create(offsetX - truncDiv(offsetZ, 2), offsetZ, metrics);
    }

    /**
     * Coordinates of the cell containing a world position.
     * The position is assumed to lie inside the map; nothing is clamped.
     */
    public static fromPosition(position: Vector3, metrics: HexMetrics): HexCoordinates {
        let x = position.x / metrics.innerDiameter;
        let y = -x;

        const offset = position.z / (metrics.outerRadius * 3);
        x -= offset;
        y -= offset;
        const z = -x - y;

        let iX = roundToInt(x);
        const iY = roundToInt(y);
        let iZ = roundToInt(z);

        if (iX + iY + iZ !== 0) {
            const dX = Math.abs(x - iX);
            const dY = Math.abs(y - iY);
            const dZ = Math.abs(z - iZ);

            if (dX > dY && dX > dZ) {
                iX = -iY - iZ;
            } else if (dZ > dY) {
                iZ = -iX - iY;
            }
            // otherwise Y carries the largest error and is simply dropped
        }

        return HexCoordinates.create(iX, iZ, metrics);
    }

    /** Restore saved coordinates as-is; they were normalized when created */
    public static load(reader: BinaryReader): HexCoordinates {
        const x = reader.readInt32();
        const z = reader.readInt32();
        return new HexCoordinates(x, z);
    }

    public get y(): number {
        return 0 - this.x - this.z;
    }

    /** Column of the cell in offset (array) coordinates */
    public get offsetX(): number {
        return this.x + truncDiv(this.z, 2);
    }

    /** X position in hex space, where east-west neighbors are one unit apart */
    public get worldX(): number {
        return this.offsetX + ((this.z & 1) === 0 ? 0 : 0.5);
    }

    /** Z position in hex space, matching the scale of worldX */
    public worldZ(metrics: HexMetrics): number {
        return this.z * metrics.outerToInner;
    }

    /** Index of the chunk column this cell falls into */
    public columnIndex(metrics: HexMetrics): number {
        return truncDiv(this.offsetX, metrics.chunkSizeX);
    }

    /** Distance in cells, taking the horizontal wrap into account */
    public distanceTo(other: HexCoordinates, metrics: HexMetrics): number {
        let xy = xyDistance(this.x, this.z, other.x, other.z);

        if (metrics.wrapping) {
            xy = Math.min(
                xy,
                xyDistance(this.x, this.z, other.x + metrics.wrapSize, other.z),
                xyDistance(this.x, this.z, other.x - metrics.wrapSize, other.z)
            );
        }

        return (xy + Math.abs(this.z - other.z)) / 2;
    }

    /** Neighbor one step away in [direction], wrapped */
    public step(direction: HexDirection, metrics: HexMetrics): HexCoordinates {
        switch (direction) {
        case HexDirection.NE:
            return HexCoordinates.create(this.x, this.z + 1, metrics);
        case HexDirection.E:
            return HexCoordinates.create(this.x + 1, this.z, metrics);
        case HexDirection.SE:
            return HexCoordinates.create(this.x + 1, this.z - 1, metrics);
        case HexDirection.SW:
            return HexCoordinates.create(this.x, this.z - 1, metrics);
        case HexDirection.W:
            return HexCoordinates.create(this.x - 1, this.z, metrics);
        default:
            return HexCoordinates.create(this.x - 1, this.z + 1, metrics);
        }
    }

    public equals(other: HexCoordinates): boolean {
        return this.x === other.x && this.z === other.z;
    }

    public save(writer: BinaryWriter): void {
        writer.writeInt32(this.x);
        writer.writeInt32(this.z);
    }

    /** "(X, Y, Z)" */
    public toString(): string {
        return '(' + this.x + ', ' + this.y + ', ' + this.z + ')';
    }

    /** "X\nY\nZ" */
    public toMultilineString(): string {
        return this.x + '\n' + this.y + '\n' + this.z;
    }
}
