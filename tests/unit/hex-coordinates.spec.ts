import { describe, it, expect } from 'vitest';
import { HexCoordinates } from '@/game/hex/hex-coordinates';
import { HexDirection, HEX_DIRECTIONS, opposite } from '@/game/hex/hex-direction';
import { createHexMetrics } from '@/game/hex/hex-metrics';
import { BinaryReader, BinaryReadError } from '@/resources/file/binary-reader';
import { BinaryWriter } from '@/resources/file/binary-writer';

const flat = createHexMetrics();
const wrapped = createHexMetrics({ wrapping: true, wrapSize: 10 });

function hex(x: number, z: number, metrics = flat): HexCoordinates {
    return HexCoordinates.create(x, z, metrics);
}

function xz(c: HexCoordinates): [number, number] {
    return [c.x, c.z];
}

// ─── Construction ─────────────────────────────────────────────────────────────

describe('HexCoordinates.create', () => {
    it('keeps x + y + z == 0', () => {
        const samples: Array<[number, number]> = [[0, 0], [3, -1], [-4, 7], [12, 5], [-2, -9]];
        for (const [x, z] of samples) {
            const c = hex(x, z);
            expect(c.x + c.y + c.z).toBe(0);
        }
    });

    it('derives y without negative zero', () => {
        expect(hex(0, 0).y).toBe(0);
        expect(hex(2, 5).y).toBe(-7);
    });

    it('stores values unchanged when the map does not wrap', () => {
        expect(xz(hex(25, 0))).toEqual([25, 0]);
        expect(xz(hex(-7, 3))).toEqual([-7, 3]);
    });

    it('moves x back into the wrap band', () => {
        expect(xz(hex(10, 0, wrapped))).toEqual([0, 0]);
        expect(xz(hex(-1, 0, wrapped))).toEqual([9, 0]);
        // offset x = 9 + 3/2 = 10
        expect(xz(hex(9, 3, wrapped))).toEqual([-1, 3]);
        // offset x = -1 + 2/2 = 0, already inside
        expect(xz(hex(-1, 2, wrapped))).toEqual([-1, 2]);
    });

    it('truncates z / 2 toward zero when normalizing', () => {
        // -1 / 2 == 0, so offset x is 0 and nothing moves
        expect(xz(hex(0, -1, wrapped))).toEqual([0, -1]);
    });

    it('normalizes a coordinate one band away to the same value', () => {
        expect(hex(13, 4, wrapped).equals(hex(3, 4, wrapped))).toBe(true);
        expect(hex(-7, 0, wrapped).equals(hex(3, 0, wrapped))).toBe(true);
    });
});

// ─── Derived values ───────────────────────────────────────────────────────────

describe('derived accessors', () => {
    it('projects x with a half cell shift on odd rows', () => {
        expect(hex(2, 2).worldX).toBe(3);
        expect(hex(3, 3).worldX).toBe(4.5);
        expect(hex(0, -1).worldX).toBe(0.5);
    });

    it('scales z by the row spacing ratio', () => {
        expect(hex(0, 2).worldZ(flat)).toBeCloseTo(1.732050808, 9);
        expect(hex(5, 0).worldZ(flat)).toBe(0);
    });

    it('computes the chunk column', () => {
        expect(hex(3, 0).columnIndex(flat)).toBe(0);
        // offset x = 7 + 2 = 9
        expect(hex(7, 4).columnIndex(flat)).toBe(1);
        expect(hex(10, 0).columnIndex(flat)).toBe(2);
        expect(hex(10, 0).columnIndex(createHexMetrics({ chunkSizeX: 3 }))).toBe(3);
    });
});

// ─── Distance ─────────────────────────────────────────────────────────────────

describe('distanceTo', () => {
    it('measures cube distance on a flat map', () => {
        const origin = hex(0, 0);
        expect(origin.distanceTo(hex(3, 0), flat)).toBe(3);
        expect(origin.distanceTo(hex(0, 3), flat)).toBe(3);
        expect(origin.distanceTo(hex(3, -3), flat)).toBe(3);
        expect(origin.distanceTo(hex(2, 3), flat)).toBe(5);
    });

    it('is zero only for equal coordinates', () => {
        expect(hex(4, -2).distanceTo(hex(4, -2), flat)).toBe(0);
        expect(hex(4, 2, wrapped).distanceTo(hex(4, 2, wrapped), wrapped)).toBe(0);
        expect(hex(4, -2).distanceTo(hex(4, -1), flat)).toBe(1);
    });

    it('takes the short way around a wrapping map', () => {
        expect(hex(0, 0, wrapped).distanceTo(hex(9, 0, wrapped), wrapped)).toBe(1);
        expect(hex(9, 0, wrapped).distanceTo(hex(0, 0, wrapped), wrapped)).toBe(1);
        // columns 1 and 9 on row 2
        expect(hex(0, 2, wrapped).distanceTo(hex(8, 2, wrapped), wrapped)).toBe(2);
    });

    it('ignores the wrap when the map does not wrap', () => {
        expect(hex(0, 0).distanceTo(hex(9, 0), flat)).toBe(9);
    });

    it('is symmetric', () => {
        const coords: Array<[number, number]> = [[0, 0], [9, 0], [3, 4], [-2, 6], [7, 1], [5, 5]];
        for (const metrics of [flat, wrapped]) {
            for (const [ax, az] of coords) {
                for (const [bx, bz] of coords) {
                    const a = hex(ax, az, metrics);
                    const b = hex(bx, bz, metrics);
                    expect(a.distanceTo(b, metrics)).toBe(b.distanceTo(a, metrics));
                }
            }
        }
    });
});

// ─── Stepping ─────────────────────────────────────────────────────────────────

describe('step', () => {
    it('moves one cell in each direction', () => {
        const c = hex(2, 2);
        expect(xz(c.step(HexDirection.NE, flat))).toEqual([2, 3]);
        expect(xz(c.step(HexDirection.E, flat))).toEqual([3, 2]);
        expect(xz(c.step(HexDirection.SE, flat))).toEqual([3, 1]);
        expect(xz(c.step(HexDirection.SW, flat))).toEqual([2, 1]);
        expect(xz(c.step(HexDirection.W, flat))).toEqual([1, 2]);
        expect(xz(c.step(HexDirection.NW, flat))).toEqual([1, 3]);
    });

    it('reaches neighbors at distance one', () => {
        const c = hex(-3, 4);
        for (const direction of HEX_DIRECTIONS) {
            expect(c.distanceTo(c.step(direction, flat), flat)).toBe(1);
        }
    });

    it('returns to the start after stepping back', () => {
        const c = hex(5, -2);
        expect(c.step(HexDirection.E, flat).step(HexDirection.W, flat).equals(c)).toBe(true);
        for (const direction of HEX_DIRECTIONS) {
            expect(c.step(direction, flat).step(opposite(direction), flat).equals(c)).toBe(true);
        }
    });

    it('falls back to north-west for unknown directions', () => {
        const c = hex(2, 2);
        const unknownDirection: number = 9;

        expect(xz(c.step(unknownDirection, flat))).toEqual([1, 3]);
        expect(c.step(unknownDirection, flat).equals(c.step(HexDirection.NW, flat))).toBe(true);
    });

    it('wraps across the map edge', () => {
        expect(xz(hex(9, 0, wrapped).step(HexDirection.E, wrapped))).toEqual([0, 0]);
        expect(xz(hex(0, 0, wrapped).step(HexDirection.W, wrapped))).toEqual([9, 0]);
    });
});

// ─── Wrapping ─────────────────────────────────────────────────────────────────

describe('wrapped invariants', () => {
    const narrow = createHexMetrics({ wrapping: true, wrapSize: 7 });

    it('keeps offset and neighbor cells inside the wrap band', () => {
        for (let z = 0; z <= 5; z++) {
            for (let x = 0; x < narrow.wrapSize; x++) {
                const c = HexCoordinates.fromOffsetCoordinates(x, z, narrow);
                const cells = [c, ...HEX_DIRECTIONS.map(direction => c.step(direction, narrow))];

                for (const cell of cells) {
                    expect(cell.x + cell.y + cell.z).toBe(0);
                    expect(cell.offsetX).toBeGreaterThanOrEqual(0);
                    expect(cell.offsetX).toBeLessThan(narrow.wrapSize);
                }
            }
        }
    });
});

// ─── Offset coordinates ───────────────────────────────────────────────────────

describe('fromOffsetCoordinates', () => {
    it('shifts x back by half the row', () => {
        expect(xz(HexCoordinates.fromOffsetCoordinates(4, 3, flat))).toEqual([3, 3]);
        expect(xz(HexCoordinates.fromOffsetCoordinates(2, -3, flat))).toEqual([3, -3]);
    });

    it('round-trips through offsetX', () => {
        for (let z = -3; z <= 5; z++) {
            for (let x = 0; x <= 6; x++) {
                const c = HexCoordinates.fromOffsetCoordinates(x, z, flat);
                expect([c.offsetX, c.z]).toEqual([x, z]);
            }
        }
    });

    it('lands inside the wrap band', () => {
        expect(xz(HexCoordinates.fromOffsetCoordinates(10, 2, wrapped))).toEqual([-1, 2]);
    });
});

// ─── Text ─────────────────────────────────────────────────────────────────────

describe('text output', () => {
    it('formats as (X, Y, Z)', () => {
        expect(hex(1, 2).toString()).toBe('(1, -3, 2)');
        expect(hex(0, 0).toString()).toBe('(0, 0, 0)');
        expect(`${hex(-4, 1)}`).toBe('(-4, 3, 1)');
    });

    it('formats one component per line', () => {
        expect(hex(1, 2).toMultilineString()).toBe('1\n-3\n2');
    });
});

// ─── Binary persistence ───────────────────────────────────────────────────────

describe('save / load', () => {
    it('writes x then z as little-endian int32', () => {
        const writer = new BinaryWriter();
        hex(7, -3).save(writer);

        expect(Array.from(writer.getBuffer())).toEqual([7, 0, 0, 0, 0xfd, 0xff, 0xff, 0xff]);
    });

    it('restores saved coordinates', () => {
        const coords = [hex(7, -3), hex(0, 0), hex(9, 5, wrapped), hex(-2147483648, 2147483647)];
        const writer = new BinaryWriter();
        for (const c of coords) {
            c.save(writer);
        }

        const reader = new BinaryReader(writer.getBuffer());
        for (const c of coords) {
            expect(HexCoordinates.load(reader).equals(c)).toBe(true);
        }
        expect(reader.eof()).toBe(true);
    });

    it('does not normalize on load', () => {
        const writer = new BinaryWriter();
        writer.writeInt32(15);
        writer.writeInt32(0);

        const loaded = HexCoordinates.load(new BinaryReader(writer.getBuffer()));
        expect(xz(loaded)).toEqual([15, 0]);
    });

    it('propagates a truncated read', () => {
        const reader = new BinaryReader(new Uint8Array([1, 0, 0, 0, 2, 0]));
        expect(() => HexCoordinates.load(reader)).toThrow(BinaryReadError);
    });
});
