/** The six neighbor directions of a cell, clockwise starting at north-east */
export enum HexDirection {
    NE,
    E,
    SE,
    SW,
    W,
    NW
}

export const HEX_DIRECTIONS: ReadonlyArray<HexDirection> = [
    HexDirection.NE,
    HexDirection.E,
    HexDirection.SE,
    HexDirection.SW,
    HexDirection.W,
    HexDirection.NW,
];

const DIRECTION_COUNT = 6;

export function opposite(direction: HexDirection): HexDirection {
    return (direction + 3) % DIRECTION_COUNT;
}

/** Clockwise neighbor direction; NW wraps to NE */
export function next(direction: HexDirection): HexDirection {
    return (direction + 1) % DIRECTION_COUNT;
}

/** Counter-clockwise neighbor direction; NE wraps to NW */
export function previous(direction: HexDirection): HexDirection {
    return (direction + DIRECTION_COUNT - 1) % DIRECTION_COUNT;
}
