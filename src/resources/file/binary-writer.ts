const INITIAL_CAPACITY = 64;

/**
 * Growable little-endian byte sink, the write-side counterpart of BinaryReader.
 */
export class BinaryWriter {
    private data: Uint8Array;
    private view: DataView;
    private pos = 0;

    constructor(capacity = INITIAL_CAPACITY) {
        this.data = new Uint8Array(Math.max(1, capacity));
        this.view = new DataView(this.data.buffer);
    }

    /** Number of bytes written so far */
    public get length(): number {
        return this.pos;
    }

    public writeByte(value: number): void {
        this.reserve(1);
        this.data[this.pos++] = value & 0xff;
    }

    /** Write a signed 32-bit little-endian integer */
    public writeInt32(value: number): void {
        this.reserve(4);
        this.view.setInt32(this.pos, value, true);
        this.pos += 4;
    }

    /** Copy of the written bytes */
    public getBuffer(): Uint8Array {
        return this.data.slice(0, this.pos);
    }

    private reserve(byteCount: number): void {
        const required = this.pos + byteCount;
        if (required <= this.data.length) {
            return;
        }

        let capacity = this.data.length * 2;
        while (capacity < required) {
            capacity *= 2;
        }

        const grown = new Uint8Array(capacity);
        grown.set(this.data.subarray(0, this.pos));
        this.data = grown;
        this.view = new DataView(grown.buffer);
    }
}
