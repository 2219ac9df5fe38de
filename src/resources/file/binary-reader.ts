import { LogHandler } from '@/utilities/log-handler';

/** Thrown when a read would run past the end of the reader's data window */
export class BinaryReadError extends Error {
    public readonly filename: string;
    public readonly offset: number;
    public readonly size: number;

    constructor(filename: string, offset: number, size: number) {
        super('read out of data: ' + filename + ' - size: ' + size + ' @ ' + offset);
        this.name = 'BinaryReadError';
        this.filename = filename;
        this.offset = offset;
        this.size = size;

        Object.seal(this);
    }
}

/** Class to provide a read pointer and little-endian read functions to a binary buffer */
export class BinaryReader {
    private static log = new LogHandler('BinaryReader');
    public filename: string;
    protected readonly data: Uint8Array;
    protected readonly view: DataView;
    protected readonly hiddenOffset: number;
    public readonly length: number;
    public pos: number;

    constructor(
        dataArray?: BinaryReader | Uint8Array | ArrayBufferLike,
        offset = 0, length: number | null = null, filename: string | null = null
    ) {
        let dataLength = 0;
        let srcHiddenOffset = 0;

        if (dataArray == null) {
            this.data = new Uint8Array(0);
        } else if (dataArray instanceof BinaryReader) {
            this.data = dataArray.data;
            dataLength = dataArray.length;
            srcHiddenOffset = dataArray.hiddenOffset;

            if (!filename) {
                filename = dataArray.filename;
            }
        } else if (dataArray instanceof Uint8Array) {
            this.data = dataArray;
            dataLength = dataArray.byteLength;
        } else {
            this.data = new Uint8Array(dataArray);
            dataLength = dataArray.byteLength;
        }

        if (length == null) {
            length = dataLength - offset;
        }

        this.view = new DataView(this.data.buffer, this.data.byteOffset, this.data.byteLength);
        this.hiddenOffset = offset + srcHiddenOffset;
        this.length = length;
        this.pos = this.hiddenOffset;

        this.filename = (filename) || '[Unknown]';

        Object.seal(this);
    }

    public getBuffer(offset = 0, length = -1): Uint8Array {
        const l = (length >= 0) ? Math.min(this.length, length) : this.length;
        const o = this.hiddenOffset + offset;

        return this.data.slice(o, o + l);
    }

    public readByte(offset: number | null = null): number {
        if (offset !== null) {
            this.pos = offset + this.hiddenOffset;
        }

        this.ensureAvailable(1);

        const v = this.data[this.pos];
        this.pos++;

        return v;
    }

    /** Read a signed 32-bit little-endian integer */
    public readInt32(offset: number | null = null): number {
        if (offset !== null) {
            this.pos = offset + this.hiddenOffset;
        }

        this.ensureAvailable(4);

        const v = this.view.getInt32(this.pos, true);
        this.pos += 4;

        return v;
    }

    public getOffset(): number {
        return this.pos - this.hiddenOffset;
    }

    public setOffset(newPos: number): void {
        this.pos = newPos + this.hiddenOffset;
    }

    public eof(): boolean {
        const pos = this.pos - this.hiddenOffset;
        return ((pos >= this.length) || (pos < 0));
    }

    private ensureAvailable(byteCount: number): void {
        const pos = this.getOffset();
        if ((pos >= 0) && (pos + byteCount <= this.length)) {
            return;
        }

        const error = new BinaryReadError(this.filename, pos, this.length);
        BinaryReader.log.error(error.message);
        throw error;
    }
}
