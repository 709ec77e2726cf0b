import {TLVError} from "../errors";
import {TLVValues} from "../types/hap";

/**
 * Type Length Value encoding/decoding (TLV8), used by HAP as a wire format.
 * https://en.wikipedia.org/wiki/Type-length-value
 */

const MAX_FRAGMENT_LENGTH = 255;

export type TLVEncodable = Buffer | number | string;

export type TLVItem = [type: number, value: Buffer];
export type TLVContainer = TLVItem[];

function assertByte(value: number, what: string) {
    if (!Number.isInteger(value) || value < 0 || value > 0xFF) {
        throw new TLVError(`${what} ${value} doesn't fit into a single byte`);
    }
}

function toBuffer(data: TLVEncodable): Buffer {
    if (typeof data === "number") {
        assertByte(data, "Value");
        return Buffer.from([data]);
    } else if (typeof data === "string") {
        return Buffer.from(data);
    }

    return data;
}

export function item(type: number, data: TLVEncodable): TLVItem {
    assertByte(type, "Type");
    return [type, toBuffer(data)];
}

/**
 * Zero-length item marking the boundary between two records of a list.
 */
export function separator(): TLVItem {
    return [TLVValues.SEPARATOR, Buffer.alloc(0)];
}

function encodeItem(type: number, value: Buffer, encodedTLVBuffers: Buffer[]) {
    assertByte(type, "Type");

    // values exceeding 255 bytes are split into multiple fragments of the same type.
    // The last fragment is always shorter than 255 bytes (possibly empty), which terminates the value
    let currentIndex = 0;
    for (;;) {
        const length = Math.min(value.length - currentIndex, MAX_FRAGMENT_LENGTH);
        encodedTLVBuffers.push(Buffer.from([type, length]), value.subarray(currentIndex, currentIndex + length));
        currentIndex += length;

        if (length < MAX_FRAGMENT_LENGTH) {
            break;
        }
    }
}

export function encodeContainer(container: TLVContainer): Buffer {
    const encodedTLVBuffers: Buffer[] = [];

    for (const [type, value] of container) {
        encodeItem(type, value, encodedTLVBuffers);
    }

    return Buffer.concat(encodedTLVBuffers);
}

/**
 * Encodes a flat list of type/value pairs, e.g. `encode(TLVValues.STATE, HAPStates.M2, TLVValues.ERROR, TLVErrors.UNKNOWN)`.
 */
export function encode(type: number, data: TLVEncodable, ...args: TLVEncodable[]): Buffer {
    if (args.length % 2 !== 0) {
        throw new TLVError("Got type without a value to encode");
    }

    const container: TLVContainer = [item(type, data)];
    for (let i = 0; i < args.length; i += 2) {
        const nextType = args[i];
        if (typeof nextType !== "number") {
            throw new TLVError(`Expected numeric type at argument ${i + 2}`);
        }

        container.push(item(nextType, args[i + 1]));
    }

    return encodeContainer(container);
}

/**
 * Reads every raw item in order without merging any fragments.
 *
 * @param buffer - TLV8 data
 * @throws TLVError if a length byte or a value is truncated
 */
export function decodeItems(buffer: Buffer): TLVContainer {
    const items: TLVContainer = [];

    let currentIndex = 0;
    while (currentIndex < buffer.length) {
        if (currentIndex + 2 > buffer.length) {
            throw new TLVError(`Truncated tlv item at offset ${currentIndex}: missing length byte`);
        }

        const type = buffer[currentIndex];
        const length = buffer[currentIndex + 1];
        const start = currentIndex + 2;
        const end = start + length;

        if (end > buffer.length) {
            throw new TLVError(`Truncated tlv item at offset ${currentIndex}: expected ${length} bytes but only ${buffer.length - start} are left`);
        }

        items.push([type, buffer.subarray(start, end)]);
        currentIndex = end;
    }

    return items;
}

function mergeRuns(items: TLVContainer): Record<number, Buffer> {
    const objects: Record<number, Buffer> = {};

    let runType = -1;
    let run: Buffer[] = [];
    for (const [type, value] of items) {
        if (type !== runType) {
            if (run.length > 0) {
                objects[runType] = Buffer.concat(run);
            }

            runType = type;
            run = [];
        }

        run.push(value);
    }

    if (run.length > 0) {
        objects[runType] = Buffer.concat(run);
    }

    return objects;
}

/**
 * Decodes tlv data into a type to value mapping.
 * Consecutive items of the same type are concatenated (fragmented values).
 * Should a type appear again after some other type, the later value replaces the earlier one.
 *
 * @param buffer - TLV8 data
 * @throws TLVError on structurally invalid input
 */
export function decode(buffer: Buffer): Record<number, Buffer> {
    return mergeRuns(decodeItems(buffer));
}

/**
 * Decodes tlv data containing a list of records delimited by {@link TLVValues.SEPARATOR} items.
 * Empty records (e.g. after a trailing separator) are dropped.
 */
export function decodeList(buffer: Buffer): Record<number, Buffer>[] {
    const records: Record<number, Buffer>[] = [];

    let current: TLVContainer = [];
    for (const entry of decodeItems(buffer)) {
        if (entry[0] === TLVValues.SEPARATOR) {
            if (current.length > 0) {
                records.push(mergeRuns(current));
            }
            current = [];
        } else {
            current.push(entry);
        }
    }

    if (current.length > 0) {
        records.push(mergeRuns(current));
    }

    return records;
}
