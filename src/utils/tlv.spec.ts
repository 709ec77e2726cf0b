import * as tlv from "./tlv";
import {TLVError} from "../errors";
import {TLVValues} from "../types/hap";

describe("#encode()", () => {

    it("encodes a single value", () => {
        expect(tlv.encode(TLVValues.STATE, 2)).toEqual(Buffer.from([0x06, 0x01, 0x02]));
    });

    it("encodes multiple values in order", () => {
        const encoded = tlv.encode(TLVValues.STATE, 2, TLVValues.ERROR, 1);
        expect(encoded).toEqual(Buffer.from([0x06, 0x01, 0x02, 0x07, 0x01, 0x01]));
    });

    it("encodes strings as utf8", () => {
        expect(tlv.encode(TLVValues.IDENTIFIER, "AB")).toEqual(Buffer.from([0x01, 0x02, 0x41, 0x42]));
    });

    it("rejects a type without value", () => {
        expect(() => tlv.encode(TLVValues.STATE, 1, TLVValues.METHOD)).toThrow(TLVError);
    });

    it("rejects numbers which don't fit into a byte", () => {
        expect(() => tlv.encode(TLVValues.STATE, 256)).toThrow(TLVError);
        expect(() => tlv.encode(256, 1)).toThrow(TLVError);
    });
});

describe("#encodeContainer()", () => {

    it("encodes an empty value as zero length item", () => {
        expect(tlv.encodeContainer([[TLVValues.PUBLIC_KEY, Buffer.alloc(0)]])).toEqual(Buffer.from([0x03, 0x00]));
    });

    it("encodes the separator", () => {
        expect(tlv.encodeContainer([tlv.separator()])).toEqual(Buffer.from([0xFF, 0x00]));
    });

    it("fragments values longer than 255 bytes", () => {
        const value = Buffer.alloc(300, 0xAA);
        const encoded = tlv.encodeContainer([[TLVValues.PUBLIC_KEY, value]]);

        expect(encoded.length).toEqual(304);
        expect(encoded.subarray(0, 2)).toEqual(Buffer.from([0x03, 0xFF]));
        expect(encoded.subarray(257, 259)).toEqual(Buffer.from([0x03, 45]));
        expect(tlv.decode(encoded)[TLVValues.PUBLIC_KEY]).toEqual(value);
    });

    it("terminates a value of exactly 255 bytes with an empty fragment", () => {
        const value = Buffer.alloc(255, 0x01);
        const encoded = tlv.encodeContainer([[TLVValues.PUBLIC_KEY, value]]);

        expect(encoded.length).toEqual(259);
        expect(encoded.subarray(257)).toEqual(Buffer.from([0x03, 0x00]));
        expect(tlv.decode(encoded)[TLVValues.PUBLIC_KEY]).toEqual(value);
    });
});

describe("#decode()", () => {

    it("decodes an empty buffer", () => {
        expect(tlv.decode(Buffer.alloc(0))).toEqual({});
    });

    it("decodes multiple values", () => {
        const result = tlv.decode(Buffer.from([0x06, 0x01, 0x01, 0x00, 0x01, 0x05]));
        expect(result[TLVValues.STATE]).toEqual(Buffer.from([0x01]));
        expect(result[TLVValues.METHOD]).toEqual(Buffer.from([0x05]));
    });

    it("lets a repeated type replace the earlier value", () => {
        const result = tlv.decode(Buffer.from([0x01, 0x01, 0x41, 0x03, 0x01, 0x42, 0x01, 0x01, 0x43]));
        expect(result[TLVValues.IDENTIFIER].toString()).toEqual("C");
        expect(result[TLVValues.PUBLIC_KEY].toString()).toEqual("B");
    });

    it("rejects a missing length byte", () => {
        expect(() => tlv.decode(Buffer.from([0x06, 0x01, 0x01, 0x00]))).toThrow(TLVError);
    });

    it("rejects a truncated value", () => {
        expect(() => tlv.decode(Buffer.from([0x06, 0x05, 0x01]))).toThrow(TLVError);
    });
});

describe("#decodeList()", () => {

    it("splits records at separators", () => {
        const encoded = tlv.encodeContainer([
            tlv.item(TLVValues.STATE, 2),
            tlv.item(TLVValues.IDENTIFIER, "A"),
            tlv.item(TLVValues.PERMISSIONS, 1),
            tlv.separator(),
            tlv.item(TLVValues.IDENTIFIER, "B"),
            tlv.item(TLVValues.PERMISSIONS, 0),
            tlv.separator(),
        ]);

        const records = tlv.decodeList(encoded);
        expect(records.length).toEqual(2);
        expect(records[0][TLVValues.STATE]).toEqual(Buffer.from([0x02]));
        expect(records[0][TLVValues.IDENTIFIER].toString()).toEqual("A");
        expect(records[1][TLVValues.IDENTIFIER].toString()).toEqual("B");
        expect(records[1][TLVValues.PERMISSIONS]).toEqual(Buffer.from([0x00]));
    });

    it("drops empty records", () => {
        expect(tlv.decodeList(Buffer.from([0xFF, 0x00, 0xFF, 0x00]))).toEqual([]);
    });
});
