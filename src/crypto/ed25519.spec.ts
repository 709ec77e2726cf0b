import tweetnacl from "tweetnacl";
import {isValidPublicKey} from "./ed25519";

describe("isValidPublicKey", () => {
    it("should accept generated keys", () => {
        const keyPair = tweetnacl.sign.keyPair.fromSeed(Buffer.alloc(32, 7));
        expect(isValidPublicKey(Buffer.from(keyPair.publicKey))).toBe(true);
    });

    it("should accept the identity point", () => {
        const identity = Buffer.alloc(32);
        identity[0] = 1;
        expect(isValidPublicKey(identity)).toBe(true);
    });

    it("should reject a y coordinate without matching x", () => {
        const key = Buffer.alloc(32);
        key[0] = 2;
        expect(isValidPublicKey(key)).toBe(false);
    });

    it("should reject x = 0 with the sign bit set", () => {
        const key = Buffer.alloc(32);
        key[0] = 1;
        key[31] = 0x80;
        expect(isValidPublicKey(key)).toBe(false);
    });

    it("should reject a y coordinate which isn't fully reduced", () => {
        // p + 1, which is congruent to the identity's y coordinate
        const key = Buffer.alloc(32, 0xFF);
        key[0] = 0xEE;
        key[31] = 0x7F;
        expect(isValidPublicKey(key)).toBe(false);
    });

    it("should reject keys with the wrong length", () => {
        const keyPair = tweetnacl.sign.keyPair.fromSeed(Buffer.alloc(32, 7));
        expect(isValidPublicKey(Buffer.from(keyPair.publicKey).subarray(0, 31))).toBe(false);
        expect(isValidPublicKey(Buffer.alloc(0))).toBe(false);
    });
});
