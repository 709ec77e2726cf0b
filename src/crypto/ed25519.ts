import {ed25519} from "@noble/curves/ed25519";
import tweetnacl from "tweetnacl";

/**
 * Checks that the buffer is a 32 byte compressed edwards point in the strict RFC 8032 encoding,
 * the same requirement a signature verification would impose on the long-term public key.
 */
export function isValidPublicKey(publicKey: Buffer): boolean {
    if (publicKey.length !== tweetnacl.sign.publicKeyLength) {
        return false;
    }

    try {
        ed25519.ExtendedPoint.fromHex(publicKey);
        return true;
    } catch (error) {
        return false; // not on the curve or not canonically encoded
    }
}
