import createDebug from "debug";
import {StorageManager} from "./storage";
import {PairingStore} from "./PairingStore";
import {Pairing, permissionFromByte} from "./Pairing";
import {isValidPublicKey} from "../crypto/ed25519";
import {uuid} from "../utils/uuid";

const debug = createDebug("Storage");

export type SavedPairingInformation = {
    id: string,
    publicKey: string, // hex
    permission: number,
}

type SavedPairings = {
    pairings: SavedPairingInformation[],
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null;
}

function restorePairing(saved: unknown): Pairing | undefined {
    if (!isRecord(saved) || typeof saved.id !== "string" || typeof saved.publicKey !== "string"
        || typeof saved.permission !== "number") {
        return undefined;
    }

    const id = uuid.parse(saved.id);
    const publicKey = Buffer.from(saved.publicKey, "hex");
    if (!id || !isValidPublicKey(publicKey)) {
        return undefined;
    }

    try {
        return {
            id: id,
            publicKey: publicKey,
            permission: permissionFromByte(saved.permission),
        };
    } catch (error) {
        debug("Could not restore permission of pairing %s: %s", id, error);
        return undefined;
    }
}

/**
 * Pairing store persisted through node-persist.
 * All pairings are kept in memory after {@link load} and the whole list is written on every mutation.
 */
export class PersistentPairingStore implements PairingStore {

    private readonly accessoryName: string;
    private pairings: Pairing[] = [];

    private restorePromise?: Promise<void>;

    constructor(accessoryName: string) {
        this.accessoryName = accessoryName;
    }

    async load(id: string): Promise<Pairing | undefined> {
        await this.restore();
        const pairing = this.pairings.find(value => value.id === id);
        return pairing ? { ...pairing, publicKey: Buffer.from(pairing.publicKey) } : undefined;
    }

    async save(pairing: Pairing): Promise<void> {
        await this.restore();

        const copy = { ...pairing, publicKey: Buffer.from(pairing.publicKey) };
        const pairings = this.pairings.slice();
        const index = pairings.findIndex(value => value.id === pairing.id);
        if (index >= 0) {
            pairings[index] = copy;
        } else {
            pairings.push(copy);
        }

        // the in-memory state only changes once the write went through
        await this.persist(pairings);
        this.pairings = pairings;
    }

    async delete(id: string): Promise<void> {
        await this.restore();

        const pairings = this.pairings.filter(value => value.id !== id);
        if (pairings.length === this.pairings.length) {
            return;
        }

        await this.persist(pairings);
        this.pairings = pairings;
    }

    async list(): Promise<Pairing[]> {
        await this.restore();
        return this.pairings.map(pairing => ({ ...pairing, publicKey: Buffer.from(pairing.publicKey) }));
    }

    async count(): Promise<number> {
        await this.restore();
        return this.pairings.length;
    }

    private async persist(pairings: Pairing[]) {
        const saved: SavedPairings = {
            pairings: pairings.map(pairing => ({
                id: pairing.id,
                publicKey: pairing.publicKey.toString("hex"),
                permission: pairing.permission,
            })),
        };

        await StorageManager.setItem(StorageManager.pairingsFormatPersistKey(this.accessoryName), saved);
    }

    private restore(): Promise<void> {
        if (!this.restorePromise) {
            this.restorePromise = this.restoreFromStorage().catch(error => {
                this.restorePromise = undefined; // retried by the next operation
                throw error;
            });
        }

        return this.restorePromise;
    }

    private async restoreFromStorage() {
        const saved = await StorageManager.getItem(StorageManager.pairingsFormatPersistKey(this.accessoryName));

        if (!isRecord(saved) || !Array.isArray(saved.pairings)) {
            debug("No saved pairings found for '%s'", this.accessoryName);
            return;
        }

        for (const entry of saved.pairings) {
            const pairing = restorePairing(entry);
            if (!pairing) {
                debug("Skipping corrupt pairing entry %o of '%s'", entry, this.accessoryName);
                continue;
            }
            if (this.pairings.some(value => value.id === pairing.id)) {
                debug("Skipping duplicate pairing entry %s of '%s'", pairing.id, this.accessoryName);
                continue;
            }

            this.pairings.push(pairing);
        }

        debug("Restored %d pairings for '%s'", this.pairings.length, this.accessoryName);
    }

}
