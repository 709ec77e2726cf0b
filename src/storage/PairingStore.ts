import {Pairing} from "./Pairing";

/**
 * Persists pairings keyed by their controller id.
 * Every operation is atomic on its own; callers needing more than one operation to be consistent
 * must hold exclusive access to the store (see {@link SharedResource}).
 */
export interface PairingStore {
    /**
     * @returns the pairing or undefined if no pairing with the given id exists
     */
    load(id: string): Promise<Pairing | undefined>;
    save(pairing: Pairing): Promise<void>;
    /**
     * Deleting an id which isn't stored is not an error.
     */
    delete(id: string): Promise<void>;
    list(): Promise<Pairing[]>;
    count(): Promise<number>;
}

function copyPairing(pairing: Pairing): Pairing {
    return {
        id: pairing.id,
        publicKey: Buffer.from(pairing.publicKey),
        permission: pairing.permission,
    };
}

export class MemoryPairingStore implements PairingStore {

    private readonly pairings = new Map<string, Pairing>();

    constructor(pairings: Pairing[] = []) {
        pairings.forEach(pairing => this.pairings.set(pairing.id, copyPairing(pairing)));
    }

    async load(id: string): Promise<Pairing | undefined> {
        const pairing = this.pairings.get(id);
        return pairing ? copyPairing(pairing) : undefined;
    }

    async save(pairing: Pairing): Promise<void> {
        this.pairings.set(pairing.id, copyPairing(pairing));
    }

    async delete(id: string): Promise<void> {
        this.pairings.delete(id);
    }

    async list(): Promise<Pairing[]> {
        return Array.from(this.pairings.values(), copyPairing);
    }

    async count(): Promise<number> {
        return this.pairings.size;
    }

}
