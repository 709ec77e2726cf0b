import tweetnacl from "tweetnacl";
import {PersistentPairingStore} from "./PersistentPairingStore";
import {StorageManager} from "./storage";
import {Pairing, PermissionTypes} from "./Pairing";

const ADMIN_ID = "cf47a128-769a-4563-8203-11f307b1926d";
const USER_ID = "0b7e3a1c-2d4f-4e5a-9b6c-7d8e9fa0b1c2";

function publicKey(seed: number): Buffer {
    return Buffer.from(tweetnacl.sign.keyPair.fromSeed(Buffer.alloc(32, seed)).publicKey);
}

const admin: Pairing = { id: ADMIN_ID, publicKey: publicKey(1), permission: PermissionTypes.ADMIN };
const user: Pairing = { id: USER_ID, publicKey: publicKey(2), permission: PermissionTypes.USER };

describe(PersistentPairingStore, () => {
    it("should persist pairings across store instances", async () => {
        const store = new PersistentPairingStore("Reload");
        await store.save(admin);
        await store.save(user);

        const restored = new PersistentPairingStore("Reload");
        expect(await restored.count()).toBe(2);
        expect(await restored.load(USER_ID)).toEqual(user);
        expect((await restored.list()).map(pairing => pairing.id)).toEqual([ADMIN_ID, USER_ID]);
    });

    it("should store the public key as hex", async () => {
        const store = new PersistentPairingStore("Format");
        await store.save(admin);

        expect(await StorageManager.getItem("Pairings.FORMAT.json")).toEqual({
            pairings: [{ id: ADMIN_ID, publicKey: admin.publicKey.toString("hex"), permission: 1 }],
        });
    });

    it("should update an existing pairing in place", async () => {
        const store = new PersistentPairingStore("Update");
        await store.save(admin);
        await store.save(user);
        await store.save({ ...admin, permission: PermissionTypes.USER });

        const pairings = await new PersistentPairingStore("Update").list();
        expect(pairings.map(pairing => [pairing.id, pairing.permission])).toEqual([
            [ADMIN_ID, PermissionTypes.USER],
            [USER_ID, PermissionTypes.USER],
        ]);
    });

    it("should treat deleting an unknown id as no-op", async () => {
        const store = new PersistentPairingStore("Delete");
        await store.save(admin);

        await store.delete(USER_ID);
        await store.delete(ADMIN_ID);
        await store.delete(ADMIN_ID);

        expect(await store.load(ADMIN_ID)).toBeUndefined();
        expect(await new PersistentPairingStore("Delete").count()).toBe(0);
    });

    it("should not hand out references to its records", async () => {
        const store = new PersistentPairingStore("Copy");
        await store.save(admin);

        const loaded = await store.load(ADMIN_ID);
        expect(loaded).toBeDefined();
        if (loaded) {
            loaded.permission = PermissionTypes.USER;
        }

        expect(await store.load(ADMIN_ID)).toEqual(admin);
    });

    it("should skip corrupt entries", async () => {
        const malformedKey = Buffer.alloc(32);
        malformedKey[0] = 2;

        await StorageManager.setItem("Pairings.CORRUPT.json", {
            pairings: [
                { id: ADMIN_ID.toUpperCase(), publicKey: admin.publicKey.toString("hex"), permission: 1 },
                { id: "not-a-uuid", publicKey: user.publicKey.toString("hex"), permission: 0 },
                { id: USER_ID, publicKey: malformedKey.toString("hex"), permission: 0 },
                { id: USER_ID, publicKey: user.publicKey.toString("hex"), permission: 7 },
                { id: USER_ID, publicKey: user.publicKey.toString("hex") },
                "garbage",
            ],
        });

        const store = new PersistentPairingStore("Corrupt");
        expect(await store.list()).toEqual([admin]);
    });

    it("should skip entries whose id was already restored", async () => {
        await StorageManager.setItem("Pairings.DUPLICATE.json", {
            pairings: [
                { id: ADMIN_ID, publicKey: admin.publicKey.toString("hex"), permission: 1 },
                { id: ADMIN_ID.toUpperCase(), publicKey: user.publicKey.toString("hex"), permission: 0 },
            ],
        });

        const store = new PersistentPairingStore("Duplicate");
        expect(await store.count()).toBe(1);
        expect(await store.load(ADMIN_ID)).toEqual(admin);

        await store.delete(ADMIN_ID);
        expect(await store.load(ADMIN_ID)).toBeUndefined();
    });

    it("should keep its state when a write fails", async () => {
        const store = new PersistentPairingStore("WriteFailure");
        await store.save(admin);

        const setItem = jest.spyOn(StorageManager, "setItem");
        setItem.mockRejectedValueOnce(new Error("disk full"));
        await expect(store.save(user)).rejects.toThrow("disk full");
        expect(await store.load(USER_ID)).toBeUndefined();
        expect(await store.count()).toBe(1);

        setItem.mockRejectedValueOnce(new Error("disk full"));
        await expect(store.delete(ADMIN_ID)).rejects.toThrow("disk full");
        expect(await store.load(ADMIN_ID)).toEqual(admin);
        setItem.mockRestore();

        expect(await new PersistentPairingStore("WriteFailure").list()).toEqual([admin]);
    });

    it("should retry restoring after a failed read", async () => {
        await StorageManager.setItem("Pairings.READFAILURE.json", {
            pairings: [{ id: ADMIN_ID, publicKey: admin.publicKey.toString("hex"), permission: 1 }],
        });

        const getItem = jest.spyOn(StorageManager, "getItem");
        getItem.mockRejectedValueOnce(new Error("read failure"));

        const store = new PersistentPairingStore("ReadFailure");
        await expect(store.count()).rejects.toThrow("read failure");
        expect(await store.count()).toBe(1);
        expect(getItem).toHaveBeenCalledTimes(2);
        getItem.mockRestore();
    });

    it("should start empty without saved pairings", async () => {
        expect(await new PersistentPairingStore("Empty").count()).toBe(0);
    });
});
