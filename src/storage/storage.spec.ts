import nodePersist from "node-persist";
import {StorageManager} from "./storage";

describe("StorageManager", () => {
    it("should create the storage in the custom path only once", async () => {
        StorageManager.setCustomStoragePath("test-persist");

        await StorageManager.init();
        await StorageManager.setItem("key", { value: 1 });

        expect(nodePersist.create).toHaveBeenCalledTimes(1);
        expect(nodePersist.create).toHaveBeenLastCalledWith({ dir: "test-persist" });
        await expect(StorageManager.getItem("key")).resolves.toEqual({ value: 1 });
    });

    it("should reject setCustomStoragePath after storage has already been initialized", () => {
        expect(() => StorageManager.setCustomStoragePath("other-path")).toThrow(Error);
    });

    it("should format the pairings key with the upper case accessory name", () => {
        expect(StorageManager.pairingsFormatPersistKey("Bridge")).toBe("Pairings.BRIDGE.json");
    });
});
