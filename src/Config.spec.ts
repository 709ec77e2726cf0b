import {Config, DEFAULT_PORT, DEFAULT_STORAGE_PATH} from "./Config";

describe(Config, () => {
    it("should apply defaults", () => {
        const config = new Config({ name: "Bridge" });

        expect(config.port).toBe(DEFAULT_PORT);
        expect(config.storagePath).toBe(DEFAULT_STORAGE_PATH);
        expect(config.maxPeers()).toBeUndefined();
        expect(config.insecureController).toBeUndefined();
    });

    it("should keep port 0", () => {
        expect(new Config({ name: "Bridge", port: 0 }).port).toBe(0);
    });

    it("should expose the peer limit", () => {
        expect(new Config({ name: "Bridge", maxPeers: 16 }).maxPeers()).toBe(16);
    });

    it("should reject invalid peer limits", () => {
        expect(() => new Config({ name: "Bridge", maxPeers: 0 })).toThrow(Error);
        expect(() => new Config({ name: "Bridge", maxPeers: 1.5 })).toThrow(Error);
    });
});
