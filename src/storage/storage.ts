import storage, {LocalStorage} from "node-persist";
import util from "util";
import createDebug from "debug";

const debug = createDebug("Storage");

export namespace StorageManager {

    let localStore: LocalStorage | undefined;
    let initPromise: Promise<unknown> = Promise.resolve();
    let customStoragePath: string | undefined;

    export function setCustomStoragePath(path: string) {
        if (localStore) {
            throw new Error("Cannot change storage path after it has already been initialized!");
        }

        customStoragePath = path;
    }

    async function localStorage(): Promise<LocalStorage> {
        if (!localStore) {
            const store = customStoragePath ? storage.create({ dir: customStoragePath }) : storage.create();
            localStore = store;
            initPromise = initPromise.then(() => store.init());
            debug("Initializing storage in %s", customStoragePath || "default directory");
        }

        await initPromise;
        return localStore;
    }

    export async function init() {
        await localStorage();
    }

    export async function getItem(key: string): Promise<unknown> {
        const store = await localStorage();
        return store.getItem(key);
    }

    export async function setItem(key: string, value: unknown): Promise<void> {
        const store = await localStorage();
        await store.setItem(key, value);
    }

    export function pairingsFormatPersistKey(accessoryName: string) {
        return util.format("Pairings.%s.json", accessoryName.toUpperCase());
    }

}
