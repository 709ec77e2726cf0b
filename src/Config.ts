export const DEFAULT_PORT = 51826;
export const DEFAULT_STORAGE_PATH = "./persist";
export const DEFAULT_MAX_PEERS = 16; // HAP accessories must support at least 16 pairings

export type ConfigOptions = {
    name: string,
    port?: number,
    storagePath?: string,
    /**
     * Upper bound of stored pairings. Undefined disables the limit.
     */
    maxPeers?: number,
    /**
     * Treats every connection as authenticated by the given controller id.
     * Only meant for development, as long as no pair-verify layer is plugged in.
     */
    insecureController?: string,
}

export class Config {

    readonly name: string;
    readonly port: number;
    readonly storagePath: string;
    readonly insecureController?: string;

    private readonly maxPeerCount?: number;

    constructor(options: ConfigOptions) {
        if (options.maxPeers !== undefined && (!Number.isInteger(options.maxPeers) || options.maxPeers < 1)) {
            throw new Error(`maxPeers must be a positive integer (got ${options.maxPeers})`);
        }

        this.name = options.name;
        this.port = options.port !== undefined ? options.port : DEFAULT_PORT;
        this.storagePath = options.storagePath || DEFAULT_STORAGE_PATH;
        this.maxPeerCount = options.maxPeers;
        this.insecureController = options.insecureController;
    }

    maxPeers(): number | undefined {
        return this.maxPeerCount;
    }

}
