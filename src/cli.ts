import fs from "fs";
import path from "path";
import createDebug from "debug";
import {Command, InvalidArgumentError} from "commander";
import {Config, DEFAULT_MAX_PEERS, DEFAULT_PORT, DEFAULT_STORAGE_PATH} from "./Config";
import {HAPServer} from "./HAPServer";
import {StorageManager} from "./storage/storage";
import {PersistentPairingStore} from "./storage/PersistentPairingStore";
import {Pairing, PermissionTypes} from "./storage/Pairing";
import {isValidPublicKey} from "./crypto/ed25519";
import {uuid} from "./utils/uuid";

// DEBUG=HAPServer,HAPServer:*,Pairings,Storage ts-node src/cli.ts --insecure-controller <id>

type CliOptions = {
    name: string,
    port: number,
    storagePath: string,
    maxPeers: number,
    insecureController?: string,
    initialAdmin?: Pairing,
    verbose?: boolean,
}

function getVersion(): string {
    const packageJson: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"));
    if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson
        && typeof packageJson.version === "string") {
        return packageJson.version;
    }
    return "0.0.0";
}

function parseInteger(value: string, minimum: number): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < minimum) {
        throw new InvalidArgumentError(`Expected an integer >= ${minimum}.`);
    }
    return parsed;
}

function parseControllerId(value: string): string {
    const id = uuid.parse(value);
    if (!id) {
        throw new InvalidArgumentError("Expected a controller uuid.");
    }
    return id;
}

// format <id>:<hex encoded ed25519 public key>
function parseInitialAdmin(value: string): Pairing {
    const separatorIndex = value.lastIndexOf(":");
    if (separatorIndex < 0) {
        throw new InvalidArgumentError("Expected <id>:<public key hex>.");
    }

    const publicKeyHex = value.slice(separatorIndex + 1);
    const publicKey = Buffer.from(publicKeyHex, "hex");
    if (!/^[0-9a-f]*$/i.test(publicKeyHex) || !isValidPublicKey(publicKey)) {
        throw new InvalidArgumentError("Expected a hex encoded 32 byte ed25519 public key.");
    }

    return {
        id: parseControllerId(value.slice(0, separatorIndex)),
        publicKey: publicKey,
        permission: PermissionTypes.ADMIN,
    };
}

const command = new Command()
    .version(getVersion())
    .option("-n, --name <name>", "define the accessory name the pairings are stored under", "Accessory")
    .option("-p, --port <port>", "define the server port", value => parseInteger(value, 0), DEFAULT_PORT)
    .option("-s, --storage-path <dir>", "define the directory pairings are persisted in", DEFAULT_STORAGE_PATH)
    .option("--max-peers <count>", "define the maximum number of pairings", value => parseInteger(value, 1), DEFAULT_MAX_PEERS)
    .option("--insecure-controller <id>", "treat every connection as authenticated by this controller (development only)", parseControllerId)
    .option("--initial-admin <id:publicKey>", "store this admin pairing if no pairings exist yet", parseInitialAdmin)
    .option("-v, --verbose", "enable debug output");

command.parse(process.argv);
const opts = command.opts<CliOptions>();

if (opts.verbose && !process.env.DEBUG) {
    createDebug.enable("HAPServer,HAPServer:*,Pairings,Storage");
}

async function main() {
    const config = new Config({
        name: opts.name,
        port: opts.port,
        storagePath: opts.storagePath,
        maxPeers: opts.maxPeers,
        insecureController: opts.insecureController,
    });

    StorageManager.setCustomStoragePath(config.storagePath);
    const store = new PersistentPairingStore(config.name);

    if (opts.initialAdmin && await store.count() === 0) {
        await store.save(opts.initialAdmin);
        console.log(`Stored initial admin pairing ${opts.initialAdmin.id}`);
    }

    if (config.insecureController) {
        console.warn(`Every connection is treated as controller ${config.insecureController}!`);
    }

    const server = new HAPServer(config, store);
    const port = await server.listen();
    console.log(`'${config.name}' is serving /pairings on port ${port}`);
}

main().catch(error => {
    console.error("Failed to start the server:", error);
    process.exitCode = 1;
});
