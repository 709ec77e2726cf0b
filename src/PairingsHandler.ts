import createDebug from "debug";
import * as tlv from "./utils/tlv";
import {TLVContainer} from "./utils/tlv";
import {uuid} from "./utils/uuid";
import {HAPStates, PairingsStep, PairMethods, TLVErrors, TLVValues} from "./types/hap";
import {PairingsError} from "./errors";
import {Pairing, PermissionTypes, permissionFromByte, permissionToByte} from "./storage/Pairing";
import {PairingStore} from "./storage/PairingStore";
import {EventSink, HAPEvent, HAPEventTypes} from "./lib/EventDispatcher";
import {SharedResource} from "./lib/SharedResource";
import {Config} from "./Config";
import {isValidPublicKey} from "./crypto/ed25519";

const debug = createDebug("Pairings");

/**
 * Supplies the id of the controller which authenticated the current session (via pair-verify).
 */
export interface ControllerIdentity {
    current(): string | undefined;
}

export type AddPairingRequest = {
    method: PairMethods.ADD_PAIRING,
    identifier: Buffer,
    publicKey: Buffer,
    permission: PermissionTypes,
}

export type RemovePairingRequest = {
    method: PairMethods.REMOVE_PAIRING,
    identifier: Buffer,
}

export type ListPairingsRequest = {
    method: PairMethods.LIST_PAIRINGS,
}

export type PairingsRequest = AddPairingRequest | RemovePairingRequest | ListPairingsRequest;

export type PairingsContext = {
    storage: SharedResource<PairingStore>,
    events: SharedResource<EventSink>,
    config: Pick<Config, "maxPeers">,
}

function requireField(tlvData: Record<number, Buffer>, type: TLVValues): Buffer {
    const value: Buffer | undefined = tlvData[type];
    if (!value) {
        throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.UNKNOWN, `Request is missing the ${TLVValues[type]} field`);
    }

    return value;
}

function parsePairingId(identifier: Buffer): string {
    const id = uuid.parse(identifier.toString("utf8"));
    if (!id) {
        throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.UNKNOWN, "Pairing identifier is not a valid uuid");
    }

    return id;
}

/**
 * Handles the /pairings endpoint: a single M1/M2 exchange which lets an admin controller
 * add, update, remove or list the pairings of the accessory.
 */
export class PairingsHandler {

    private readonly context: PairingsContext;

    constructor(context: PairingsContext) {
        this.context = context;
    }

    /**
     * Runs a whole exchange for a fully received request body.
     *
     * @returns the encoded response, which is an error container if the request failed
     */
    async process(body: Buffer, identity: ControllerIdentity): Promise<Buffer> {
        try {
            const request = this.parse(body);
            const response = await this.handle(request, identity);
            return tlv.encodeContainer(response);
        } catch (error) {
            const pairingsError = error instanceof PairingsError
                ? error
                : new PairingsError(PairingsStep.RESPONSE, TLVErrors.UNKNOWN, String(error));

            debug("Rejecting pairings request at step %d with %s: %s",
                pairingsError.step, TLVErrors[pairingsError.code], pairingsError.message);
            return tlv.encode(TLVValues.STATE, pairingsError.step, TLVValues.ERROR, pairingsError.code);
        }
    }

    /**
     * Decodes the request body without any side effects.
     *
     * @throws PairingsError
     */
    parse(body: Buffer): PairingsRequest {
        let tlvData: Record<number, Buffer>;
        try {
            tlvData = tlv.decode(body);
        } catch (error) {
            throw new PairingsError(PairingsStep.UNKNOWN, TLVErrors.UNKNOWN, "Malformed tlv body: " + String(error));
        }

        const state: Buffer | undefined = tlvData[TLVValues.STATE];
        if (!state || !state.equals(Buffer.from([HAPStates.M1]))) {
            throw new PairingsError(PairingsStep.UNKNOWN, TLVErrors.UNKNOWN, "Request isn't in state M1");
        }

        const method: Buffer | undefined = tlvData[TLVValues.METHOD];
        if (!method || method.length === 0) {
            throw new PairingsError(PairingsStep.UNKNOWN, TLVErrors.UNKNOWN, "Request is missing the method");
        }

        switch (method[0]) {
            case PairMethods.ADD_PAIRING: {
                const identifier = requireField(tlvData, TLVValues.IDENTIFIER);
                const publicKey = requireField(tlvData, TLVValues.PUBLIC_KEY);
                const permissions = requireField(tlvData, TLVValues.PERMISSIONS);

                if (permissions.length === 0) {
                    throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.UNKNOWN, "Empty permissions field");
                }

                let permission: PermissionTypes;
                try {
                    permission = permissionFromByte(permissions[0]);
                } catch (error) {
                    throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.UNKNOWN, String(error));
                }

                return {
                    method: PairMethods.ADD_PAIRING,
                    identifier: identifier,
                    publicKey: publicKey,
                    permission: permission,
                };
            }
            case PairMethods.REMOVE_PAIRING:
                return {
                    method: PairMethods.REMOVE_PAIRING,
                    identifier: requireField(tlvData, TLVValues.IDENTIFIER),
                };
            case PairMethods.LIST_PAIRINGS:
                return { method: PairMethods.LIST_PAIRINGS };
            default:
                throw new PairingsError(PairingsStep.UNKNOWN, TLVErrors.UNKNOWN, `Unsupported pairings method ${method[0]}`);
        }
    }

    /**
     * Authorizes and executes a parsed request.
     *
     * @returns the success container
     * @throws PairingsError
     */
    async handle(request: PairingsRequest, identity: ControllerIdentity): Promise<TLVContainer> {
        try {
            switch (request.method) {
                case PairMethods.ADD_PAIRING:
                    return await this.addPairing(request, identity);
                case PairMethods.REMOVE_PAIRING:
                    return await this.removePairing(request, identity);
                case PairMethods.LIST_PAIRINGS:
                    return await this.listPairings(identity);
            }
        } catch (error) {
            if (error instanceof PairingsError) {
                throw error;
            }

            debug("Failed to execute pairings request: %s", error);
            throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.UNKNOWN, String(error));
        }
    }

    private async addPairing(request: AddPairingRequest, identity: ControllerIdentity): Promise<TLVContainer> {
        debug("M1: Got Add Pairing Request");

        const id = await this.context.storage.exclusive(async store => {
            await this.ensureAdmin(store, identity);

            const pairingId = parsePairingId(request.identifier);
            const pairing = await store.load(pairingId);

            if (pairing) {
                if (!isValidPublicKey(pairing.publicKey) || !isValidPublicKey(request.publicKey)) {
                    throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.UNKNOWN, "Malformed long-term public key");
                }
                if (!pairing.publicKey.equals(request.publicKey)) {
                    // someone tries to take over an existing pairing id
                    throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.UNKNOWN, `Public key of ${pairingId} doesn't match the stored one`);
                }

                pairing.permission = request.permission;
                await store.save(pairing);
                debug("Updated permission of %s to %s", pairingId, PermissionTypes[request.permission]);
            } else {
                if (!isValidPublicKey(request.publicKey)) {
                    throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.UNKNOWN, "Malformed long-term public key");
                }

                const maxPeers = this.context.config.maxPeers();
                if (maxPeers !== undefined && await store.count() + 1 > maxPeers) {
                    throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.MAX_PEERS, `Reached the limit of ${maxPeers} pairings`);
                }

                const newPairing: Pairing = {
                    id: pairingId,
                    publicKey: Buffer.from(request.publicKey),
                    permission: request.permission,
                };
                await store.save(newPairing);
                debug("Added pairing %s with %s permissions", pairingId, PermissionTypes[request.permission]);
            }

            return pairingId;
        });

        await this.emit({ type: HAPEventTypes.CONTROLLER_PAIRED, id: id });

        debug("M2: Sending Add Pairing Response");
        return [tlv.item(TLVValues.STATE, HAPStates.M2)];
    }

    private async removePairing(request: RemovePairingRequest, identity: ControllerIdentity): Promise<TLVContainer> {
        debug("M1: Got Remove Pairing Request");

        const id = await this.context.storage.exclusive(async store => {
            await this.ensureAdmin(store, identity);

            const pairingId = parsePairingId(request.identifier);
            await store.delete(pairingId);
            debug("Removed pairing %s", pairingId);
            return pairingId;
        });

        await this.emit({ type: HAPEventTypes.CONTROLLER_UNPAIRED, id: id });

        debug("M2: Sending Remove Pairing Response");
        return [tlv.item(TLVValues.STATE, HAPStates.M2)];
    }

    private async listPairings(identity: ControllerIdentity): Promise<TLVContainer> {
        debug("M1: Got List Pairings Request");

        const pairings = await this.context.storage.exclusive(async store => {
            await this.ensureAdmin(store, identity);
            return store.list();
        });

        const container: TLVContainer = [tlv.item(TLVValues.STATE, HAPStates.M2)];
        for (const pairing of pairings) {
            // every entry is terminated by a separator, including the last one
            container.push(
                tlv.item(TLVValues.IDENTIFIER, pairing.id),
                tlv.item(TLVValues.PUBLIC_KEY, pairing.publicKey),
                tlv.item(TLVValues.PERMISSIONS, permissionToByte(pairing.permission)),
                tlv.separator(),
            );
        }

        debug("M2: Sending List Pairings Response with %d pairings", pairings.length);
        return container;
    }

    private async ensureAdmin(store: PairingStore, identity: ControllerIdentity): Promise<void> {
        const currentId = identity.current();
        const controllerId = currentId !== undefined ? uuid.parse(currentId) : undefined;
        if (!controllerId) {
            throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.AUTHENTICATION, "Session isn't authenticated");
        }

        const controller = await store.load(controllerId);
        if (!controller || controller.permission !== PermissionTypes.ADMIN) {
            throw new PairingsError(PairingsStep.RESPONSE, TLVErrors.AUTHENTICATION, `Controller ${controllerId} isn't an admin`);
        }
    }

    private emit(event: HAPEvent): Promise<void> {
        return this.context.events.exclusive(events => events.emit(event));
    }

}
