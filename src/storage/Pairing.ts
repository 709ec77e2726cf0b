import {UnknownPermissionError} from "../errors";

export enum PermissionTypes {
    // noinspection JSUnusedGlobalSymbols
    USER = 0x00,
    ADMIN = 0x01, // admins are the only ones who can add/remove/list pairings
}

export type Pairing = {
    id: string, // canonical lower case hyphenated uuid of the controller
    publicKey: Buffer, // ed25519 long-term public key
    permission: PermissionTypes,
}

export function permissionFromByte(value: number): PermissionTypes {
    switch (value) {
        case PermissionTypes.USER:
            return PermissionTypes.USER;
        case PermissionTypes.ADMIN:
            return PermissionTypes.ADMIN;
        default:
            throw new UnknownPermissionError(value);
    }
}

export function permissionToByte(permission: PermissionTypes): number {
    return permission;
}
