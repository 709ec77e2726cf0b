export enum TLVValues {
    // noinspection JSUnusedGlobalSymbols
    METHOD = 0x00,
    IDENTIFIER = 0x01,
    SALT = 0x02,
    PUBLIC_KEY = 0x03,
    PASSWORD_PROOF = 0x04,
    ENCRYPTED_DATA = 0x05,
    STATE = 0x06,
    ERROR = 0x07,
    RETRY_DELAY = 0x08,
    CERTIFICATE = 0x09, // x.509 certificate
    SIGNATURE = 0x0A,  // ed25519
    PERMISSIONS = 0x0B, // None (0x00): regular user, 0x01: Admin (able to add/remove/list pairings)
    FRAGMENT_DATA = 0x0C,
    FRAGMENT_LAST = 0x0D,
    PAIRING_FLAGS = 0x13,
    SEPARATOR = 0xFF, // Zero-length TLV that separates different TLVs in a list.
}

export enum PairMethods {
    // noinspection JSUnusedGlobalSymbols
    PAIR_SETUP = 0x00,
    PAIR_SETUP_WITH_AUTH = 0x01,
    PAIR_VERIFY = 0x02,
    ADD_PAIRING = 0x03,
    REMOVE_PAIRING = 0x04,
    LIST_PAIRINGS = 0x05,
}

export enum HAPStates {
    M1 = 0x01,
    M2 = 0x02,
}

/**
 * The step reported in the STATE field of an error container.
 * Requests which couldn't even be dispatched to a method report {@link UNKNOWN}.
 */
export enum PairingsStep {
    UNKNOWN = 0x00,
    RESPONSE = HAPStates.M2,
}

export enum TLVErrors {
    // noinspection JSUnusedGlobalSymbols
    UNKNOWN = 0x01,
    AUTHENTICATION = 0x02, // setup code or signature verification failed
    BACKOFF = 0x03, // client must look at retry delay tlv item
    MAX_PEERS = 0x04, // server cannot accept any more pairings
    MAX_TRIES = 0x05, // server reached maximum number of authentication attempts
    UNAVAILABLE = 0x06, // server pairing method is unavailable
    BUSY = 0x07, // cannot accept pairing request at this time
}

// noinspection JSUnusedGlobalSymbols
export enum HAPStatusCode { // body includes it if http status code is 4xx or 5xx
    SUCCESS = 0,
    INSUFFICIENT_PRIVILEGES = -70401,
    SERVICE_COMMUNICATION_FAILURE = -70402,
    RESOURCE_BUSY = -70403,
    RESOURCE_DOES_NOT_EXIST = -70409,
    INVALID_VALUE_IN_REQUEST = -70410,
}
