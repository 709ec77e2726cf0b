import crypto from "crypto";

export namespace uuid {

    const VALID_UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
    const SIMPLE_UUID_REGEX = /^[0-9a-f]{32}$/i;

    // http://stackoverflow.com/a/25951500/66673
    export function generate(data: string | Buffer): string {
        const sha1sum = crypto.createHash("sha1");
        sha1sum.update(data);
        const s = sha1sum.digest("hex");
        let i = -1;
        return "xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx".replace(/[xy]/g, (c: string) => {
            i += 1;
            switch (c) {
                case "y":
                    return ((parseInt("0x" + s[i], 16) & 0x3) | 0x8).toString(16);
                case "x":
                default:
                    return s[i];
            }
        });
    }

    export function isValid(value: string): boolean {
        return VALID_UUID_REGEX.test(value);
    }

    /**
     * Parses the hyphenated, simple (32 hex digits), braced and urn forms of an uuid.
     *
     * @returns the canonical lower case hyphenated representation or undefined if the input isn't an uuid
     */
    export function parse(value: string): string | undefined {
        let stripped = value;
        if (stripped.toLowerCase().startsWith("urn:uuid:")) {
            stripped = stripped.slice("urn:uuid:".length);
        } else if (stripped.startsWith("{") && stripped.endsWith("}")) {
            stripped = stripped.slice(1, -1);
        }

        if (SIMPLE_UUID_REGEX.test(stripped)) {
            stripped = stripped.slice(0, 8) + "-" + stripped.slice(8, 12) + "-" + stripped.slice(12, 16)
                + "-" + stripped.slice(16, 20) + "-" + stripped.slice(20);
        }

        return isValid(stripped) ? stripped.toLowerCase() : undefined;
    }

}
