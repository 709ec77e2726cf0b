import createDebug from "debug";

const debug = createDebug("HTTP:RequestParser");

export enum ParsingState {
    HEAD,
    HEADERS,
    BODY,
}

export enum HTTPMethod {
    // noinspection JSUnusedGlobalSymbols
    GET = "GET",
    HEAD = "HEAD",
    POST = "POST",
    PUT = "PUT",
    DELETE = "DELETE",
    CONNECT = "CONNECT",
    OPTIONS = "OPTIONS",
    TRACE = "TRACE",
}

// header names are stored in lower case
export enum HTTPHeader {
    CONTENT_TYPE = "content-type",
    TRANSFER_ENCODING = "transfer-encoding",
    CONTENT_LENGTH = "content-length",
}

// 4xx or 5xx response must include an HAP status Code property
export enum HTTPStatus {
    // noinspection JSUnusedGlobalSymbols
    SUCCESS = 200,
    NO_CONTENT = 204,

    BAD_REQUEST = 400, // http client error (e.g. malformed request)
    NOT_FOUND = 404,
    METHOD_NOT_ALLOWED = 405,

    INTERNAL_SERVER_ERROR = 500,
}

export const HTTPStatusText: Record<HTTPStatus, string> = {
    [HTTPStatus.SUCCESS]: "OK",
    [HTTPStatus.NO_CONTENT]: "No Content",
    [HTTPStatus.BAD_REQUEST]: "Bad Request",
    [HTTPStatus.NOT_FOUND]: "Not Found",
    [HTTPStatus.METHOD_NOT_ALLOWED]: "Method Not Allowed",
    [HTTPStatus.INTERNAL_SERVER_ERROR]: "Internal Server Error",
};

export enum HTTPContentType {
    HAP_JSON = "application/hap+json",
    PAIRING_TLV8 = "application/pairing+tlv8",
}

export enum HTTPRoutes {
    // noinspection JSUnusedGlobalSymbols
    PAIRINGS = "/pairings",
}

export type HTTPRequest = {
    method: HTTPMethod,
    uri: string,
    version: string,

    headers: Record<string, string>,

    body: Buffer,
}

export type HTTPServerResponse = {
    status: HTTPStatus,
    contentType?: HTTPContentType,
    data?: Buffer,
    headers?: Record<string, string>,
}

/**
 * Incremental parser for HTTP/1.1 requests. Feed it with {@link appendData} and collect every request
 * which was received completely (including the whole body) with {@link parse}.
 */
export class HTTPRequestParser {

    private static readonly HTTP_HEADER_PATTERN = /^(GET|HEAD|POST|PUT|DELETE|CONNECT|OPTIONS|TRACE)\s+(\/\S*)\s+HTTP\/(\d+\.\d+)$/;

    private state: ParsingState = ParsingState.HEAD;

    private buffer: Buffer = Buffer.alloc(0);
    private readerIndex: number = 0;

    private method?: HTTPMethod;
    private uri = "";
    private version = "";
    private headers: Record<string, string> = {};
    private body: Buffer = Buffer.alloc(0);

    appendData(buffer: Buffer) {
        this.buffer = Buffer.concat([this.buffer, buffer]);
    }

    /**
     * @throws Error if the data doesn't form a valid http request
     */
    parse(): HTTPRequest[] {
        const finishedRequests: HTTPRequest[] = [];

        for (;;) {
            if (this.state === ParsingState.HEAD) {
                const head = this.readStringLine();
                if (head === null) {
                    return finishedRequests; // we couldn't finish parsing
                }

                const match = HTTPRequestParser.HTTP_HEADER_PATTERN.exec(head);
                if (!match) {
                    throw new Error("Unexpected http header format!");
                }

                this.method = HTTPRequestParser.toMethod(match[1]);
                this.uri = match[2];
                this.version = match[3];
                this.headers = {};

                debug("Successfully parsed HEAD '%s'", head);
                this.state = ParsingState.HEADERS;
            }

            if (this.state === ParsingState.HEADERS) {
                let headerLine: string | null;
                while ((headerLine = this.readStringLine())) {
                    const separatorIndex = headerLine.indexOf(":");
                    if (separatorIndex <= 0) {
                        throw new Error("Malformed http header line '" + headerLine + "'");
                    }

                    const name = headerLine.slice(0, separatorIndex).trim().toLowerCase();
                    this.headers[name] = headerLine.slice(separatorIndex + 1).trim();
                }

                if (headerLine === null) {
                    return finishedRequests; // we couldn't finish parsing
                }

                debug("found headers %o", this.headers);
                this.body = Buffer.alloc(0);
                this.state = ParsingState.BODY;
            }

            if (!this.readBody()) {
                return finishedRequests;
            }

            finishedRequests.push({
                method: this.method || HTTPMethod.GET,
                uri: this.uri,
                version: this.version,
                headers: this.headers,
                body: this.body,
            });

            // reset stuff
            this.buffer = this.buffer.slice(this.readerIndex, this.buffer.length); // drop read bytes
            this.readerIndex = 0;
            this.state = ParsingState.HEAD;
        }
    }

    private static toMethod(value: string): HTTPMethod {
        const method = Object.values(HTTPMethod).find(method => method === value);
        if (!method) {
            throw new Error("Unsupported http method " + value);
        }
        return method;
    }

    /**
     * @returns true if the body was read completely
     */
    private readBody(): boolean {
        const contentLength = this.headers[HTTPHeader.CONTENT_LENGTH];

        if (contentLength !== undefined) {
            const length = parseInt(contentLength, 10);
            if (isNaN(length) || length < 0) {
                throw new Error("Invalid content length '" + contentLength + "'");
            }

            const data = this.readFixedLengthBuffer(length);
            if (!data) {
                return false; // not enough data
            }

            this.body = data;
            return true;
        } else if (this.headers[HTTPHeader.TRANSFER_ENCODING] === "chunked") {
            for (;;) {
                const chunk = this.readChunk();
                if (chunk === null) {
                    return false; // we couldn't finish parsing
                }

                if (chunk.length === 0) { // we finished parsing
                    return true;
                }

                this.body = Buffer.concat([this.body, chunk]);
            }
        }

        return true; // request without body
    }

    private readLine(): Buffer | null {
        for (let i = this.readerIndex; i < this.buffer.length; i++) {
            if (this.buffer[i] === 0x0A) { // '\n'
                const endIndex = i > this.readerIndex && this.buffer[i - 1] === 0x0D ? i - 1 : i; // strip '\r'
                const line = this.buffer.slice(this.readerIndex, endIndex);
                this.readerIndex = i + 1;
                return line;
            }
        }

        return null;
    }

    private readStringLine(): string | null {
        const line = this.readLine();
        return line !== null ? line.toString() : null;
    }

    private readChunk(): Buffer | null {
        const oldReaderIndex = this.readerIndex;

        const size = this.readStringLine();
        if (size === null) {
            this.readerIndex = oldReaderIndex; // reset index to the state before we read the size
            return null; // indicates not enough data
        }

        const sizeInt = parseInt(size, 16);
        if (isNaN(sizeInt)) {
            throw new Error("Invalid chunk size '" + size + "'");
        }

        // every chunk (including the terminating zero length chunk) is followed by CRLF
        const chunk = this.readFixedLengthBuffer(sizeInt);
        const terminator = chunk !== null ? this.readLine() : null;
        if (chunk === null || terminator === null) {
            this.readerIndex = oldReaderIndex;
            return null;
        }

        return chunk;
    }

    private readFixedLengthBuffer(length: number): Buffer | null {
        if (this.readerIndex + length > this.buffer.length) {
            return null; // not enough data
        }

        const data = this.buffer.slice(this.readerIndex, this.readerIndex + length);
        this.readerIndex += length;
        return data;
    }

}
