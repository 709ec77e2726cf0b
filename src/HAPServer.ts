import net, {Server, Socket} from "net";
import {EventEmitter} from "events";
import createDebug from "debug";
import {
    HTTPContentType,
    HTTPMethod,
    HTTPRequest,
    HTTPRequestParser,
    HTTPRoutes,
    HTTPServerResponse,
    HTTPStatus,
    HTTPStatusText,
} from "./lib/http-protocol";
import * as tlv from "./utils/tlv";
import {uuid} from "./utils/uuid";
import {HAPStatusCode, TLVErrors, TLVValues} from "./types/hap";
import {ControllerIdentity, PairingsHandler} from "./PairingsHandler";
import {EventDispatcher, EventSink, HAPEvent, HAPEventTypes} from "./lib/EventDispatcher";
import {SharedResource} from "./lib/SharedResource";
import {PairingStore} from "./storage/PairingStore";
import {Config} from "./Config";

const debug = createDebug("HAPServer");
const debugCon = createDebug("HAPServer:Connection");

export type HTTPRequestHandler = (connection: HAPServerConnection, request: HTTPRequest) => Promise<HTTPServerResponse>;

const NOT_FOUND_HANDLER: HTTPRequestHandler = () => Promise.resolve({
    status: HTTPStatus.NOT_FOUND,
    contentType: HTTPContentType.HAP_JSON,
    data: Buffer.from(JSON.stringify({ status: HAPStatusCode.RESOURCE_DOES_NOT_EXIST })),
});

export enum HAPServerEvents {
    LISTENING = "listening",
    CONNECTION = "connection",
}

export declare interface HAPServer {
    on(event: HAPServerEvents.LISTENING, listener: (port: number) => void): this;
    on(event: HAPServerEvents.CONNECTION, listener: (connection: HAPServerConnection) => void): this;

    emit(event: HAPServerEvents.LISTENING, port: number): boolean;
    emit(event: HAPServerEvents.CONNECTION, connection: HAPServerConnection): boolean;
}

/**
 * Accessory server exposing the /pairings endpoint.
 *
 * Pair-setup, pair-verify and the session encryption are provided by other layers; whoever verifies a
 * session marks the connection with {@link HAPServerConnection.authenticate}.
 */
export class HAPServer extends EventEmitter {

    private readonly config: Config;
    private readonly pairingsHandler: PairingsHandler;

    private readonly tcpServer: Server;
    private connections: HAPServerConnection[] = [];

    private readonly routeHandlers: Record<HTTPRoutes, HTTPRequestHandler> = {
        [HTTPRoutes.PAIRINGS]: this.handlePairings.bind(this),
    };

    constructor(config: Config, store: PairingStore, events: EventDispatcher = new EventDispatcher()) {
        super();
        this.config = config;

        events.addListener(this.handleEvent.bind(this));

        this.pairingsHandler = new PairingsHandler({
            storage: new SharedResource<PairingStore>(store),
            events: new SharedResource<EventSink>(events),
            config: config,
        });

        this.tcpServer = net.createServer();
        this.tcpServer.on("connection", this.handleConnection.bind(this));
        this.tcpServer.on("error", error => debug("Server error: %s", error.stack));
    }

    /**
     * @returns the port the server is bound to
     */
    listen(targetPort: number = this.config.port, host?: string): Promise<number> {
        return new Promise((resolve, reject) => {
            const errorListener = (error: Error) => reject(error);
            this.tcpServer.once("error", errorListener);

            this.tcpServer.listen(targetPort, host, () => {
                this.tcpServer.removeListener("error", errorListener);

                const address = this.tcpServer.address();
                const port = address && typeof address !== "string" ? address.port : targetPort;
                debug("Server listening on port %s", port);

                this.emit(HAPServerEvents.LISTENING, port);
                resolve(port);
            });
        });
    }

    stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.tcpServer.close(error => error ? reject(error) : resolve());
            this.connections.forEach(connection => connection.disconnect());
        });
    }

    private handleConnection(socket: Socket) {
        const connection = new HAPServerConnection(socket, this.routeHandlers, this.config.insecureController);
        connection.on(HAPServerConnectionEvents.DISCONNECTED, this.handleConnectionClosed.bind(this, connection));

        this.connections.push(connection);

        debug("Received new connection on %s!", connection.remoteAddress);

        this.emit(HAPServerEvents.CONNECTION, connection);
    }

    private handleConnectionClosed(connection: HAPServerConnection) {
        debug("Connection disconnected %s!", connection.remoteAddress);

        const index = this.connections.indexOf(connection);
        if (index >= 0) {
            this.connections.splice(index, 1);
        }
    }

    private handleEvent(event: HAPEvent) {
        if (event.type !== HAPEventTypes.CONTROLLER_UNPAIRED) {
            return;
        }

        this.connections.forEach(connection => {
            const controllerId = connection.current();
            // event ids are canonical, the session may carry any accepted uuid form
            if (controllerId === undefined || uuid.parse(controllerId) !== event.id) {
                return;
            }

            // the session which removed its own pairing is only closed after it received the response
            debug("Closing connection %s of unpaired controller %s", connection.remoteAddress, event.id);
            connection.disconnectAfterWrite();
        });
    }

    private async handlePairings(connection: HAPServerConnection, request: HTTPRequest): Promise<HTTPServerResponse> {
        if (request.method !== HTTPMethod.POST) {
            return {
                status: HTTPStatus.METHOD_NOT_ALLOWED,
                contentType: HTTPContentType.HAP_JSON,
                data: Buffer.from(JSON.stringify({ status: HAPStatusCode.INVALID_VALUE_IN_REQUEST })),
            };
        }

        const data = await this.pairingsHandler.process(request.body, connection);
        // protocol errors are transported inside the tlv body
        return {
            status: HTTPStatus.SUCCESS,
            contentType: HTTPContentType.PAIRING_TLV8,
            data: data,
        };
    }

}

export enum HAPServerConnectionEvents {
    DISCONNECTED = "disconnected",
}

export declare interface HAPServerConnection {
    on(event: HAPServerConnectionEvents.DISCONNECTED, listener: () => void): this;

    emit(event: HAPServerConnectionEvents.DISCONNECTED): boolean;
}

export class HAPServerConnection extends EventEmitter implements ControllerIdentity {

    private readonly socket: Socket;
    private readonly parser: HTTPRequestParser;

    private readonly routeHandler: Record<HTTPRoutes, HTTPRequestHandler>;

    readonly sessionID: string;
    readonly remoteAddress: string;

    private clientId?: string;

    private processingRequest: boolean = false;
    private disconnectAfterResponse: boolean = false;
    private socketClosed: boolean = false;

    private httpWorkingQueue: Promise<void> = Promise.resolve();

    constructor(socket: Socket, routeHandler: Record<HTTPRoutes, HTTPRequestHandler>, clientId?: string) {
        super();
        this.socket = socket;
        this.socket.on("data", this.handleData.bind(this));
        this.socket.on("close", this.handleClose.bind(this));
        this.socket.on("error", this.handleError.bind(this));
        this.parser = new HTTPRequestParser();

        this.routeHandler = routeHandler;
        this.clientId = clientId;

        this.remoteAddress = this.socket.remoteAddress + ":" + this.socket.remotePort;
        this.sessionID = uuid.generate(this.remoteAddress);
        this.socket.setNoDelay(true);
    }

    /**
     * Called once the controller of this session was verified.
     */
    authenticate(controllerId: string) {
        debugCon("Session %s authenticated as %s", this.sessionID, controllerId);
        this.clientId = controllerId;
    }

    current(): string | undefined {
        return this.clientId;
    }

    disconnect() {
        if (this.socketClosed) {
            return;
        }

        this.clientId = undefined;
        this.socketClosed = true;
        this.socket.end();
    }

    disconnectAfterWrite() {
        if (this.processingRequest) {
            this.disconnectAfterResponse = true;
        } else {
            this.disconnect();
        }
    }

    private handleData(data: Buffer) {
        if (this.socketClosed) {
            return;
        }

        this.parser.appendData(data);

        let requests: HTTPRequest[];
        try {
            requests = this.parser.parse();
        } catch (error) {
            debugCon("Received malformed http request from %s: %s", this.remoteAddress, error);
            this.httpWorkingQueue = this.httpWorkingQueue.then(() => {
                this.sendResponse({ status: HTTPStatus.BAD_REQUEST });
                this.disconnect();
            });
            return;
        }

        requests.forEach(request => {
            const route = Object.values(HTTPRoutes).find(value => value === request.uri.split("?")[0]);
            const requestHandler = route ? this.routeHandler[route] : NOT_FOUND_HANDLER;

            this.httpWorkingQueue = this.httpWorkingQueue
                .then(() => {
                    this.processingRequest = true;
                    return requestHandler(this, request);
                })
                .catch(reason => {
                    debugCon("Encountered error when handling response: %s", reason);

                    const response: HTTPServerResponse = {
                        status: HTTPStatus.SUCCESS,
                        contentType: HTTPContentType.PAIRING_TLV8,
                        data: tlv.encode(TLVValues.ERROR, TLVErrors.UNKNOWN),
                    };
                    return response;
                })
                .then(response => this.sendResponse(response))
                .catch(error => debugCon("Failed to send http response to %s: %s", this.remoteAddress, error));
        });
    }

    private sendResponse(response: HTTPServerResponse) {
        this.processingRequest = false;

        if (this.socketClosed) {
            debugCon("Dropping http response for %s as the socket is already closed", this.remoteAddress);
            return;
        }

        const data = response.data || Buffer.alloc(0);

        const headers: Record<string, string> = response.headers || {};
        if (response.contentType && data.length > 0) {
            headers["Content-Type"] = response.contentType;
        }
        headers["Content-Length"] = data.length + "";

        const responseBuf = Buffer.concat([
            Buffer.from(
                `HTTP/1.1 ${response.status} ${HTTPStatusText[response.status]}\r\n` +
                Object.keys(headers).reduce((acc: string, header: string) => {
                    return acc + `${header}: ${headers[header]}\r\n`;
                }, "") +
                `\r\n` // additional newline before content
            ),
            data,
        ]);

        this.socket.write(responseBuf);

        if (this.disconnectAfterResponse) {
            this.disconnectAfterResponse = false;
            this.disconnect();
        }
    }

    private handleClose() {
        this.socketClosed = true;
        this.emit(HAPServerConnectionEvents.DISCONNECTED);
    }

    private handleError(error: Error) {
        debugCon("Socket error on %s: %s", this.remoteAddress, error.stack);
    }

}
