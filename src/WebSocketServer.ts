import EventEmitter from "events";
import { createServer } from "http";
import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import Dispatcher, { validateDispatcherOptions } from "./Dispatcher.js";
import type { DispatcherOptions } from "./Dispatcher.js";
import { handshake } from "./Handshake.js";
import HandshakeError from "./HandshakeError.js";
import type { CloseReason } from "./Message.js";
import ResponseBuilder from "./ResponseBuilder.js";
import { CloseCode } from "./utils/CloseCode.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("server");

export type WebSocketServerOptions = {
    //server to attach to; a plain http server is created otherwise
    server?:Server;
    port?:number;
    path?:string;
    allowOrigin?:string[];
    maxConnections?:number;
    handleSubprotocols?:(subprotocols:string[]) => string;
    connection?:DispatcherOptions;
};

declare interface WebSocketServer{
    on(event: "listening", listener: () => void): this;
    on(event: "connection", listener: (connection:Dispatcher, request:IncomingMessage) => void): this;
    on(event: "error", listener: (error:Error) => void): this;
    on(event: string, listener: Function): this;
}

function writeResponse(socket:Duplex, response:ResponseBuilder){
    response.header("Connection", "close");
    socket.end(response.toBuffer());
}

class WebSocketServer extends EventEmitter{

    readonly connections:Set<Dispatcher>;
    readonly maxConnections:number|undefined;
    readonly path:string;
    readonly allowOrigin:string[]|undefined;
    #server:Server;
    #ownsServer:boolean;
    #connectionOptions:DispatcherOptions;
    #handleSubprotocols:(subprotocols:string[]) => string;

    constructor({server, port, path = "/", allowOrigin, maxConnections, handleSubprotocols, connection = {}}:WebSocketServerOptions = {}){
        super();
        if(maxConnections != null && (!Number.isInteger(maxConnections) || maxConnections < 1)){
            throw new RangeError("maxConnections must be a positive integer");
        }
        //checked here so a bad setting never reaches a client that already got 101
        validateDispatcherOptions(connection);
        this.connections = new Set();
        this.path = path;
        this.allowOrigin = allowOrigin;
        this.maxConnections = maxConnections;
        this.#connectionOptions = connection;
        this.#handleSubprotocols = handleSubprotocols ?? (() => "");

        this.#ownsServer = server === undefined;
        this.#server = server ?? createServer((req, res) => {
            res.writeHead(426, {"Upgrade":"websocket", "Connection":"close"});
            res.end();
        });
        this.#server.on("upgrade", (req:IncomingMessage, socket:Duplex, head:Buffer) => this.handleUpgrade(req, socket, head));
        this.#server.on("error", (err) => this.emit("error", err));
        this.#server.on("listening", () => this.emit("listening"));

        if(port != null){
            this.#server.listen(port);
        }
    }

    get server(){
        return this.#server;
    }

    /**
     * Answers an upgrade request. On success the socket is wrapped in a
     * Dispatcher and announced with a "connection" event.
     */
    handleUpgrade(req:IncomingMessage, socket:Duplex, head:Buffer = Buffer.alloc(0)){

        if(this.maxConnections != null && this.connections.size >= this.maxConnections){
            writeResponse(socket, new ResponseBuilder(503, "Service Unavailable"));
            return null;
        }

        const url = new URL(req.url ?? "/", "http://localhost");
        if(url.pathname !== this.path){
            writeResponse(socket, new ResponseBuilder(404, "Not Found"));
            return null;
        }

        const origin = req.headers["origin"];
        if(this.allowOrigin && (origin === undefined || !this.allowOrigin.includes(origin))){
            writeResponse(socket, new ResponseBuilder(403, "Forbidden"));
            return null;
        }

        let response:ResponseBuilder;
        try{
            response = handshake(req);
        }catch(error){
            if(error instanceof HandshakeError){
                log.info("rejected upgrade:", error.message);
                writeResponse(socket, error.toResponse());
                return null;
            }
            throw error;
        }

        const subprotocols = req.headers["sec-websocket-protocol"]
            ?.split(",")
            .map((subprotocol) => subprotocol.trim())
            .filter((subprotocol) => subprotocol !== "") ?? [];
        const subprotocol = subprotocols.length > 0 ? this.#handleSubprotocols(subprotocols) : "";
        if(subprotocol !== ""){
            response.header("Sec-WebSocket-Protocol", subprotocol);
        }

        socket.write(response.toString());
        if(head.byteLength > 0){
            socket.unshift(head);
        }

        const connection = new Dispatcher(socket, this.#connectionOptions);
        this.connections.add(connection);
        log.info("add new websocket, rest of all:", this.connections.size);

        connection.on("close", () => {
            this.connections.delete(connection);
            log.info("remove websocket, rest of all:", this.connections.size);
        });
        this.emit("connection", connection, req);
        return connection;
    }

    /**
     * Closes every open connection, then the HTTP server if this instance
     * created it.
     */
    async close(reason:CloseReason = {code:CloseCode.GOING_AWAY}){

        const closing = [...this.connections].map((connection) =>
            connection.close(reason).catch((error:unknown) => {
                log.debug("close failed, terminating:", error);
                connection.terminate();
            })
        );
        await Promise.all(closing);

        if(this.#ownsServer && this.#server.listening){
            await new Promise<void>((resolve, reject) => {
                this.#server.close((err) => err ? reject(err) : resolve());
            });
        }
    }

}

export default WebSocketServer;
