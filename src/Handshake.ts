import { createHash } from "crypto";
import type { IncomingHttpHeaders } from "http";
import HandshakeError from "./HandshakeError.js";
import ResponseBuilder from "./ResponseBuilder.js";

const MAGIC_STRING = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";
const SUPPORTED_VERSIONS:readonly string[] = ["13", "8", "7"];

//an http.IncomingMessage satisfies this
export type RequestHead = {
    method?:string;
    url?:string;
    headers:IncomingHttpHeaders;
}

function headerValue(headers:IncomingHttpHeaders, name:string){
    const value = headers[name];
    if(value === undefined){
        return undefined;
    }
    return typeof value === "string" ? value : value.join(", ");
}

/**
 * Sec-WebSocket-Accept for a client key.
 */
export function hashKey(key:string){
    return createHash("sha1").update(key + MAGIC_STRING).digest("base64");
}

/**
 * Checks an upgrade request, throwing a HandshakeError for the first thing
 * that is wrong with it.
 */
export function verifyHandshake({method, headers}:RequestHead){

    if(method !== "GET"){
        throw new HandshakeError("GetMethodRequired");
    }

    const upgrade = headerValue(headers, "upgrade");
    if(upgrade === undefined || !upgrade.toLowerCase().includes("websocket")){
        throw new HandshakeError("NoWebsocketUpgrade");
    }

    //substring match, "keep-alive, Upgrade" and similar lists pass
    const connection = headerValue(headers, "connection");
    if(connection === undefined || !connection.toLowerCase().includes("upgrade")){
        throw new HandshakeError("NoConnectionUpgrade");
    }

    const version = headerValue(headers, "sec-websocket-version");
    if(version === undefined){
        throw new HandshakeError("NoVersionHeader");
    }
    if(!SUPPORTED_VERSIONS.includes(version)){
        throw new HandshakeError("UnsupportedVersion");
    }

    if(headerValue(headers, "sec-websocket-key") === undefined){
        throw new HandshakeError("BadWebsocketKey");
    }
}

/**
 * Builds the 101 response for a request that already passed verification.
 */
export function handshakeResponse({headers}:RequestHead){

    const key = headerValue(headers, "sec-websocket-key");
    if(key === undefined){
        throw new HandshakeError("BadWebsocketKey");
    }

    return new ResponseBuilder(101, "Switching Protocols")
        .header("Upgrade", "websocket")
        .header("Connection", "upgrade")
        .header("Sec-WebSocket-Accept", hashKey(key));
}

export function handshake(request:RequestHead){
    verifyHandshake(request);
    return handshakeResponse(request);
}
