import ResponseBuilder from "./ResponseBuilder.js";

export type HandshakeErrorKind =
| "GetMethodRequired"
| "NoWebsocketUpgrade"
| "NoConnectionUpgrade"
| "NoVersionHeader"
| "UnsupportedVersion"
| "BadWebsocketKey"

const MESSAGES:Record<HandshakeErrorKind, string> = {
    GetMethodRequired:"Method not allowed",
    NoWebsocketUpgrade:"WebSocket upgrade is expected",
    NoConnectionUpgrade:"Connection upgrade is expected",
    NoVersionHeader:"WebSocket version header is required",
    UnsupportedVersion:"Unsupported WebSocket version",
    BadWebsocketKey:"Unknown websocket key",
};

const REASON_PHRASES:Record<Exclude<HandshakeErrorKind, "GetMethodRequired">, string> = {
    NoWebsocketUpgrade:"No WebSocket Upgrade header found",
    NoConnectionUpgrade:"No Connection upgrade",
    NoVersionHeader:"WebSocket version header is required",
    UnsupportedVersion:"Unsupported WebSocket version",
    BadWebsocketKey:"Handshake error",
};

/**
 * The upgrade request was not a valid opening handshake. The connection stays
 * plain HTTP and the client gets the response from `toResponse()`.
 */
class HandshakeError extends Error{

    readonly kind:HandshakeErrorKind;

    constructor(kind:HandshakeErrorKind){
        super(MESSAGES[kind]);
        this.name = "HandshakeError";
        this.kind = kind;
    }

    get status(){
        return this.kind === "GetMethodRequired" ? 405 : 400;
    }

    toResponse(){
        if(this.kind === "GetMethodRequired"){
            return new ResponseBuilder(405, "Method Not Allowed").header("Allow", "GET");
        }
        return new ResponseBuilder(400, REASON_PHRASES[this.kind]);
    }
}

export default HandshakeError;
