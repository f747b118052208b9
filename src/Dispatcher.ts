import EventEmitter from "events";
import { Readable } from "stream";
import type { Duplex } from "stream";
import ConnectionClosedError from "./ConnectionClosedError.js";
import ContinuationAssembler, { DEFAULT_MAX_MESSAGE_SIZE } from "./ContinuationAssembler.js";
import type { Frame } from "./Frame.js";
import type { CloseReason, ContinuationItem, Message } from "./Message.js";
import { checkSizeLimit, DEFAULT_MAX_FRAME_SIZE, MAX_CONTROL_FRAME_PAYLOAD_SIZE } from "./Parser.js";
import ProtocolError from "./ProtocolError.js";
import Receiver from "./Receiver.js";
import Sender from "./Sender.js";
import { CloseCode, isValidCloseCode } from "./utils/CloseCode.js";
import { createClosePayload, MAX_CLOSE_DESCRIPTION_SIZE, truncateDescription } from "./utils/closePayload.js";
import createFrame from "./utils/createFrame.js";
import { createLogger } from "./utils/logger.js";
import Opcode from "./utils/Opcode.js";

const DEFAULT_CLOSE_TIMEOUT = 1000;
const DEFAULT_HIGH_WATER_MARK = 16;

const log = createLogger("dispatcher");

export enum State {
    OPEN = 1,
    CLOSING = 2,
    CLOSED = 3
}

export type Role = "server" | "client";

export type CloseInitiator = "local" | "remote";

export type DispatcherOptions = {
    role?:Role;
    maxFrameSize?:number;
    maxMessageSize?:number;
    //how long to wait for the peer's Close after sending ours
    closeTimeout?:number;
    autoPong?:boolean;
    rawFragments?:boolean;
    //inbound messages buffered before the transport is paused
    highWaterMark?:number;
}

type OutboundMessage = Exclude<Message, {type:"close"} | {type:"nop"}>;

declare interface Dispatcher {
    on(event: "close", listener: (code:number, description:string) => void): this;
    on(event: "ping", listener: (payload:Buffer) => void): this;
    on(event: "pong", listener: (payload:Buffer) => void): this;
    on(event: string, listener: Function): this;
}

/**
 * Range-checks connection options up front, so a server can refuse bad
 * settings before it accepts anyone.
 */
export function validateDispatcherOptions({maxFrameSize, maxMessageSize, closeTimeout, highWaterMark}:DispatcherOptions){
    if(maxFrameSize !== undefined){
        checkSizeLimit("Max frame size", maxFrameSize);
    }
    if(maxMessageSize !== undefined){
        checkSizeLimit("Max message size", maxMessageSize);
    }
    if(closeTimeout !== undefined && (!Number.isFinite(closeTimeout) || closeTimeout < 0)){
        throw new RangeError("closeTimeout must be a non-negative number of milliseconds");
    }
    if(highWaterMark !== undefined && (!Number.isInteger(highWaterMark) || highWaterMark < 1)){
        throw new RangeError("highWaterMark must be a positive integer");
    }
}

function continuationFrame({kind, data}:ContinuationItem):Frame{
    switch(kind){
        case "firstText":
            return createFrame({isFinished:false, opcode:Opcode.TEXT, payload:data});
        case "firstBinary":
            return createFrame({isFinished:false, opcode:Opcode.BINARY, payload:data});
        case "continue":
            return createFrame({isFinished:false, opcode:Opcode.CONTINUATION, payload:data});
        case "last":
            return createFrame({opcode:Opcode.CONTINUATION, payload:data});
    }
}

function toFrame(message:OutboundMessage):Frame{
    switch(message.type){
        case "text":
            return createFrame({opcode:Opcode.TEXT, payload:Buffer.from(message.data, "utf8")});
        case "binary":
            return createFrame({opcode:Opcode.BINARY, payload:message.data});
        case "continuation":
            return continuationFrame(message.item);
        case "ping":
            return createFrame({opcode:Opcode.PING, payload:message.data});
        case "pong":
            return createFrame({opcode:Opcode.PONG, payload:message.data});
    }
}

function closeFrame(reason?:CloseReason|null){
    return createFrame({opcode:Opcode.CLOSE, payload:createClosePayload(reason)});
}

/**
 * Runs one upgraded connection: decodes what the transport delivers into
 * messages, encodes what the application sends, and carries out the close
 * handshake. Inbound messages are read with `for await`.
 */
class Dispatcher extends EventEmitter implements AsyncIterable<Message> {

    #state = State.OPEN;
    #closeInitiator:CloseInitiator|null = null;
    #closeReason:CloseReason|null = null;
    #role:Role;

    #transport:Duplex;
    #receiver:Receiver;
    #sender:Sender;
    #assembler:ContinuationAssembler;
    #messages:Readable;

    #autoPong:boolean;
    #closeTimeout:number;
    #closeTimer?:NodeJS.Timeout;
    //an outbound fragmented message has been started and not finished
    #sendingFragments = false;

    constructor(transport:Duplex, options:DispatcherOptions = {}){
        super();
        validateDispatcherOptions(options);
        const {
            role = "server",
            maxFrameSize = DEFAULT_MAX_FRAME_SIZE,
            maxMessageSize = DEFAULT_MAX_MESSAGE_SIZE,
            closeTimeout = DEFAULT_CLOSE_TIMEOUT,
            autoPong = true,
            rawFragments = false,
            highWaterMark = DEFAULT_HIGH_WATER_MARK,
        } = options;

        this.#role = role;
        this.#transport = transport;
        this.#autoPong = autoPong;
        this.#closeTimeout = closeTimeout;

        this.#receiver = new Receiver({mustBeMasked:role === "server", maxFrameSize});
        this.#sender = new Sender({mask:role === "client"});
        this.#assembler = new ContinuationAssembler({maxMessageSize, rawFragments});
        this.#messages = new Readable({
            objectMode:true,
            highWaterMark,
            read:() => this.#resumeInbound(),
        });
        //leaving `for await` destroys the message stream; nobody reads anymore
        this.#messages.on("close", () => this.#messagesAbandoned());

        this.#sender.pipe(transport);
        transport.pipe(this.#receiver);

        this.#receiver.on("data", (frame) => this.#receiveFrame(frame));
        this.#receiver.on("error", (error) => {
            this.#fail(error instanceof ProtocolError ? error : ProtocolError.io(error));
        });
        this.#receiver.on("end", () => this.#abort(new Error("Transport ended before the close handshake")));
        this.#sender.on("error", (error) => this.#abort(error));
        transport.on("error", (error:Error) => this.#abort(error));
        transport.on("close", () => {
            //after a clean end the receiver drains its frames and reports "end" itself
            if(!transport.readableEnded){
                this.#abort(new Error("Transport closed before the close handshake"));
            }
        });
    }

    get state(){
        return this.#state;
    }

    get closeInitiator(){
        return this.#closeInitiator;
    }

    get closeReason(){
        return this.#closeReason;
    }

    get role(){
        return this.#role;
    }

    [Symbol.asyncIterator]():AsyncIterator<Message>{
        return this.#messages[Symbol.asyncIterator]();
    }

    send(message:Message):Promise<void>{

        if(message.type === "close"){
            return this.close(message.reason);
        }
        if(this.#state !== State.OPEN){
            return Promise.reject(new ConnectionClosedError());
        }
        if(message.type === "nop"){
            return Promise.resolve();
        }
        if((message.type === "ping" || message.type === "pong") && message.data.byteLength > MAX_CONTROL_FRAME_PAYLOAD_SIZE){
            return Promise.reject(new RangeError(`Control frame payload must not exceed ${MAX_CONTROL_FRAME_PAYLOAD_SIZE} bytes`));
        }

        const fragmentError = this.#trackFragments(message);
        if(fragmentError !== null){
            return Promise.reject(fragmentError);
        }

        return this.#write(toFrame(message));
    }

    ping(payload = Buffer.alloc(0)){
        return this.send({type:"ping", data:payload});
    }

    pong(payload = Buffer.alloc(0)){
        return this.send({type:"pong", data:payload});
    }

    /**
     * Starts the close handshake. Resolves once the Close frame is written;
     * the "close" event fires when the peer answers or `closeTimeout` runs out.
     */
    close(reason?:CloseReason|null):Promise<void>{

        if(this.#state !== State.OPEN){
            return Promise.reject(new ConnectionClosedError("Cannot send close frame when state is not OPEN"));
        }
        if(reason != null){
            if(!isValidCloseCode(reason.code)){
                return Promise.reject(new RangeError(`Code ${reason.code} cannot be sent in a close frame`));
            }
            if(Buffer.byteLength(reason.description ?? "") > MAX_CLOSE_DESCRIPTION_SIZE){
                return Promise.reject(new RangeError(`Length of reason must not be greater than ${MAX_CLOSE_DESCRIPTION_SIZE} bytes`));
            }
        }

        this.#state = State.CLOSING;
        this.#closeInitiator = "local";
        log.debug("closing handshake started", reason ?? "");

        this.#closeTimer = setTimeout(() => {
            log.warn("no close frame from peer, closing transport");
            this.#closeReason = {code:CloseCode.ABNORMAL_CLOSURE, description:"Close handshake timed out"};
            this.#finish(this.#closeReason);
        }, this.#closeTimeout);

        return new Promise<void>((resolve, reject) => {
            this.#sender.write(closeFrame(reason), (err) => err ? reject(err) : resolve());
            this.#sender.end();
        });
    }

    /**
     * Drops the connection without a close handshake.
     */
    terminate(){
        if(this.#state === State.CLOSED){
            return;
        }
        this.#closeReason = {code:CloseCode.ABNORMAL_CLOSURE, description:"Connection terminated"};
        this.#finish(this.#closeReason);
        this.#transport.destroy();
    }

    #trackFragments(message:OutboundMessage):Error|null{

        if(message.type === "continuation"){
            const starts = message.item.kind === "firstText" || message.item.kind === "firstBinary";
            if(starts === this.#sendingFragments){
                return new Error(starts ? "A fragmented message is already being sent" : "No fragmented message has been started");
            }
            this.#sendingFragments = message.item.kind !== "last";
            return null;
        }
        if((message.type === "text" || message.type === "binary") && this.#sendingFragments){
            return new Error("Cannot send a message while a fragmented message is unfinished");
        }
        return null;
    }

    #write(frame:Frame){
        return new Promise<void>((resolve, reject) => {
            this.#sender.write(frame, (err) => err ? reject(err) : resolve());
        });
    }

    #receiveFrame(frame:Frame){

        if(this.#state === State.CLOSED){
            return;
        }

        let message:Message|null;
        try{
            message = this.#assembler.consume(frame);
        }catch(error){
            if(error instanceof ProtocolError){
                this.#fail(error);
                return;
            }
            throw error;
        }

        if(message === null){
            return;
        }

        switch(message.type){
            case "ping":
                this.emit("ping", message.data);
                if(this.#autoPong){
                    if(this.#state === State.OPEN){
                        this.#writeControl(createFrame({opcode:Opcode.PONG, payload:message.data}));
                    }
                    return;
                }
                break;
            case "pong":
                this.emit("pong", message.data);
                break;
            case "close":
                this.#receiveClose(message.reason);
                return;
        }

        this.#deliver(message);
    }

    #receiveClose(reason:CloseReason|null){

        this.#closeReason = reason;
        this.#deliver({type:"close", reason});

        if(this.#state === State.OPEN){
            this.#state = State.CLOSING;
            this.#closeInitiator = "remote";
            log.debug("peer started closing handshake", reason ?? "");
            this.#sender.end(closeFrame({code:reason?.code ?? CloseCode.NORMAL}));
        }

        this.#finish(reason ?? {code:CloseCode.NO_STATUS});
    }

    #fail(error:ProtocolError){

        if(this.#state === State.CLOSED){
            return;
        }
        log.warn("protocol error:", error.reason);

        const reason:CloseReason = {code:error.code, description:truncateDescription(error.reason)};
        if(error.detail.type !== "Io" && !this.#sender.writableEnded){
            this.#sender.end(closeFrame(reason));
        }

        this.#closeReason = reason;
        this.#deliver({type:"close", reason});
        this.#finish(reason);
    }

    #abort(error:Error){

        if(this.#state === State.CLOSED){
            return;
        }
        log.warn("transport failure:", error.message);

        const reason:CloseReason = {code:CloseCode.ABNORMAL_CLOSURE, description:error.message};
        this.#closeReason = reason;
        this.#deliver({type:"close", reason});
        this.#finish(reason);
        this.#transport.destroy();
    }

    #messagesAbandoned(){
        if(this.#state === State.CLOSED){
            return;
        }
        //it may have been paused for a reader that is now gone
        this.#receiver.resume();
        if(this.#state !== State.OPEN){
            return;
        }
        log.debug("message stream closed by the application, going away");
        this.close({code:CloseCode.GOING_AWAY}).catch((err:unknown) => {
            log.warn("close after the message stream ended failed:", err);
            this.terminate();
        });
    }

    #finish({code, description = ""}:CloseReason){

        this.#state = State.CLOSED;
        clearTimeout(this.#closeTimer);
        this.#assembler.reset();
        if(!this.#messages.destroyed){
            this.#messages.push(null);
        }
        this.#shutdown();

        log.debug("connection closed", code, description);
        this.emit("close", code, description);
    }

    #shutdown(){

        const transport = this.#transport;
        if(transport.destroyed){
            return;
        }
        if(transport.writableFinished){
            transport.destroy();
            return;
        }

        transport.once("finish", () => transport.destroy());
        if(!this.#sender.writableEnded){
            this.#sender.end();
        }
    }

    #deliver(message:Message){
        //abandoned by the application: keep reading so control frames are still answered
        if(this.#messages.destroyed){
            return;
        }
        if(!this.#messages.push(message)){
            this.#receiver.pause();
        }
    }

    #writeControl(frame:Frame){
        if(!this.#sender.write(frame)){
            this.#receiver.pause();
            this.#sender.once("drain", () => {
                if(this.#messages.destroyed || this.#messages.readableLength < this.#messages.readableHighWaterMark){
                    this.#resumeInbound();
                }
            });
        }
    }

    //called from the message stream's read(), which only asks when it has room
    #resumeInbound(){
        if(this.#state !== State.CLOSED){
            this.#receiver.resume();
        }
    }
}

export default Dispatcher;
