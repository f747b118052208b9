import type { Frame } from "./Frame.js";
import type { ContinuationItem, Message } from "./Message.js";
import { checkSizeLimit } from "./Parser.js";
import ProtocolError from "./ProtocolError.js";
import { parseClosePayload } from "./utils/closePayload.js";
import decodeUtf8 from "./utils/decodeUtf8.js";
import Opcode, { type DataOpcode } from "./utils/Opcode.js";

export const DEFAULT_MAX_MESSAGE_SIZE = 1024**2*10;

export type AssemblerOptions = {
    maxMessageSize?:number;
    //emit every data fragment as a continuation message instead of buffering
    rawFragments?:boolean;
}

type ActiveMessage = {
    opcode:DataOpcode;
    payloads:Buffer[];
    size:number;
}

/**
 * Rebuilds application messages from a frame sequence. Control frames pass
 * straight through and may arrive between the fragments of a data message.
 */
class ContinuationAssembler{

    #active:ActiveMessage|null = null;
    #maxMessageSize:number;
    #rawFragments:boolean;

    constructor({maxMessageSize = DEFAULT_MAX_MESSAGE_SIZE, rawFragments = false}:AssemblerOptions = {}){
        checkSizeLimit("Max message size", maxMessageSize);
        this.#maxMessageSize = maxMessageSize;
        this.#rawFragments = rawFragments;
    }

    get inProgress(){
        return this.#active !== null;
    }

    /**
     * Feeds one frame. Returns the message it completes, or null while a
     * fragmented message is still being collected.
     */
    consume(frame:Frame):Message|null{

        switch(frame.opcode){
            case Opcode.CLOSE:
            case Opcode.PING:
            case Opcode.PONG:
                if(!frame.isFinished){
                    throw new ProtocolError({type:"ContinuationFragment", opcode:frame.opcode});
                }
                return this.#controlMessage(frame.opcode, frame.payload);

            case Opcode.TEXT:
            case Opcode.BINARY:
                if(this.#active !== null){
                    throw new ProtocolError({type:"ContinuationStarted"});
                }
                if(frame.payload.byteLength > this.#maxMessageSize){
                    throw new ProtocolError({type:"Overflow"});
                }
                if(frame.isFinished){
                    return this.#dataMessage(frame.opcode, frame.payload);
                }

                this.#active = {opcode:frame.opcode, payloads:[frame.payload], size:frame.payload.byteLength};
                if(this.#rawFragments){
                    const kind = frame.opcode === Opcode.TEXT ? "firstText" : "firstBinary";
                    return this.#fragment(kind, frame.payload);
                }
                return null;

            case Opcode.CONTINUATION:
                return this.#continue(frame);

            default:
                throw new ProtocolError({type:"BadOpCode"});
        }
    }

    reset(){
        this.#active = null;
    }

    #continue({isFinished, payload}:Frame):Message|null{

        const active = this.#active;
        if(active === null){
            throw new ProtocolError({type:"ContinuationNotStarted"});
        }

        active.size += payload.byteLength;
        if(active.size > this.#maxMessageSize){
            this.#active = null;
            throw new ProtocolError({type:"Overflow"});
        }

        if(this.#rawFragments){
            if(isFinished){
                this.#active = null;
            }
            return this.#fragment(isFinished ? "last" : "continue", payload);
        }

        active.payloads.push(payload);
        if(!isFinished){
            return null;
        }

        this.#active = null;
        return this.#dataMessage(active.opcode, Buffer.concat(active.payloads, active.size));
    }

    #fragment(kind:ContinuationItem["kind"], data:Buffer):Message{
        //only the byte count is tracked when fragments are handed out
        if(this.#active !== null){
            this.#active.payloads = [];
        }
        return {type:"continuation", item:{kind, data}};
    }

    #dataMessage(opcode:DataOpcode, payload:Buffer):Message{
        if(opcode === Opcode.TEXT){
            return {type:"text", data:decodeUtf8(payload)};
        }
        return {type:"binary", data:payload};
    }

    #controlMessage(opcode:Opcode.CLOSE|Opcode.PING|Opcode.PONG, payload:Buffer):Message{
        switch(opcode){
            case Opcode.CLOSE:
                return {type:"close", reason:parseClosePayload(payload)};
            case Opcode.PING:
                return {type:"ping", data:payload};
            case Opcode.PONG:
                return {type:"pong", data:payload};
        }
    }
}

/**
 * Lazily turns frames into messages, in arrival order. The generator owns its
 * assembler, so it cannot be rewound.
 */
export function* assemble(frames:Iterable<Frame>, options?:AssemblerOptions):Generator<Message, void, undefined>{
    const assembler = new ContinuationAssembler(options);
    for(const frame of frames){
        const message = assembler.consume(frame);
        if(message !== null){
            yield message;
        }
    }
}

export default ContinuationAssembler;
