import { Transform, TransformCallback } from "stream";
import type { Frame } from "./Frame.js";
import { checkSizeLimit, DEFAULT_MAX_FRAME_SIZE, parseFrame } from "./Parser.js";
import ProtocolError from "./ProtocolError.js";

export type ReceiverOptions = {
    mustBeMasked?:boolean;
    maxFrameSize?:number;
}

declare interface Receiver{
    on(event: "data", listener:(frame:Frame) => void): this;
    on(event: "error", listener:(error:Error) => void): this;
    on(event: "end", listener:() => void): this;
    on(event: "close", listener:() => void): this;
    on(event: string, listener: Function): this;
}

/**
 * Turns transport bytes into decoded frames. Chunks are held until enough
 * bytes are buffered for the parser to make progress.
 */
class Receiver extends Transform{

    #mustBeMasked:boolean;
    #maxFrameSize:number;

    #chunks:Buffer[] = [];
    #bufferedSize = 0;
    #needed = 2;

    constructor({mustBeMasked = true, maxFrameSize = DEFAULT_MAX_FRAME_SIZE}:ReceiverOptions = {}){
        super({readableObjectMode:true});
        checkSizeLimit("Max frame size", maxFrameSize);
        this.#mustBeMasked = mustBeMasked;
        this.#maxFrameSize = maxFrameSize;
    }

    get bufferedSize(){
        return this.#bufferedSize;
    }

    override _transform(chunk:Buffer, encoding:BufferEncoding, callback:TransformCallback): void {

        this.#chunks.push(chunk);
        this.#bufferedSize += chunk.byteLength;
        if(this.#bufferedSize < this.#needed){
            callback();
            return;
        }

        let buffer = this.#chunks.length === 1 ? this.#chunks[0] : Buffer.concat(this.#chunks, this.#bufferedSize);
        let offset = 0;

        try{
            while(offset < buffer.byteLength){
                const result = parseFrame(buffer.subarray(offset), {
                    mustBeMasked:this.#mustBeMasked,
                    maxFrameSize:this.#maxFrameSize
                });

                if(result.status === "incomplete"){
                    this.#needed = result.needed;
                    break;
                }

                offset += result.consumed;
                this.#needed = 2;
                this.push(result.frame);
            }
        }catch(error){
            this.#chunks = [];
            this.#bufferedSize = 0;
            if(error instanceof ProtocolError){
                callback(error);
                return;
            }
            throw error;
        }

        buffer = buffer.subarray(offset);
        this.#chunks = buffer.byteLength > 0 ? [buffer] : [];
        this.#bufferedSize = buffer.byteLength;
        callback();
    }

}

export default Receiver;
