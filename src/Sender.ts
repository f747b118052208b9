import { randomBytes } from "crypto";
import { Transform, TransformCallback } from "stream";
import type { Frame } from "./Frame.js";
import { encodeFrame } from "./Parser.js";

export type SenderOptions = {
    //clients mask every frame with a fresh key, servers never mask
    mask?:boolean;
}

declare interface Sender extends Transform{
    write(frame:Frame, callback?:(err?:Error|null) => void):boolean;
    write(frame:Frame, encoding?:BufferEncoding, callback?:(err?:Error|null) => void):boolean;
    on(event: "data", listener:(chunk:Buffer) => void): this;
    on(event: "error", listener:(error:Error) => void): this;
    on(event: "close", listener:() => void): this;
    on(event: "drain", listener:() => void): this;
    on(event: string, listener: Function): this;
}

class Sender extends Transform{

    #mask:boolean;

    constructor({mask = false}:SenderOptions = {}){
        super({writableObjectMode:true});
        this.#mask = mask;
    }

    override _transform(frame:Frame, encoding:BufferEncoding, callback:TransformCallback): void {

        const maskingKey = this.#mask ? (frame.maskingKey ?? randomBytes(4)) : null;
        this.push(encodeFrame({...frame, maskingKey}));
        callback();
    }

}

export default Sender;
