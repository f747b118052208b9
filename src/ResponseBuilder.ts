import formatResponseHead from "./utils/formatResponseHead.js";

export type ResponseHead = {
    status:number;
    statusText:string;
    headers:{[k:string]:string};
    body:Buffer;
}

/**
 * An HTTP response under construction. The handshake hands one of these back
 * so the caller can add headers or a body before writing it out.
 */
class ResponseBuilder{

    #status:number;
    #statusText:string;
    //keyed by lower-case name, keeps the spelling it was set with
    #headers = new Map<string, [string, string]>();
    #body:Buffer = Buffer.alloc(0);

    constructor(status:number, statusText:string){
        this.#status = status;
        this.#statusText = statusText;
    }

    get status(){
        return this.#status;
    }

    get statusText(){
        return this.#statusText;
    }

    header(name:string, value:string){
        this.#headers.set(name.toLowerCase(), [name, value]);
        return this;
    }

    getHeader(name:string){
        return this.#headers.get(name.toLowerCase())?.[1];
    }

    reason(statusText:string){
        this.#statusText = statusText;
        return this;
    }

    body(body:string|Buffer){
        this.#body = typeof body === "string" ? Buffer.from(body, "utf8") : body;
        return this;
    }

    finish():ResponseHead{
        const headers:{[k:string]:string} = {};
        for(const [name, value] of this.#headers.values()){
            headers[name] = value;
        }
        if(this.#body.byteLength > 0){
            headers["Content-Length"] = String(this.#body.byteLength);
        }
        return {status:this.#status, statusText:this.#statusText, headers, body:this.#body};
    }

    /**
     * Serializes the status line and headers. The body is not included.
     */
    toString(){
        const {status, statusText, headers} = this.finish();
        return formatResponseHead(status, statusText, headers);
    }

    toBuffer(){
        const {body} = this.finish();
        return Buffer.concat([Buffer.from(this.toString(), "latin1"), body]);
    }
}

export default ResponseBuilder;
