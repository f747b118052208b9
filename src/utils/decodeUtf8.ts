import ProtocolError from "../ProtocolError.js";

const decoder = new TextDecoder("utf-8", {fatal:true, ignoreBOM:true});

function decodeUtf8(payload:Uint8Array){
    try{
        return decoder.decode(payload);
    }catch(error){
        if(error instanceof TypeError){
            throw new ProtocolError({type:"InvalidPayload"});
        }
        throw error;
    }
}

export default decodeUtf8;
