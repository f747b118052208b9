/**
 * XORs every payload byte with `maskingKey[i % 4]`, in place.
 * Masking twice with the same key restores the original bytes.
 */
function applyMask(maskingKey:Uint8Array, payload:Uint8Array){

    for(let i = 0; i < payload.byteLength; i++){
        payload[i] ^= maskingKey[i & 3];
    }
}

export default applyMask;
