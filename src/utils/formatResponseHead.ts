function formatResponseHead(statusCode:number, statusText:string, headers:{[k:string]:string|readonly string[]} = {}){

    let head = "HTTP/1.1" + " " + statusCode + " " + statusText + "\r\n";
    for(const [fieldName, fieldValue] of Object.entries(headers)){
        head += `${fieldName}: ${ typeof fieldValue === "string" ? fieldValue : fieldValue.join(", ") }\r\n`;
    }
    head += "\r\n";

    return head;
}

export default formatResponseHead;
