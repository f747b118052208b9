export type CloseReason = {
    code:number;
    description?:string;
}

export type ContinuationItem = {
    kind:"firstText"|"firstBinary"|"continue"|"last";
    data:Buffer;
}

export type TextMessage = { type:"text"; data:string };
export type BinaryMessage = { type:"binary"; data:Buffer };
export type ContinuationMessage = { type:"continuation"; item:ContinuationItem };
export type PingMessage = { type:"ping"; data:Buffer };
export type PongMessage = { type:"pong"; data:Buffer };
export type CloseMessage = { type:"close"; reason:CloseReason|null };
export type NopMessage = { type:"nop" };

export type Message =
| TextMessage
| BinaryMessage
| ContinuationMessage
| PingMessage
| PongMessage
| CloseMessage
| NopMessage
