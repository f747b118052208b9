export { default as Dispatcher, State, validateDispatcherOptions } from "./Dispatcher.js";
export type { CloseInitiator, DispatcherOptions, Role } from "./Dispatcher.js";
export { default as ContinuationAssembler, assemble, DEFAULT_MAX_MESSAGE_SIZE } from "./ContinuationAssembler.js";
export type { AssemblerOptions } from "./ContinuationAssembler.js";
export { handshake, handshakeResponse, hashKey, verifyHandshake } from "./Handshake.js";
export type { RequestHead } from "./Handshake.js";
export { default as HandshakeError } from "./HandshakeError.js";
export type { HandshakeErrorKind } from "./HandshakeError.js";
export { default as ProtocolError } from "./ProtocolError.js";
export type { ProtocolErrorDetail } from "./ProtocolError.js";
export { default as ConnectionClosedError } from "./ConnectionClosedError.js";
export { default as ResponseBuilder } from "./ResponseBuilder.js";
export type { ResponseHead } from "./ResponseBuilder.js";
export { parseFrame, encodeFrame, checkSizeLimit, DEFAULT_MAX_FRAME_SIZE, MAX_CONTROL_FRAME_PAYLOAD_SIZE } from "./Parser.js";
export type { ParseResult, ParserOptions } from "./Parser.js";
export { default as Receiver } from "./Receiver.js";
export { default as Sender } from "./Sender.js";
export { default as WebSocketServer } from "./WebSocketServer.js";
export type { WebSocketServerOptions } from "./WebSocketServer.js";
export type { Frame } from "./Frame.js";
export type { BinaryMessage, CloseMessage, CloseReason, ContinuationItem, ContinuationMessage, Message, NopMessage, PingMessage, PongMessage, TextMessage } from "./Message.js";
export { default as Opcode, isOpcode } from "./utils/Opcode.js";
export { CloseCode, classifyCloseCode, isReservedCode, isValidCloseCode } from "./utils/CloseCode.js";
export type { CloseCodeClass, CloseCodeName } from "./utils/CloseCode.js";
export { parseClosePayload, createClosePayload } from "./utils/closePayload.js";
export { default as applyMask } from "./utils/applyMask.js";
export { default as createFrame } from "./utils/createFrame.js";
export { createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { loadConfig } from "./config.js";
export type { ServerConfig } from "./config.js";
