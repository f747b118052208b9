import { loadConfig } from "./config.js";
import Dispatcher, { State } from "./Dispatcher.js";
import { createLogger, setLogLevel } from "./utils/logger.js";
import WebSocketServer from "./WebSocketServer.js";

const config = loadConfig();
setLogLevel(config.logLevel);
const log = createLogger("demo");

const wsServer = new WebSocketServer({
    port:config.port,
    path:config.path,
    maxConnections:config.maxConnections,
    connection:{
        maxFrameSize:config.maxFrameSize,
        maxMessageSize:config.maxMessageSize,
        closeTimeout:config.closeTimeout,
    },
});

wsServer.on("listening", () => {
    log.info(`Websocket server is listening on :${config.port}${config.path}`);
});

wsServer.on("error", (err) => {
    log.error(err);
});

function broadcast(connections:Iterable<Dispatcher>, data:string|Buffer){
    for(const connection of connections){
        if(connection.state !== State.OPEN){
            continue;
        }
        const sent = typeof data === "string"
            ? connection.send({type:"text", data})
            : connection.send({type:"binary", data});
        sent.catch((err:unknown) => log.warn("broadcast failed:", err));
    }
}

async function serve(connection:Dispatcher){
    for await (const message of connection){
        if(message.type === "text" && message.data === "!close"){
            await connection.close({code:1000, description:"bye"});
            continue;
        }
        if(message.type === "text" || message.type === "binary"){
            broadcast(wsServer.connections, message.data);
        }
    }
}

wsServer.on("connection", (connection) => {
    log.info("new websocket connection, connections:", wsServer.connections.size);

    connection.on("close", (code, description) => {
        log.info("ws closed", "code:" + code, "reason:" + description);
    });

    serve(connection).catch((err:unknown) => log.error("connection failed:", err));
});

const shutdown = () => {
    wsServer.close().then(() => process.exit(0), (err:unknown) => {
        log.error(err);
        process.exit(1);
    });
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
