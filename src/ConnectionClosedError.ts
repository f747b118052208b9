/**
 * Raised by operations on a connection that has left the open state.
 */
class ConnectionClosedError extends Error{

    constructor(message = "Connection is not open"){
        super(message);
        this.name = "ConnectionClosedError";
    }
}

export default ConnectionClosedError;
