export interface ILog {
    info(message: string): void;
    verbose(message: string): void;
    error(message: string): void;
    exception(message: string, error: Error): void;
    warn(message: string): void;
    debug(message: string): void;
}

//
// The log that is installed when nothing else has been set.
// Verbose and debug output is discarded.
//
export const defaultLog: ILog = {
    info(message: string): void {
        console.log(message);
    },
    verbose(message: string): void {
        // You have to install your own log if you want verbose output.
    },
    error(message: string): void {
        console.error(message);
    },
    exception(message: string, error: Error): void {
        console.error(message);
        console.error(error.stack || error.message || error);
    },
    warn(message: string): void {
        console.warn(message);
    },
    debug(message: string): void {
        // You have to install your own log if you want debug output.
    },
};

//
// Sets the global log.
//
export function setLog(_log: ILog): void {
    log = _log;
}

export let log: ILog = defaultLog;
