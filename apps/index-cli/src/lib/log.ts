import { ILog, setLog } from "utils";
import pc from "picocolors";

export interface ILogOptions {
    //
    // Enables verbose logging.
    //
    verbose?: boolean;

    //
    // Enables debug logging.
    //
    debug?: boolean;
}

export class Log implements ILog {
    constructor(private readonly options: ILogOptions) {
    }

    info(message: string): void {
        console.log(message);
    }
    
    verbose(message: string): void {    
        if (!this.options.verbose) {
            return;
        }
        
        console.log(pc.gray(message));
    }
    
    error(message: string): void {
        console.error(pc.red(message));
    }
    
    exception(message: string, error: Error): void {
        console.error(pc.red(message));
        console.error(pc.red(error.stack || error.message));
    }

    warn(message: string): void {
        console.warn(pc.yellow(message));
    }

    debug(message: string): void {
        if (!this.options.debug) {
            return;
        }

        console.debug(pc.gray(message));
    }
}

//
// Configure the log based on input.
//
export function configureLog(options: ILogOptions): void {
    setLog(new Log(options));
}
