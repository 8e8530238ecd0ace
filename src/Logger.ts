export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string, error?: unknown): void;
}

export const noopLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};

export const consoleLogger: Logger = {
    debug: message => console.debug(message),
    info: message => console.info(message),
    warn: message => console.warn(message),
    error: (message, error) => (error === undefined ? console.error(message) : console.error(message, error)),
};
