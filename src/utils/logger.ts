import type { Logger } from "../param";

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Console logger that prefixes every line with the component name.
 */
export class ConsoleLogger implements Logger {
    readonly #prefix: string;
    #enabled: boolean;

    constructor(component: string, enabled: boolean = true) {
        this.#prefix = `${component}: `;
        this.#enabled = enabled;
    }

    setEnabled(value: boolean) {
        this.#enabled = value;
    }

    debug(message: string): void {
        this.#log('debug', message);
    }

    info(message: string): void {
        this.#log('info', message);
    }

    warn(message: string): void {
        this.#log('warn', message);
    }

    error(message: string): void {
        this.#log('error', message);
    }

    #log(level: LogLevel, message: string) {
        if (!this.#enabled) return;
        console[level](`${this.#prefix}${message}`);
    }
}
