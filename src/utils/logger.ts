/** Anything console-shaped. Services default to `console`. */
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
