/**
 * Log sink used by the loader and the action handlers.
 * Anything console-shaped works; tests pass a recorder.
 */
export type Logger = Pick<Console, "log" | "warn" | "error">;

export const consoleLogger: Logger = console;
