/**
 * Minimal logging surface accepted by every factory.
 *
 * Defaults to `console`; tests pass a spy to silence or assert output.
 */
export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;
