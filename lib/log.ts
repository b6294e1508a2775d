export type Logger = Pick<Console, "info" | "warn" | "error">;

const PREFIX = "[song-selector]";

export const consoleLogger: Logger = {
  info: (message: string, ...rest: unknown[]) => console.info(`${PREFIX} ${message}`, ...rest),
  warn: (message: string, ...rest: unknown[]) => console.warn(`${PREFIX} ${message}`, ...rest),
  error: (message: string, ...rest: unknown[]) => console.error(`${PREFIX} ${message}`, ...rest),
};
