// `console` satisfies this
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
