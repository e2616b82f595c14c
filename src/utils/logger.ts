export interface Logger {
  debug: (message: string, ...data: unknown[]) => void;
  info: (message: string, ...data: unknown[]) => void;
  warn: (message: string, ...data: unknown[]) => void;
  error: (message: string, ...data: unknown[]) => void;
}

export const createLogger = (scope: string): Logger => ({
  debug: (message, ...data) => console.debug(`[${scope}] ${message}`, ...data),
  info: (message, ...data) => console.log(`[${scope}] ${message}`, ...data),
  warn: (message, ...data) => console.warn(`[${scope}] ${message}`, ...data),
  error: (message, ...data) => console.error(`[${scope}] ${message}`, ...data),
});

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
