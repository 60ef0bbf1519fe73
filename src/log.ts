export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  step(current: number, total: number, message: string): void;
  line(message?: string): void;
};

export const consoleLogger: Logger = {
  info: message => console.log(`[INFO] ${message}`),
  warn: message => console.warn(`[WARN] ${message}`),
  error: message => console.error(`[ERROR] ${message}`),
  step: (current, total, message) => console.log(`[${current}/${total}] ${message}`),
  line: (message = "") => console.log(message)
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  step: () => undefined,
  line: () => undefined
};
