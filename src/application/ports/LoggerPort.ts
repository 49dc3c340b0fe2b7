export interface LoggerPort {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export const consoleLogger: LoggerPort = {
  info: (message, context) => (context ? console.log(message, context) : console.log(message)),
  warn: (message, context) => (context ? console.warn(message, context) : console.warn(message)),
  error: (message, context) => (context ? console.error(message, context) : console.error(message)),
};
