// stdout carries the stdio MCP transport, so every level goes to stderr.
const isTest = process.env.NODE_ENV === "test";
const isDebug = process.env.LOG_LEVEL === "debug";

function write(level: string, message: string, data?: unknown) {
  if (isTest) {
    return;
  }
  if (data === undefined) {
    console.error(`[${level}] ${message}`);
  } else {
    console.error(`[${level}] ${message}`, data);
  }
}

export const logger = {
  error: (message: string, error?: unknown) => write("ERROR", message, error),
  warn: (message: string, data?: unknown) => write("WARN", message, data),
  info: (message: string, data?: unknown) => write("INFO", message, data),
  debug: (message: string, data?: unknown) => {
    if (isDebug) {
      write("DEBUG", message, data);
    }
  },
};
