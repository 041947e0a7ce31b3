import pino from "pino";

const isProduction = process.env.NODE_ENV === "production";
const logLevel = process.env.LOG_LEVEL || (isProduction ? "info" : "debug");

export const logger = pino({
  level: logLevel,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  ...(isProduction
    ? {
        // isoTime in production, epoch millis locally
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {}),
});

// Child logger for payment file generation
export const sepaLogger = logger.child({ module: "sepa" });

export default logger;
