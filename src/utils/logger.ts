import winston from "winston";

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp({ format: "HH:mm:ss" }),
    winston.format.errors({ stack: true }),
  ),
  transports: [
    new winston.transports.Console({
      // every level on stderr; stdout carries rendered output
      stderrLevels: ["error", "warn", "info", "debug"],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, module: mod, version, table, stack }) => {
          const tag = mod ? ` [${mod}]` : "";
          const scope = [version !== undefined ? `v${version}` : "", table ? `${table}` : ""].filter(Boolean).join(" ");
          const where = scope ? ` (${scope})` : "";
          if (stack) return `${timestamp} ${level}:${tag} ${message}${where}\n${stack}`;
          return `${timestamp} ${level}:${tag} ${message}${where}`;
        })
      ),
    }),
  ],
});

export default logger;
