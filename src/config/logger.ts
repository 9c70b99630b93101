import winston from "winston";
import { config } from "./index.js";

const format =
  config.nodeEnv === "production"
    ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
    : winston.format.combine(winston.format.colorize(), winston.format.simple());

export const logger = winston.createLogger({
  level: config.logLevel,
  format,
  defaultMeta: { service: "ingress-hosts" },
  transports: [new winston.transports.Console()],
});
