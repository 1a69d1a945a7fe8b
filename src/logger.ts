import pino from "pino";
import { config } from "./config";

export const logger = pino({
  level: config.logging.level,
  ...(config.logging.pretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
          },
        },
      }
    : {}),
});
