import { pino } from "pino";
import { env } from "../config/env.js";

export const logger = pino({
  name: "collector",
  level: env.logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
});
