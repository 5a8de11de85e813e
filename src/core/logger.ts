import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

const root = pino({
  name: "equation-snn",
  level: process.env.SIM_LOG_LEVEL ?? "info",
});

export function createLogger(component: string): Logger {
  return root.child({ component });
}
