import { z } from "zod";

/** Hostname under which the catch-all virtual host is registered. */
export const DEFAULT_HOSTNAME = "<default>";

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Host registry configuration. */
  hosts: z
    .object({
      defaultHostname: z.string().min(1).default(DEFAULT_HOSTNAME),
    })
    .default({
      defaultHostname: DEFAULT_HOSTNAME,
    }),
});

export const config = configSchema.parse({
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  hosts: {
    defaultHostname: process.env.DEFAULT_HOSTNAME,
  },
});

export type Config = z.infer<typeof configSchema>;
