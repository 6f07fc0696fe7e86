/**
 * Server configuration, read from environment variables once at startup.
 * Nothing else in the server reads process.env.
 */

import { z } from "zod";

const environmentSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DATABASE_PATH: z.string().min(1).default("data/street-guide.sqlite"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export interface ServerConfig {
  port: number;
  host: string;
  databasePath: string;
  nodeEnv: "development" | "production" | "test";
  isProduction: boolean;
}

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid environment: ${issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`
    );
    this.name = "ConfigError";
  }
}

/** Parse and validate the environment, failing fast on bad values */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  const { PORT, HOST, DATABASE_PATH, NODE_ENV } = parsed.data;
  return {
    port: PORT,
    host: HOST,
    databasePath: DATABASE_PATH,
    nodeEnv: NODE_ENV,
    isProduction: NODE_ENV === "production",
  };
}
