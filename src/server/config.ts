import { z } from "zod";
import { RatingOptions } from "../engine/elo";

const envSchema = z.object({
  PORT: z.coerce.number().int().nonnegative().default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  RATING_K_FACTOR: z.coerce.number().positive().default(32),
  RATING_INITIAL: z.coerce.number().default(1000)
});

export type Env = z.infer<typeof envSchema>;

export interface ServerConfig {
  port: number;
  env: Env["NODE_ENV"];
  rating: RatingOptions;
}

/** Parses process-style env vars; throws with every bad key listed. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const env = parsed.data;
  return {
    port: env.PORT,
    env: env.NODE_ENV,
    rating: { kFactor: env.RATING_K_FACTOR, initialRating: env.RATING_INITIAL }
  };
}
