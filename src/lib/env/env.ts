import * as v from "valibot";

import { type Env, envSchema } from "./schema";

export class EnvValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Environment variable validation failed: ${issues.join("; ")}`);
    this.name = "EnvValidationError";
  }
}

/**
 * Validate `source` (defaults to `process.env`) against the env schema.
 *
 * @throws {EnvValidationError} listing every failing variable
 */
export const parseEnv = (source: Record<string, string | undefined> = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (!result.success) {
    throw new EnvValidationError(
      result.issues.map((issue) => `${v.getDotPath(issue) ?? "env"}: ${issue.message}`),
    );
  }
  return result.output;
};

let cachedEnv: Env | undefined;

/**
 * Parsed environment, validated once per process. Prints every issue and
 * exits with code 1 when validation fails.
 */
export const getEnv = (): Env => {
  if (!cachedEnv) {
    try {
      cachedEnv = parseEnv();
    } catch (error) {
      if (error instanceof EnvValidationError) {
        console.error("Environment variable validation failed:");
        for (const issue of error.issues) {
          console.error(`  - ${issue}`);
        }
        process.exit(1);
      }
      throw error;
    }
  }
  return cachedEnv;
};

export type { Env } from "./schema";
