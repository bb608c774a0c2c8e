import * as v from "valibot";
import { type Env, envSchema } from "./schema";

const formatIssuePath = (issue: v.BaseIssue<unknown>): string =>
  issue.path?.map((item) => String(item.key)).join(".") ?? "(root)";

/**
 * Raised when environment variables fail validation. `issues` holds one
 * `path: message` line per invalid variable.
 */
export class EnvError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Environment variable validation failed:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "EnvError";
  }
}

/**
 * Validate environment variables.
 *
 * @throws {EnvError} when any variable is invalid
 */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (!result.success) {
    throw new EnvError(
      result.issues.map((issue) => `${formatIssuePath(issue)}: ${issue.message}`),
    );
  }
  return result.output;
};

export type { Env } from "./schema";
