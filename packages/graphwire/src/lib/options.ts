import { z } from "zod";
import { ConfigurationError } from "./dependency-error";
import {
  LOG_LEVELS,
  createConsoleLogger,
  isLogger,
  resolveLogLevel,
  type Logger,
} from "./logger";

const containerOptionsSchema = z
  .object({
    /** Shows up in log prefixes; handy when several containers coexist. */
    name: z.string().min(1, "name must be a non-empty string").optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    /** Replaces the console logger entirely; `logLevel` is then ignored. */
    logger: z
      .custom<Logger>(isLogger, {
        message: "logger must implement error, warn, info and debug",
      })
      .optional(),
    /**
     * Bind decorated classes to themselves when requested unqualified
     * without an explicit binding.
     */
    implicitBindings: z.boolean().default(true),
  })
  .strict();

export type ContainerOptions = z.input<typeof containerOptionsSchema>;

export interface ResolvedContainerOptions {
  name?: string;
  logger: Logger;
  implicitBindings: boolean;
}

export function resolveContainerOptions(
  options: ContainerOptions = {},
): ResolvedContainerOptions {
  const parsed = containerOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ");
    throw new ConfigurationError(`Invalid container options: ${issues}`, {
      cause: parsed.error,
    });
  }

  const { name, logLevel, logger, implicitBindings } = parsed.data;
  return {
    name,
    logger:
      logger ??
      createConsoleLogger({ level: resolveLogLevel(logLevel), name }),
    implicitBindings,
  };
}
