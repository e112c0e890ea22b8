import { z } from "zod";
import { InvalidOptionsError } from "./errors.js";
import { Logger, createLogger } from "./logger.js";

export const DefaultOptions: Omit<ResolvedOptions, "logger"> = {
  recover: true,
  sync: false,
};

export const LogStoreOptionsSchema = z
  .object({
    /**
     * Rebuild the key directory by replaying the existing log on open.
     * Without it a reopened store answers `null` for every key written
     * before the restart.
     */
    recover: z.boolean().default(DefaultOptions.recover),
    /**
     * fsync after every append. Without it `put` only guarantees the bytes
     * were handed to the operating system.
     */
    sync: z.boolean().default(DefaultOptions.sync),
    logger: z.instanceof(Logger).optional(),
  })
  .strict();

export type LogStoreOptions = z.input<typeof LogStoreOptionsSchema>;

export type ResolvedOptions = {
  recover: boolean;
  sync: boolean;
  logger: Logger;
};

export function resolveOptions(options?: LogStoreOptions): ResolvedOptions {
  const result = LogStoreOptionsSchema.safeParse(options ?? {});

  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
      ),
    );
  }

  return {
    recover: result.data.recover,
    sync: result.data.sync,
    logger: result.data.logger ?? createLogger(),
  };
}
