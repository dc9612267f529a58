import { ErrorCode } from "@logfan/shared";
import { z } from "zod";
import { ConfigurationError } from "../../errors/types.js";

/**
 * @throws ConfigurationError for an empty or blank identifier
 */
export function validateDestinationId(id: string): string {
  if (typeof id !== "string" || id.trim().length === 0) {
    throw new ConfigurationError(
      "Destination identifier cannot be empty",
      ErrorCode.INVALID_IDENTIFIER,
      { context: { id } }
    );
  }
  return id;
}

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "critical"]);

/**
 * Fields every destination accepts.
 */
export const DestinationBaseSchema = z.object({
  id: z.string(),
  minimumLevel: LogLevelSchema.optional(),
  enabled: z.boolean().optional(),
});

/**
 * Validate destination options, turning zod issues into one
 * ConfigurationError that names every offending field.
 */
export function parseDestinationOptions<S extends z.ZodTypeAny>(
  schema: S,
  options: unknown,
  kind: string,
  code: ErrorCode = ErrorCode.CONFIG_INVALID
): z.output<S> {
  const result = schema.safeParse(options);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigurationError(`Invalid ${kind} destination options: ${details}`, code, {
      cause: result.error,
    });
  }
  return result.data;
}
