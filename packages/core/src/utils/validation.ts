/**
 * Validation schemas for errcode
 */

import { z } from "zod";

/**
 * Validate a log level name
 */
export const logLevelSchema = z.enum([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
]);

/**
 * Validate a registrable error code
 */
export const coderCodeSchema = z
  .number()
  .int("Code must be an integer")
  .refine((code) => code !== 0, "Code 0 is reserved");

/**
 * Validate an HTTP status code
 */
export const httpStatusSchema = z
  .number()
  .int("HTTP status must be an integer")
  .min(100, "HTTP status must be between 100 and 599")
  .max(599, "HTTP status must be between 100 and 599");

/**
 * Validate a single coder definition
 */
export const coderDefinitionSchema = z.object({
  code: coderCodeSchema,
  httpStatus: httpStatusSchema.optional(),
  message: z.string().min(1, "Message is required"),
  reference: z.string().optional(),
});

/**
 * Validate a catalog of coder definitions (codes must be unique)
 */
export const coderCatalogSchema = z
  .array(coderDefinitionSchema)
  .superRefine((definitions, ctx) => {
    const seen = new Set<number>();
    definitions.forEach((definition, index) => {
      if (seen.has(definition.code)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "code"],
          message: `Duplicate code ${definition.code}`,
        });
      }
      seen.add(definition.code);
    });
  });

export type CoderDefinition = z.infer<typeof coderDefinitionSchema>;
