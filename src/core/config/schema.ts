/**
 * Zod schemas for run options
 */

import { z } from "zod";

/**
 * Command-line options schema
 */
export const cliOptionsSchema = z.object({
  identifier: z.string().trim(),
  region: z
    .string()
    .regex(
      /^[a-z]{2}(-[a-z]+)+-\d+$/,
      "Must be a valid AWS region (e.g., us-east-1)"
    )
    .optional(),
  profile: z.string().min(1, "Profile name cannot be empty").optional(),
  full: z.boolean().default(false),
  verbose: z.boolean().default(false),
  dryRun: z.boolean().default(false),
});

export type ParsedCliOptions = z.infer<typeof cliOptionsSchema>;

/**
 * Validate options with safe parsing (returns result object)
 */
export function validateCliOptionsSafe(options: unknown) {
  return cliOptionsSchema.safeParse(options);
}
