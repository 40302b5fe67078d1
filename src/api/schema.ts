/**
 * Request body and path schemas for the zone routes.
 * Ranges are left to the zone layer so every caller gets the same messages.
 */
import { z } from "zod";

export const OutputParamSchema = z.coerce
  .number()
  .int("Output must be an integer")
  .positive("Output must be positive");

export const VolumeRequestSchema = z.object({
  level: z.number().describe("Volume level 0.0-1.0"),
});

export const SourceRequestSchema = z.union([
  z.object({ source: z.string().min(1).describe('Label, e.g. "Input 3"') }),
  z.object({ input: z.number().int().describe("Input number") }),
]);

