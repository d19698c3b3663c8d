import { z } from "zod";

const UINT32_MAX = 0xffffffff;

/** Largest grid side accepted from callers. */
export const MAX_GRID_DIMENSION = 1024;

const PositiveInt = z.number().int().min(1);

/**
 * Shape of a (partial) user configuration. Cross-field rules live in
 * `isValidConfiguration`; the schema only guards types and ranges.
 */
export const ConfigurationInputSchema = z
  .object({
    minRoomDimension: PositiveInt,
    maxRoomDimension: PositiveInt,
    minPadding: PositiveInt,
    doorwayOffset: PositiveInt,
    maxFailCount: z.number().int().min(0),
    reintroducedCorridorDensity: z
      .tuple([z.number().int().min(0), PositiveInt])
      .refine(([numerator, denominator]) => numerator <= denominator, {
        error: "Density numerator must be ≤ denominator",
      }),
    corridorCost: PositiveInt,
    straightCost: PositiveInt,
    standardCost: PositiveInt,
    minMazeDimension: PositiveInt,
    mazeChance: z.number().min(0).max(1),
  })
  .partial()
  .strict();

export type ConfigurationInput = z.infer<typeof ConfigurationInputSchema>;

export const SeedSchema = z
  .number()
  .int({ error: "Seed must be an integer" })
  .min(0, { error: "Seed must be non-negative" })
  .max(UINT32_MAX, { error: "Seed must fit in uint32" });

/**
 * Input accepted by the generation entry point.
 */
export const GenerationRequestSchema = z.object({
  width: z.number().int().min(1).max(MAX_GRID_DIMENSION),
  height: z.number().int().min(1).max(MAX_GRID_DIMENSION),
  seed: SeedSchema,
  targetRoomCount: z.number().int().min(0).optional(),
  configuration: ConfigurationInputSchema.optional(),
  trace: z.boolean().optional(),
});

export type GenerationRequestInput = z.infer<typeof GenerationRequestSchema>;
