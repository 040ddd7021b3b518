import { z } from "zod";
import { MAX_CELL_STATE, RuleConfigSchema } from "./rule";

const UINT32_MAX = 0xffffffff;

/** Largest width or height accepted from untrusted configuration. */
export const MAX_GRID_DIMENSION = 10000;

export const StrategyNameSchema = z.enum(["direct", "convolution", "spectral"]);

const DimensionSchema = z
  .number()
  .int({ error: "Grid dimensions must be integers" })
  .min(1, { error: "Grid dimensions must be at least 1" })
  .max(MAX_GRID_DIMENSION, {
    error: `Grid dimensions cannot exceed ${MAX_GRID_DIMENSION}`,
  });

const CellStateSchema = z.number().int().min(0).max(MAX_CELL_STATE);

export const SimulationConfigSchema = z
  .object({
    width: DimensionSchema,
    height: DimensionSchema,
    strategy: StrategyNameSchema.optional(),
    rule: RuleConfigSchema.optional(),
    ruleString: z.string().min(1, { error: "Rulestring cannot be empty" }).optional(),
    probability: z
      .number()
      .min(0, { error: "Probability must be between 0 and 1" })
      .max(1, { error: "Probability must be between 0 and 1" })
      .optional(),
    seed: z
      .number()
      .int()
      .min(0, { error: "Seed must be a non-negative integer" })
      .max(UINT32_MAX, { error: "Seed must fit in uint32" })
      .optional(),
    cells: z.array(CellStateSchema).optional(),
    rows: z.array(z.array(CellStateSchema)).optional(),
    trace: z.boolean().optional(),
  })
  .superRefine((data, ctx) => {
    if (data.rule !== undefined && data.ruleString !== undefined) {
      ctx.addIssue({
        code: "custom",
        message: "Provide either rule or ruleString, not both",
        path: ["ruleString"],
      });
    }
    if (data.cells !== undefined && data.rows !== undefined) {
      ctx.addIssue({
        code: "custom",
        message: "Provide either cells or rows, not both",
        path: ["rows"],
      });
    }
  });

export type StrategyName = z.infer<typeof StrategyNameSchema>;
export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
