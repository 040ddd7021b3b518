import { z } from "zod";

/** Largest neighbor count any supported neighborhood can report. */
export const MAX_NEIGHBOR_COUNT = 8;

/** Largest neighbor count under Von Neumann adjacency. */
export const MAX_VON_NEUMANN_COUNT = 4;

/** Largest state a cell can hold (cells are stored as bytes). */
export const MAX_CELL_STATE = 255;

export const NeighborhoodSchema = z.enum(["moore", "von-neumann"]);

const CountSchema = z
  .number()
  .int({ error: "Neighbor counts must be integers" })
  .min(0, { error: "Neighbor counts cannot be negative" })
  .max(MAX_NEIGHBOR_COUNT, {
    error: `Neighbor counts cannot exceed ${MAX_NEIGHBOR_COUNT}`,
  });

/**
 * Half-open range of counts: `start <= n < end`.
 */
const CountRangeSchema = z
  .object({
    start: CountSchema,
    end: z.number().int().min(0).max(MAX_NEIGHBOR_COUNT + 1),
  })
  .refine(({ start, end }) => start <= end, {
    error: "Range start must be <= range end",
  });

/**
 * Every accepted way of writing a survival or birth set.
 */
export const CountSpecSchema = z.union([
  CountSchema,
  CountRangeSchema,
  z.array(CountSchema).max(MAX_NEIGHBOR_COUNT + 1),
  z.array(z.boolean()).length(MAX_NEIGHBOR_COUNT + 1, {
    error: "Raw count masks must have exactly 9 entries",
  }),
]);

/**
 * Highest count a spec selects, or -1 when it selects none.
 */
function highestCount(spec: z.infer<typeof CountSpecSchema>): number {
  if (typeof spec === "number") return spec;
  if (Array.isArray(spec)) {
    let highest = -1;
    spec.forEach((entry, index) => {
      const count = typeof entry === "boolean" ? (entry ? index : -1) : entry;
      if (count > highest) highest = count;
    });
    return highest;
  }
  return spec.end > spec.start ? spec.end - 1 : -1;
}

export const RuleConfigSchema = z
  .object({
    survival: CountSpecSchema,
    birth: CountSpecSchema,
    maxState: z
      .number()
      .int({ error: "maxState must be an integer" })
      .min(1, { error: "maxState must be at least 1" })
      .max(MAX_CELL_STATE, {
        error: `maxState cannot exceed ${MAX_CELL_STATE}`,
      })
      .optional(),
    neighborhood: NeighborhoodSchema.optional(),
  })
  .superRefine((data, ctx) => {
    if (data.neighborhood !== "von-neumann") return;
    for (const field of ["survival", "birth"] as const) {
      if (highestCount(data[field]) > MAX_VON_NEUMANN_COUNT) {
        ctx.addIssue({
          code: "custom",
          message: `Von Neumann ${field} counts cannot exceed ${MAX_VON_NEUMANN_COUNT}`,
          path: [field],
        });
      }
    }
  });

export type Neighborhood = z.infer<typeof NeighborhoodSchema>;
export type CountSpecConfig = z.infer<typeof CountSpecSchema>;
export type RuleConfig = z.infer<typeof RuleConfigSchema>;
