import { z } from "zod";

const FiniteNumberArraySchema = z.array(z.number().finite());

export const CatalogueFileSchema = z
  .object({
    quantities: z.record(z.string().min(1), FiniteNumberArraySchema),
    units: z.record(z.string(), z.string()).optional()
  })
  .superRefine((value, ctx) => {
    const lengths = new Set(Object.values(value.quantities).map((arr) => arr.length));
    if (lengths.size > 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "All catalogue quantities must have the same length." });
    }
  });

export type CatalogueFile = z.infer<typeof CatalogueFileSchema>;

const MetadataScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const SnapshotFileSchema = z.object({
  metadata: z
    .object({
      run_name: z.string().min(1).optional()
    })
    .catchall(z.union([MetadataScalarSchema, z.record(z.string(), MetadataScalarSchema)]))
});

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

export const DERIVED_OPS = ["ratio", "product", "sum", "difference", "log10"] as const;

export const DerivedQuantitySchema = z
  .object({
    op: z.enum(DERIVED_OPS),
    of: z.array(z.string().min(1)).min(1).max(2)
  })
  .superRefine((value, ctx) => {
    const expected = value.op === "log10" ? 1 : 2;
    if (value.of.length !== expected) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${value.op} takes ${expected} operand(s).` });
    }
  });

export type DerivedQuantity = z.infer<typeof DerivedQuantitySchema>;

export const RegistrationFileSchema = z.object({
  derived: z.record(z.string().min(1), DerivedQuantitySchema).default({})
});

const AxisConfigSchema = z.object({
  quantity: z.string().min(1),
  label: z.string().optional(),
  log: z.boolean().default(false)
});

export const PlotConfigEntrySchema = z
  .object({
    type: z.enum(["median", "mean", "histogram"]),
    filename: z.string().regex(/^[A-Za-z0-9._-]+$/).optional(),
    x: AxisConfigSchema,
    y: AxisConfigSchema.optional(),
    bins: z.object({
      count: z.number().int().min(1).max(1000),
      start: z.number().finite(),
      end: z.number().finite()
    }),
    metadata: z
      .object({
        title: z.string().optional(),
        caption: z.string().optional(),
        section: z.string().optional()
      })
      .default({}),
    observational_data: z.array(z.string().min(1)).default([])
  })
  .superRefine((value, ctx) => {
    if (value.type !== "histogram" && !value.y) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${value.type} plots need a y axis.` });
    }
    if (value.bins.end <= value.bins.start) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "bins.end must be greater than bins.start." });
    }
    if (value.x.log && value.bins.start <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Logarithmic x bins need a positive start." });
    }
  });

export type PlotConfigEntry = z.infer<typeof PlotConfigEntrySchema>;

export const PlotConfigFileSchema = z.record(z.string().regex(/^[A-Za-z0-9._-]+$/), PlotConfigEntrySchema);

export const ObservationalDataSchema = z
  .object({
    name: z.string().min(1),
    x: FiniteNumberArraySchema,
    y: FiniteNumberArraySchema
  })
  .refine((value) => value.x.length === value.y.length, { message: "Observational x and y must have the same length." });
