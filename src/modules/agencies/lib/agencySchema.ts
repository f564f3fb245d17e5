import { z } from "zod";

const SectionRequirementSchema = z
  .object({
    name: z.string().min(1),
    required: z.boolean(),
    min_pages: z.number().nonnegative(),
    max_pages: z.number().nonnegative(),
    // Derived from pages * words_per_page when absent
    min_words: z.number().int().nonnegative().optional(),
    max_words: z.number().int().nonnegative().optional(),
    order: z.number().int(),
    guidelines: z.string().default(""),
    required_keywords: z.array(z.string().min(1)).default([]),
    description: z.string().default(""),
  })
  .refine((s) => s.min_pages <= s.max_pages, {
    message: "min_pages must not exceed max_pages",
    path: ["min_pages"],
  })
  .refine(
    (s) =>
      s.min_words === undefined ||
      s.max_words === undefined ||
      s.min_words <= s.max_words,
    { message: "min_words must not exceed max_words", path: ["min_words"] }
  );

const EvaluationCriterionSchema = z.object({
  weight: z.number().min(0).max(1),
  description: z.string(),
  sub_criteria: z.array(z.string()).default([]),
});

const FormatSpecificationSchema = z.object({
  font: z.string().min(1),
  font_size: z.number().positive(),
  line_spacing: z.number().positive(),
  margins: z.record(z.string(), z.number().nonnegative()),
  page_numbers: z.boolean(),
  headers_footers: z.boolean(),
  words_per_page: z.number().int().positive(),
  references_format: z.string(),
  volume_limit: z.string().nullish(),
});

export const AgencyRequirementsFileSchema = z
  .object({
    agency: z.string().min(1),
    program: z.string().min(1),
    funding_amount: z.number().int().positive(),
    duration_months: z.number().int().positive(),
    description: z.string().default(""),
    sections: z
      .record(z.string(), SectionRequirementSchema)
      .refine((s) => Object.keys(s).length > 0, {
        message: "at least one section is required",
      }),
    evaluation_criteria: z.record(z.string(), EvaluationCriterionSchema),
    format_specifications: FormatSpecificationSchema,
    special_requirements: z.record(z.string(), z.unknown()).default({}),
    submission_requirements: z.record(z.string(), z.string()).default({}),
  })
  .superRefine((data, ctx) => {
    const seen = new Map<number, string>();
    for (const [key, section] of Object.entries(data.sections)) {
      const prior = seen.get(section.order);
      if (prior !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sections", key, "order"],
          message: `order ${section.order} is already used by "${prior}"`,
        });
      }
      seen.set(section.order, key);
    }
  });

export type AgencyRequirementsFile = z.infer<typeof AgencyRequirementsFileSchema>;
export type RawSectionRequirement = z.infer<typeof SectionRequirementSchema>;
export type EvaluationCriterion = z.infer<typeof EvaluationCriterionSchema>;
export type FormatSpecification = z.infer<typeof FormatSpecificationSchema>;

export type FrozenCriterion = Readonly<
  Omit<EvaluationCriterion, "sub_criteria"> & { sub_criteria: readonly string[] }
>;

export type FrozenFormatSpecification = Readonly<
  Omit<FormatSpecification, "margins"> & { margins: Readonly<Record<string, number>> }
>;

/** Section requirement with word bounds resolved. Frozen after load. */
export type SectionRequirement = Readonly<
  Omit<RawSectionRequirement, "min_words" | "max_words" | "required_keywords"> & {
    min_words: number;
    max_words: number;
    required_keywords: readonly string[];
  }
>;
