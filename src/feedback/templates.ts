import { z } from "zod";
import { ValueFormat, formatValue } from "../utils/format";
import headerData from "../data/templates/headers.json";
import commendableData from "../data/templates/commendable.json";
import reviewData from "../data/templates/review.json";
import improvementData from "../data/templates/improvement.json";

/**
 * Feedback text templates, loaded from src/data/templates and validated on load.
 *
 * A template is `{ text, vars }`: `text` holds `{name}` placeholders and `vars`
 * declares each one with the format its value is shown in.
 */

export const TEMPLATE_VARIABLES = ["user_value", "min_val", "max_val", "gap_amt"] as const;
export type TemplateVariable = (typeof TEMPLATE_VARIABLES)[number];
export type TemplateValues = Record<TemplateVariable, number>;

const PLACEHOLDER = /\{(\w+)\}/g;

function placeholdersOf(text: string): string[] {
  return Array.from(text.matchAll(PLACEHOLDER), (match) => match[1] ?? "");
}

function isTemplateVariable(name: string): name is TemplateVariable {
  return TEMPLATE_VARIABLES.some((variable) => variable === name);
}

const ValueFormatSchema = z.enum(["plain", "decimal1", "decimal2", "percent", "currency"]);

const TextTemplateSchema = z
  .object({
    text: z.string().min(1),
    vars: z.record(z.enum(TEMPLATE_VARIABLES), ValueFormatSchema),
  })
  .superRefine((template, ctx) => {
    for (const name of placeholdersOf(template.text)) {
      if (!isTemplateVariable(name) || template.vars[name] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `placeholder {${name}} is not declared in vars`,
          path: ["text"],
        });
      }
    }
  });

export type TextTemplate = z.infer<typeof TextTemplateSchema>;

const HeaderPoolSchema = z.array(z.string().min(1)).nonempty();

const HeaderTemplatesSchema = z.object({
  ratio: z.object({
    good: HeaderPoolSchema,
    badLow: HeaderPoolSchema,
    badHigh: HeaderPoolSchema,
  }),
  adequacy: z.object({
    good: HeaderPoolSchema,
    badLow: HeaderPoolSchema,
    badHigh: HeaderPoolSchema,
  }),
});

export type HeaderTemplates = z.infer<typeof HeaderTemplatesSchema>;

const ImprovementTemplateSchema = z.object({
  currentScenario: TextTemplateSchema,
  actionable: TextTemplateSchema,
});

export type ImprovementTemplate = z.infer<typeof ImprovementTemplateSchema>;

/** Keyed by metric name, then verdict */
const ByMetricAndVerdict = <T extends z.ZodTypeAny>(schema: T) =>
  z.record(z.string(), z.record(z.string(), schema));

const FeedbackTemplatesSchema = z.object({
  headers: HeaderTemplatesSchema,
  commendable: ByMetricAndVerdict(TextTemplateSchema),
  review: ByMetricAndVerdict(TextTemplateSchema),
  improvement: ByMetricAndVerdict(ImprovementTemplateSchema),
});

export type FeedbackTemplates = z.infer<typeof FeedbackTemplatesSchema>;

/**
 * Validates a raw template set
 * @throws ZodError naming the offending template
 */
export function parseTemplates(raw: unknown): FeedbackTemplates {
  return FeedbackTemplatesSchema.parse(raw);
}

export const DEFAULT_TEMPLATES: FeedbackTemplates = parseTemplates({
  headers: headerData,
  commendable: commendableData,
  review: reviewData,
  improvement: improvementData,
});

/**
 * Substitutes the declared placeholders with formatted values.
 * Placeholders that are not declared stay as they are.
 */
export function renderTemplate(template: TextTemplate, values: TemplateValues): string {
  return template.text.replace(PLACEHOLDER, (match: string, name: string) => {
    if (!isTemplateVariable(name)) {
      return match;
    }
    const format: ValueFormat | undefined = template.vars[name];
    return format === undefined ? match : formatValue(values[name], format);
  });
}

export function lookupTemplate<T>(
  table: Record<string, Record<string, T>>,
  metricName: string,
  verdict: string
): T | undefined {
  return table[metricName]?.[verdict];
}
