import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const MissingInformationSchema = z.enum(['STOCK_NAME', 'SPECIFIC_DATE', 'TIME_PERIOD', 'NONE']);

export const CompletenessSchema = z.enum(['COMPLETE', 'PARTIAL', 'AMBIGUOUS']);

export const CompletenessAnalysisSchema = z.object({
  hasStockName: z.boolean(),
  hasSpecificDate: z.boolean(),
  hasRelativeTime: z.boolean(),
  hasMetrics: z.boolean(),
  hasConditions: z.boolean(),
  missingInformationType: MissingInformationSchema,
  informationCompleteness: CompletenessSchema,
});

export type CompletenessAnalysis = z.infer<typeof CompletenessAnalysisSchema>;

export const CompletenessAnalysisJsonSchema = zodToJsonSchema(CompletenessAnalysisSchema, {
  name: 'CompletenessAnalysis',
  $refStrategy: 'none',
});

const OptionalText = z
  .string()
  .nullish()
  .transform((value) => (value ? value.trim() || undefined : undefined));

export const QueryRewriteSchema = z.object({
  clarifiedQuery: z.string().default(''),
  startDate: OptionalText,
  endDate: OptionalText,
  marketScope: z
    .enum(['KOSPI', 'KOSDAQ', 'ALL'])
    .nullish()
    .catch(undefined)
    .transform((value) => value ?? undefined),
  primaryCriteria: OptionalText,
  secondaryCriteria: OptionalText,
});

export type QueryRewrite = z.infer<typeof QueryRewriteSchema>;

export const QueryRewriteJsonSchema = zodToJsonSchema(QueryRewriteSchema, {
  name: 'QueryRewrite',
  $refStrategy: 'none',
});
