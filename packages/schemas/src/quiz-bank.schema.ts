import { z } from 'zod';

export const OPTION_SYMBOLS = {
  '1': '①',
  '2': '②',
  '3': '③',
  '4': '④',
} as const;

const OptionNumberSchema = z.enum(['1', '2', '3', '4']);

const OptionsSchema = z.object({
  '1': z.string().min(1),
  '2': z.string().min(1),
  '3': z.string().min(1),
  '4': z.string().min(1),
});

export const QuizQuestionSchema = z
  .object({
    id: z.number().int().positive(),
    question: z.string().trim().min(10),
    options: OptionsSchema.strict(),
    correctAnswer: z.object({
      number: OptionNumberSchema,
      company: z.string().min(1),
      symbol: z.enum(['①', '②', '③', '④']),
    }),
    background: z.string(),
  })
  .superRefine((question, ctx) => {
    const { number, company, symbol } = question.correctAnswer;
    if (question.options[number] !== company) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['correctAnswer', 'company'],
        message: `Option ${number} is "${question.options[number]}", not "${company}"`,
      });
    }
    if (OPTION_SYMBOLS[number] !== symbol) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['correctAnswer', 'symbol'],
        message: `Symbol ${symbol} does not match option ${number}`,
      });
    }
  });

export const QuizBankSchema = z
  .object({
    $schema: z.string().optional(),
    version: z.string().regex(/^\d+\.\d+\.\d+$/),
    questions: z.array(QuizQuestionSchema).min(1),
  })
  .superRefine((bank, ctx) => {
    const seen = new Set<number>();
    bank.questions.forEach((question, index) => {
      if (seen.has(question.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['questions', index, 'id'],
          message: `Duplicate question id ${String(question.id)}`,
        });
      }
      seen.add(question.id);
    });
  });

export type QuizBank = z.infer<typeof QuizBankSchema>;
export type QuizQuestionConfig = z.infer<typeof QuizQuestionSchema>;
