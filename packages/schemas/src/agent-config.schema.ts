import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export const DEFAULT_COMPLETION_URL =
  'https://clovastudio.stream.ntruss.com/v3/chat-completions/HCX-005';

export const AgentConfigSchema = z.object({
  port: z.coerce.number().int().positive().default(3000),
  mockLlm: booleanFlag,
  storage: z.enum(['memory', 'firestore']).default('memory'),
  gcpProjectId: z.string().min(1).optional(),
  completion: z.object({
    url: z.string().url().default(DEFAULT_COMPLETION_URL),
    apiKey: z.string().min(1).optional(),
    timeoutMs: z.coerce.number().int().positive().default(30_000),
    temperature: z.coerce.number().min(0).max(1).default(0),
    maxTokens: z.coerce.number().int().positive().default(4000),
  }),
  session: z.object({
    idleTimeoutMinutes: z.coerce.number().positive().default(10),
    capacity: z.coerce.number().int().positive().default(5),
  }),
  quizBankPath: z.string().min(1).optional(),
  news: z.object({
    clientId: z.string().min(1).optional(),
    clientSecret: z.string().min(1).optional(),
  }),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
