import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { QuizQuestion } from '@market-agent/shared/src/types/quiz.types.js';
import type { LlmClient } from '../llm/llm-client.js';

const log = createChildLogger('quiz:company-insight');

const MIN_INSIGHT_LENGTH = 20;

const SYSTEM_PROMPT = `You are a company insight writer for retail investors.
Write a short, friendly Korean note (3-4 sentences) about the company: what it does,
why it matters in its industry and one point investors usually watch.
No investment advice, no price targets.`;

export interface CompanyInsightWriter {
  write(question: QuizQuestion, context?: { sessionId?: string; credential?: string }): Promise<string>;
}

export function createCompanyInsightWriter(llmClient: LlmClient): CompanyInsightWriter {
  return {
    async write(question, context = {}): Promise<string> {
      const company = question.correctAnswer.company;
      try {
        const response = await llmClient.invoke({
          systemPrompt: SYSTEM_PROMPT,
          userMessage: `Company: ${company}\nBackground: ${question.background}`,
          sessionId: context.sessionId,
          credential: context.credential,
        });
        const insight = response.content.trim();
        if (insight.length >= MIN_INSIGHT_LENGTH) {
          return insight;
        }
        log.warn({ quizId: question.id, length: insight.length }, 'Insight too short, using background');
      } catch (error) {
        log.error({ err: error, quizId: question.id }, 'Company insight generation failed');
      }
      return `${company}: ${question.background}`;
    },
  };
}
