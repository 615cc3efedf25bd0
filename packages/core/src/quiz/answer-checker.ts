import { z } from 'zod';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { OptionNumber, QuizQuestion } from '@market-agent/shared/src/types/quiz.types.js';
import { OPTION_SYMBOLS } from '@market-agent/schemas/src/quiz-bank.schema.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';

const log = createChildLogger('quiz:answer-checker');

const OPTION_NUMBERS: readonly OptionNumber[] = ['1', '2', '3', '4'];

export const AnswerCheckSchema = z.object({
  isCorrect: z.boolean(),
  confidence: z.number().min(0).max(100),
  reason: z.string(),
});

export interface AnswerCheck extends z.infer<typeof AnswerCheckSchema> {
  readonly method: 'rule' | 'model';
}

export interface AnswerContext {
  readonly sessionId?: string;
  readonly credential?: string;
}

export interface AnswerChecker {
  /** Throws when neither the rules nor the model can decide. */
  check(question: QuizQuestion, answer: string, context?: AnswerContext): Promise<AnswerCheck>;
}

const NUMBER_PATTERN = /^([1-4])\s*번?$/;

function chosenOption(question: QuizQuestion, answer: string): OptionNumber | undefined {
  const trimmed = answer.trim();

  const numbered = NUMBER_PATTERN.exec(trimmed);
  if (numbered) {
    return OPTION_NUMBERS.find((n) => n === numbered[1]);
  }

  const bySymbol = OPTION_NUMBERS.find((n) => trimmed.startsWith(OPTION_SYMBOLS[n]));
  if (bySymbol) {
    return bySymbol;
  }

  // Longest name wins so "삼성전자우" is not read as "삼성전자".
  const lowered = trimmed.toLowerCase();
  const byName = OPTION_NUMBERS.filter((n) => lowered.includes(question.options[n].toLowerCase()))
    .sort((a, b) => question.options[b].length - question.options[a].length);
  return byName[0];
}

/** Option numbers, circled symbols and option names; undefined when none appear. */
export function matchAnswerByRule(question: QuizQuestion, answer: string): AnswerCheck | undefined {
  const option = chosenOption(question, answer);
  if (!option) {
    return undefined;
  }
  const isCorrect = option === question.correctAnswer.number;
  return {
    isCorrect,
    confidence: 100,
    reason: `Answer selects option ${option} (${question.options[option]})`,
    method: 'rule',
  };
}

const SYSTEM_PROMPT = `You are a quiz answer checker for a Korean stock quiz.
Decide whether the user's free-form answer identifies the correct company.
Accept abbreviations, English names and common nicknames of the correct company.
Reject answers naming another option or several companies at once.
Return JSON: {"isCorrect": boolean, "confidence": 0-100, "reason": "short explanation"}.`;

function buildUserMessage(question: QuizQuestion, answer: string): string {
  const options = OPTION_NUMBERS.map((n) => `${n}. ${question.options[n]}`).join('\n');
  return `Question: ${question.question}
Options:
${options}
Correct answer: ${question.correctAnswer.number}. ${question.correctAnswer.company}
User answer: ${answer}`;
}

export function createAnswerChecker(llmClient: LlmClient): AnswerChecker {
  return {
    async check(
      question: QuizQuestion,
      answer: string,
      context: AnswerContext = {},
    ): Promise<AnswerCheck> {
      const ruled = matchAnswerByRule(question, answer);
      if (ruled) {
        log.debug({ quizId: question.id, isCorrect: ruled.isCorrect }, 'Answer matched by rule');
        return ruled;
      }

      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: SYSTEM_PROMPT,
          userMessage: buildUserMessage(question, answer),
          sessionId: context.sessionId,
          credential: context.credential,
        },
        schema: AnswerCheckSchema,
        agentName: 'answer-checker',
      });

      log.debug(
        { quizId: question.id, isCorrect: result.isCorrect, confidence: result.confidence },
        'Answer checked by model',
      );
      return { ...result, method: 'model' };
    },
  };
}
