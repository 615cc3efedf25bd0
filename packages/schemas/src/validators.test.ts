import { describe, it, expect } from 'vitest';
import { validateAgentConfig, validateQuizBank } from './validators.js';
import { SchemaValidationError } from '@market-agent/shared/src/utils/errors.js';

const validQuestion = {
  id: 1,
  question: 'Which company makes the Galaxy smartphone line?',
  options: { '1': 'Samsung Electronics', '2': 'LG Electronics', '3': 'SK hynix', '4': 'Naver' },
  correctAnswer: { number: '1', company: 'Samsung Electronics', symbol: '①' },
  background: 'A consumer electronics maker headquartered in Suwon.',
};

describe('validateQuizBank', () => {
  const validBank = { version: '1.0.0', questions: [validQuestion] };

  it('should accept a valid quiz bank', () => {
    const result = validateQuizBank(validBank);
    expect(result.questions).toHaveLength(1);
    expect(result.questions[0].correctAnswer.company).toBe('Samsung Electronics');
  });

  it('should reject a question shorter than ten characters', () => {
    const invalid = { ...validBank, questions: [{ ...validQuestion, question: 'Too short' }] };
    expect(() => validateQuizBank(invalid)).toThrow(SchemaValidationError);
  });

  it('should reject a non-positive question id', () => {
    const invalid = { ...validBank, questions: [{ ...validQuestion, id: 0 }] };
    expect(() => validateQuizBank(invalid)).toThrow(SchemaValidationError);
  });

  it('should reject a question with a missing option', () => {
    const invalid = {
      ...validBank,
      questions: [
        {
          ...validQuestion,
          options: { '1': 'Samsung Electronics', '2': 'LG Electronics', '3': 'SK hynix' },
        },
      ],
    };
    expect(() => validateQuizBank(invalid)).toThrow(SchemaValidationError);
  });

  it('should reject an answer that does not match its option', () => {
    const invalid = {
      ...validBank,
      questions: [
        {
          ...validQuestion,
          correctAnswer: { number: '2', company: 'Samsung Electronics', symbol: '②' },
        },
      ],
    };

    try {
      validateQuizBank(invalid);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      expect((error as SchemaValidationError).validationErrors).toContain(
        'questions.0.correctAnswer.company: Option 2 is "LG Electronics", not "Samsung Electronics"',
      );
    }
  });

  it('should reject a symbol that does not match the answer number', () => {
    const invalid = {
      ...validBank,
      questions: [
        {
          ...validQuestion,
          correctAnswer: { number: '1', company: 'Samsung Electronics', symbol: '③' },
        },
      ],
    };
    expect(() => validateQuizBank(invalid)).toThrow(SchemaValidationError);
  });

  it('should reject duplicate question ids', () => {
    const invalid = { ...validBank, questions: [validQuestion, validQuestion] };
    expect(() => validateQuizBank(invalid)).toThrow(SchemaValidationError);
  });
});

describe('validateAgentConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = validateAgentConfig({ completion: {}, session: {}, news: {} });

    expect(config.port).toBe(3000);
    expect(config.mockLlm).toBe(false);
    expect(config.storage).toBe('memory');
    expect(config.completion.timeoutMs).toBe(30000);
    expect(config.completion.maxTokens).toBe(4000);
    expect(config.session.idleTimeoutMinutes).toBe(10);
    expect(config.session.capacity).toBe(5);
  });

  it('should coerce numeric strings', () => {
    const config = validateAgentConfig({
      port: '8080',
      completion: { timeoutMs: '5000' },
      session: { capacity: '20' },
      news: {},
    });

    expect(config.port).toBe(8080);
    expect(config.completion.timeoutMs).toBe(5000);
    expect(config.session.capacity).toBe(20);
  });

  it('should reject an unknown storage backend', () => {
    expect(() =>
      validateAgentConfig({ storage: 'postgres', completion: {}, session: {}, news: {} }),
    ).toThrow(SchemaValidationError);
  });
});
