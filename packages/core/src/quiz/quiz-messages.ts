import type { OptionNumber, QuizQuestion, RewardPackage } from '@market-agent/shared/src/types/quiz.types.js';
import { OPTION_SYMBOLS } from '@market-agent/schemas/src/quiz-bank.schema.js';
import { NEWS_HINT_FALLBACK, type NewsHint } from './hint-provider.js';

const OPTION_ORDER: readonly OptionNumber[] = ['1', '2', '3', '4'];

export const QUIZ_RESTART_PROMPT = "🎯 새로운 퀴즈를 원하시면 '주식퀴즈'를 입력해주세요!";
export const QUIZ_CONTINUES = '퀴즈는 계속 진행 중입니다. 답변을 입력해주세요!';
export const QUIZ_EXPIRED_MESSAGE = `⏰ 퀴즈 제한 시간(10분)이 지나 퀴즈가 종료되었습니다.\n${QUIZ_RESTART_PROMPT}`;
export const QUIZ_CLOSED_MESSAGE = `이전 퀴즈가 종료되었습니다.\n${QUIZ_RESTART_PROMPT}`;
export const QUIZ_ERROR_MESSAGE = '퀴즈 진행 중 오류가 발생했습니다. 퀴즈를 다시 시작해주세요.';
export const QUIZ_CHECK_FAILED_MESSAGE =
  '답변을 확인하는 중 오류가 발생했습니다. 잠시 후 다시 입력해주세요.';

export function formatQuizStart(question: QuizQuestion): string {
  const options = OPTION_ORDER.map((n) => `${OPTION_SYMBOLS[n]} ${question.options[n]}`);
  return [
    '🎯 주식 퀴즈 도전!',
    `문제 #${String(question.id)}`,
    '',
    `Q. ${question.question}`,
    '',
    ...options,
    '',
    "💡 번호(1,2,3,4), 기업명, 또는 '힌트'를 입력해주세요!",
  ].join('\n');
}

function formatNewsHint(news: NewsHint): string {
  if (!news.available) {
    return `📰 ${NEWS_HINT_FALLBACK}`;
  }
  return [
    '📰 **최근 뉴스 기반 힌트**',
    '',
    '최근 뉴스에서 발견된 관련 키워드:',
    `💡 ${news.keywords.join(', ')}`,
    '',
    '이 키워드들과 관련된 기업을 생각해보세요!',
  ].join('\n');
}

export function formatHint(keywordHint: string, news: NewsHint): string {
  return [`💡 **힌트**: ${keywordHint}`, '', formatNewsHint(news), '', '---', QUIZ_CONTINUES].join(
    '\n',
  );
}

export function formatWrongAnswer(userAnswer: string, hint: string): string {
  return [
    '**오답입니다!**',
    '',
    `입력하신 답변: ${userAnswer}`,
    '정답은 다른 선택지입니다.',
    '',
    `💡 **힌트**: ${hint}`,
    '',
    '다시 답변해보세요!',
  ].join('\n');
}

function formatRewardSection(reward: RewardPackage | undefined): string[] {
  if (!reward) {
    return ['⚠️ 보상 정보를 처리하지 못했습니다.', ''];
  }

  const lines: string[] = [];
  if (reward.eligible) {
    lines.push('🎁 **보상**', `${reward.stock} ${String(reward.shares)}주를 받았습니다!`);
    if (reward.referencePrice !== undefined && reward.referenceDate) {
      lines.push(`종가: ${reward.referencePrice.toLocaleString('ko-KR')}원 (${reward.referenceDate})`);
    }
  } else {
    lines.push(
      '⏰ **보상 지급 제한**',
      '',
      '하루에 한 번만 주식 보상을 받을 수 있습니다.',
      `다음 보상 가능 시간: ${reward.nextEligibleAt ?? '-'}`,
      '',
      '그래도 퀴즈는 계속 풀 수 있으니 도전해보세요!',
    );
  }
  lines.push('');

  lines.push('📊 **현재 보유 주식**');
  if (reward.totalRewards.length === 0) {
    lines.push('아직 받은 보상이 없습니다.');
  } else {
    lines.push(...reward.totalRewards.map((h) => `• ${h.stock}: ${String(h.shares)}주`));
  }
  lines.push('');
  return lines;
}

export function formatCorrectAnswer(
  question: QuizQuestion,
  insight: string,
  reward: RewardPackage | undefined,
): string {
  const { number, company } = question.correctAnswer;
  return [
    `🎉 정답입니다! 정답은 ${OPTION_SYMBOLS[number]} ${company}입니다.`,
    '',
    '📚 **기업 정보**',
    insight,
    '',
    ...formatRewardSection(reward),
    '---',
    QUIZ_RESTART_PROMPT,
  ].join('\n');
}
