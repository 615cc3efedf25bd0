export type QuizPhase = 'inactive' | 'asking' | 'processing' | 'completed';

export type OptionNumber = '1' | '2' | '3' | '4';

export interface QuizQuestion {
  readonly id: number;
  readonly question: string;
  readonly options: Readonly<Record<OptionNumber, string>>;
  readonly correctAnswer: {
    readonly number: OptionNumber;
    readonly company: string;
    readonly symbol: string;
  };
  readonly background: string;
}

export interface InactiveQuizSession {
  readonly phase: 'inactive';
}

export interface ActiveQuizSession {
  readonly phase: 'asking' | 'processing' | 'completed';
  readonly quizSessionId: string;
  readonly startedAt: string;
  readonly question: QuizQuestion;
  readonly hintUsed: boolean;
}

export type QuizSession = InactiveQuizSession | ActiveQuizSession;

export interface RewardHolding {
  readonly stock: string;
  readonly shares: number;
}

export interface RewardPackage {
  readonly eligible: boolean;
  readonly stock: string;
  readonly ticker?: string;
  readonly shares: number;
  readonly referencePrice?: number;
  readonly referenceDate?: string;
  readonly nextEligibleAt?: string;
  readonly totalRewards: readonly RewardHolding[];
}

export interface QuizHistoryRecord {
  readonly requestId: string;
  readonly quizId: number;
  readonly quizQuestion: string;
  readonly correctAnswer: string;
  readonly userAnswer: string;
  readonly isCorrect: boolean;
  readonly hintUsed: boolean;
  readonly rewardStock?: string;
  readonly rewardAmount: number;
  readonly completedAt: string;
  readonly createdAt: string;
}

export type QuizOutcomeType =
  | 'started'
  | 'hint'
  | 'correct'
  | 'incorrect'
  | 'completed'
  | 'expired'
  | 'error';

export interface QuizOutcome {
  readonly type: QuizOutcomeType;
  readonly message: string;
  readonly quizId?: number;
  readonly reward?: RewardPackage;
}
