/**
 * @fileoverview Ready-to-run decision strategy backed by configured round content.
 */

import type { PlayerQuestion } from '@q21-referee/protocol';
import type {
  Answer,
  AnswersOutput,
  RoundStartInfoOutput,
  ScoreFeedbackOutput,
  WarmupQuestionOutput,
} from '../callbacks/outputSchemas.js';
import type {
  AnswersContext,
  RefereeAI,
  RoundStartContext,
  ScoreFeedbackContext,
  WarmupContext,
} from '../callbacks/types.js';
import type { RefereeConfig } from '../config/refereeConfig.js';
import { scoreGuess } from './scoring.js';

export interface DemoContent {
  readonly warmupQuestion: string;
  readonly bookName: string;
  readonly bookHint: string;
  readonly associationWord: string;
  readonly openingSentence: string;
}

export const DEFAULT_DEMO_CONTENT: DemoContent = {
  warmupQuestion: 'What is 2 + 2?',
  bookName: 'The Lighthouse Keeper',
  bookHint: 'A quiet story about a keeper who logs every passing ship through one long winter',
  associationWord: 'lantern',
  openingSentence: 'The lamp had burned for forty years before anyone thought to ask who lit it.',
};

export function demoContentFromConfig(demo: RefereeConfig['demo']): DemoContent {
  return {
    warmupQuestion: demo.warmupQuestion ?? DEFAULT_DEMO_CONTENT.warmupQuestion,
    bookName: demo.bookName ?? DEFAULT_DEMO_CONTENT.bookName,
    bookHint: demo.bookHint ?? DEFAULT_DEMO_CONTENT.bookHint,
    associationWord: demo.associationWord ?? DEFAULT_DEMO_CONTENT.associationWord,
    openingSentence: demo.openingSentence ?? DEFAULT_DEMO_CONTENT.openingSentence,
  };
}

export class DemoRefereeAI implements RefereeAI {
  constructor(private readonly content: DemoContent = DEFAULT_DEMO_CONTENT) {}

  getWarmupQuestion(_context: WarmupContext): WarmupQuestionOutput {
    return { warmup_question: this.content.warmupQuestion };
  }

  getRoundStartInfo(_context: RoundStartContext): RoundStartInfoOutput {
    return {
      book_name: this.content.bookName,
      book_hint: this.content.bookHint,
      association_word: this.content.associationWord,
      actual_opening_sentence: this.content.openingSentence,
      actual_associative_word: this.content.associationWord,
    };
  }

  /**
   * 'A' for a question that names the association word, 'Not Relevant' otherwise.
   */
  getAnswers(context: AnswersContext): AnswersOutput {
    const word = context.dynamic.association_word.toLowerCase();
    const answers = context.dynamic.questions.map((question, index): Answer => {
      const text = questionText(question).toLowerCase();
      return {
        question_number: questionNumber(question, index),
        answer: word !== '' && text.includes(word) ? 'A' : 'Not Relevant',
      };
    });
    return { answers };
  }

  getScoreFeedback(context: ScoreFeedbackContext): ScoreFeedbackOutput {
    const { dynamic } = context;
    const guess = dynamic.player_guess;
    return scoreGuess({
      actualSentence: dynamic.actual_opening_sentence ?? this.content.openingSentence,
      actualWord: dynamic.actual_associative_word ?? this.content.associationWord,
      sentenceGuess: guess.opening_sentence,
      sentenceJustification: guess.sentence_justification,
      wordGuess: guess.associative_word,
      wordJustification: guess.word_justification,
    });
  }
}

function questionNumber(question: PlayerQuestion, index: number): number {
  const value = question['question_number'];
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 ? value : index + 1;
}

function questionText(question: PlayerQuestion): string {
  const value = question['question_text'];
  return typeof value === 'string' ? value : '';
}
