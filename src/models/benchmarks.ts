/**
 * Benchmark questions used to evaluate a space's answers.
 */

import { z } from 'zod';
import {
  BenchmarkAnswerDocument,
  BenchmarkQuestionDocument,
  BenchmarksDocument,
} from '../types/space-export';
import { check, checkId, TextLines, TextLinesInput } from './common';

/**
 * Answer formats the service accepts. Only SQL answers are supported today;
 * a new format is added here and nowhere else.
 */
export const AnswerFormatSchema = z.enum(['SQL'], {
  errorMap: () => ({ message: 'unsupported answer format (only SQL is supported)' }),
});

export type AnswerFormat = z.infer<typeof AnswerFormatSchema>;

export interface BenchmarkAnswerInput {
  format?: string;
  content: TextLinesInput;
}

export class BenchmarkAnswer {
  readonly format: AnswerFormat;
  readonly content: TextLines;

  constructor(data: BenchmarkAnswerInput) {
    this.format = check(AnswerFormatSchema, data.format ?? 'SQL', 'BenchmarkAnswer.format');
    this.content = TextLines.from(data.content);
  }

  static fromSql(sql: string): BenchmarkAnswer {
    return new BenchmarkAnswer({ format: 'SQL', content: TextLines.fromText(sql) });
  }

  toJSON(): BenchmarkAnswerDocument {
    return { format: this.format, content: this.content.toJSON() };
  }
}

export interface BenchmarkQuestionInput {
  id?: string;
  question: TextLinesInput;
  answer: readonly (BenchmarkAnswer | BenchmarkAnswerInput)[];
}

export class BenchmarkQuestion {
  readonly id: string;
  readonly question: TextLines;
  readonly answer: readonly BenchmarkAnswer[];

  constructor(data: BenchmarkQuestionInput) {
    this.id = checkId(data.id, 'BenchmarkQuestion.id');
    this.question = TextLines.from(data.question);
    this.answer = Object.freeze(
      data.answer.map((a) => (a instanceof BenchmarkAnswer ? a : new BenchmarkAnswer(a)))
    );
  }

  static create(question: string, sqlAnswer: string, options?: { id?: string }): BenchmarkQuestion {
    return new BenchmarkQuestion({
      id: options?.id,
      question: TextLines.fromText(question),
      answer: [BenchmarkAnswer.fromSql(sqlAnswer)],
    });
  }

  toJSON(): BenchmarkQuestionDocument {
    return {
      id: this.id,
      question: this.question.toJSON(),
      answer: this.answer.map((a) => a.toJSON()),
    };
  }
}

export interface BenchmarksInput {
  questions?: readonly (BenchmarkQuestion | BenchmarkQuestionInput)[] | null;
}

export class Benchmarks {
  readonly questions: readonly BenchmarkQuestion[];

  constructor(data: BenchmarksInput = {}) {
    this.questions = Object.freeze(
      (data.questions ?? []).map((q) => (q instanceof BenchmarkQuestion ? q : new BenchmarkQuestion(q)))
    );
  }

  get isEmpty(): boolean {
    return this.questions.length === 0;
  }

  toJSON(): BenchmarksDocument {
    const json: BenchmarksDocument = {};
    if (this.questions.length > 0) {
      json.questions = this.questions.map((q) => q.toJSON());
    }
    return json;
  }
}
