/**
 * Space-level configuration: the sample questions shown to end users.
 *
 * Warehouse, title and description are not part of the serialized blob; they
 * travel as separate fields of the create and update requests.
 */

import { SampleQuestionDocument, SpaceConfigDocument } from '../types/space-export';
import { checkId, TextLines, TextLinesInput } from './common';

export interface SampleQuestionInput {
  id?: string;
  question: TextLinesInput;
}

export class SampleQuestion {
  readonly id: string;
  readonly question: TextLines;

  constructor(data: SampleQuestionInput) {
    this.id = checkId(data.id, 'SampleQuestion.id');
    this.question = TextLines.from(data.question);
  }

  static fromText(question: string, options?: { id?: string }): SampleQuestion {
    return new SampleQuestion({ id: options?.id, question: TextLines.fromText(question) });
  }

  toJSON(): SampleQuestionDocument {
    return {
      id: this.id,
      question: this.question.toJSON(),
    };
  }
}

export interface SpaceConfigInput {
  sample_questions?: readonly (SampleQuestion | SampleQuestionInput)[] | null;
}

export class SpaceConfig {
  readonly sample_questions: readonly SampleQuestion[];

  constructor(data: SpaceConfigInput = {}) {
    this.sample_questions = Object.freeze(
      (data.sample_questions ?? []).map((q) => (q instanceof SampleQuestion ? q : new SampleQuestion(q)))
    );
  }

  get isEmpty(): boolean {
    return this.sample_questions.length === 0;
  }

  toJSON(): SpaceConfigDocument {
    const json: SpaceConfigDocument = {};
    if (this.sample_questions.length > 0) {
      json.sample_questions = this.sample_questions.map((q) => q.toJSON());
    }
    return json;
  }
}
