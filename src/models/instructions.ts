/**
 * Instructions, SQL examples, functions and joins scoped to the whole space.
 */

import {
  ExampleQuestionSqlDocument,
  InstructionsDocument,
  JoinSpecDocument,
  ParameterDocument,
  SqlFunctionDocument,
  TableRefDocument,
  TextInstructionDocument,
} from '../types/space-export';
import {
  check,
  checkId,
  IdentifierSchema,
  NameSchema,
  optionalText,
  TextLines,
  TextLinesInput,
  textOrUndefined,
} from './common';

export interface TextInstructionInput {
  id?: string;
  content?: TextLinesInput | null;
}

/**
 * Free-form guidance for the assistant. The service currently honours a
 * single text instruction per space.
 */
export class TextInstruction {
  readonly id: string;
  readonly content?: TextLines;

  constructor(data: TextInstructionInput = {}) {
    this.id = checkId(data.id, 'TextInstruction.id');
    this.content = optionalText(data.content);
  }

  static fromText(content: string, options?: { id?: string }): TextInstruction {
    return new TextInstruction({ id: options?.id, content: textOrUndefined(content) });
  }

  toJSON(): TextInstructionDocument {
    const json: TextInstructionDocument = { id: this.id };
    if (this.content) {
      json.content = this.content.toJSON();
    }
    return json;
  }
}

export interface ParameterInput {
  name: string;
  type_hint: string;
  description?: TextLinesInput | null;
}

/**
 * A named parameter of a parameterized example query, e.g. `:limit`.
 */
export class Parameter {
  readonly name: string;
  readonly type_hint: string;
  readonly description?: TextLines;

  constructor(data: ParameterInput) {
    this.name = check(NameSchema, data.name, 'Parameter.name');
    this.type_hint = check(NameSchema, data.type_hint, 'Parameter.type_hint');
    this.description = optionalText(data.description);
  }

  static create(name: string, typeHint: string, description?: string | null): Parameter {
    return new Parameter({ name, type_hint: typeHint, description: textOrUndefined(description) });
  }

  toJSON(): ParameterDocument {
    const json: ParameterDocument = { name: this.name, type_hint: this.type_hint };
    if (this.description) {
      json.description = this.description.toJSON();
    }
    return json;
  }
}

export interface ExampleQuestionSqlInput {
  id?: string;
  question: TextLinesInput;
  sql: TextLinesInput;
  parameters?: readonly (Parameter | ParameterInput)[] | null;
  usage_guidance?: TextLinesInput | null;
}

/**
 * An example question paired with its ground-truth SQL.
 */
export class ExampleQuestionSql {
  readonly id: string;
  readonly question: TextLines;
  readonly sql: TextLines;
  readonly parameters: readonly Parameter[];
  readonly usage_guidance?: TextLines;

  constructor(data: ExampleQuestionSqlInput) {
    this.id = checkId(data.id, 'ExampleQuestionSql.id');
    this.question = TextLines.from(data.question);
    this.sql = TextLines.from(data.sql);
    this.parameters = Object.freeze(
      (data.parameters ?? []).map((p) => (p instanceof Parameter ? p : new Parameter(p)))
    );
    this.usage_guidance = optionalText(data.usage_guidance);
  }

  static create(
    question: string,
    sql: string,
    options?: {
      parameters?: readonly Parameter[] | null;
      usageGuidance?: string | null;
      id?: string;
    }
  ): ExampleQuestionSql {
    return new ExampleQuestionSql({
      id: options?.id,
      question: TextLines.fromText(question),
      sql: TextLines.fromText(sql),
      parameters: options?.parameters,
      usage_guidance: textOrUndefined(options?.usageGuidance),
    });
  }

  toJSON(): ExampleQuestionSqlDocument {
    const json: ExampleQuestionSqlDocument = {
      id: this.id,
      question: this.question.toJSON(),
      sql: this.sql.toJSON(),
    };
    if (this.parameters.length > 0) {
      json.parameters = this.parameters.map((p) => p.toJSON());
    }
    if (this.usage_guidance) {
      json.usage_guidance = this.usage_guidance.toJSON();
    }
    return json;
  }
}

export interface SqlFunctionInput {
  id?: string;
  identifier: string;
}

/**
 * A catalog function the generated SQL may call.
 */
export class SqlFunction {
  readonly id: string;
  readonly identifier: string;

  constructor(data: SqlFunctionInput) {
    this.id = checkId(data.id, 'SqlFunction.id');
    this.identifier = check(IdentifierSchema, data.identifier, 'SqlFunction.identifier');
  }

  static create(identifier: string, options?: { id?: string }): SqlFunction {
    return new SqlFunction({ id: options?.id, identifier });
  }

  toJSON(): SqlFunctionDocument {
    return { id: this.id, identifier: this.identifier };
  }
}

export interface TableRefInput {
  identifier: string;
  alias: string;
}

/**
 * One side of a join: a table or metric view and the alias used in the condition.
 */
export class TableRef {
  readonly identifier: string;
  readonly alias: string;

  constructor(data: TableRefInput) {
    this.identifier = check(IdentifierSchema, data.identifier, 'TableRef.identifier');
    this.alias = check(NameSchema, data.alias, 'TableRef.alias');
  }

  toJSON(): TableRefDocument {
    return { identifier: this.identifier, alias: this.alias };
  }
}

export interface JoinSpecInput {
  id?: string;
  left: TableRef | TableRefInput;
  right: TableRef | TableRefInput;
  sql: TextLinesInput;
  comment?: TextLinesInput | null;
}

export class JoinSpec {
  readonly id: string;
  readonly left: TableRef;
  readonly right: TableRef;
  readonly sql: TextLines;
  readonly comment?: TextLines;

  constructor(data: JoinSpecInput) {
    this.id = checkId(data.id, 'JoinSpec.id');
    this.left = data.left instanceof TableRef ? data.left : new TableRef(data.left);
    this.right = data.right instanceof TableRef ? data.right : new TableRef(data.right);
    this.sql = TextLines.from(data.sql);
    this.comment = optionalText(data.comment);
  }

  static create(options: {
    left: TableRefInput;
    right: TableRefInput;
    condition: string;
    comment?: string | null;
    id?: string;
  }): JoinSpec {
    return new JoinSpec({
      id: options.id,
      left: options.left,
      right: options.right,
      sql: TextLines.fromText(options.condition),
      comment: textOrUndefined(options.comment),
    });
  }

  toJSON(): JoinSpecDocument {
    const json: JoinSpecDocument = {
      id: this.id,
      left: this.left.toJSON(),
      right: this.right.toJSON(),
      sql: this.sql.toJSON(),
    };
    if (this.comment) {
      json.comment = this.comment.toJSON();
    }
    return json;
  }
}

export interface InstructionsInput {
  text_instructions?: readonly (TextInstruction | TextInstructionInput)[] | null;
  example_question_sqls?: readonly (ExampleQuestionSql | ExampleQuestionSqlInput)[] | null;
  sql_functions?: readonly (SqlFunction | SqlFunctionInput)[] | null;
  join_specs?: readonly (JoinSpec | JoinSpecInput)[] | null;
}

export class Instructions {
  readonly text_instructions: readonly TextInstruction[];
  readonly example_question_sqls: readonly ExampleQuestionSql[];
  readonly sql_functions: readonly SqlFunction[];
  readonly join_specs: readonly JoinSpec[];

  constructor(data: InstructionsInput = {}) {
    this.text_instructions = Object.freeze(
      (data.text_instructions ?? []).map((t) => (t instanceof TextInstruction ? t : new TextInstruction(t)))
    );
    this.example_question_sqls = Object.freeze(
      (data.example_question_sqls ?? []).map((e) =>
        e instanceof ExampleQuestionSql ? e : new ExampleQuestionSql(e)
      )
    );
    this.sql_functions = Object.freeze(
      (data.sql_functions ?? []).map((f) => (f instanceof SqlFunction ? f : new SqlFunction(f)))
    );
    this.join_specs = Object.freeze(
      (data.join_specs ?? []).map((j) => (j instanceof JoinSpec ? j : new JoinSpec(j)))
    );
  }

  get isEmpty(): boolean {
    return (
      this.text_instructions.length === 0 &&
      this.example_question_sqls.length === 0 &&
      this.sql_functions.length === 0 &&
      this.join_specs.length === 0
    );
  }

  toJSON(): InstructionsDocument {
    const json: InstructionsDocument = {};
    if (this.text_instructions.length > 0) {
      json.text_instructions = this.text_instructions.map((t) => t.toJSON());
    }
    if (this.example_question_sqls.length > 0) {
      json.example_question_sqls = this.example_question_sqls.map((e) => e.toJSON());
    }
    if (this.sql_functions.length > 0) {
      json.sql_functions = this.sql_functions.map((f) => f.toJSON());
    }
    if (this.join_specs.length > 0) {
      json.join_specs = this.join_specs.map((j) => j.toJSON());
    }
    return json;
  }
}
