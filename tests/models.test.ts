/**
 * Unit tests for the space export models.
 */

import {
  BenchmarkAnswer,
  BenchmarkQuestion,
  Benchmarks,
  ColumnConfig,
  DataSources,
  ExampleQuestionSql,
  ID_PATTERN,
  Instructions,
  JoinSpec,
  MetricView,
  Parameter,
  SampleQuestion,
  SchemaValidationError,
  SpaceConfig,
  SpaceExport,
  SqlFunction,
  Table,
  TextInstruction,
  TextLines,
  ValidationError,
  generateId,
} from '../src/index';

describe('TextLines', () => {
  test('splits text on newlines and joins it back', () => {
    const text = 'SELECT *\nFROM orders\nWHERE amount > 10';
    const lines = TextLines.fromText(text);
    expect(lines.lines).toEqual(['SELECT *', 'FROM orders', 'WHERE amount > 10']);
    expect(lines.toText()).toBe(text);
  });

  test.each([
    'single line',
    'two\nlines',
    '',
    '\n',
    'trailing blank line\n\n',
    '\n\nleading blank lines',
    '  indented\n\tsql',
  ])('round-trips %j', (text) => {
    expect(TextLines.fromText(text).toText()).toBe(text);
  });

  test('splits a line that carries its own newlines', () => {
    const lines = new TextLines(['first', 'second\nthird']);
    expect(lines.lines).toEqual(['first', 'second', 'third']);
    expect(lines.toText()).toBe('first\nsecond\nthird');
  });

  test('from accepts text, lines or an existing value', () => {
    const existing = TextLines.fromText('a\nb');
    expect(TextLines.from(existing)).toBe(existing);
    expect(TextLines.from('a\nb').equals(existing)).toBe(true);
    expect(TextLines.from(['a', 'b']).equals(existing)).toBe(true);
    expect(TextLines.from(['a']).equals(existing)).toBe(false);
  });

  test('serializes to a plain array', () => {
    expect(JSON.stringify({ sql: TextLines.fromText('x\ny') })).toBe('{"sql":["x","y"]}');
  });
});

describe('ids', () => {
  test('generated ids are 32 lowercase hex characters', () => {
    for (let i = 0; i < 20; i++) {
      expect(generateId()).toMatch(/^[0-9a-f]{32}$/);
    }
  });

  test('every entity generates an id when none is given', () => {
    const ids = [
      SampleQuestion.fromText('Q?').id,
      TextInstruction.fromText('Be brief').id,
      ExampleQuestionSql.create('Q?', 'SELECT 1').id,
      SqlFunction.create('main.udfs.f').id,
      JoinSpec.create({
        left: { identifier: 'main.s.a', alias: 'a' },
        right: { identifier: 'main.s.b', alias: 'b' },
        condition: 'a.id = b.id',
      }).id,
      BenchmarkQuestion.create('Q?', 'SELECT 1').id,
    ];
    for (const id of ids) {
      expect(id).toMatch(ID_PATTERN);
    }
    expect(new Set(ids).size).toBe(ids.length);
  });

  test('keeps an explicit valid id', () => {
    const sq = SampleQuestion.fromText('Question', { id: 'abcdefabcdefabcdefabcdefabcdef12' });
    expect(sq.id).toBe('abcdefabcdefabcdefabcdefabcdef12');
  });

  test.each(['custom123', 'ABCDEFABCDEFABCDEFABCDEFABCDEF12', '0123456789abcdef0123456789abcdef0', ''])(
    'rejects explicit id %j',
    (id) => {
      expect(() => SampleQuestion.fromText('Question', { id })).toThrow(SchemaValidationError);
    }
  );

  test('reports the offending field', () => {
    try {
      new SqlFunction({ id: 'not-an-id', identifier: 'main.udfs.f' });
      throw new Error('expected a SchemaValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.path).toBe('SqlFunction.id');
        expect(error.message).toBe('SqlFunction.id: must be 32 lowercase hexadecimal characters');
      }
    }
  });
});

describe('SampleQuestion', () => {
  test('fromText keeps a single line as one entry', () => {
    const sq = SampleQuestion.fromText('What is the total revenue?');
    expect(sq.question.lines).toEqual(['What is the total revenue?']);
  });

  test('fromText splits multi-line questions', () => {
    const sq = SampleQuestion.fromText('Line 1\nLine 2\nLine 3');
    expect(sq.question.lines).toEqual(['Line 1', 'Line 2', 'Line 3']);
  });
});

describe('ColumnConfig', () => {
  test('create with only a name leaves everything else unset', () => {
    const col = ColumnConfig.create('order_id');
    expect(col.column_name).toBe('order_id');
    expect(col.description).toBeUndefined();
    expect(col.synonyms).toEqual([]);
    expect(col.toJSON()).toEqual({ column_name: 'order_id' });
  });

  test('create with all options', () => {
    const col = ColumnConfig.create('order_id', {
      description: 'Primary key',
      synonyms: ['id', 'orderid'],
      getExampleValues: true,
      buildValueDictionary: true,
    });
    expect(col.description?.lines).toEqual(['Primary key']);
    expect(col.synonyms).toEqual(['id', 'orderid']);
    expect(col.toJSON()).toEqual({
      column_name: 'order_id',
      description: ['Primary key'],
      synonyms: ['id', 'orderid'],
      get_example_values: true,
      build_value_dictionary: true,
    });
  });

  test('flags left false are not recorded', () => {
    const col = ColumnConfig.create('email', { exclude: false, getExampleValues: false });
    expect(col.exclude).toBeUndefined();
    expect(col.get_example_values).toBeUndefined();
  });

  test('explicit false flags from a document are kept', () => {
    const col = new ColumnConfig({ column_name: 'email', exclude: false });
    expect(col.toJSON()).toEqual({ column_name: 'email', exclude: false });
  });

  test('synonyms are de-duplicated in first-seen order', () => {
    const col = ColumnConfig.create('status', { synonyms: ['state', 'order_status', 'state'] });
    expect(col.synonyms).toEqual(['state', 'order_status']);
  });

  test('rejects an empty column name', () => {
    expect(() => ColumnConfig.create('  ')).toThrow('ColumnConfig.column_name: must not be empty');
  });
});

describe('Table and MetricView', () => {
  test('create a minimal table', () => {
    const table = Table.create('catalog.schema.table');
    expect(table.identifier).toBe('catalog.schema.table');
    expect(table.description).toBeUndefined();
    expect(table.column_configs).toEqual([]);
  });

  test('create a table with column configs', () => {
    const table = Table.create('sales.prod.orders', {
      description: 'Order data',
      columnConfigs: [ColumnConfig.create('order_id', { description: 'Primary key' }), ColumnConfig.create('customer_id')],
    });
    expect(table.description?.toText()).toBe('Order data');
    expect(table.column_configs).toHaveLength(2);
  });

  test('an empty description is treated as absent', () => {
    expect(Table.create('a.b.c', { description: '' }).description).toBeUndefined();
  });

  test.each(['orders', '', 'sales..orders', '.orders', 'sales.prod.'])('rejects identifier %j', (identifier) => {
    expect(() => Table.create(identifier)).toThrow(SchemaValidationError);
    expect(() => MetricView.create(identifier)).toThrow(SchemaValidationError);
  });

  test('metric view with description', () => {
    const mv = MetricView.create('sales.analytics.revenue_mv', { description: 'Daily\nrevenue' });
    expect(mv.toJSON()).toEqual({ identifier: 'sales.analytics.revenue_mv', description: ['Daily', 'revenue'] });
  });
});

describe('Instructions', () => {
  test('text instruction from text', () => {
    const ti = TextInstruction.fromText('Use DATE for dates\nAmounts are USD');
    expect(ti.content?.lines).toEqual(['Use DATE for dates', 'Amounts are USD']);
  });

  test('text instruction from empty text has no content', () => {
    const ti = TextInstruction.fromText('', { id: '22222222222222222222222222222222' });
    expect(ti.toJSON()).toEqual({ id: '22222222222222222222222222222222' });
  });

  test('example SQL with parameters and guidance', () => {
    const ex = ExampleQuestionSql.create('Top N products', 'SELECT *\nFROM products\nLIMIT :n', {
      parameters: [Parameter.create('n', 'INTEGER', 'Number of results')],
      usageGuidance: 'Use for top-N queries',
    });
    expect(ex.sql.lines).toEqual(['SELECT *', 'FROM products', 'LIMIT :n']);
    expect(ex.parameters).toHaveLength(1);
    expect(ex.parameters[0].name).toBe('n');
    expect(ex.parameters[0].type_hint).toBe('INTEGER');
    expect(ex.usage_guidance?.lines).toEqual(['Use for top-N queries']);
  });

  test('parameter requires a type hint', () => {
    expect(() => Parameter.create('n', '')).toThrow('Parameter.type_hint: must not be empty');
  });

  test('join spec', () => {
    const join = JoinSpec.create({
      left: { identifier: 'sales.orders', alias: 'o' },
      right: { identifier: 'sales.customers', alias: 'c' },
      condition: 'o.customer_id = c.id',
      comment: 'Join for customer details',
      id: '55555555555555555555555555555555',
    });
    expect(join.toJSON()).toEqual({
      id: '55555555555555555555555555555555',
      left: { identifier: 'sales.orders', alias: 'o' },
      right: { identifier: 'sales.customers', alias: 'c' },
      sql: ['o.customer_id = c.id'],
      comment: ['Join for customer details'],
    });
  });

  test('join sides must name a dotted table identifier', () => {
    expect(() =>
      JoinSpec.create({
        left: { identifier: 'orders', alias: 'o' },
        right: { identifier: 'sales.customers', alias: 'c' },
        condition: 'o.customer_id = c.id',
      })
    ).toThrow("TableRef.identifier: must be a dotted name such as 'catalog.schema.table'");
  });

  test('accepts more than one text instruction', () => {
    const instructions = new Instructions({
      text_instructions: [TextInstruction.fromText('first'), TextInstruction.fromText('second')],
    });
    expect(instructions.text_instructions).toHaveLength(2);
  });
});

describe('Benchmarks', () => {
  test('create a benchmark question with a SQL answer', () => {
    const bq = BenchmarkQuestion.create('Total revenue?', 'SELECT SUM(revenue)\nFROM sales');
    expect(bq.question.lines).toEqual(['Total revenue?']);
    expect(bq.answer).toHaveLength(1);
    expect(bq.answer[0].format).toBe('SQL');
    expect(bq.answer[0].content.lines).toEqual(['SELECT SUM(revenue)', 'FROM sales']);
  });

  test('answer format defaults to SQL', () => {
    expect(new BenchmarkAnswer({ content: ['SELECT 1'] }).format).toBe('SQL');
  });

  test('rejects answer formats other than SQL', () => {
    expect(() => new BenchmarkAnswer({ format: 'CSV', content: ['a,b'] })).toThrow(
      'BenchmarkAnswer.format: unsupported answer format (only SQL is supported)'
    );
  });
});

describe('SpaceExport', () => {
  test('an empty export has version 1 and empty sections', () => {
    const space = new SpaceExport();
    expect(space.version).toBe(1);
    expect(space.config.sample_questions).toEqual([]);
    expect(space.data_sources.isEmpty).toBe(true);
    expect(space.toJSON()).toEqual({ version: 1 });
  });

  test.each([0, -1, 1.5, Number.NaN])('rejects version %p', (version) => {
    expect(() => new SpaceExport({ version })).toThrow(SchemaValidationError);
  });

  test('accepts plain objects for nested sections', () => {
    const space = new SpaceExport({
      config: { sample_questions: [{ question: 'How many orders?' }] },
      data_sources: { tables: [{ identifier: 'sales.prod.orders' }] },
    });
    expect(space.config).toBeInstanceOf(SpaceConfig);
    expect(space.config.sample_questions[0]).toBeInstanceOf(SampleQuestion);
    expect(space.data_sources).toBeInstanceOf(DataSources);
    expect(space.data_sources.tables[0].identifier).toBe('sales.prod.orders');
  });

  test('collections are frozen', () => {
    const space = new SpaceExport({ benchmarks: new Benchmarks({ questions: [BenchmarkQuestion.create('Q?', 'SELECT 1')] }) });
    expect(Object.isFrozen(space.benchmarks.questions)).toBe(true);
    expect(Object.isFrozen(space.benchmarks.questions[0].question.lines)).toBe(true);
  });

  test('a new export can be derived from an existing one', () => {
    const current = new SpaceExport({ config: new SpaceConfig({ sample_questions: [SampleQuestion.fromText('First?')] }) });
    const next = new SpaceExport({
      ...current,
      config: { sample_questions: [...current.config.sample_questions, SampleQuestion.fromText('Second?')] },
    });
    expect(current.config.sample_questions).toHaveLength(1);
    expect(next.config.sample_questions.map((q) => q.question.toText())).toEqual(['First?', 'Second?']);
    expect(next.config.sample_questions[0]).toBe(current.config.sample_questions[0]);
  });

  test('equality is structural', () => {
    const build = () =>
      new SpaceExport({
        config: { sample_questions: [SampleQuestion.fromText('Q?', { id: '0123456789abcdef0123456789abcdef' })] },
        data_sources: { tables: [Table.create('a.b.c', { description: 'T' })] },
      });
    expect(build().equals(build())).toBe(true);
    expect(build().equals(new SpaceExport())).toBe(false);
  });
});
