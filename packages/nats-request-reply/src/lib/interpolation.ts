import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';

import { nuid } from 'nats';

import { PipelineRecord } from './pipeline.record';
import { errorMessage, TemplateEvaluationError } from './request-reply.errors';

/**
 * Evaluates a template against a record.
 */
export interface Interpolator {
  /**
   * @throws TemplateEvaluationError when the template is malformed or one of its
   * expressions cannot be evaluated against the record
   */
  evaluate(template: string, record: PipelineRecord): string;
}

export interface Expression {
  source: string;
  fn: string;
  argument?: string;
  fallback?: string;
}

export type Segment = { kind: 'text'; text: string } | { kind: 'expression'; expression: Expression };

interface FunctionDefinition {
  takesArgument: boolean;
  evaluate(record: PipelineRecord, argument?: string): string | undefined;
  missing?(argument?: string): string;
}

const FUNCTIONS: Record<string, FunctionDefinition> = {
  meta: {
    takesArgument: true,
    evaluate: (record, key) =>
      key === undefined ? JSON.stringify(Object.fromEntries(record.metadataEntries())) : record.getMeta(key),
    missing: (key) => `metadata value "${key}" not found`
  },
  json: {
    takesArgument: true,
    evaluate: (record, path) => stringify(lookup(parseBody(record), path)),
    missing: (path) => `json path "${path}" not found`
  },
  content: {
    takesArgument: false,
    evaluate: (record) => record.asString()
  },
  uuid_v4: {
    takesArgument: false,
    evaluate: () => randomUUID()
  },
  nuid: {
    takesArgument: false,
    evaluate: () => nuid.next()
  },
  hostname: {
    takesArgument: false,
    evaluate: () => hostname()
  },
  timestamp_unix: {
    takesArgument: false,
    evaluate: () => String(Math.floor(Date.now() / 1000))
  },
  timestamp_unix_nano: {
    takesArgument: false,
    evaluate: () => (BigInt(Date.now()) * 1_000_000n).toString()
  }
};

/**
 * Interpolates `${! <expr> }` segments in literal text.
 *
 * An expression is a function call, optionally followed by `.or("fallback")`:
 * `meta("key")`, `meta()`, `json("a.b")`, `json()`, `content()`, `uuid_v4()`,
 * `nuid()`, `hostname()`, `timestamp_unix()` and `timestamp_unix_nano()`.
 * `${{!...}}` renders a literal `${!...}`.
 *
 * Templates are compiled on first use and cached.
 */
export class ExpressionInterpolator implements Interpolator {
  private readonly compiled = new Map<string, Segment[]>();

  evaluate(template: string, record: PipelineRecord): string {
    let segments = this.compiled.get(template);
    if (!segments) {
      segments = compileTemplate(template);
      this.compiled.set(template, segments);
    }

    let result = '';
    for (const segment of segments) {
      result += segment.kind === 'text' ? segment.text : evaluateExpression(segment.expression, record);
    }
    return result;
  }
}

export function compileTemplate(template: string): Segment[] {
  const segments: Segment[] = [];
  let text = '';
  let position = 0;

  while (position < template.length) {
    if (template.startsWith('${{!', position)) {
      const end = template.indexOf('}}', position + 4);
      if (end === -1) {
        throw new TemplateEvaluationError(`unterminated escape sequence at position ${position} in "${template}"`);
      }
      text += '${!' + template.slice(position + 4, end) + '}';
      position = end + 2;
      continue;
    }

    if (template.startsWith('${!', position)) {
      const end = findClosingBrace(template, position + 3);
      if (end === -1) {
        throw new TemplateEvaluationError(`unterminated interpolation at position ${position} in "${template}"`);
      }
      if (text.length > 0) {
        segments.push({ kind: 'text', text });
        text = '';
      }
      segments.push({ kind: 'expression', expression: new ExpressionParser(template.slice(position + 3, end)).parse() });
      position = end + 1;
      continue;
    }

    text += template[position];
    position++;
  }

  if (text.length > 0) {
    segments.push({ kind: 'text', text });
  }
  return segments;
}

function findClosingBrace(template: string, from: number): number {
  let inString = false;
  for (let i = from; i < template.length; i++) {
    const char = template[i];
    if (inString) {
      if (char === '\\') {
        i++;
      } else if (char === '"') {
        inString = false;
      }
    } else if (char === '"') {
      inString = true;
    } else if (char === '}') {
      return i;
    }
  }
  return -1;
}

class ExpressionParser {
  private position = 0;

  constructor(private readonly source: string) {}

  parse(): Expression {
    this.skipWhitespace();
    const fn = this.identifier();
    if (!Object.hasOwn(FUNCTIONS, fn)) {
      throw this.error(`unknown function "${fn}"`);
    }
    const definition = FUNCTIONS[fn];

    const argument = this.callArguments();
    if (argument !== undefined && !definition.takesArgument) {
      throw this.error(`function "${fn}" does not take arguments`);
    }

    let fallback: string | undefined;
    this.skipWhitespace();
    if (this.source.startsWith('.', this.position)) {
      this.position++;
      const method = this.identifier();
      if (method !== 'or') {
        throw this.error(`unknown method "${method}"`);
      }
      fallback = this.callArguments();
      if (fallback === undefined) {
        throw this.error('or() requires a string argument');
      }
      this.skipWhitespace();
    }

    if (this.position < this.source.length) {
      throw this.error(`unexpected "${this.source.slice(this.position)}"`);
    }

    return { source: this.source.trim(), fn, argument, fallback };
  }

  private identifier(): string {
    const match = /[A-Za-z_][A-Za-z0-9_]*/y;
    match.lastIndex = this.position;
    const result = match.exec(this.source);
    if (!result) {
      throw this.error('expected a function name');
    }
    this.position = match.lastIndex;
    return result[0];
  }

  private callArguments(): string | undefined {
    this.expect('(');
    this.skipWhitespace();
    if (this.source.startsWith(')', this.position)) {
      this.position++;
      return undefined;
    }
    const value = this.stringLiteral();
    this.skipWhitespace();
    this.expect(')');
    return value;
  }

  private stringLiteral(): string {
    const match = /"(?:[^"\\]|\\.)*"/y;
    match.lastIndex = this.position;
    const result = match.exec(this.source);
    if (!result) {
      throw this.error('expected a string literal');
    }
    this.position = match.lastIndex;

    let value: unknown;
    try {
      value = JSON.parse(result[0]);
    } catch (err) {
      throw this.error(`invalid string literal ${result[0]}: ${errorMessage(err)}`);
    }
    if (typeof value !== 'string') {
      throw this.error(`invalid string literal ${result[0]}`);
    }
    return value;
  }

  private expect(char: string): void {
    this.skipWhitespace();
    if (!this.source.startsWith(char, this.position)) {
      throw this.error(`expected "${char}"`);
    }
    this.position++;
  }

  private skipWhitespace(): void {
    while (this.position < this.source.length && /\s/.test(this.source[this.position])) {
      this.position++;
    }
  }

  private error(reason: string): TemplateEvaluationError {
    return new TemplateEvaluationError(`failed to parse expression "${this.source.trim()}": ${reason}`);
  }
}

function evaluateExpression(expression: Expression, record: PipelineRecord): string {
  const definition = FUNCTIONS[expression.fn];
  const value = definition.evaluate(record, expression.argument);
  if (value !== undefined) {
    return value;
  }
  if (expression.fallback !== undefined) {
    return expression.fallback;
  }
  const reason = definition.missing ? definition.missing(expression.argument) : 'no value';
  throw new TemplateEvaluationError(`failed to evaluate "${expression.source}": ${reason}`);
}

function parseBody(record: PipelineRecord): unknown {
  try {
    return record.asStructured();
  } catch (err) {
    throw new TemplateEvaluationError(`record body is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookup(value: unknown, path?: string): unknown {
  if (path === undefined || path.length === 0) {
    return value;
  }

  let current = value;
  for (const key of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(key)) {
      current = current[Number(key)];
    } else if (isRecord(current)) {
      current = current[key];
    } else {
      return undefined;
    }
  }
  return current;
}

function stringify(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
