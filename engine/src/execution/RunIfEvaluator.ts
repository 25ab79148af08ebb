/**
 * runIf Evaluator
 *
 * Grammar: `{{token}} <op> <value>` where op is `==`, `!=`, `in` or
 * `not in`, and value is `null`, a quoted string, a number, or a list of
 * quoted strings and numbers. Comparison is ordinal on resolved strings.
 * `null` matches an unresolved token only; an empty string is a value.
 *
 * @module execution
 */

import { ConfigurationError } from '../errors/index.js';
import type { TemplateResolver } from '../context/TemplateResolver.js';
import type { TemplateScope } from '../context/ExecutionContext.js';

export type RunIfOperator = '==' | '!=' | 'in' | 'not in';

export type RunIfOperand = { kind: 'null' } | { kind: 'value'; value: string } | { kind: 'list'; values: string[] };

export interface RunIfCondition {
  token: string;
  operator: RunIfOperator;
  operand: RunIfOperand;
}

const SCALAR = String.raw`"[^"]*"|'[^']*'|-?\d+(?:\.\d+)?`;
const LIST = String.raw`\[\s*(?:(?:${SCALAR})\s*(?:,\s*(?:${SCALAR})\s*)*)?\]`;
const CONDITION_PATTERN = new RegExp(
  String.raw`^\s*\{\{\s*(.+?)\s*\}\}\s*(==|!=|not\s+in|in)\s*(null|${SCALAR}|${LIST})\s*$`,
  'i',
);
const LIST_ITEM_PATTERN = new RegExp(SCALAR, 'g');

export class RunIfEvaluator {
  constructor(private readonly templateResolver: TemplateResolver) {}

  /**
   * @returns The parsed condition, or undefined when the text does not
   *          match the grammar
   */
  static parse(expression: string): RunIfCondition | undefined {
    const match = CONDITION_PATTERN.exec(expression);
    if (!match) {
      return undefined;
    }
    const [, token = '', rawOperator = '', rawOperand = ''] = match;
    const operator = normalizeOperator(rawOperator);
    const operand = parseOperand(rawOperand);

    const isList = operand.kind === 'list';
    const isMembership = operator === 'in' || operator === 'not in';
    if (isList !== isMembership) {
      return undefined;
    }
    return { token, operator, operand };
  }

  /**
   * @throws {ConfigurationError} When the expression is malformed
   * @throws {TemplateResolutionError} When the token cannot be resolved;
   *         the executor applies the runIf error policy
   */
  shouldRun(expression: string | undefined, scope: TemplateScope, stageName?: string): boolean {
    if (expression === undefined || !expression.trim()) {
      return true;
    }

    const condition = RunIfEvaluator.parse(expression);
    if (!condition) {
      throw ConfigurationError.invalidCondition(expression, stageName);
    }

    return RunIfEvaluator.evaluate(condition, this.resolveActual(condition.token, scope));
  }

  /**
   * Compare an already-resolved value; undefined stands for an unresolved token
   */
  static evaluate(condition: RunIfCondition, actual: string | undefined): boolean {
    const { operator, operand } = condition;

    switch (operand.kind) {
      case 'null': {
        const isNull = actual === undefined;
        return operator === '==' ? isNull : !isNull;
      }
      case 'value': {
        const equal = actual === operand.value;
        return operator === '==' ? equal : !equal;
      }
      case 'list': {
        const contained = operand.values.includes(actual ?? '');
        return operator === 'in' ? contained : !contained;
      }
    }
  }

  private resolveActual(token: string, scope: TemplateScope): string | undefined {
    // Fallback chains always produce a value
    if (token.includes('||')) {
      return this.templateResolver.resolveToken(token, scope);
    }
    return this.templateResolver.tryResolveToken(token, scope);
  }
}

const OPERATORS: readonly RunIfOperator[] = ['==', '!=', 'in', 'not in'];

function normalizeOperator(raw: string): RunIfOperator {
  const lowered = raw.toLowerCase().replace(/\s+/g, ' ');
  return OPERATORS.find((candidate) => candidate === lowered) ?? '==';
}

function parseOperand(raw: string): RunIfOperand {
  if (raw.toLowerCase() === 'null') {
    return { kind: 'null' };
  }
  if (raw.startsWith('[')) {
    return { kind: 'list', values: Array.from(raw.matchAll(LIST_ITEM_PATTERN), (m) => unquote(m[0])) };
  }
  return { kind: 'value', value: unquote(raw) };
}

function unquote(text: string): string {
  const quoted = /^(["'])(.*)\1$/s.exec(text);
  return quoted ? quoted[2] ?? '' : text;
}
