import { ConditionError } from './workflows.errors';
import { isPlainObject, lookupPath } from './workflows.context';
import type { VariableContext } from './workflows.types';

const MAX_PATTERN_LENGTH = 200;

type CompareOperator = '==' | '!=' | '>' | '>=' | '<' | '<=' | 'contains' | 'matches';

type Token =
  | { type: 'number'; value: number }
  | { type: 'string'; value: string }
  | { type: 'path'; value: string }
  | { type: 'literal'; value: boolean | null }
  | { type: 'op'; value: CompareOperator }
  | { type: 'and' | 'or' | 'not' | 'lparen' | 'rparen' };

type Expression =
  | { type: 'value'; value: unknown }
  | { type: 'path'; path: string }
  | { type: 'not'; operand: Expression }
  | { type: 'and' | 'or'; left: Expression; right: Expression }
  | { type: 'compare'; operator: CompareOperator; left: Expression; right: Expression };

const SYMBOL_OPERATORS: ReadonlyArray<[string, Token]> = [
  ['==', { type: 'op', value: '==' }],
  ['!=', { type: 'op', value: '!=' }],
  ['>=', { type: 'op', value: '>=' }],
  ['<=', { type: 'op', value: '<=' }],
  ['&&', { type: 'and' }],
  ['||', { type: 'or' }],
  ['>', { type: 'op', value: '>' }],
  ['<', { type: 'op', value: '<' }],
  ['!', { type: 'not' }],
  ['(', { type: 'lparen' }],
  [')', { type: 'rparen' }],
];

const WORD_TOKENS = new Map<string, Token>([
  ['and', { type: 'and' }],
  ['or', { type: 'or' }],
  ['not', { type: 'not' }],
  ['contains', { type: 'op', value: 'contains' }],
  ['matches', { type: 'op', value: 'matches' }],
  ['true', { type: 'literal', value: true }],
  ['false', { type: 'literal', value: false }],
  ['null', { type: 'literal', value: null }],
]);

const NUMBER = /^-?\d+(?:\.\d+)?/;
const PATH = /^\$?[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*/;

const readString = (source: string, start: number): { value: string; end: number } => {
  const quote = source[start];
  let value = '';
  let index = start + 1;
  while (index < source.length) {
    const char = source[index];
    if (char === '\\' && index + 1 < source.length) {
      value += source[index + 1];
      index += 2;
      continue;
    }
    if (char === quote) {
      return { value, end: index + 1 };
    }
    value += char;
    index += 1;
  }
  throw new ConditionError(`Unterminated string in condition: ${source}`);
};

export const tokenize = (source: string): Token[] => {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const rest = source.slice(index);
    const char = source[index];

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (char === '"' || char === "'") {
      const { value, end } = readString(source, index);
      tokens.push({ type: 'string', value });
      index = end;
      continue;
    }

    const number = NUMBER.exec(rest);
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]) });
      index += number[0].length;
      continue;
    }

    const symbol = SYMBOL_OPERATORS.find(([text]) => rest.startsWith(text));
    if (symbol) {
      tokens.push(symbol[1]);
      index += symbol[0].length;
      continue;
    }

    const path = PATH.exec(rest);
    if (path) {
      const word = path[0];
      const keyword = word.startsWith('$') ? undefined : WORD_TOKENS.get(word.toLowerCase());
      tokens.push(keyword ?? { type: 'path', value: word.replace(/^\$/, '') });
      index += word.length;
      continue;
    }

    throw new ConditionError(`Unexpected "${char}" at position ${index} in condition: ${source}`);
  }

  return tokens;
};

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[], private readonly source: string) {}

  parse(): Expression {
    if (this.tokens.length === 0) {
      throw new ConditionError('Condition is empty');
    }
    const expression = this.parseOr();
    if (this.position < this.tokens.length) {
      throw new ConditionError(`Unexpected trailing input in condition: ${this.source}`);
    }
    return expression;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new ConditionError(`Condition ended unexpectedly: ${this.source}`);
    }
    this.position += 1;
    return token;
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.peek()?.type === 'or') {
      this.position += 1;
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseUnary();
    while (this.peek()?.type === 'and') {
      this.position += 1;
      left = { type: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.peek()?.type === 'not') {
      this.position += 1;
      return { type: 'not', operand: this.parseUnary() };
    }
    return this.parseCompare();
  }

  private parseCompare(): Expression {
    const left = this.parseOperand();
    const token = this.peek();
    if (token?.type === 'op') {
      this.position += 1;
      const right = this.parseOperand();
      if (token.value === 'matches') {
        this.checkPattern(right);
      }
      return { type: 'compare', operator: token.value, left, right };
    }
    return left;
  }

  /** Patterns come from the definition only: a quoted string of bounded length. */
  private checkPattern(pattern: Expression): void {
    if (pattern.type !== 'value' || typeof pattern.value !== 'string') {
      throw new ConditionError(`"matches" needs a quoted pattern in condition: ${this.source}`);
    }
    if (pattern.value.length > MAX_PATTERN_LENGTH) {
      throw new ConditionError(`Pattern is longer than ${MAX_PATTERN_LENGTH} characters`, {
        length: pattern.value.length,
      });
    }
  }

  private parseOperand(): Expression {
    const token = this.next();
    switch (token.type) {
      case 'number':
      case 'string':
      case 'literal':
        return { type: 'value', value: token.value };
      case 'path':
        return { type: 'path', path: token.value };
      case 'lparen': {
        const inner = this.parseOr();
        if (this.next().type !== 'rparen') {
          throw new ConditionError(`Missing ")" in condition: ${this.source}`);
        }
        return inner;
      }
      default:
        throw new ConditionError(`Expected a value in condition: ${this.source}`);
    }
  }
}

const toNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const isNullish = (value: unknown): value is null | undefined => value === null || value === undefined;

export const looseEquals = (left: unknown, right: unknown): boolean => {
  if (left === right) {
    return true;
  }
  if (isNullish(left) || isNullish(right)) {
    return isNullish(left) && isNullish(right);
  }
  const leftNumber = toNumber(left);
  const rightNumber = toNumber(right);
  if (leftNumber !== null && rightNumber !== null) {
    return leftNumber === rightNumber;
  }
  if (typeof left === 'object' || typeof right === 'object') {
    return JSON.stringify(left) === JSON.stringify(right);
  }
  return String(left) === String(right);
};

export const isTruthy = (value: unknown): boolean => {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isPlainObject(value)) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
};

const compareOrder = (left: unknown, right: unknown): number | null => {
  if (isNullish(left) || isNullish(right)) {
    return null;
  }
  const leftNumber = toNumber(left);
  const rightNumber = toNumber(right);
  if (leftNumber !== null && rightNumber !== null) {
    return leftNumber - rightNumber;
  }
  const leftText = String(left);
  const rightText = String(right);
  if (leftText === rightText) {
    return 0;
  }
  return leftText < rightText ? -1 : 1;
};

const contains = (container: unknown, item: unknown): boolean => {
  if (Array.isArray(container)) {
    return container.some((entry: unknown) => looseEquals(entry, item));
  }
  if (typeof container === 'string') {
    return container.toLowerCase().includes(String(item).toLowerCase());
  }
  if (isPlainObject(container)) {
    return Object.prototype.hasOwnProperty.call(container, String(item));
  }
  return false;
};

const matches = (value: unknown, pattern: unknown): boolean => {
  let regex: RegExp;
  try {
    regex = new RegExp(String(pattern), 'i');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConditionError(`Invalid pattern ${String(pattern)}: ${reason}`);
  }
  return !isNullish(value) && regex.test(String(value));
};

const compare = (operator: CompareOperator, left: unknown, right: unknown): boolean => {
  switch (operator) {
    case '==':
      return looseEquals(left, right);
    case '!=':
      return !looseEquals(left, right);
    case 'contains':
      return contains(left, right);
    case 'matches':
      return matches(left, right);
    default: {
      const order = compareOrder(left, right);
      if (order === null) {
        return false;
      }
      if (operator === '>') return order > 0;
      if (operator === '>=') return order >= 0;
      if (operator === '<') return order < 0;
      return order <= 0;
    }
  }
};

const evaluate = (expression: Expression, context: VariableContext): unknown => {
  switch (expression.type) {
    case 'value':
      return expression.value;
    case 'path': {
      const lookup = lookupPath(context, expression.path);
      return lookup.found ? lookup.value : undefined;
    }
    case 'not':
      return !isTruthy(evaluate(expression.operand, context));
    case 'and':
      return isTruthy(evaluate(expression.left, context)) && isTruthy(evaluate(expression.right, context));
    case 'or':
      return isTruthy(evaluate(expression.left, context)) || isTruthy(evaluate(expression.right, context));
    case 'compare':
      return compare(expression.operator, evaluate(expression.left, context), evaluate(expression.right, context));
  }
};

export const parseCondition = (source: string): Expression => new Parser(tokenize(source), source).parse();

/**
 * Evaluates a `conditional_logic` expression: comparisons (`==`, `!=`, `>`,
 * `>=`, `<`, `<=`, `contains`, `matches`) joined with `and`/`or`/`not` (or
 * `&&`, `||`, `!`) over context paths such as `$user.age` or `score`. The
 * right side of `matches` must be a quoted pattern of at most 200 characters.
 */
export const evaluateCondition = (source: string, context: VariableContext): boolean =>
  isTruthy(evaluate(parseCondition(source), context));
