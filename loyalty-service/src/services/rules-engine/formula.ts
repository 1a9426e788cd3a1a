/**
 * Reward formula evaluation
 *
 * Closed arithmetic grammar over numeric player-state fields:
 *
 *   expression := term (('+' | '-') term)*
 *   term       := unary (('*' | '/') unary)*
 *   unary      := ('-' | '+') unary | primary
 *   primary    := NUMBER | IDENTIFIER | '(' expression ')'
 *
 * Identifiers resolve by exact name; there are no function calls and no
 * member access.
 */

export class FormulaEvaluationError extends Error {
  constructor(readonly formula: string, message: string) {
    super(`${message} in formula "${formula}"`);
    this.name = 'FormulaEvaluationError';
  }
}

// ═══════════════════════════════════════════════════════════════════
// Tokenizer
// ═══════════════════════════════════════════════════════════════════

type Operator = '+' | '-' | '*' | '/';

export type Token =
  | { kind: 'number'; value: number; position: number }
  | { kind: 'identifier'; name: string; position: number }
  | { kind: 'operator'; operator: Operator; position: number }
  | { kind: 'lparen'; position: number }
  | { kind: 'rparen'; position: number };

const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;
const LITERAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

function isOperator(char: string): char is Operator {
  return char === '+' || char === '-' || char === '*' || char === '/';
}

export function tokenize(formula: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  while (position < formula.length) {
    const char = formula[position];

    if (/\s/.test(char)) {
      position++;
      continue;
    }

    if (isOperator(char)) {
      tokens.push({ kind: 'operator', operator: char, position });
      position++;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push(char === '(' ? { kind: 'lparen', position } : { kind: 'rparen', position });
      position++;
      continue;
    }

    const rest = formula.slice(position);
    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ kind: 'number', value: Number(number[0]), position });
      position += number[0].length;
      continue;
    }

    const identifier = IDENTIFIER_PATTERN.exec(rest);
    if (identifier) {
      tokens.push({ kind: 'identifier', name: identifier[0], position });
      position += identifier[0].length;
      continue;
    }

    throw new FormulaEvaluationError(formula, `Unexpected character "${char}" at ${position}`);
  }

  return tokens;
}

// ═══════════════════════════════════════════════════════════════════
// Parser
// ═══════════════════════════════════════════════════════════════════

export type Expression =
  | { type: 'number'; value: number }
  | { type: 'variable'; name: string }
  | { type: 'negate'; operand: Expression }
  | { type: 'binary'; operator: Operator; left: Expression; right: Expression };

class Parser {
  private index = 0;

  constructor(private readonly formula: string, private readonly tokens: Token[]) {}

  parse(): Expression {
    if (this.tokens.length === 0) {
      throw new FormulaEvaluationError(this.formula, 'Empty expression');
    }
    const expression = this.expression();
    const extra = this.peek();
    if (extra) {
      throw new FormulaEvaluationError(this.formula, `Unexpected token at ${extra.position}`);
    }
    return expression;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw new FormulaEvaluationError(this.formula, 'Unexpected end of expression');
    }
    this.index++;
    return token;
  }

  private matchOperator(...operators: Operator[]): Operator | null {
    const token = this.peek();
    if (token?.kind === 'operator' && operators.includes(token.operator)) {
      this.index++;
      return token.operator;
    }
    return null;
  }

  private expression(): Expression {
    let left = this.term();
    for (let op = this.matchOperator('+', '-'); op; op = this.matchOperator('+', '-')) {
      left = { type: 'binary', operator: op, left, right: this.term() };
    }
    return left;
  }

  private term(): Expression {
    let left = this.unary();
    for (let op = this.matchOperator('*', '/'); op; op = this.matchOperator('*', '/')) {
      left = { type: 'binary', operator: op, left, right: this.unary() };
    }
    return left;
  }

  private unary(): Expression {
    const sign = this.matchOperator('-', '+');
    if (sign === '-') {
      return { type: 'negate', operand: this.unary() };
    }
    if (sign === '+') {
      return this.unary();
    }
    return this.primary();
  }

  private primary(): Expression {
    const token = this.next();
    switch (token.kind) {
      case 'number':
        return { type: 'number', value: token.value };
      case 'identifier':
        return { type: 'variable', name: token.name };
      case 'lparen': {
        const inner = this.expression();
        const closing = this.next();
        if (closing.kind !== 'rparen') {
          throw new FormulaEvaluationError(this.formula, `Expected ")" at ${closing.position}`);
        }
        return inner;
      }
      case 'operator':
      case 'rparen':
        throw new FormulaEvaluationError(this.formula, `Unexpected token at ${token.position}`);
    }
  }
}

export function parseFormula(formula: string): Expression {
  return new Parser(formula, tokenize(formula)).parse();
}

// ═══════════════════════════════════════════════════════════════════
// Evaluation
// ═══════════════════════════════════════════════════════════════════

function evaluate(formula: string, node: Expression, variables: Readonly<Record<string, number>>): number {
  switch (node.type) {
    case 'number':
      return node.value;
    case 'variable': {
      if (!Object.prototype.hasOwnProperty.call(variables, node.name)) {
        throw new FormulaEvaluationError(formula, `Unknown variable "${node.name}"`);
      }
      return variables[node.name];
    }
    case 'negate':
      return -evaluate(formula, node.operand, variables);
    case 'binary': {
      const left = evaluate(formula, node.left, variables);
      const right = evaluate(formula, node.right, variables);
      switch (node.operator) {
        case '+':
          return left + right;
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '/':
          if (right === 0) {
            throw new FormulaEvaluationError(formula, 'Division by zero');
          }
          return left / right;
      }
    }
  }
}

/** A formula that is just a number ("50", " 12.5 ", "1e3") */
export function parseLiteral(formula: string): number | null {
  const trimmed = formula.trim();
  return LITERAL_PATTERN.test(trimmed) ? Number(trimmed) : null;
}

/**
 * Evaluate a formula against named numbers.
 * Throws FormulaEvaluationError for syntax errors, unknown names,
 * division by zero and non-finite results.
 */
export function evaluateFormula(formula: string, variables: Readonly<Record<string, number>>): number {
  const result = evaluate(formula, parseFormula(formula), variables);
  if (!Number.isFinite(result)) {
    throw new FormulaEvaluationError(formula, 'Non-finite result');
  }
  return result;
}
