/**
 * Arithmetic evaluator for the calculator tool. Parses with a small recursive-descent
 * grammar instead of evaluating source text:
 *
 *   expr   := term (('+' | '-') term)*
 *   term   := factor (('*' | '/' | '%') factor)*
 *   factor := unary ('^' factor)?
 *   unary  := ('-' | '+') unary | atom
 *   atom   := number | '(' expr ')'
 */

export class ArithmeticError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArithmeticError';
  }
}

type Token = { type: 'number'; value: number } | { type: 'op'; value: string };

const MAX_DEPTH = 32;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < expression.length) {
    const char = expression.charAt(index);
    if (/\s/.test(char)) {
      index += 1;
      continue;
    }
    if (/[0-9.]/.test(char)) {
      const match = /^(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?/i.exec(expression.slice(index));
      if (!match) throw new ArithmeticError(`Invalid number at position ${index}`);
      tokens.push({ type: 'number', value: Number(match[0]) });
      index += match[0].length;
      continue;
    }
    if ('+-*/%^()'.includes(char)) {
      tokens.push({ type: 'op', value: char });
      index += 1;
      continue;
    }
    throw new ArithmeticError(`Unexpected character "${char}" at position ${index}`);
  }

  return tokens;
}

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) throw new ArithmeticError('Empty expression');
    const value = this.expr(0);
    if (this.position < this.tokens.length) {
      throw new ArithmeticError('Unexpected trailing input');
    }
    return value;
  }

  private peekOp(): string | undefined {
    const token = this.tokens[this.position];
    return token?.type === 'op' ? token.value : undefined;
  }

  private expr(depth: number): number {
    let value = this.term(depth);
    for (let op = this.peekOp(); op === '+' || op === '-'; op = this.peekOp()) {
      this.position += 1;
      const right = this.term(depth);
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(depth: number): number {
    let value = this.factor(depth);
    for (let op = this.peekOp(); op === '*' || op === '/' || op === '%'; op = this.peekOp()) {
      this.position += 1;
      const right = this.factor(depth);
      if ((op === '/' || op === '%') && right === 0) throw new ArithmeticError('Division by zero');
      value = op === '*' ? value * right : op === '/' ? value / right : value % right;
    }
    return value;
  }

  private factor(depth: number): number {
    const base = this.unary(depth);
    if (this.peekOp() === '^') {
      this.position += 1;
      return base ** this.factor(depth);
    }
    return base;
  }

  private unary(depth: number): number {
    const op = this.peekOp();
    if (op === '-' || op === '+') {
      this.position += 1;
      const value = this.unary(depth);
      return op === '-' ? -value : value;
    }
    return this.atom(depth);
  }

  private atom(depth: number): number {
    if (depth > MAX_DEPTH) throw new ArithmeticError('Expression is nested too deeply');

    const token = this.tokens[this.position];
    if (!token) throw new ArithmeticError('Unexpected end of expression');

    if (token.type === 'number') {
      this.position += 1;
      return token.value;
    }
    if (token.value === '(') {
      this.position += 1;
      const value = this.expr(depth + 1);
      if (this.peekOp() !== ')') throw new ArithmeticError('Missing closing parenthesis');
      this.position += 1;
      return value;
    }
    throw new ArithmeticError(`Unexpected operator "${token.value}"`);
  }
}

/**
 * Evaluate an arithmetic expression.
 *
 * @throws ArithmeticError on malformed input, division by zero or a non-finite result.
 */
export function evaluateArithmetic(expression: string): number {
  const value = new Parser(tokenize(expression)).parse();
  if (!Number.isFinite(value)) throw new ArithmeticError('Result is not a finite number');
  return value;
}
