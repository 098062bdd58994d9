/**
 * Arithmetic evaluator for the built-in calculator tool.
 * Recursive descent over + - * / %, parentheses, unary signs and decimals.
 */

import { ToolExecutionError } from "../errors/standardErrors";

const ALLOWED = /^[0-9+\-*/%(). ]+$/;

class Parser {
  private pos = 0;

  constructor(private readonly src: string) {}

  parse(): number {
    const value = this.expression();
    this.skipSpaces();
    if (this.pos < this.src.length) {
      throw this.error(`Unexpected character "${this.src[this.pos]}" at position ${this.pos}`);
    }
    return value;
  }

  private expression(): number {
    let value = this.term();
    for (;;) {
      const op = this.peek();
      if (op !== "+" && op !== "-") return value;
      this.pos++;
      const rhs = this.term();
      value = op === "+" ? value + rhs : value - rhs;
    }
  }

  private term(): number {
    let value = this.factor();
    for (;;) {
      const op = this.peek();
      if (op !== "*" && op !== "/" && op !== "%") return value;
      this.pos++;
      const rhs = this.factor();
      if ((op === "/" || op === "%") && rhs === 0) {
        throw this.error("Division by zero");
      }
      if (op === "*") value *= rhs;
      else if (op === "/") value /= rhs;
      else value = value - Math.floor(value / rhs) * rhs;
    }
  }

  private factor(): number {
    const op = this.peek();
    if (op === "-" || op === "+") {
      this.pos++;
      const value = this.factor();
      return op === "-" ? -value : value;
    }
    return this.primary();
  }

  private primary(): number {
    const ch = this.peek();
    if (ch === "(") {
      this.pos++;
      const value = this.expression();
      if (this.peek() !== ")") {
        throw this.error("Missing closing parenthesis");
      }
      this.pos++;
      return value;
    }
    return this.number();
  }

  private number(): number {
    this.skipSpaces();
    const match = /^(\d+(\.\d*)?|\.\d+)/.exec(this.src.slice(this.pos));
    if (!match) {
      throw this.error(this.pos >= this.src.length ? "Unexpected end of expression" : `Expected a number at position ${this.pos}`);
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private peek(): string | undefined {
    this.skipSpaces();
    return this.src[this.pos];
  }

  private skipSpaces(): void {
    while (this.src[this.pos] === " ") this.pos++;
  }

  private error(message: string): ToolExecutionError {
    return new ToolExecutionError(message, "calculator");
  }
}

/**
 * Evaluate `expression`; integral results print without a decimal point.
 */
export function evaluateExpression(expression: string): string {
  const src = expression.trim();
  if (!src) {
    throw new ToolExecutionError("Empty expression", "calculator");
  }
  if (!ALLOWED.test(src)) {
    throw new ToolExecutionError("Invalid mathematical expression", "calculator");
  }

  const value = new Parser(src).parse();
  if (!Number.isFinite(value)) {
    throw new ToolExecutionError("Result is not a finite number", "calculator");
  }
  return String(Object.is(value, -0) ? 0 : value);
}
