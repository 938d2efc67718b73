import type { ToolInputSchema, ToolResult } from "../types.ts";
import { validateInput, type Tool } from "./base.ts";

const ALLOWED_CHARS = /^[\d\s+\-*/().]+$/;
const TOKEN_REGEX = /\s*(\*\*|\d+\.?\d*|\.\d+|[+\-*/()])/y;

class DivisionByZero extends Error {}

type Token = { kind: "number"; value: number; pos: number } | { kind: "op"; value: string; pos: number };

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  while (pos < expression.length) {
    if (expression.slice(pos).trim() === "") break;
    TOKEN_REGEX.lastIndex = pos;
    const match = TOKEN_REGEX.exec(expression);
    const text = match?.[1];
    if (!match || text === undefined) {
      throw new Error(`unexpected character at position ${pos}`);
    }
    const start = match.index + match[0].length - text.length;
    tokens.push(
      /^[\d.]/.test(text) ? { kind: "number", value: Number(text), pos: start } : { kind: "op", value: text, pos: start }
    );
    pos = TOKEN_REGEX.lastIndex;
  }
  return tokens;
}

/**
 * Recursive-descent evaluator. Precedence from loosest: `+ -`, `* /`, unary
 * `+ -`, then right-associative `**`, which binds tighter than a unary sign
 * on its left (`-2**2` is -4).
 */
class ExpressionParser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) throw new Error("empty expression");
    const value = this.expression();
    const extra = this.tokens[this.index];
    if (extra) throw new Error(`unexpected '${String(extra.value)}' at position ${extra.pos}`);
    return value;
  }

  private peekOp(...ops: string[]): string | null {
    const token = this.tokens[this.index];
    if (token?.kind === "op" && ops.includes(token.value)) return token.value;
    return null;
  }

  private expression(): number {
    let value = this.term();
    let op = this.peekOp("+", "-");
    while (op) {
      this.index += 1;
      const right = this.term();
      value = op === "+" ? value + right : value - right;
      op = this.peekOp("+", "-");
    }
    return value;
  }

  private term(): number {
    let value = this.factor();
    let op = this.peekOp("*", "/");
    while (op) {
      this.index += 1;
      const right = this.factor();
      if (op === "/") {
        if (right === 0) throw new DivisionByZero();
        value = value / right;
      } else {
        value = value * right;
      }
      op = this.peekOp("*", "/");
    }
    return value;
  }

  private factor(): number {
    const op = this.peekOp("+", "-");
    if (op) {
      this.index += 1;
      const operand = this.factor();
      return op === "-" ? -operand : operand;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (!this.peekOp("**")) return base;
    this.index += 1;
    const exponent = this.factor();
    if (base === 0 && exponent < 0) throw new DivisionByZero();
    return base ** exponent;
  }

  private primary(): number {
    const token = this.tokens[this.index];
    if (!token) throw new Error("unexpected end of expression");
    this.index += 1;
    if (token.kind === "number") return token.value;
    if (token.value === "(") {
      const value = this.expression();
      if (!this.peekOp(")")) throw new Error("missing closing parenthesis");
      this.index += 1;
      return value;
    }
    throw new Error(`unexpected '${token.value}' at position ${token.pos}`);
  }
}

export function evaluateExpression(expression: string): number {
  return new ExpressionParser(tokenize(expression)).parse();
}

export class Calculator implements Tool {
  readonly name = "Calculator";
  readonly description =
    "Safely evaluates arithmetic expressions like '(41*7)+13'. Supports +, -, *, /, ** (power), and parentheses. " +
    "Integer results must stay within +/-9007199254740991 to be exact.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      expression: { type: "string", description: "Arithmetic expression to evaluate" },
    },
    required: ["expression"],
  };

  execute(input: Record<string, unknown>): ToolResult {
    const raw = input["expression"];
    if (!validateInput(this.inputSchema, input) || typeof raw !== "string") {
      return { success: false, error: "Invalid input: 'expression' field is required and must be a string" };
    }

    const expression = raw.trim();
    if (!expression) {
      return { success: false, error: "Expression cannot be empty" };
    }
    if (!ALLOWED_CHARS.test(expression)) {
      return {
        success: false,
        error: "Expression contains invalid characters. Only numbers, +, -, *, /, **, (, ) are allowed",
      };
    }

    try {
      const result = evaluateExpression(expression);
      if (!Number.isFinite(result)) {
        return { success: false, error: "Evaluation error: result is not a finite number" };
      }
      if (Number.isInteger(result) && !Number.isSafeInteger(result)) {
        return { success: false, error: "Evaluation error: integer result is too large to represent exactly" };
      }
      return { success: true, output: result };
    } catch (error) {
      if (error instanceof DivisionByZero) {
        return { success: false, error: "Division by zero" };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, error: `Evaluation error: ${message}` };
    }
  }
}
