import { ConditionSyntaxError } from "./errors";

/**
 * Step conditions are a small closed expression language over session
 * context:
 *
 *   expr       := or
 *   or         := and (("||" | "or") and)*
 *   and        := not (("&&" | "and") not)*
 *   not        := ("!" | "not") not | comparison
 *   comparison := operand (("==" | "!=" | "<" | "<=" | ">" | ">=" | "in") operand)?
 *   operand    := number | string | true | false | null | list | path | "(" expr ")"
 *   list       := "[" (operand ("," operand)*)? "]"
 *   path       := identifier ("." identifier)*
 */

export type ConditionScalar = string | number | boolean | null;

export type ComparisonOperator = "==" | "!=" | "<" | "<=" | ">" | ">=" | "in";

export type ConditionNode =
  | { kind: "literal"; value: ConditionScalar }
  | { kind: "list"; items: ConditionNode[] }
  | { kind: "path"; path: string[] }
  | { kind: "not"; operand: ConditionNode }
  | {
      kind: "logical";
      operator: "and" | "or";
      left: ConditionNode;
      right: ConditionNode;
    }
  | {
      kind: "compare";
      operator: ComparisonOperator;
      left: ConditionNode;
      right: ConditionNode;
    };

type Token =
  | { type: "number"; value: number; position: number }
  | { type: "string"; value: string; position: number }
  | { type: "identifier"; value: string; position: number }
  | { type: "symbol"; value: string; position: number }
  | { type: "end"; position: number };

const SYMBOLS = [
  "==",
  "!=",
  "<=",
  ">=",
  "&&",
  "||",
  "<",
  ">",
  "!",
  "(",
  ")",
  "[",
  "]",
  ",",
  ".",
];

const COMPARISON_OPERATORS: readonly string[] = [
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
  "in",
];

const isComparisonOperator = (value: string): value is ComparisonOperator =>
  COMPARISON_OPERATORS.includes(value);

const tokenize = (expression: string): Token[] => {
  const tokens: Token[] = [];
  let index = 0;

  while (index < expression.length) {
    const char = expression.charAt(index);

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (
      /[0-9]/.test(char) ||
      (char === "-" && /[0-9]/.test(expression.charAt(index + 1)))
    ) {
      const match = /^-?[0-9]+(\.[0-9]+)?/.exec(expression.slice(index));
      const text = match?.[0] ?? char;
      tokens.push({ type: "number", value: Number(text), position: index });
      index += text.length;
      continue;
    }

    if (char === "'" || char === '"') {
      let end = index + 1;
      let value = "";
      while (end < expression.length && expression.charAt(end) !== char) {
        if (expression.charAt(end) === "\\" && end + 1 < expression.length) {
          end += 1;
        }
        value += expression.charAt(end);
        end += 1;
      }
      if (end >= expression.length) {
        throw new ConditionSyntaxError(
          expression,
          index,
          "Unterminated string",
        );
      }
      tokens.push({ type: "string", value, position: index });
      index = end + 1;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(expression.slice(index));
      const text = match?.[0] ?? char;
      tokens.push({ type: "identifier", value: text, position: index });
      index += text.length;
      continue;
    }

    const symbol = SYMBOLS.find((candidate) =>
      expression.startsWith(candidate, index),
    );
    if (!symbol) {
      throw new ConditionSyntaxError(
        expression,
        index,
        `Unexpected character '${char}'`,
      );
    }
    tokens.push({ type: "symbol", value: symbol, position: index });
    index += symbol.length;
  }

  tokens.push({ type: "end", position: expression.length });
  return tokens;
};

class Parser {
  private index = 0;

  constructor(
    private readonly expression: string,
    private readonly tokens: Token[],
  ) {}

  parse(): ConditionNode {
    const node = this.parseOr();
    const next = this.peek();
    if (next.type !== "end") {
      this.fail(next, "Unexpected trailing input");
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { type: "end", position: 0 };
  }

  private advance(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }

  private fail(token: Token, detail: string): never {
    throw new ConditionSyntaxError(this.expression, token.position, detail);
  }

  private isKeyword(token: Token, ...words: string[]): boolean {
    return (
      (token.type === "symbol" || token.type === "identifier") &&
      words.includes(token.value)
    );
  }

  private expectSymbol(value: string): void {
    const token = this.advance();
    if (token.type !== "symbol" || token.value !== value) {
      this.fail(token, `Expected '${value}'`);
    }
  }

  private parseOr(): ConditionNode {
    let left = this.parseAnd();
    while (this.isKeyword(this.peek(), "||", "or")) {
      this.advance();
      left = { kind: "logical", operator: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionNode {
    let left = this.parseNot();
    while (this.isKeyword(this.peek(), "&&", "and")) {
      this.advance();
      left = { kind: "logical", operator: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ConditionNode {
    if (this.isKeyword(this.peek(), "!", "not")) {
      this.advance();
      return { kind: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ConditionNode {
    const left = this.parseOperand();
    const next = this.peek();
    if (
      (next.type === "symbol" || next.type === "identifier") &&
      isComparisonOperator(next.value)
    ) {
      this.advance();
      return {
        kind: "compare",
        operator: next.value,
        left,
        right: this.parseOperand(),
      };
    }
    return left;
  }

  private parseOperand(): ConditionNode {
    const token = this.advance();
    switch (token.type) {
      case "number":
        return { kind: "literal", value: token.value };
      case "string":
        return { kind: "literal", value: token.value };
      case "identifier":
        return this.parseIdentifier(token.value);
      case "symbol":
        if (token.value === "(") {
          const inner = this.parseOr();
          this.expectSymbol(")");
          return inner;
        }
        if (token.value === "[") {
          return this.parseList();
        }
        return this.fail(token, `Unexpected '${token.value}'`);
      case "end":
        return this.fail(token, "Unexpected end of expression");
    }
  }

  private parseIdentifier(name: string): ConditionNode {
    if (name === "true") return { kind: "literal", value: true };
    if (name === "false") return { kind: "literal", value: false };
    if (name === "null") return { kind: "literal", value: null };

    const path = [name];
    while (this.isKeyword(this.peek(), ".")) {
      this.advance();
      const segment = this.advance();
      if (segment.type !== "identifier") {
        return this.fail(segment, "Expected property name after '.'");
      }
      path.push(segment.value);
    }
    return { kind: "path", path };
  }

  private parseList(): ConditionNode {
    const items: ConditionNode[] = [];
    if (this.isKeyword(this.peek(), "]")) {
      this.advance();
      return { kind: "list", items };
    }
    for (;;) {
      items.push(this.parseOperand());
      const next = this.advance();
      if (next.type === "symbol" && next.value === "]") {
        return { kind: "list", items };
      }
      if (next.type !== "symbol" || next.value !== ",") {
        this.fail(next, "Expected ',' or ']'");
      }
    }
  }
}

export const parseCondition = (expression: string): ConditionNode =>
  new Parser(expression, tokenize(expression)).parse();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const resolvePath = (
  context: Record<string, unknown>,
  path: string[],
): unknown => {
  let current: unknown = context;
  for (const segment of path) {
    if (!isRecord(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
};

const isTruthy = (value: unknown): boolean => {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
};

const valueOf = (
  node: ConditionNode,
  context: Record<string, unknown>,
): unknown => {
  switch (node.kind) {
    case "literal":
      return node.value;
    case "list":
      return node.items.map((item) => valueOf(item, context));
    case "path":
      return resolvePath(context, node.path);
    case "not":
    case "logical":
    case "compare":
      return evaluateCondition(node, context);
  }
};

const ordered = <T extends number | string>(
  operator: "<" | "<=" | ">" | ">=",
  left: T,
  right: T,
): boolean => {
  if (operator === "<") return left < right;
  if (operator === "<=") return left <= right;
  if (operator === ">") return left > right;
  return left >= right;
};

const compare = (
  operator: ComparisonOperator,
  left: unknown,
  right: unknown,
): boolean => {
  switch (operator) {
    case "==":
      return left === right || (left == null && right == null);
    case "!=":
      return !(left === right || (left == null && right == null));
    case "in":
      if (Array.isArray(right)) return right.includes(left);
      if (typeof right === "string" && typeof left === "string")
        return right.includes(left);
      if (isRecord(right) && typeof left === "string")
        return Object.hasOwn(right, left);
      return false;
    case "<":
    case "<=":
    case ">":
    case ">=":
      if (typeof left === "number" && typeof right === "number")
        return ordered(operator, left, right);
      if (typeof left === "string" && typeof right === "string")
        return ordered(operator, left, right);
      return false;
  }
};

/** Never throws: missing paths resolve to undefined, mismatched types compare false. */
export const evaluateCondition = (
  node: ConditionNode,
  context: Record<string, unknown>,
): boolean => {
  switch (node.kind) {
    case "not":
      return !evaluateCondition(node.operand, context);
    case "logical":
      return node.operator === "and"
        ? evaluateCondition(node.left, context) &&
            evaluateCondition(node.right, context)
        : evaluateCondition(node.left, context) ||
            evaluateCondition(node.right, context);
    case "compare":
      return compare(
        node.operator,
        valueOf(node.left, context),
        valueOf(node.right, context),
      );
    case "literal":
    case "list":
    case "path":
      return isTruthy(valueOf(node, context));
  }
};

export const compileCondition = (
  expression: string,
): ((context: Record<string, unknown>) => boolean) => {
  const node = parseCondition(expression);
  return (context) => evaluateCondition(node, context);
};
