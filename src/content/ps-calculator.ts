/**
 * PostScript calculator functions (function type 4).
 */

import { Scanner } from "#src/io/scanner";
import { TokenReader } from "#src/parser/token-reader";
import { ContentError } from "./errors";

type PsValue = number | boolean;

type PsNode =
  | { type: "value"; value: PsValue }
  | { type: "operator"; name: string }
  | { type: "if"; then: PsNode[] }
  | { type: "ifelse"; then: PsNode[]; otherwise: PsNode[] };

const MAX_STACK = 100;

/**
 * Parse a calculator program: `{ ... }` with nested procedures only as
 * operands of `if` and `ifelse`.
 *
 * @throws {ContentError} on malformed programs
 */
export function parsePsProgram(data: Uint8Array): PsNode[] {
  const reader = new TokenReader(new Scanner(data));
  const first = reader.nextToken();

  if (first.type !== "delimiter" || first.value !== "{") {
    throw new ContentError("PostScript function does not start with {");
  }

  return parseBlock(reader);
}

function parseBlock(reader: TokenReader): PsNode[] {
  const nodes: PsNode[] = [];
  const blocks: PsNode[][] = [];

  for (;;) {
    const token = reader.nextToken();

    switch (token.type) {
      case "eof":
        throw new ContentError("Unterminated PostScript procedure");

      case "number":
        nodes.push({ type: "value", value: token.value });
        break;

      case "delimiter":
        if (token.value === "{") {
          blocks.push(parseBlock(reader));
          continue;
        }

        if (token.value === "}") {
          if (blocks.length > 0) {
            throw new ContentError("Procedure without if or ifelse");
          }

          return nodes;
        }

        throw new ContentError(`Unexpected ${token.value} in PostScript function`);

      case "keyword": {
        const name = token.value;

        if (name === "if") {
          const then = blocks.pop();

          if (!then || blocks.length > 0) {
            throw new ContentError("if without a procedure");
          }

          nodes.push({ type: "if", then });
          continue;
        }

        if (name === "ifelse") {
          const otherwise = blocks.pop();
          const then = blocks.pop();

          if (!then || !otherwise || blocks.length > 0) {
            throw new ContentError("ifelse without two procedures");
          }

          nodes.push({ type: "ifelse", then, otherwise });
          continue;
        }

        if (name === "true" || name === "false") {
          nodes.push({ type: "value", value: name === "true" });
        } else if (Object.hasOwn(OPERATORS, name)) {
          nodes.push({ type: "operator", name });
        } else {
          throw new ContentError(`Unknown PostScript operator ${name}`);
        }

        break;
      }

      default:
        throw new ContentError(`Unexpected ${token.type} in PostScript function`);
    }

    if (blocks.length > 0) {
      throw new ContentError("Procedure without if or ifelse");
    }
  }
}

class PsStack {
  readonly values: PsValue[] = [];

  push(value: PsValue): void {
    if (this.values.length >= MAX_STACK) {
      throw new ContentError("PostScript stack overflow");
    }

    this.values.push(value);
  }

  pop(): PsValue {
    const value = this.values.pop();

    if (value === undefined) {
      throw new ContentError("PostScript stack underflow");
    }

    return value;
  }

  number(): number {
    const value = this.pop();

    if (typeof value !== "number") {
      throw new ContentError("PostScript type check: expected a number");
    }

    return value;
  }

  int(): number {
    return Math.trunc(this.number());
  }

  bool(): boolean {
    const value = this.pop();

    if (typeof value !== "boolean") {
      throw new ContentError("PostScript type check: expected a boolean");
    }

    return value;
  }
}

type PsOperator = (stack: PsStack) => void;

const unary =
  (fn: (a: number) => number): PsOperator =>
  stack =>
    stack.push(fn(stack.number()));

const binary =
  (fn: (a: number, b: number) => PsValue): PsOperator =>
  stack => {
    const b = stack.number();
    const a = stack.number();

    stack.push(fn(a, b));
  };

const degrees = (radians: number) => {
  const value = (radians * 180) / Math.PI;

  return value < 0 ? value + 360 : value;
};

/** Bitwise on integers, logical on booleans */
const logical =
  (ints: (a: number, b: number) => number, bools: (a: boolean, b: boolean) => boolean): PsOperator =>
  stack => {
    const b = stack.pop();
    const a = stack.pop();

    if (typeof a === "boolean" && typeof b === "boolean") {
      stack.push(bools(a, b));
    } else if (typeof a === "number" && typeof b === "number") {
      stack.push(ints(Math.trunc(a), Math.trunc(b)));
    } else {
      throw new ContentError("PostScript type check: mixed operands");
    }
  };

const compare =
  (fn: (a: PsValue, b: PsValue) => boolean): PsOperator =>
  stack => {
    const b = stack.pop();
    const a = stack.pop();

    stack.push(fn(a, b));
  };

const OPERATORS: Record<string, PsOperator> = {
  abs: unary(Math.abs),
  add: binary((a, b) => a + b),
  atan: binary((num, den) => degrees(Math.atan2(num, den))),
  ceiling: unary(Math.ceil),
  cos: unary(a => Math.cos((a * Math.PI) / 180)),
  cvi: unary(Math.trunc),
  cvr: unary(a => a),
  div: binary((a, b) => (b === 0 ? 0 : a / b)),
  exp: binary((base, exponent) => base ** exponent),
  floor: unary(Math.floor),
  idiv: binary((a, b) => (Math.trunc(b) === 0 ? 0 : Math.trunc(Math.trunc(a) / Math.trunc(b)))),
  ln: unary(Math.log),
  log: unary(Math.log10),
  mod: binary((a, b) => (Math.trunc(b) === 0 ? 0 : Math.trunc(a) % Math.trunc(b))),
  mul: binary((a, b) => a * b),
  neg: unary(a => -a),
  round: unary(a => Math.floor(a + 0.5)),
  sin: unary(a => Math.sin((a * Math.PI) / 180)),
  sqrt: unary(Math.sqrt),
  sub: binary((a, b) => a - b),
  truncate: unary(Math.trunc),

  and: logical(
    (a, b) => a & b,
    (a, b) => a && b,
  ),
  or: logical(
    (a, b) => a | b,
    (a, b) => a || b,
  ),
  xor: logical(
    (a, b) => a ^ b,
    (a, b) => a !== b,
  ),
  not: stack => {
    const a = stack.pop();

    stack.push(typeof a === "boolean" ? !a : ~Math.trunc(a));
  },
  bitshift: stack => {
    const shift = stack.int();
    const value = stack.int();

    stack.push(shift >= 0 ? value << shift : value >> -shift);
  },
  eq: compare((a, b) => a === b),
  ne: compare((a, b) => a !== b),
  gt: binary((a, b) => a > b),
  ge: binary((a, b) => a >= b),
  lt: binary((a, b) => a < b),
  le: binary((a, b) => a <= b),

  copy: stack => {
    const n = stack.int();
    const values = stack.values;

    if (n < 0 || n > values.length) {
      throw new ContentError("PostScript copy out of range");
    }

    for (const value of values.slice(values.length - n)) {
      stack.push(value);
    }
  },
  dup: stack => {
    const value = stack.pop();

    stack.push(value);
    stack.push(value);
  },
  exch: stack => {
    const b = stack.pop();
    const a = stack.pop();

    stack.push(b);
    stack.push(a);
  },
  index: stack => {
    const n = stack.int();
    const value = stack.values[stack.values.length - 1 - n];

    if (n < 0 || value === undefined) {
      throw new ContentError("PostScript index out of range");
    }

    stack.push(value);
  },
  pop: stack => {
    stack.pop();
  },
  roll: stack => {
    const j = stack.int();
    const n = stack.int();
    const values = stack.values;

    if (n < 0 || n > values.length) {
      throw new ContentError("PostScript roll out of range");
    }

    if (n === 0) {
      return;
    }

    const shift = ((j % n) + n) % n;
    const moved = values.splice(values.length - n, n);

    values.push(...moved.slice(n - shift), ...moved.slice(0, n - shift));
  },
};

function run(nodes: readonly PsNode[], stack: PsStack): void {
  for (const node of nodes) {
    switch (node.type) {
      case "value":
        stack.push(node.value);
        break;
      case "operator":
        OPERATORS[node.name](stack);
        break;
      case "if":
        if (stack.bool()) {
          run(node.then, stack);
        }

        break;
      case "ifelse":
        run(stack.bool() ? node.then : node.otherwise, stack);
        break;
    }
  }
}

/**
 * Run a program on the inputs and return the top `outputs` stack values
 * in order.
 *
 * @throws {ContentError} on stack or type errors
 */
export function runPsProgram(program: readonly PsNode[], inputs: readonly number[], outputs: number): number[] {
  const stack = new PsStack();

  for (const input of inputs) {
    stack.push(input);
  }

  run(program, stack);

  const values = stack.values.slice(-outputs);

  if (values.length < outputs) {
    throw new ContentError("PostScript function left too few results");
  }

  return values.map(value => (typeof value === "number" ? value : value ? 1 : 0));
}
