/**
 * Type 2 charstring interpreter.
 *
 * Produces the glyph outline in charstring units. Hints are parsed only
 * as far as needed to skip hintmask bytes.
 */

import { PathBuilder, type Path } from "#src/scene/path";

export interface Type2Context {
  globalSubrs: Uint8Array[];
  localSubrs: Uint8Array[];
  defaultWidthX: number;
  nominalWidthX: number;
  /** Charstring for a StandardEncoding code, for `endchar` accent composition */
  seacCharString?: (code: number) => Uint8Array | undefined;
}

export interface Type2Glyph {
  path: Path;
  width: number;
}

const MAX_SUBR_DEPTH = 10;
const MAX_STACK = 48;

export function subrBias(count: number): number {
  if (count < 1240) {
    return 107;
  }

  return count < 33900 ? 1131 : 32768;
}

class Type2Interpreter {
  readonly builder = new PathBuilder();
  private stack: number[] = [];
  private transient: number[] = new Array(32).fill(0);
  private x = 0;
  private y = 0;
  private stems = 0;
  private open = false;
  width: number | null = null;
  finished = false;

  constructor(
    private readonly ctx: Type2Context,
    private readonly offsetX = 0,
    private readonly offsetY = 0,
  ) {}

  run(data: Uint8Array, depth = 0): void {
    if (depth > MAX_SUBR_DEPTH) {
      throw new Error("Type 2 subroutine nesting too deep");
    }

    let i = 0;

    while (i < data.length && !this.finished) {
      const b0 = data[i++];

      if (b0 === 28) {
        const value = (data[i] << 8) | data[i + 1];

        this.push(value > 0x7fff ? value - 0x10000 : value);
        i += 2;
      } else if (b0 >= 32 && b0 <= 246) {
        this.push(b0 - 139);
      } else if (b0 >= 247 && b0 <= 250) {
        this.push((b0 - 247) * 256 + data[i++] + 108);
      } else if (b0 >= 251 && b0 <= 254) {
        this.push(-(b0 - 251) * 256 - data[i++] - 108);
      } else if (b0 === 255) {
        const value = ((data[i] << 24) | (data[i + 1] << 16) | (data[i + 2] << 8) | data[i + 3]) | 0;

        this.push(value / 65536);
        i += 4;
      } else if (b0 === 12) {
        this.escape(data[i++]);
      } else if (b0 === 19 || b0 === 20) {
        // hintmask / cntrmask: pending arguments are implicit vstems
        this.takeWidth(this.stack.length % 2 === 1);
        this.stems += this.stack.length >> 1;
        this.stack = [];
        i += (this.stems + 7) >> 3;
      } else if (b0 === 10 || b0 === 29) {
        const subrs = b0 === 10 ? this.ctx.localSubrs : this.ctx.globalSubrs;
        const index = (this.stack.pop() ?? 0) + subrBias(subrs.length);
        const subr = subrs[index];

        if (!subr) {
          throw new Error(`Missing ${b0 === 10 ? "local" : "global"} subroutine ${index}`);
        }

        this.run(subr, depth + 1);
      } else if (b0 === 11) {
        return;
      } else {
        this.operator(b0);
      }
    }
  }

  private push(value: number): void {
    if (this.stack.length >= MAX_STACK) {
      throw new Error("Type 2 argument stack overflow");
    }

    this.stack.push(value);
  }

  /**
   * The first stack-clearing operator may carry the advance width as an
   * extra leading argument.
   */
  private takeWidth(hasExtra: boolean): void {
    if (this.width !== null) {
      return;
    }

    if (hasExtra) {
      this.width = this.ctx.nominalWidthX + (this.stack.shift() ?? 0);
    } else {
      this.width = this.ctx.defaultWidthX;
    }
  }

  private moveTo(dx: number, dy: number): void {
    this.closeSubpath();
    this.x += dx;
    this.y += dy;
    this.builder.moveTo(this.x + this.offsetX, this.y + this.offsetY);
    this.open = true;
  }

  private lineTo(dx: number, dy: number): void {
    this.x += dx;
    this.y += dy;
    this.builder.lineTo(this.x + this.offsetX, this.y + this.offsetY);
  }

  private curveTo(dx1: number, dy1: number, dx2: number, dy2: number, dx3: number, dy3: number): void {
    const x1 = this.x + dx1;
    const y1 = this.y + dy1;
    const x2 = x1 + dx2;
    const y2 = y1 + dy2;

    this.x = x2 + dx3;
    this.y = y2 + dy3;
    this.builder.curveTo(
      x1 + this.offsetX,
      y1 + this.offsetY,
      x2 + this.offsetX,
      y2 + this.offsetY,
      this.x + this.offsetX,
      this.y + this.offsetY,
    );
  }

  closeSubpath(): void {
    if (this.open) {
      this.builder.close();
      this.open = false;
    }
  }

  private operator(op: number): void {
    const s = this.stack;

    switch (op) {
      case 1: // hstem
      case 3: // vstem
      case 18: // hstemhm
      case 23: // vstemhm
        this.takeWidth(s.length % 2 === 1);
        this.stems += s.length >> 1;
        break;

      case 21: // rmoveto
        this.takeWidth(s.length > 2);
        this.moveTo(s[0] ?? 0, s[1] ?? 0);
        break;

      case 22: // hmoveto
        this.takeWidth(s.length > 1);
        this.moveTo(s[0] ?? 0, 0);
        break;

      case 4: // vmoveto
        this.takeWidth(s.length > 1);
        this.moveTo(0, s[0] ?? 0);
        break;

      case 5: // rlineto
        for (let i = 0; i + 1 < s.length; i += 2) {
          this.lineTo(s[i], s[i + 1]);
        }
        break;

      case 6: // hlineto
      case 7: {
        // vlineto
        let horizontal = op === 6;

        for (const d of s) {
          if (horizontal) {
            this.lineTo(d, 0);
          } else {
            this.lineTo(0, d);
          }

          horizontal = !horizontal;
        }
        break;
      }

      case 8: // rrcurveto
        for (let i = 0; i + 5 < s.length; i += 6) {
          this.curveTo(s[i], s[i + 1], s[i + 2], s[i + 3], s[i + 4], s[i + 5]);
        }
        break;

      case 24: {
        // rcurveline
        let i = 0;

        for (; i + 7 < s.length; i += 6) {
          this.curveTo(s[i], s[i + 1], s[i + 2], s[i + 3], s[i + 4], s[i + 5]);
        }

        if (i + 1 < s.length) {
          this.lineTo(s[i], s[i + 1]);
        }
        break;
      }

      case 25: {
        // rlinecurve
        let i = 0;

        for (; i + 7 < s.length; i += 2) {
          this.lineTo(s[i], s[i + 1]);
        }

        if (i + 5 < s.length) {
          this.curveTo(s[i], s[i + 1], s[i + 2], s[i + 3], s[i + 4], s[i + 5]);
        }
        break;
      }

      case 26: {
        // vvcurveto
        let i = 0;
        let dx1 = 0;

        if (s.length % 2 === 1) {
          dx1 = s[i++];
        }

        for (; i + 3 < s.length; i += 4) {
          this.curveTo(dx1, s[i], s[i + 1], s[i + 2], 0, s[i + 3]);
          dx1 = 0;
        }
        break;
      }

      case 27: {
        // hhcurveto
        let i = 0;
        let dy1 = 0;

        if (s.length % 2 === 1) {
          dy1 = s[i++];
        }

        for (; i + 3 < s.length; i += 4) {
          this.curveTo(s[i], dy1, s[i + 1], s[i + 2], s[i + 3], 0);
          dy1 = 0;
        }
        break;
      }

      case 30: // vhcurveto
      case 31: {
        // hvcurveto
        let horizontal = op === 31;

        for (let i = 0; i + 3 < s.length; i += 4) {
          const last = i + 5 === s.length ? s[i + 4] : 0;

          if (horizontal) {
            this.curveTo(s[i], 0, s[i + 1], s[i + 2], last, s[i + 3]);
          } else {
            this.curveTo(0, s[i], s[i + 1], s[i + 2], s[i + 3], last);
          }

          horizontal = !horizontal;
        }
        break;
      }

      case 14: // endchar
        this.takeWidth(s.length === 1 || s.length === 5);

        if (s.length >= 4) {
          this.seac(s[s.length - 4], s[s.length - 3], s[s.length - 2], s[s.length - 1]);
        }

        this.closeSubpath();
        this.finished = true;
        break;

      default:
        // reserved operators are ignored
        break;
    }

    this.stack = [];
  }

  private escape(op: number): void {
    const s = this.stack;

    switch (op) {
      case 35: // flex
        this.curveTo(s[0], s[1], s[2], s[3], s[4], s[5]);
        this.curveTo(s[6], s[7], s[8], s[9], s[10], s[11]);
        break;

      case 34: {
        // hflex
        const startY = this.y;

        this.curveTo(s[0], 0, s[1], s[2], s[3], 0);
        this.curveTo(s[4], 0, s[5], startY - this.y, s[6], 0);
        break;
      }

      case 36: {
        // hflex1
        const startY = this.y;

        this.curveTo(s[0], s[1], s[2], s[3], s[4], 0);
        this.curveTo(s[5], 0, s[6], s[7], s[8], startY - this.y - s[7]);
        break;
      }

      case 37: {
        // flex1
        const startX = this.x;
        const startY = this.y;
        let dx = 0;
        let dy = 0;

        for (let i = 0; i < 10; i += 2) {
          dx += s[i];
          dy += s[i + 1];
        }

        this.curveTo(s[0], s[1], s[2], s[3], s[4], s[5]);

        const horizontal = Math.abs(dx) > Math.abs(dy);
        const x1 = s[6];
        const y1 = s[7];
        const x2 = s[8];
        const y2 = s[9];
        const endX = horizontal ? s[10] : startX - (this.x + x1 + x2);
        const endY = horizontal ? startY - (this.y + y1 + y2) : s[10];

        this.curveTo(x1, y1, x2, y2, endX, endY);
        break;
      }

      default:
        this.arithmetic(op);

        return;
    }

    this.stack = [];
  }

  /**
   * Arithmetic and storage operators operate on the stack and do not
   * clear it.
   */
  private arithmetic(op: number): void {
    const s = this.stack;
    const pop = () => s.pop() ?? 0;

    switch (op) {
      case 3: {
        // and
        const b = pop();
        const a = pop();
        s.push(a && b ? 1 : 0);
        break;
      }
      case 4: {
        // or
        const b = pop();
        const a = pop();
        s.push(a || b ? 1 : 0);
        break;
      }
      case 5: // not
        s.push(pop() ? 0 : 1);
        break;
      case 9: // abs
        s.push(Math.abs(pop()));
        break;
      case 10: // add
        s.push(pop() + pop());
        break;
      case 11: {
        // sub
        const b = pop();
        s.push(pop() - b);
        break;
      }
      case 12: {
        // div
        const b = pop();
        const a = pop();
        s.push(b === 0 ? 0 : a / b);
        break;
      }
      case 14: // neg
        s.push(-pop());
        break;
      case 15: // eq
        s.push(pop() === pop() ? 1 : 0);
        break;
      case 18: // drop
        pop();
        break;
      case 20: {
        // put
        const index = pop();
        this.transient[index] = pop();
        break;
      }
      case 21: // get
        s.push(this.transient[pop()] ?? 0);
        break;
      case 22: {
        // ifelse
        const v2 = pop();
        const v1 = pop();
        const s2 = pop();
        const s1 = pop();
        s.push(v1 <= v2 ? s1 : s2);
        break;
      }
      case 23: // random
        s.push(Math.random());
        break;
      case 24: // mul
        s.push(pop() * pop());
        break;
      case 26: // sqrt
        s.push(Math.sqrt(Math.abs(pop())));
        break;
      case 27: {
        // dup
        const v = pop();
        s.push(v, v);
        break;
      }
      case 28: {
        // exch
        const b = pop();
        const a = pop();
        s.push(b, a);
        break;
      }
      case 29: {
        // index
        const i = pop();
        s.push(s[s.length - 1 - Math.max(0, i)] ?? 0);
        break;
      }
      case 30: {
        // roll
        const j = pop();
        const n = pop();

        if (n > 0 && n <= s.length) {
          const items = s.splice(s.length - n, n);
          const shift = ((j % n) + n) % n;

          s.push(...items.slice(n - shift), ...items.slice(0, n - shift));
        }
        break;
      }
      default:
        // dotsection and reserved escapes
        this.stack = [];
        break;
    }
  }

  private seac(adx: number, ady: number, bchar: number, achar: number): void {
    const base = this.ctx.seacCharString?.(bchar);
    const accent = this.ctx.seacCharString?.(achar);

    this.closeSubpath();

    if (base) {
      const sub = new Type2Interpreter({ ...this.ctx, seacCharString: undefined }, this.offsetX, this.offsetY);

      sub.run(base);
      sub.closeSubpath();
      this.builder.append(sub.builder.build());
    }

    if (accent) {
      const sub = new Type2Interpreter(
        { ...this.ctx, seacCharString: undefined },
        this.offsetX + adx,
        this.offsetY + ady,
      );

      sub.run(accent);
      sub.closeSubpath();
      this.builder.append(sub.builder.build());
    }
  }
}

/**
 * Execute a Type 2 charstring.
 */
export function interpretType2(data: Uint8Array, ctx: Type2Context): Type2Glyph {
  const interpreter = new Type2Interpreter(ctx);

  interpreter.run(data);
  interpreter.closeSubpath();

  return {
    path: interpreter.builder.build(),
    width: interpreter.width ?? ctx.defaultWidthX,
  };
}
