/**
 * Type 1 charstring interpreter (decrypted charstrings).
 *
 * Supports the flex and hint-replacement OtherSubrs, `seac` accented
 * characters and `div`. Hints are ignored.
 */

import { type Path, PathBuilder } from "#src/scene/path";

export interface Type1Context {
  subrs: Uint8Array[];
  /** Charstring for a StandardEncoding code, used by `seac` */
  seacCharString?: (code: number) => Uint8Array | undefined;
}

export interface Type1Glyph {
  path: Path;
  width: number;
}

const MAX_SUBR_DEPTH = 10;

class Type1Interpreter {
  readonly builder = new PathBuilder();
  private stack: number[] = [];
  private psStack: number[] = [];
  private x = 0;
  private y = 0;
  private flexPoints: Array<{ x: number; y: number }> | null = null;
  private open = false;
  sbx = 0;
  width = 0;
  finished = false;

  constructor(
    private readonly ctx: Type1Context,
    private readonly offsetX = 0,
    private readonly offsetY = 0,
  ) {}

  run(data: Uint8Array, depth = 0): void {
    if (depth > MAX_SUBR_DEPTH) {
      throw new Error("Type 1 subroutine nesting too deep");
    }

    let i = 0;

    while (i < data.length && !this.finished) {
      const v = data[i++];

      if (v >= 32 && v <= 246) {
        this.stack.push(v - 139);
      } else if (v >= 247 && v <= 250) {
        this.stack.push((v - 247) * 256 + data[i++] + 108);
      } else if (v >= 251 && v <= 254) {
        this.stack.push(-(v - 251) * 256 - data[i++] - 108);
      } else if (v === 255) {
        this.stack.push(((data[i] << 24) | (data[i + 1] << 16) | (data[i + 2] << 8) | data[i + 3]) | 0);
        i += 4;
      } else if (v === 12) {
        this.escape(data[i++]);
      } else if (v === 10) {
        const index = this.stack.pop() ?? -1;
        const subr = this.ctx.subrs[index];

        if (!subr) {
          throw new Error(`Missing Type 1 subroutine ${index}`);
        }

        this.run(subr, depth + 1);
      } else if (v === 11) {
        return;
      } else {
        this.command(v);
      }
    }
  }

  private point(): { x: number; y: number } {
    return { x: this.x + this.offsetX, y: this.y + this.offsetY };
  }

  private moveTo(dx: number, dy: number): void {
    this.x += dx;
    this.y += dy;

    if (this.flexPoints) {
      this.flexPoints.push(this.point());

      return;
    }

    this.closeSubpath();

    const p = this.point();

    this.builder.moveTo(p.x, p.y);
    this.open = true;
  }

  private lineTo(dx: number, dy: number): void {
    this.x += dx;
    this.y += dy;

    const p = this.point();

    this.builder.lineTo(p.x, p.y);
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

  private command(op: number): void {
    const s = this.stack;

    switch (op) {
      case 13: // hsbw
        this.sbx = s[0] ?? 0;
        this.width = s[1] ?? 0;
        this.x = this.sbx;
        this.y = 0;
        break;
      case 21: // rmoveto
        this.moveTo(s[0] ?? 0, s[1] ?? 0);
        break;
      case 22: // hmoveto
        this.moveTo(s[0] ?? 0, 0);
        break;
      case 4: // vmoveto
        this.moveTo(0, s[0] ?? 0);
        break;
      case 5: // rlineto
        this.lineTo(s[0] ?? 0, s[1] ?? 0);
        break;
      case 6: // hlineto
        this.lineTo(s[0] ?? 0, 0);
        break;
      case 7: // vlineto
        this.lineTo(0, s[0] ?? 0);
        break;
      case 8: // rrcurveto
        this.curveTo(s[0], s[1], s[2], s[3], s[4], s[5]);
        break;
      case 30: // vhcurveto
        this.curveTo(0, s[0], s[1], s[2], s[3], 0);
        break;
      case 31: // hvcurveto
        this.curveTo(s[0], 0, s[1], s[2], 0, s[3]);
        break;
      case 9: // closepath
        this.closeSubpath();
        break;
      case 14: // endchar
        this.closeSubpath();
        this.finished = true;
        break;
      default:
        // hstem, vstem and reserved commands
        break;
    }

    this.stack = [];
  }

  private escape(op: number): void {
    const s = this.stack;

    switch (op) {
      case 7: // sbw
        this.sbx = s[0] ?? 0;
        this.width = s[2] ?? 0;
        this.x = this.sbx;
        this.y = s[1] ?? 0;
        break;

      case 6: // seac
        this.seac(s[0] ?? 0, s[1] ?? 0, s[2] ?? 0, s[3] ?? 0, s[4] ?? 0);
        this.finished = true;
        break;

      case 12: {
        // div: leaves its result on the stack
        const b = s.pop() ?? 1;
        const a = s.pop() ?? 0;

        s.push(b === 0 ? 0 : a / b);

        return;
      }

      case 16: // callothersubr
        this.callOtherSubr();

        return;

      case 17: // pop
        s.push(this.psStack.pop() ?? 0);

        return;

      case 33: // setcurrentpoint
        this.x = (s[0] ?? 0) - this.offsetX;
        this.y = (s[1] ?? 0) - this.offsetY;
        break;

      default:
        // dotsection, vstem3, hstem3
        break;
    }

    this.stack = [];
  }

  private callOtherSubr(): void {
    const s = this.stack;
    const index = s.pop() ?? -1;
    const count = s.pop() ?? 0;
    const args = s.splice(Math.max(0, s.length - count), count);

    switch (index) {
      case 1: // start flex
        this.flexPoints = [];
        break;

      case 2: // flex point; rmoveto already recorded it
        break;

      case 0: {
        // end flex: reference point + 6 control/end points
        const points = this.flexPoints ?? [];

        this.flexPoints = null;

        if (points.length >= 7) {
          const [, c1, c2, p1, c3, c4, p2] = points;

          this.builder.curveTo(c1.x, c1.y, c2.x, c2.y, p1.x, p1.y);
          this.builder.curveTo(c3.x, c3.y, c4.x, c4.y, p2.x, p2.y);
          this.x = p2.x - this.offsetX;
          this.y = p2.y - this.offsetY;
        }

        // leaves the end point for `pop pop setcurrentpoint`
        this.psStack.push(this.y + this.offsetY, this.x + this.offsetX);
        break;
      }

      default:
        // hint replacement (3) and unknown OtherSubrs hand their
        // arguments back through `pop`
        this.psStack.push(...args.reverse());
        break;
    }
  }

  private seac(asb: number, adx: number, ady: number, bchar: number, achar: number): void {
    const base = this.ctx.seacCharString?.(bchar);
    const accent = this.ctx.seacCharString?.(achar);
    const plain: Type1Context = { subrs: this.ctx.subrs };

    this.closeSubpath();

    if (base) {
      const sub = new Type1Interpreter(plain, this.offsetX, this.offsetY);

      sub.run(base);
      sub.closeSubpath();
      this.builder.append(sub.builder.build());
    }

    if (accent) {
      const sub = new Type1Interpreter(plain, this.offsetX + this.sbx + adx - asb, this.offsetY + ady);

      sub.run(accent);
      sub.closeSubpath();
      this.builder.append(sub.builder.build());
    }
  }
}

/**
 * Execute a decrypted Type 1 charstring. The path is in charstring units
 * with the left sidebearing applied.
 */
export function interpretType1(data: Uint8Array, ctx: Type1Context): Type1Glyph {
  const interpreter = new Type1Interpreter(ctx);

  interpreter.run(data);
  interpreter.closeSubpath();

  return { path: interpreter.builder.build(), width: interpreter.width };
}
