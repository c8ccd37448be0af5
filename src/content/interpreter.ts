/**
 * Content stream interpreter.
 *
 * Runs a page's operators against the graphics state and records the
 * result as a {@link Scene}. Nothing in a content stream aborts the run:
 * problems become diagnostics and the operator is skipped. Only
 * cancellation and internal faults propagate.
 */

import { DocumentError } from "#src/document/errors";
import type { PdfDocument } from "#src/document/pdf-document";
import type { PdfPage } from "#src/document/pdf-page";
import { ResourceScope } from "#src/document/resources";
import { FontError, UndefinedGlyphError } from "#src/fonts/errors";
import type { FontCache } from "#src/fonts/font-cache";
import type { FontDirectory } from "#src/fonts/font-directory";
import type { FontLoadContext } from "#src/fonts/font-loader";
import type { GlyphCache } from "#src/fonts/glyph-cache";
import { OutlineFont, type PdfFont } from "#src/fonts/pdf-font";
import { Type3Font } from "#src/fonts/type3-font";
import type { CharCode } from "#src/fonts/cmap";
import { type RGB, type RGBA, rgb, withAlpha } from "#src/helpers/colors";
import {
  IDENTITY,
  intersectRects,
  type Matrix,
  multiply,
  type Rect,
  transformRect,
  translate,
} from "#src/helpers/matrix";
import type { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { isDictLike, isPdfStream, type PdfObject } from "#src/objects/pdf-object";
import { PdfStream } from "#src/objects/pdf-stream";
import { RecoverableParseError } from "#src/parser/errors";
import { type FillRule, Path, PathBuilder } from "#src/scene/path";
import { type PlacedGlyph, type Scene, SceneBuilder, type SceneImage } from "#src/scene/scene";
import {
  type ColorSpace,
  DEVICE_CMYK,
  DEVICE_GRAY,
  DEVICE_RGB,
  loadColorSpace,
  namedColorSpace,
  PatternSpace,
} from "./color-space";
import { parseContent } from "./content-parser";
import { type Diagnostic, type DiagnosticCallback, type DiagnosticKind, DiagnosticLog } from "./diagnostics";
import { ContentError, UnsupportedFeatureError } from "./errors";
import {
  type GraphicsState,
  GraphicsStateStack,
  initialGraphicsState,
  LINE_CAPS,
  LINE_JOINS,
  type PaintState,
  strokeStyle,
} from "./graphics-state";
import { decodeImage, type ImageDecodeContext, rejectCodecImage } from "./image-decoder";
import type { LoadContext } from "./load-context";
import type { ContentOp, DeviceSpaceName, PaintTarget } from "./operators";
import { loadShading, renderShading, type Shading, shadingMidColor } from "./shading";

/** Nesting limit for form XObjects and Type 3 glyph procedures together */
export const MAX_NESTING_DEPTH = 32;

/** Operators between cancellation checks */
const CHECK_INTERVAL = 256;

const MID_GRAY: RGB = rgb(0.5, 0.5, 0.5);

export interface InterpreterOptions {
  fontCache: FontCache;
  glyphCache: GlyphCache;
  fontDirectory?: FontDirectory | null;
  /** Device pixels per point; sets the sample density of shadings */
  resolution?: number;
  signal?: AbortSignal;
  onDiagnostic?: DiagnosticCallback;
}

export interface PageRun {
  scene: Scene;
  diagnostics: readonly Diagnostic[];
}

/**
 * State of one content stream being run: the page, a form XObject, or a
 * Type 3 glyph procedure.
 */
interface StreamRun {
  scope: ResourceScope;
  /** Stack depth when the stream began; `Q` never restores below it */
  floor: number;
  /** Pattern space for patterns used in this stream */
  patternMatrix: Matrix;
  /** Set by `d1`: colour operators are ignored in this glyph */
  colorLocked: boolean;
}

type LoadedPattern =
  | { type: "shading"; shading: Shading; matrix: Matrix }
  | { type: "solid"; color: RGB; note: string };

const DEVICE_SPACES: Record<DeviceSpaceName, ColorSpace> = {
  DeviceGray: DEVICE_GRAY,
  DeviceRGB: DEVICE_RGB,
  DeviceCMYK: DEVICE_CMYK,
};

/**
 * Run a page's content and build its scene.
 *
 * @throws the signal's reason when cancelled
 */
export function interpretPage(page: PdfPage, options: InterpreterOptions): Promise<PageRun> {
  return new Interpreter(page, options).run();
}

export class Interpreter {
  private readonly log: DiagnosticLog;
  private readonly builder: SceneBuilder;
  private readonly stack: GraphicsStateStack;
  private readonly pageBounds: Rect;
  private readonly baseMatrix: Matrix;
  private readonly resolution: number;

  private path = new PathBuilder();
  private pendingClip: FillRule | null = null;

  // Text object state
  private inText = false;
  private textMatrix: Matrix = IDENTITY;
  private lineMatrix: Matrix = IDENTITY;
  private textClip: Path | null = null;

  private compatibilityDepth = 0;
  private depth = 0;
  private opsSinceCheck = 0;
  private readonly activeForms = new Set<PdfStream>();

  private readonly colorSpaces = new Map<PdfObject, ColorSpace>();
  private readonly images = new Map<PdfStream, SceneImage>();
  private readonly patterns = new Map<PdfObject, LoadedPattern>();
  private readonly reportedPatterns = new Set<PdfObject>();

  constructor(
    private readonly page: PdfPage,
    private readonly options: InterpreterOptions,
  ) {
    const { width, height } = page.size;

    this.log = new DiagnosticLog(options.onDiagnostic);
    this.builder = new SceneBuilder(width, height);
    this.pageBounds = { x0: 0, y0: 0, x1: width, y1: height };
    this.baseMatrix = page.deviceTransform(1);
    this.stack = new GraphicsStateStack(initialGraphicsState(this.baseMatrix, this.pageBounds));
    this.resolution = options.resolution ?? 1;
  }

  private get state(): GraphicsState {
    return this.stack.current;
  }

  private get document(): PdfDocument {
    return this.page.document;
  }

  async run(): Promise<PageRun> {
    this.options.signal?.throwIfAborted();

    const data = await this.page.readContents(message =>
      this.report("syntax", `Content stream skipped: ${message}`),
    );

    this.options.signal?.throwIfAborted();

    await this.runStream(parseContent(data), {
      scope: ResourceScope.forPage(this.page),
      floor: 0,
      patternMatrix: this.baseMatrix,
      colorLocked: false,
    });

    return { scene: this.builder.finish(), diagnostics: this.log.diagnostics };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Running
  // ─────────────────────────────────────────────────────────────────────────────

  private async runStream(ops: readonly ContentOp[], run: StreamRun): Promise<void> {
    for (const op of ops) {
      if (++this.opsSinceCheck >= CHECK_INTERVAL) {
        this.opsSinceCheck = 0;
        this.options.signal?.throwIfAborted();
      }

      const pending = this.execute(op, run);

      if (pending) {
        await pending;
      }
    }

    if (this.inText && run.floor === 0 && this.depth === 0) {
      this.report("state", "Text object not closed with ET");
      this.endText();
    }

    while (this.stack.depth > run.floor) {
      this.restore();
    }
  }

  private report(kind: DiagnosticKind, message: string, op?: ContentOp): void {
    this.log.report(op ? { kind, message, operator: op.operator, position: op.position } : { kind, message });
  }

  /**
   * Turn a failed resource load into a diagnostic. Cancellation and
   * errors outside the document/content/font families propagate.
   */
  private fail(kind: DiagnosticKind, error: unknown, op: ContentOp): void {
    if (this.options.signal?.aborted) {
      throw error;
    }

    if (error instanceof UnsupportedFeatureError) {
      this.report("unsupported", error.message, op);
    } else if (
      error instanceof ContentError ||
      error instanceof DocumentError ||
      error instanceof FontError ||
      error instanceof RecoverableParseError
    ) {
      this.report(kind, error.message, op);
    } else {
      throw error;
    }
  }

  private execute(op: ContentOp, run: StreamRun): Promise<void> | undefined {
    const state = this.state;

    switch (op.kind) {
      // General graphics state
      case "save":
        this.stack.save();
        return;
      case "restore":
        if (this.stack.depth <= run.floor) {
          this.report("state", "Q without matching q ignored", op);
        } else {
          this.restore();
        }

        return;
      case "transform":
        state.ctm = multiply(op.matrix, state.ctm);
        return;
      case "lineWidth":
        state.lineWidth = Math.abs(op.width);
        return;
      case "lineCap": {
        const cap = LINE_CAPS[op.cap];

        if (cap) {
          state.lineCap = cap;
        } else {
          this.report("syntax", `Invalid line cap ${op.cap}`, op);
        }

        return;
      }
      case "lineJoin": {
        const join = LINE_JOINS[op.join];

        if (join) {
          state.lineJoin = join;
        } else {
          this.report("syntax", `Invalid line join ${op.join}`, op);
        }

        return;
      }
      case "miterLimit":
        state.miterLimit = Math.max(op.limit, 1);
        return;
      case "dash":
        this.setDash(op.array, op.phase, op);
        return;
      case "renderingIntent":
      case "flatness":
        return;
      case "extGState":
        return this.applyExtGState(op.name, run, op);

      // Path construction
      case "moveTo":
        this.path.moveTo(op.x, op.y);
        return;
      case "lineTo":
        if (!this.path.lineTo(op.x, op.y)) {
          this.report("syntax", "No current point", op);
        }

        return;
      case "curveTo":
        if (!this.path.curveTo(op.x1, op.y1, op.x2, op.y2, op.x3, op.y3)) {
          this.report("syntax", "No current point", op);
        }

        return;
      case "curveToInitial": {
        const current = this.path.currentPoint;

        if (current) {
          this.path.curveTo(current.x, current.y, op.x2, op.y2, op.x3, op.y3);
        } else {
          this.report("syntax", "No current point", op);
        }

        return;
      }
      case "curveToFinal":
        if (!this.path.curveTo(op.x1, op.y1, op.x3, op.y3, op.x3, op.y3)) {
          this.report("syntax", "No current point", op);
        }

        return;
      case "closePath":
        this.path.close();
        return;
      case "rect":
        this.path.rect(op.x, op.y, op.width, op.height);
        return;

      // Painting and clipping
      case "paint":
        return this.paint(op.close, op.fill, op.stroke, run, op);
      case "clip":
        this.pendingClip = op.rule;
        return;

      // Text
      case "beginText":
        if (this.inText) {
          this.report("state", "BT inside a text object", op);
        }

        this.inText = true;
        this.textMatrix = IDENTITY;
        this.lineMatrix = IDENTITY;
        this.textClip = null;
        return;
      case "endText":
        if (!this.inText) {
          this.report("state", "ET without BT", op);
          return;
        }

        this.endText();
        return;
      case "charSpacing":
        state.text.charSpacing = op.spacing;
        return;
      case "wordSpacing":
        state.text.wordSpacing = op.spacing;
        return;
      case "horizontalScaling":
        state.text.horizontalScaling = op.percent / 100;
        return;
      case "leading":
        state.text.leading = op.leading;
        return;
      case "font":
        return this.setFont(op.name, op.size, run, op);
      case "renderMode":
        if (Number.isInteger(op.mode) && op.mode >= 0 && op.mode <= 7) {
          state.text.renderMode = op.mode;
        } else {
          this.report("syntax", `Invalid text rendering mode ${op.mode}`, op);
        }

        return;
      case "rise":
        state.text.rise = op.rise;
        return;
      case "moveText":
        if (this.requireText(op)) {
          this.moveText(op.tx, op.ty);

          if (op.setLeading) {
            state.text.leading = -op.ty;
          }
        }

        return;
      case "textMatrix":
        if (this.requireText(op)) {
          this.textMatrix = op.matrix;
          this.lineMatrix = op.matrix;
        }

        return;
      case "nextLine":
        if (this.requireText(op)) {
          this.moveText(0, -state.text.leading);
        }

        return;
      case "showText":
        return this.requireText(op) ? this.showText([op.text], run, op) : undefined;
      case "showTextArray":
        return this.requireText(op) ? this.showText(op.items, run, op) : undefined;
      case "nextLineShowText":
        if (!this.requireText(op)) {
          return;
        }

        if (op.wordSpacing !== undefined) {
          state.text.wordSpacing = op.wordSpacing;
        }

        if (op.charSpacing !== undefined) {
          state.text.charSpacing = op.charSpacing;
        }

        this.moveText(0, -state.text.leading);
        return this.showText([op.text], run, op);

      // Type 3 glyph metrics
      case "glyphWidth":
        return;
      case "glyphWidthAndBounds":
        run.colorLocked = true;
        return;

      // Colour
      case "colorSpace":
        return this.setColorSpace(op.target, op.name, run, op);
      case "color":
        if (!run.colorLocked) {
          this.setColor(op.target, op.components, op.pattern, run, op);
        }

        return;
      case "deviceColor":
        if (!run.colorLocked) {
          const space = DEVICE_SPACES[op.space];

          this.paintState(op.target).space = space;
          this.paintState(op.target).components = op.components;
          this.paintState(op.target).pattern = undefined;
        }

        return;

      // External objects, images and shadings
      case "xObject":
        return this.drawXObject(op.name, run, op);
      case "inlineImage":
        return this.drawInlineImage(op.dict, op.data, run, op);
      case "shading":
        return this.drawShading(op.name, run, op);

      case "markedContent":
        return;
      case "compatibility":
        this.compatibilityDepth = Math.max(this.compatibilityDepth + (op.begin ? 1 : -1), 0);
        return;

      case "invalid":
        this.report("syntax", op.message, op);
        return;
      case "unknown":
        if (this.compatibilityDepth === 0) {
          this.report("unknown-operator", `Unknown operator ${op.operator}`, op);
        }

        return;
    }
  }

  private restore(): void {
    const discarded = this.stack.restore();

    if (!discarded) {
      return;
    }

    for (let i = this.state.clipDepth; i < discarded.clipDepth; i++) {
      this.builder.popClip();
    }
  }

  private paintState(target: PaintTarget): PaintState {
    return target === "fill" ? this.state.fill : this.state.stroke;
  }

  private setDash(array: readonly number[], phase: number, op: ContentOp): void {
    if (array.some(n => n < 0 || !Number.isFinite(n))) {
      this.report("syntax", "Dash array has negative entries", op);
      return;
    }

    this.state.dash = array.length === 0 || array.every(n => n === 0) ? null : { array: [...array], phase };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Paths
  // ─────────────────────────────────────────────────────────────────────────────

  private async paint(
    close: boolean,
    fill: FillRule | null,
    stroke: boolean,
    run: StreamRun,
    op: ContentOp,
  ): Promise<void> {
    if (close) {
      this.path.close();
    }

    const path = this.path.take();
    const clip = this.pendingClip;

    this.pendingClip = null;

    if (fill) {
      await this.fillPath(path, fill, run, op);
    }

    if (stroke) {
      const color = await this.solidColor("stroke", run, op);

      this.builder.stroke(path, this.state.ctm, color, strokeStyle(this.state));
    }

    if (clip) {
      this.pushClip(path, this.state.ctm, clip);
    }
  }

  private async fillPath(path: Path, rule: FillRule, run: StreamRun, op: ContentOp): Promise<void> {
    const paint = this.state.fill;

    if (!paint.pattern || path.isEmpty) {
      this.builder.fill(path, this.state.ctm, await this.solidColor("fill", run, op), rule);
      return;
    }

    const pattern = await this.loadPattern(paint, run, op);

    if (!pattern) {
      return;
    }

    if (pattern.type === "solid") {
      this.builder.fill(path, this.state.ctm, withAlpha(pattern.color, this.state.fillAlpha), rule);
      return;
    }

    const bounds = path.bounds();
    const area = bounds && this.clipArea(transformRect(this.state.ctm, bounds));

    if (!area) {
      return;
    }

    const rendered = renderShading(
      pattern.shading,
      pattern.matrix,
      area,
      this.resolution,
      this.state.fillAlpha,
      true,
    );

    if (rendered) {
      this.builder.pushClip(path, this.state.ctm, rule);
      this.builder.image(rendered.image, rendered.transform, 1);
      this.builder.popClip();
    }
  }

  /**
   * Intersect the clip with a path given in the coordinates `transform`
   * maps to scene space.
   */
  private pushClip(path: Path, transform: Matrix, rule: FillRule): void {
    const state = this.state;
    const bounds = path.bounds();

    this.builder.pushClip(path, transform, rule);
    state.clipDepth++;
    state.clipBounds =
      bounds && state.clipBounds ? intersectRects(state.clipBounds, transformRect(transform, bounds)) : null;
  }

  /** A scene-space rectangle limited to the page and the current clip */
  private clipArea(rect: Rect): Rect | null {
    const clip = this.state.clipBounds;

    return clip ? intersectRects(rect, clip) : null;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Colour
  // ─────────────────────────────────────────────────────────────────────────────

  private async colorSpaceFor(obj: PdfObject, run: StreamRun): Promise<ColorSpace> {
    if (obj.type === "name") {
      const named = namedColorSpace(obj.value);

      if (named) {
        return named;
      }

      const resource = run.scope.find("ColorSpace", obj.value);

      if (!resource) {
        throw new ContentError(`Undefined colour space /${obj.value}`);
      }

      obj = resource;
    }

    const cached = this.colorSpaces.get(obj);

    if (cached) {
      return cached;
    }

    const space = await loadColorSpace(obj, this.loadContext());

    this.colorSpaces.set(obj, space);

    return space;
  }

  private async setColorSpace(target: PaintTarget, name: string, run: StreamRun, op: ContentOp): Promise<void> {
    if (run.colorLocked) {
      return;
    }

    try {
      const space = await this.colorSpaceFor(PdfName.of(name), run);
      const paint = this.paintState(target);

      paint.space = space;
      paint.components = space.initialColor();
      paint.pattern = undefined;
    } catch (error) {
      this.fail("resource", error, op);
    }
  }

  private setColor(
    target: PaintTarget,
    components: number[],
    patternName: string | undefined,
    run: StreamRun,
    op: ContentOp,
  ): void {
    const paint = this.paintState(target);

    if (paint.space instanceof PatternSpace) {
      if (patternName === undefined) {
        this.report("syntax", "Pattern colour space needs a pattern name", op);
        return;
      }

      const object = run.scope.find("Pattern", patternName);

      if (!object) {
        this.report("resource", `Undefined pattern /${patternName}`, op);
        return;
      }

      paint.components = components;
      paint.pattern = { name: patternName, object };
      return;
    }

    if (components.length < paint.space.components) {
      this.report(
        "syntax",
        `/${paint.space.family} colour needs ${paint.space.components} components, got ${components.length}`,
        op,
      );
      return;
    }

    paint.components = components.slice(0, paint.space.components);
  }

  /**
   * The paint as one colour. Patterns that cannot be drawn as such are
   * approximated, with a diagnostic.
   */
  private async solidColor(target: PaintTarget, run: StreamRun, op: ContentOp): Promise<RGBA> {
    const paint = this.paintState(target);
    const alpha = target === "fill" ? this.state.fillAlpha : this.state.strokeAlpha;

    if (!paint.pattern) {
      return withAlpha(paint.space.toRgb(paint.components), alpha);
    }

    const pattern = await this.loadPattern(paint, run, op);

    if (!pattern) {
      return withAlpha(MID_GRAY, alpha);
    }

    if (pattern.type === "shading") {
      this.notePattern(paint, "Shading pattern approximated by a single colour", op);
      return withAlpha(shadingMidColor(pattern.shading), alpha);
    }

    return withAlpha(pattern.color, alpha);
  }

  private notePattern(paint: PaintState, message: string, op: ContentOp): void {
    const object = paint.pattern?.object;

    if (object && !this.reportedPatterns.has(object)) {
      this.reportedPatterns.add(object);
      this.report("unsupported", message, op);
    }
  }

  private async loadPattern(paint: PaintState, run: StreamRun, op: ContentOp): Promise<LoadedPattern | null> {
    const selected = paint.pattern;

    if (!selected) {
      return null;
    }

    const cached = this.patterns.get(selected.object);

    if (cached) {
      if (cached.type === "solid") {
        this.notePattern(paint, cached.note, op);
      }

      return cached;
    }

    try {
      const dict = selected.object;

      if (!isDictLike(dict)) {
        throw new ContentError(`Pattern /${selected.name} is not a dictionary`);
      }

      const values = dict.getArray("Matrix", this.document.resolver)?.toNumbers(this.document.resolver);
      const [a, b, c, d, e, f] = values?.length === 6 && values.every(Number.isFinite) ? values : IDENTITY;
      const matrix = multiply([a, b, c, d, e, f], run.patternMatrix);
      const patternType = dict.getNumber("PatternType", this.document.resolver)?.value;

      let pattern: LoadedPattern;

      if (patternType === 2) {
        const shadingObject = dict.get("Shading", this.document.resolver);

        if (!shadingObject) {
          throw new ContentError(`Shading pattern /${selected.name} has no /Shading`);
        }

        pattern = { type: "shading", shading: await loadShading(shadingObject, this.imageContext(run)), matrix };
      } else if (patternType === 1 && isPdfStream(dict)) {
        const paintType = dict.getNumber("PaintType", this.document.resolver)?.value;

        if (paintType === 2) {
          // Uncoloured: the colour comes with scn and is not cached
          const base = paint.space instanceof PatternSpace ? paint.space.base : undefined;
          const color = base ? base.toRgb(paint.components) : MID_GRAY;

          this.notePattern(paint, "Tiling pattern drawn as a solid colour", op);
          return { type: "solid", color, note: "Tiling pattern drawn as a solid colour" };
        }

        pattern = {
          type: "solid",
          color: await this.averageColor(dict),
          note: "Tiling pattern drawn with its average colour",
        };
      } else {
        throw new ContentError(`Unknown pattern type ${patternType ?? "(missing)"}`);
      }

      this.patterns.set(selected.object, pattern);

      if (pattern.type === "solid") {
        this.notePattern(paint, pattern.note, op);
      }

      return pattern;
    } catch (error) {
      this.fail("resource", error, op);
      return null;
    }
  }

  /**
   * Mean of the device fill colours a tiling pattern's cell sets.
   */
  private async averageColor(stream: PdfStream): Promise<RGB> {
    const ops = parseContent(await this.document.decodeStream(stream));
    const colors: RGB[] = [];

    for (const op of ops) {
      if (op.kind === "deviceColor" && op.target === "fill") {
        colors.push(DEVICE_SPACES[op.space].toRgb(op.components));
      }
    }

    if (colors.length === 0) {
      return MID_GRAY;
    }

    const sum = (channel: keyof RGB) => colors.reduce((total, color) => total + color[channel], 0) / colors.length;

    return rgb(sum("red"), sum("green"), sum("blue"));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Graphics state parameter dictionaries
  // ─────────────────────────────────────────────────────────────────────────────

  private async applyExtGState(name: string, run: StreamRun, op: ContentOp): Promise<void> {
    const resolver = this.document.resolver;
    let dict: PdfDict;

    try {
      const value = run.scope.get("ExtGState", name);

      if (!isDictLike(value)) {
        throw new ContentError(`ExtGState /${name} is not a dictionary`);
      }

      dict = value;
    } catch (error) {
      this.fail("resource", error, op);
      return;
    }

    const state = this.state;
    const number = (key: string) => dict.getNumber(key, resolver)?.value;

    const lineWidth = number("LW");
    const lineCap = number("LC");
    const lineJoin = number("LJ");
    const miterLimit = number("ML");
    const strokeAlpha = number("CA");
    const fillAlpha = number("ca");

    if (lineWidth !== undefined) {
      state.lineWidth = Math.abs(lineWidth);
    }

    if (lineCap !== undefined) {
      state.lineCap = LINE_CAPS[lineCap] ?? state.lineCap;
    }

    if (lineJoin !== undefined) {
      state.lineJoin = LINE_JOINS[lineJoin] ?? state.lineJoin;
    }

    if (miterLimit !== undefined) {
      state.miterLimit = Math.max(miterLimit, 1);
    }

    if (strokeAlpha !== undefined) {
      state.strokeAlpha = Math.min(Math.max(strokeAlpha, 0), 1);
    }

    if (fillAlpha !== undefined) {
      state.fillAlpha = Math.min(Math.max(fillAlpha, 0), 1);
    }

    const dash = dict.getArray("D", resolver);

    if (dash) {
      const array = dash.at(0, resolver);
      const phase = dash.numberAt(1, resolver) ?? 0;

      if (array?.type === "array") {
        this.setDash(array.toNumbers(resolver), phase, op);
      }
    }

    const blendMode = dict.getNameOrFirst("BM", resolver)?.value;

    if (blendMode !== undefined) {
      state.blendMode = blendMode;

      if (blendMode !== "Normal" && blendMode !== "Compatible") {
        this.report("unsupported", `Blend mode /${blendMode} drawn as Normal`, op);
      }
    }

    const smask = dict.get("SMask", resolver);

    if (smask && !(smask.type === "name" && smask.value === "None")) {
      this.report("unsupported", "Soft mask in ExtGState ignored", op);
    }

    const font = dict.getArray("Font", resolver);

    if (font) {
      const fontDict = font.at(0, resolver);
      const size = font.numberAt(1, resolver);

      if (isDictLike(fontDict) && size !== undefined) {
        await this.loadFontInto(fontDict, size, op);
      } else {
        this.report("syntax", "ExtGState /Font is not [font size]", op);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Text
  // ─────────────────────────────────────────────────────────────────────────────

  private requireText(op: ContentOp): boolean {
    if (!this.inText) {
      this.report("state", `${op.operator} outside a text object`, op);
    }

    return this.inText;
  }

  private moveText(tx: number, ty: number): void {
    this.lineMatrix = multiply(translate(tx, ty), this.lineMatrix);
    this.textMatrix = this.lineMatrix;
  }

  private endText(): void {
    this.inText = false;

    if (this.textClip) {
      this.pushClip(this.textClip, IDENTITY, "nonzero");
      this.textClip = null;
    }
  }

  private fontContext(): FontLoadContext {
    return {
      ...this.loadContext(),
      fontDirectory: this.options.fontDirectory ?? null,
      onWarning: message => this.report("font", message),
    };
  }

  private async setFont(name: string, size: number, run: StreamRun, op: ContentOp): Promise<void> {
    this.state.text.fontSize = size;

    try {
      const dict = run.scope.get("Font", name);

      if (!isDictLike(dict)) {
        throw new ContentError(`Font /${name} is not a dictionary`);
      }

      await this.loadFontInto(dict, size, op);
    } catch (error) {
      this.state.text.font = null;
      this.fail("font", error, op);
    }
  }

  private async loadFontInto(dict: PdfDict, size: number, op: ContentOp): Promise<void> {
    const text = this.state.text;

    try {
      text.font = await this.options.fontCache.get(dict, this.fontContext());
      text.fontSize = size;
    } catch (error) {
      text.font = null;
      this.fail("font", error, op);
    }
  }

  /**
   * Text space to user space for the current text position, before the
   * font matrix.
   */
  private textSpace(): Matrix {
    const { fontSize, horizontalScaling, rise } = this.state.text;

    return multiply([fontSize * horizontalScaling, 0, 0, fontSize, 0, rise], this.textMatrix);
  }

  private async showText(items: readonly (Uint8Array | number)[], run: StreamRun, op: ContentOp): Promise<void> {
    const text = this.state.text;
    const font = text.font;

    if (!font) {
      this.report("font", "Text shown without a font", op);
      return;
    }

    const placed: PlacedGlyph[] = [];

    for (const item of items) {
      if (typeof item === "number") {
        const shift = (-item / 1000) * text.fontSize;

        this.textMatrix = multiply(
          font.vertical ? translate(0, shift) : translate(shift * text.horizontalScaling, 0),
          this.textMatrix,
        );
        continue;
      }

      for (const code of font.decode(item)) {
        await this.showGlyph(font, code, placed, run, op);
        this.advance(font, code);
      }
    }

    await this.emitGlyphs(placed, run, op);
  }

  private advance(font: PdfFont, code: CharCode): void {
    const { fontSize, charSpacing, wordSpacing, horizontalScaling } = this.state.text;
    const spacing = charSpacing + (code.length === 1 && code.code === 32 ? wordSpacing : 0);

    if (font.vertical) {
      const ty = (font.verticalMetrics(code).advance / 1000) * fontSize + spacing;

      this.textMatrix = multiply(translate(0, ty), this.textMatrix);
    } else {
      const tx = ((font.width(code) / 1000) * fontSize + spacing) * horizontalScaling;

      this.textMatrix = multiply(translate(tx, 0), this.textMatrix);
    }
  }

  /**
   * Glyph space to user space for a code at the current position.
   */
  private glyphMatrix(font: PdfFont, code: CharCode): Matrix {
    let fontMatrix = font.fontMatrix;

    if (font.vertical) {
      const { originX, originY } = font.verticalMetrics(code);

      fontMatrix = multiply(fontMatrix, translate(-originX / 1000, -originY / 1000));
    }

    return multiply(fontMatrix, this.textSpace());
  }

  private async showGlyph(
    font: PdfFont,
    code: CharCode,
    placed: PlacedGlyph[],
    run: StreamRun,
    op: ContentOp,
  ): Promise<void> {
    if (font instanceof Type3Font) {
      await this.runType3Glyph(font, code, run, op);
      return;
    }

    if (!(font instanceof OutlineFont)) {
      return;
    }

    try {
      placed.push({ glyph: this.options.glyphCache.glyphForCode(font, code), matrix: this.glyphMatrix(font, code) });
    } catch (error) {
      if (!(error instanceof UndefinedGlyphError)) {
        throw error;
      }

      this.report("glyph", error.message, op);
    }
  }

  private async emitGlyphs(placed: PlacedGlyph[], run: StreamRun, op: ContentOp): Promise<void> {
    const mode = this.state.text.renderMode;
    const ctm = this.state.ctm;

    if (mode >= 4) {
      let clip = this.textClip ?? Path.EMPTY;

      for (const { glyph, matrix } of placed) {
        clip = clip.concat(glyph.path.transform(multiply(matrix, ctm)));
      }

      this.textClip = clip;
    }

    if (placed.length === 0) {
      return;
    }

    const fills = mode === 0 || mode === 2 || mode === 4 || mode === 6;
    const strokes = mode === 1 || mode === 2 || mode === 5 || mode === 6;

    if (fills) {
      this.builder.glyphs(placed, ctm, await this.solidColor("fill", run, op));
    }

    if (strokes) {
      this.builder.glyphs(placed, ctm, await this.solidColor("stroke", run, op), strokeStyle(this.state));
    }
  }

  private async runType3Glyph(font: Type3Font, code: CharCode, run: StreamRun, op: ContentOp): Promise<void> {
    const proc = font.charProc(code);

    if (!proc) {
      this.report("glyph", `No glyph procedure for code ${code.code} in font ${font.baseFontName}`, op);
      return;
    }

    if (this.state.text.renderMode >= 4) {
      this.report("unsupported", "Type 3 glyphs do not add to the text clip", op);
    }

    if (this.state.text.renderMode === 3 || this.state.text.renderMode === 7) {
      return;
    }

    if (this.depth >= MAX_NESTING_DEPTH) {
      this.report("recursion", `Type 3 glyph nested deeper than ${MAX_NESTING_DEPTH}`, op);
      return;
    }

    let data: Uint8Array;

    try {
      data = await this.document.decodeStream(proc);
    } catch (error) {
      this.fail("glyph", error, op);
      return;
    }

    const glyphToUser = multiply(font.fontMatrix, this.textSpace());
    const savedText = { inText: this.inText, textMatrix: this.textMatrix, lineMatrix: this.lineMatrix };
    const savedPath = this.path;

    this.stack.save();
    this.state.ctm = multiply(glyphToUser, this.state.ctm);
    this.path = new PathBuilder();
    this.inText = false;
    this.depth++;

    try {
      await this.runStream(parseContent(data), {
        scope: run.scope.enter(font.resources),
        floor: this.stack.depth,
        patternMatrix: this.state.ctm,
        colorLocked: false,
      });
    } finally {
      this.depth--;
      this.restore();
      this.path = savedPath;
      this.inText = savedText.inText;
      this.textMatrix = savedText.textMatrix;
      this.lineMatrix = savedText.lineMatrix;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // XObjects, images and shadings
  // ─────────────────────────────────────────────────────────────────────────────

  private loadContext(): LoadContext {
    return {
      resolver: this.document.resolver,
      decodeStream: (stream: PdfStream) => this.document.decodeStream(stream),
    };
  }

  private imageContext(run: StreamRun): ImageDecodeContext {
    return { ...this.loadContext(), loadColorSpace: obj => this.colorSpaceFor(obj, run) };
  }

  private async drawXObject(name: string, run: StreamRun, op: ContentOp): Promise<void> {
    let stream: PdfStream;

    try {
      const value = run.scope.get("XObject", name);

      if (!(value instanceof PdfStream)) {
        throw new ContentError(`XObject /${name} is not a stream`);
      }

      stream = value;
    } catch (error) {
      this.fail("resource", error, op);
      return;
    }

    const subtype = stream.getName("Subtype", this.document.resolver)?.value;

    switch (subtype) {
      case "Image":
        await this.drawImage(stream, undefined, run, op);
        return;
      case "Form":
        await this.runForm(stream, run, op);
        return;
      case "PS":
        return;
      default:
        this.report("resource", `XObject /${name} has unknown subtype ${subtype ?? "(none)"}`, op);
    }
  }

  private async drawImage(
    image: PdfStream,
    data: Uint8Array | undefined,
    run: StreamRun,
    op: ContentOp,
  ): Promise<void> {
    const resolver = this.document.resolver;
    const isMask = image.getBool("ImageMask", resolver)?.value ?? false;
    // Stencil masks take the fill colour, so only colour images are reused
    const cacheable = data === undefined && !isMask;

    try {
      let decoded = cacheable ? this.images.get(image) : undefined;

      if (!decoded) {
        const fillColor = isMask ? await this.solidColor("fill", run, op) : MID_GRAY;

        decoded = await decodeImage(image, this.imageContext(run), { fillColor, data });

        if (cacheable) {
          this.images.set(image, decoded);
        }
      }

      this.builder.image(decoded, this.state.ctm, this.state.fillAlpha);
    } catch (error) {
      this.fail("image", error, op);
    }
  }

  private async drawInlineImage(dict: PdfDict, data: Uint8Array, run: StreamRun, op: ContentOp): Promise<void> {
    const image = new PdfStream(dict, data);
    let decoded: Uint8Array;

    try {
      rejectCodecImage(image, this.loadContext());
      decoded = await this.document.decodeStream(image);
    } catch (error) {
      this.fail("image", error, op);
      return;
    }

    await this.drawImage(image, decoded, run, op);
  }

  private async runForm(form: PdfStream, run: StreamRun, op: ContentOp): Promise<void> {
    if (this.activeForms.has(form)) {
      this.report("recursion", "Form XObject draws itself; skipped", op);
      return;
    }

    if (this.depth >= MAX_NESTING_DEPTH) {
      this.report("recursion", `Form XObjects nested deeper than ${MAX_NESTING_DEPTH}`, op);
      return;
    }

    let data: Uint8Array;

    try {
      data = await this.document.decodeStream(form);
    } catch (error) {
      this.fail("resource", error, op);
      return;
    }

    const resolver = this.document.resolver;
    const values = form.getArray("Matrix", resolver)?.toNumbers(resolver);
    const [a, b, c, d, e, f] = values?.length === 6 && values.every(Number.isFinite) ? values : IDENTITY;
    const bbox = form.getRect("BBox", resolver);
    const savedPath = this.path;

    this.stack.save();
    this.state.ctm = multiply([a, b, c, d, e, f], this.state.ctm);

    if (bbox) {
      this.pushClip(Path.rect(bbox.x0, bbox.y0, bbox.x1 - bbox.x0, bbox.y1 - bbox.y0), this.state.ctm, "nonzero");
    }

    this.path = new PathBuilder();
    this.activeForms.add(form);
    this.depth++;

    try {
      await this.runStream(parseContent(data), {
        scope: run.scope.enter(form.getDict("Resources", resolver)),
        floor: this.stack.depth,
        patternMatrix: this.state.ctm,
        colorLocked: run.colorLocked,
      });
    } finally {
      this.depth--;
      this.activeForms.delete(form);
      this.restore();
      this.path = savedPath;
    }
  }

  private async drawShading(name: string, run: StreamRun, op: ContentOp): Promise<void> {
    try {
      const shading = await loadShading(run.scope.get("Shading", name), this.imageContext(run));
      const ctm = this.state.ctm;
      const area = shading.bbox
        ? this.clipArea(transformRect(ctm, shading.bbox))
        : this.clipArea(this.pageBounds);

      if (!area) {
        return;
      }

      const rendered = renderShading(shading, ctm, area, this.resolution, this.state.fillAlpha);

      if (rendered) {
        this.builder.image(rendered.image, rendered.transform, 1);
      }
    } catch (error) {
      this.fail("resource", error, op);
    }
  }
}
