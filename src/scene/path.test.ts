import { describe, expect, it } from "vitest";
import { Path, PathBuilder } from "./path";

describe("PathBuilder", () => {
  it("refuses lines and curves without a current point", () => {
    const builder = new PathBuilder();

    expect(builder.lineTo(1, 1)).toBe(false);
    expect(builder.curveTo(0, 0, 1, 1, 2, 2)).toBe(false);
    expect(builder.isEmpty).toBe(true);
  });

  it("returns to the subpath start on close", () => {
    const builder = new PathBuilder().moveTo(1, 2);

    builder.lineTo(5, 2);
    builder.close();

    expect(builder.currentPoint).toEqual({ x: 1, y: 2 });
  });

  it("ignores close before any moveTo", () => {
    expect(new PathBuilder().close().isEmpty).toBe(true);
  });

  it("stores a quadratic as the equivalent cubic", () => {
    const builder = new PathBuilder().moveTo(0, 0);

    builder.quadTo(3, 3, 6, 0);

    expect(builder.build().segments[1]).toEqual({
      kind: "curveTo",
      x1: 2,
      y1: 2,
      x2: 4,
      y2: 2,
      x: 6,
      y: 0,
    });
  });

  it("starts over after take", () => {
    const builder = new PathBuilder().rect(0, 0, 1, 1);
    const path = builder.take();

    expect(path.segments).toHaveLength(5);
    expect(builder.isEmpty).toBe(true);
    expect(builder.currentPoint).toBeNull();
  });
});

describe("Path", () => {
  it("treats a path of moves as empty", () => {
    expect(new PathBuilder().moveTo(1, 1).moveTo(2, 2).build().isEmpty).toBe(true);
    expect(Path.rect(0, 0, 1, 1).isEmpty).toBe(false);
  });

  it("bounds control points", () => {
    const builder = new PathBuilder().moveTo(0, 0);

    builder.curveTo(-2, 5, 8, 5, 6, 0);

    expect(builder.build().bounds()).toEqual({ x0: -2, y0: 0, x1: 8, y1: 5 });
    expect(Path.EMPTY.bounds()).toBeNull();
  });

  it("transforms every point", () => {
    const moved = Path.rect(0, 0, 2, 1).transform([2, 0, 0, 3, 10, 20]);

    expect(moved.bounds()).toEqual({ x0: 10, y0: 20, x1: 14, y1: 23 });
    expect(moved.segments.at(-1)).toEqual({ kind: "close" });
  });

  it("concatenates subpaths", () => {
    const both = Path.rect(0, 0, 1, 1).concat(Path.rect(5, 5, 1, 1));

    expect(both.segments).toHaveLength(10);
    expect(Path.EMPTY.concat(Path.EMPTY)).toBe(Path.EMPTY);
  });
});
