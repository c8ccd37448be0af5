import { describe, expect, it } from "vitest";
import type { RGBA } from "#src/helpers/colors";
import { IDENTITY, type Matrix, type Rect } from "#src/helpers/matrix";
import { type FillRule, Path, PathBuilder } from "#src/scene/path";
import { type Scene, type SceneImage, SceneBuilder } from "#src/scene/scene";
import {
  BLUE,
  circlePath,
  maxChannelDifference,
  meanChannelDifference,
  pixelAt,
  RED,
  WHITE_BACKGROUND,
} from "#src/test-utils";
import { CpuBackend } from "../cpu-backend";
import { createRenderTarget, type RenderTarget } from "../render-target";
import { GpuBackend } from "./gpu-backend";
import type { GpuDevice } from "./gpu-device";
import { SoftwareGpuDevice } from "./software-gpu-device";

const ON_WHITE = { scale: 1, background: WHITE_BACKGROUND };

/**
 * Records the batches a backend issues.
 */
class RecordingDevice implements GpuDevice {
  readonly name = "recording";
  readonly sampleCount = 1;
  readonly calls: string[] = [];

  private width = 0;
  private height = 0;

  begin(width: number, height: number, _background: RGBA | null): void {
    this.width = width;
    this.height = height;
    this.calls.push(`begin ${width}x${height}`);
  }

  fill(triangles: Float32Array, _bounds: Rect, fillRule: FillRule, _color: RGBA): void {
    this.calls.push(`fill ${triangles.length / 6} ${fillRule}`);
  }

  pushClip(_triangles: Float32Array, bounds: Rect | null, _fillRule: FillRule): void {
    this.calls.push(bounds ? "pushClip" : "pushClip empty");
  }

  popClip(): void {
    this.calls.push("popClip");
  }

  drawImage(_image: SceneImage, transform: Matrix, alpha: number): void {
    this.calls.push(`drawImage [${transform.join(",")}] ${alpha}`);
  }

  readPixels(): RenderTarget {
    return createRenderTarget(this.width, this.height);
  }

  dispose(): void {
    this.calls.push("dispose");
  }
}

function redSquare(): Scene {
  const builder = new SceneBuilder(200, 200);

  builder.fill(Path.rect(10, 90, 100, 100), IDENTITY, RED, "nonzero");

  return builder.finish();
}

describe("GpuBackend", () => {
  it("issues one batch per item", async () => {
    const device = new RecordingDevice();
    const backend = new GpuBackend(device);
    const builder = new SceneBuilder(10, 10);
    const line = new PathBuilder().moveTo(0, 0);

    line.lineTo(5, 5);

    builder.pushClip(new PathBuilder().build(), IDENTITY, "nonzero");
    builder.fill(Path.rect(0, 0, 4, 4), IDENTITY, RED, "evenodd");
    builder.fill(line.build(), IDENTITY, RED, "nonzero");
    builder.popClip();
    builder.image({ width: 1, height: 1, data: new Uint8ClampedArray(4) }, [4, 0, 0, 4, 1, 1], 0.5);

    await backend.rasterize(builder.finish(), { scale: 2 });

    expect(device.calls).toEqual([
      "begin 20x20",
      "pushClip empty",
      "fill 2 evenodd",
      "popClip",
      "drawImage [8,0,0,8,2,2] 0.5",
    ]);

    backend.dispose();

    expect(device.calls.at(-1)).toBe("dispose");
  });

  it("runs concurrent renders one after another", async () => {
    const backend = new GpuBackend();
    const blue = new SceneBuilder(4, 4);

    blue.fill(Path.rect(0, 0, 4, 4), IDENTITY, BLUE, "nonzero");

    const [square, filled] = await Promise.all([
      backend.rasterize(redSquare(), ON_WHITE),
      backend.rasterize(blue.finish(), { scale: 1 }),
    ]);

    expect(pixelAt(square, 20, 100)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(square, 150, 100)).toEqual([255, 255, 255, 255]);
    expect(filled.width).toBe(4);
    expect(pixelAt(filled, 3, 3)).toEqual([0, 0, 255, 255]);
  });

  it("keeps rendering after a cancelled render", async () => {
    const backend = new GpuBackend();
    const controller = new AbortController();

    controller.abort();

    const cancelled = backend.rasterize(redSquare(), { ...ON_WHITE, signal: controller.signal });

    await expect(cancelled).rejects.toThrow();

    const target = await backend.rasterize(redSquare(), ON_WHITE);

    expect(pixelAt(target, 10, 90)).toEqual([255, 0, 0, 255]);
  });
});

describe("SoftwareGpuDevice", () => {
  const cpu = new CpuBackend();
  const gpu = new GpuBackend(new SoftwareGpuDevice());

  it("matches the CPU backend exactly on pixel-aligned geometry", async () => {
    const builder = new SceneBuilder(20, 20);
    const framed = new PathBuilder().rect(0, 0, 20, 20).rect(6, 6, 4, 4).build();

    builder.pushClip(Path.rect(0, 0, 12, 20), IDENTITY, "nonzero");
    builder.pushClip(Path.rect(4, 0, 16, 20), IDENTITY, "nonzero");
    builder.fill(framed, IDENTITY, RED, "evenodd");
    builder.popClip();
    builder.popClip();
    builder.fill(Path.rect(0, 16, 20, 4), IDENTITY, { ...BLUE, alpha: 0.5 }, "nonzero");

    const scene = builder.finish();
    const a = await cpu.rasterize(scene, ON_WHITE);
    const b = await gpu.rasterize(scene, ON_WHITE);

    expect(b.data).toEqual(a.data);
    expect(pixelAt(b, 5, 2)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(b, 7, 7)).toEqual([255, 255, 255, 255]);
    expect(pixelAt(b, 2, 2)).toEqual([255, 255, 255, 255]);
  });

  it("resolves edge coverage from the sample count", async () => {
    const builder = new SceneBuilder(2, 1);

    builder.fill(Path.rect(0.5, 0, 1, 1), IDENTITY, RED, "nonzero");

    const target = await gpu.rasterize(builder.finish(), { scale: 1 });

    expect(pixelAt(target, 0, 0)).toEqual([255, 0, 0, 128]);
    expect(pixelAt(target, 1, 0)).toEqual([255, 0, 0, 128]);
  });

  it("stays close to the CPU backend on curves", async () => {
    const builder = new SceneBuilder(100, 100);

    builder.fill(circlePath(50, 50, 40), IDENTITY, RED, "nonzero");
    builder.stroke(circlePath(50, 50, 20), IDENTITY, BLUE, {
      lineWidth: 3,
      lineCap: "round",
      lineJoin: "round",
      miterLimit: 10,
      dash: null,
    });

    const scene = builder.finish();
    const a = await cpu.rasterize(scene, ON_WHITE);
    const b = await gpu.rasterize(scene, ON_WHITE);

    expect(meanChannelDifference(a, b)).toBeLessThan(2);
    expect(maxChannelDifference(a, b)).toBeLessThanOrEqual(80);
    expect(pixelAt(b, 50, 50)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(b, 5, 5)).toEqual([255, 255, 255, 255]);
  });

  it("draws images through the clip", async () => {
    const image = { width: 1, height: 1, data: new Uint8ClampedArray([0, 0, 255, 255]) };
    const builder = new SceneBuilder(10, 10);

    builder.pushClip(Path.rect(0, 0, 5, 10), IDENTITY, "nonzero");
    builder.image(image, [10, 0, 0, -10, 0, 10], 1);

    const target = await gpu.rasterize(builder.finish(), ON_WHITE);

    expect(pixelAt(target, 2, 5)).toEqual([0, 0, 255, 255]);
    expect(pixelAt(target, 7, 5)).toEqual([255, 255, 255, 255]);
  });
});
