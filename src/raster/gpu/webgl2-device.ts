/**
 * WebGL2 implementation of {@link GpuDevice}.
 *
 * Paths are drawn stencil-then-cover into a multisampled framebuffer:
 * fan triangles increment the stencil for front faces and decrement it
 * for back faces, then a cover quad paints where the stencil passes the
 * fill rule and zeroes it. Clip layers are single-channel textures built
 * the same way and read by the fragment shaders with `texelFetch`.
 *
 * Needs a browser (or any host with a WebGL2 context); Node has none.
 */

import type { RGBA } from "#src/helpers/colors";
import type { Matrix, Rect } from "#src/helpers/matrix";
import type { FillRule } from "#src/scene/path";
import type { SceneImage } from "#src/scene/scene";
import { fromPremultiplied, type RenderTarget } from "../render-target";
import type { GpuDevice } from "./gpu-device";

const VERTEX_SHADER = `#version 300 es
layout(location = 0) in vec2 a_position;
uniform mat3 u_transform;
uniform vec2 u_size;
out vec2 v_uv;

void main() {
  vec2 p = (u_transform * vec3(a_position, 1.0)).xy;
  v_uv = a_position;
  gl_Position = vec4(p.x / u_size.x * 2.0 - 1.0, 1.0 - p.y / u_size.y * 2.0, 0.0, 1.0);
}
`;

const SOLID_FRAGMENT_SHADER = `#version 300 es
precision highp float;
uniform vec4 u_color;
uniform bool u_clipped;
uniform sampler2D u_clip;
out vec4 outColor;

void main() {
  float clip = u_clipped ? texelFetch(u_clip, ivec2(gl_FragCoord.xy), 0).r : 1.0;
  outColor = u_color * clip;
}
`;

const IMAGE_FRAGMENT_SHADER = `#version 300 es
precision highp float;
uniform sampler2D u_image;
uniform float u_alpha;
uniform bool u_clipped;
uniform sampler2D u_clip;
in vec2 v_uv;
out vec4 outColor;

void main() {
  float clip = u_clipped ? texelFetch(u_clip, ivec2(gl_FragCoord.xy), 0).r : 1.0;
  vec4 c = texture(u_image, vec2(v_uv.x, 1.0 - v_uv.y));
  outColor = vec4(c.rgb * c.a, c.a) * u_alpha * clip;
}
`;

const IDENTITY_MAT3 = new Float32Array([1, 0, 0, 0, 1, 0, 0, 0, 1]);

const UNIT_QUAD = new Float32Array([0, 0, 1, 0, 1, 1, 0, 0, 1, 1, 0, 1]);

interface Program {
  program: WebGLProgram;
  transform: WebGLUniformLocation;
  size: WebGLUniformLocation;
  clipped: WebGLUniformLocation;
  clip: WebGLUniformLocation;
}

interface SolidProgram extends Program {
  color: WebGLUniformLocation;
}

interface ImageProgram extends Program {
  image: WebGLUniformLocation;
  alpha: WebGLUniformLocation;
}

/** A multisampled draw surface resolved into a texture */
interface Surface {
  framebuffer: WebGLFramebuffer;
  color: WebGLRenderbuffer;
  stencil: WebGLRenderbuffer;
  resolveFramebuffer: WebGLFramebuffer;
  texture: WebGLTexture;
}

export class WebGl2Device implements GpuDevice {
  readonly name = "webgl2";
  readonly sampleCount: number;

  private readonly solid: SolidProgram;
  private readonly imageProgram: ImageProgram;
  private readonly vao: WebGLVertexArrayObject;
  private readonly buffer: WebGLBuffer;
  private width = 0;
  private height = 0;
  private target: Surface | null = null;
  private clips: Surface[] = [];

  constructor(private readonly gl: WebGL2RenderingContext) {
    const maxSamples: unknown = gl.getParameter(gl.MAX_SAMPLES);

    this.sampleCount = Math.min(typeof maxSamples === "number" ? maxSamples : 1, 16);
    this.solid = this.createSolidProgram();
    this.imageProgram = this.createImageProgram();
    this.vao = this.mustCreate(gl.createVertexArray(), "vertex array");
    this.buffer = this.mustCreate(gl.createBuffer(), "buffer");

    gl.bindVertexArray(this.vao);
    gl.bindBuffer(gl.ARRAY_BUFFER, this.buffer);
    gl.enableVertexAttribArray(0);
    gl.vertexAttribPointer(0, 2, gl.FLOAT, false, 8, 0);
  }

  begin(width: number, height: number, background: RGBA | null): void {
    const gl = this.gl;

    this.releaseSurfaces();
    this.width = width;
    this.height = height;
    this.target = this.createSurface(gl.RGBA8);

    const alpha = background ? background.alpha : 0;

    gl.bindFramebuffer(gl.FRAMEBUFFER, this.target.framebuffer);
    gl.viewport(0, 0, width, height);
    gl.clearColor(
      background ? background.red * alpha : 0,
      background ? background.green * alpha : 0,
      background ? background.blue * alpha : 0,
      alpha,
    );
    gl.clearStencil(0);
    gl.clear(gl.COLOR_BUFFER_BIT | gl.STENCIL_BUFFER_BIT);
  }

  fill(triangles: Float32Array, bounds: Rect, fillRule: FillRule, color: RGBA): void {
    const gl = this.gl;
    const target = this.requireTarget();

    gl.bindFramebuffer(gl.FRAMEBUFFER, target.framebuffer);
    this.stencilPass(triangles);

    gl.useProgram(this.solid.program);
    this.bindCommon(this.solid);
    gl.uniform4f(
      this.solid.color,
      color.red * color.alpha,
      color.green * color.alpha,
      color.blue * color.alpha,
      color.alpha,
    );
    gl.enable(gl.BLEND);
    gl.blendFunc(gl.ONE, gl.ONE_MINUS_SRC_ALPHA);
    this.coverPass(bounds, fillRule);
    gl.disable(gl.BLEND);
  }

  pushClip(triangles: Float32Array, bounds: Rect | null, fillRule: FillRule): void {
    const gl = this.gl;
    const layer = this.createSurface(gl.R8);

    gl.bindFramebuffer(gl.FRAMEBUFFER, layer.framebuffer);
    gl.viewport(0, 0, this.width, this.height);
    gl.clearColor(0, 0, 0, 0);
    gl.clearStencil(0);
    gl.clear(gl.COLOR_BUFFER_BIT | gl.STENCIL_BUFFER_BIT);

    if (bounds) {
      this.stencilPass(triangles);
      gl.useProgram(this.solid.program);
      // The cover pass multiplies by the enclosing layer, if any
      this.bindCommon(this.solid);
      gl.uniform4f(this.solid.color, 1, 1, 1, 1);
      this.coverPass(bounds, fillRule);
    }

    this.resolve(layer);
    this.clips.push(layer);
  }

  popClip(): void {
    const layer = this.clips.pop();

    if (layer) {
      this.deleteSurface(layer);
    }
  }

  drawImage(image: SceneImage, transform: Matrix, alpha: number): void {
    const gl = this.gl;
    const target = this.requireTarget();
    const texture = this.mustCreate(gl.createTexture(), "texture");

    gl.activeTexture(gl.TEXTURE1);
    gl.bindTexture(gl.TEXTURE_2D, texture);
    gl.pixelStorei(gl.UNPACK_ALIGNMENT, 1);
    gl.texImage2D(
      gl.TEXTURE_2D,
      0,
      gl.RGBA8,
      image.width,
      image.height,
      0,
      gl.RGBA,
      gl.UNSIGNED_BYTE,
      new Uint8Array(image.data.buffer, image.data.byteOffset, image.data.byteLength),
    );
    // Nearest when magnifying; mipmaps stand in for the box filter
    gl.generateMipmap(gl.TEXTURE_2D);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.LINEAR_MIPMAP_LINEAR);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, gl.NEAREST);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_S, gl.CLAMP_TO_EDGE);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_T, gl.CLAMP_TO_EDGE);

    gl.bindFramebuffer(gl.FRAMEBUFFER, target.framebuffer);
    gl.useProgram(this.imageProgram.program);
    this.bindCommon(this.imageProgram);
    gl.uniformMatrix3fv(this.imageProgram.transform, false, toMat3(transform));
    gl.uniform1i(this.imageProgram.image, 1);
    gl.uniform1f(this.imageProgram.alpha, alpha);
    gl.enable(gl.BLEND);
    gl.blendFunc(gl.ONE, gl.ONE_MINUS_SRC_ALPHA);
    gl.bufferData(gl.ARRAY_BUFFER, UNIT_QUAD, gl.STREAM_DRAW);
    gl.drawArrays(gl.TRIANGLES, 0, 6);
    gl.disable(gl.BLEND);
    gl.deleteTexture(texture);
  }

  readPixels(): RenderTarget {
    const gl = this.gl;
    const target = this.requireTarget();
    const { width, height } = this;
    const bytes = new Uint8Array(width * height * 4);

    this.resolve(target);
    gl.bindFramebuffer(gl.FRAMEBUFFER, target.resolveFramebuffer);
    gl.readPixels(0, 0, width, height, gl.RGBA, gl.UNSIGNED_BYTE, bytes);

    // GL rows run bottom-up; the target is premultiplied
    const pixels = new Float32Array(width * height * 4);

    for (let y = 0; y < height; y++) {
      const from = (height - 1 - y) * width * 4;
      const to = y * width * 4;

      for (let i = 0; i < width * 4; i++) {
        pixels[to + i] = bytes[from + i] / 255;
      }
    }

    return fromPremultiplied(width, height, pixels);
  }

  dispose(): void {
    const gl = this.gl;

    this.releaseSurfaces();
    gl.deleteBuffer(this.buffer);
    gl.deleteVertexArray(this.vao);
    gl.deleteProgram(this.solid.program);
    gl.deleteProgram(this.imageProgram.program);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Passes
  // ───────────────────────────────────────────────────────────────────────────

  private stencilPass(triangles: Float32Array): void {
    const gl = this.gl;

    gl.useProgram(this.solid.program);
    this.bindCommon(this.solid);
    gl.colorMask(false, false, false, false);
    gl.enable(gl.STENCIL_TEST);
    gl.disable(gl.CULL_FACE);
    gl.stencilFunc(gl.ALWAYS, 0, 0xff);
    gl.stencilOpSeparate(gl.FRONT, gl.KEEP, gl.KEEP, gl.INCR_WRAP);
    gl.stencilOpSeparate(gl.BACK, gl.KEEP, gl.KEEP, gl.DECR_WRAP);
    gl.bufferData(gl.ARRAY_BUFFER, triangles, gl.STREAM_DRAW);
    gl.drawArrays(gl.TRIANGLES, 0, triangles.length / 2);
    gl.colorMask(true, true, true, true);
  }

  /** Paint the stencilled samples under `bounds` and zero the stencil. */
  private coverPass(bounds: Rect, fillRule: FillRule): void {
    const gl = this.gl;
    const quad = new Float32Array([
      bounds.x0, bounds.y0, bounds.x1, bounds.y0, bounds.x1, bounds.y1,
      bounds.x0, bounds.y0, bounds.x1, bounds.y1, bounds.x0, bounds.y1,
    ]);

    gl.stencilFunc(gl.NOTEQUAL, 0, fillRule === "nonzero" ? 0xff : 0x01);
    gl.stencilOp(gl.ZERO, gl.ZERO, gl.ZERO);
    gl.bufferData(gl.ARRAY_BUFFER, quad, gl.STREAM_DRAW);
    gl.drawArrays(gl.TRIANGLES, 0, 6);
    gl.disable(gl.STENCIL_TEST);
  }

  /** Uniforms shared by both programs, with the current clip layer bound. */
  private bindCommon(program: Program): void {
    const gl = this.gl;
    const clip = this.clips.at(-1);

    gl.uniformMatrix3fv(program.transform, false, IDENTITY_MAT3);
    gl.uniform2f(program.size, this.width, this.height);
    gl.uniform1i(program.clipped, clip ? 1 : 0);
    gl.uniform1i(program.clip, 0);
    gl.activeTexture(gl.TEXTURE0);
    gl.bindTexture(gl.TEXTURE_2D, clip ? clip.texture : null);
  }

  private resolve(surface: Surface): void {
    const gl = this.gl;

    gl.bindFramebuffer(gl.READ_FRAMEBUFFER, surface.framebuffer);
    gl.bindFramebuffer(gl.DRAW_FRAMEBUFFER, surface.resolveFramebuffer);
    gl.blitFramebuffer(
      0,
      0,
      this.width,
      this.height,
      0,
      0,
      this.width,
      this.height,
      gl.COLOR_BUFFER_BIT,
      gl.NEAREST,
    );
    gl.bindFramebuffer(gl.FRAMEBUFFER, null);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Resources
  // ───────────────────────────────────────────────────────────────────────────

  private createSurface(format: GLenum): Surface {
    const gl = this.gl;
    const framebuffer = this.mustCreate(gl.createFramebuffer(), "framebuffer");
    const color = this.mustCreate(gl.createRenderbuffer(), "renderbuffer");
    const stencil = this.mustCreate(gl.createRenderbuffer(), "renderbuffer");

    gl.bindRenderbuffer(gl.RENDERBUFFER, color);
    gl.renderbufferStorageMultisample(gl.RENDERBUFFER, this.sampleCount, format, this.width, this.height);
    gl.bindRenderbuffer(gl.RENDERBUFFER, stencil);
    gl.renderbufferStorageMultisample(
      gl.RENDERBUFFER,
      this.sampleCount,
      gl.DEPTH24_STENCIL8,
      this.width,
      this.height,
    );
    gl.bindFramebuffer(gl.FRAMEBUFFER, framebuffer);
    gl.framebufferRenderbuffer(gl.FRAMEBUFFER, gl.COLOR_ATTACHMENT0, gl.RENDERBUFFER, color);
    gl.framebufferRenderbuffer(gl.FRAMEBUFFER, gl.DEPTH_STENCIL_ATTACHMENT, gl.RENDERBUFFER, stencil);
    this.checkFramebuffer();

    const texture = this.mustCreate(gl.createTexture(), "texture");
    const resolveFramebuffer = this.mustCreate(gl.createFramebuffer(), "framebuffer");

    gl.bindTexture(gl.TEXTURE_2D, texture);
    gl.texStorage2D(gl.TEXTURE_2D, 1, format, this.width, this.height);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.NEAREST);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, gl.NEAREST);
    gl.bindFramebuffer(gl.FRAMEBUFFER, resolveFramebuffer);
    gl.framebufferTexture2D(gl.FRAMEBUFFER, gl.COLOR_ATTACHMENT0, gl.TEXTURE_2D, texture, 0);
    this.checkFramebuffer();

    return { framebuffer, color, stencil, resolveFramebuffer, texture };
  }

  private deleteSurface(surface: Surface): void {
    const gl = this.gl;

    gl.deleteFramebuffer(surface.framebuffer);
    gl.deleteFramebuffer(surface.resolveFramebuffer);
    gl.deleteRenderbuffer(surface.color);
    gl.deleteRenderbuffer(surface.stencil);
    gl.deleteTexture(surface.texture);
  }

  private releaseSurfaces(): void {
    for (const layer of this.clips) {
      this.deleteSurface(layer);
    }

    if (this.target) {
      this.deleteSurface(this.target);
    }

    this.clips = [];
    this.target = null;
  }

  private requireTarget(): Surface {
    if (!this.target) {
      throw new Error("WebGl2Device used before begin()");
    }

    return this.target;
  }

  private checkFramebuffer(): void {
    const status = this.gl.checkFramebufferStatus(this.gl.FRAMEBUFFER);

    if (status !== this.gl.FRAMEBUFFER_COMPLETE) {
      throw new Error(`Framebuffer incomplete: 0x${status.toString(16)}`);
    }
  }

  private createSolidProgram(): SolidProgram {
    const program = this.createProgram(VERTEX_SHADER, SOLID_FRAGMENT_SHADER);

    return { ...this.commonUniforms(program), color: this.mustGetUniformLocation(program, "u_color") };
  }

  private createImageProgram(): ImageProgram {
    const program = this.createProgram(VERTEX_SHADER, IMAGE_FRAGMENT_SHADER);

    return {
      ...this.commonUniforms(program),
      image: this.mustGetUniformLocation(program, "u_image"),
      alpha: this.mustGetUniformLocation(program, "u_alpha"),
    };
  }

  private commonUniforms(program: WebGLProgram): Program {
    return {
      program,
      transform: this.mustGetUniformLocation(program, "u_transform"),
      size: this.mustGetUniformLocation(program, "u_size"),
      clipped: this.mustGetUniformLocation(program, "u_clipped"),
      clip: this.mustGetUniformLocation(program, "u_clip"),
    };
  }

  private createProgram(vertexSource: string, fragmentSource: string): WebGLProgram {
    const gl = this.gl;
    const vertexShader = this.compileShader(gl.VERTEX_SHADER, vertexSource);
    const fragmentShader = this.compileShader(gl.FRAGMENT_SHADER, fragmentSource);
    const program = this.mustCreate(gl.createProgram(), "program");

    gl.attachShader(program, vertexShader);
    gl.attachShader(program, fragmentShader);
    gl.linkProgram(program);

    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
      const error = gl.getProgramInfoLog(program) || "Unknown linker error.";

      gl.deleteProgram(program);
      throw new Error(`Program link failed: ${error}`);
    }

    gl.deleteShader(vertexShader);
    gl.deleteShader(fragmentShader);

    return program;
  }

  private compileShader(type: GLenum, source: string): WebGLShader {
    const shader = this.mustCreate(this.gl.createShader(type), "shader");

    this.gl.shaderSource(shader, source);
    this.gl.compileShader(shader);

    if (!this.gl.getShaderParameter(shader, this.gl.COMPILE_STATUS)) {
      const error = this.gl.getShaderInfoLog(shader) || "Unknown shader compiler error.";

      this.gl.deleteShader(shader);
      throw new Error(`Shader compilation failed: ${error}`);
    }

    return shader;
  }

  private mustGetUniformLocation(program: WebGLProgram, name: string): WebGLUniformLocation {
    const location = this.gl.getUniformLocation(program, name);

    if (!location) {
      throw new Error(`Missing uniform: ${name}`);
    }

    return location;
  }

  private mustCreate<T>(resource: T | null, what: string): T {
    if (!resource) {
      throw new Error(`Unable to create WebGL ${what}.`);
    }

    return resource;
  }
}

/** Column-major mat3 of a 2D affine matrix */
function toMat3([a, b, c, d, e, f]: Matrix): Float32Array {
  return new Float32Array([a, b, 0, c, d, 0, e, f, 1]);
}
