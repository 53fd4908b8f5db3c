/**
 * GUI 覆盖层程序（GLSL ES 3.00）
 *
 * 与 WebGPU 版本相同的顶点布局与 scissor 语义；
 * WebGL 的 scissor 原点在左下角，需要翻转 y。
 */

import type { SurfaceSize } from '../../core/types';
import { toPixelScissor } from '../../gui/clip';
import type { GuiFrameOutput, GuiTexturesDelta } from '../../gui/types';
import { GUI_VERTEX_FLOATS } from '../constants';
import { createBuffer, createVertexArray, linkProgram } from './glUtils';

// language=glsl
const GUI_VERT = `#version 300 es
uniform vec2 u_screen_size;
layout(location = 0) in vec2 a_pos;
layout(location = 1) in vec2 a_uv;
layout(location = 2) in vec4 a_color;
out vec2 v_uv;
out vec4 v_color;
void main() {
    gl_Position = vec4(
        2.0 * a_pos.x / u_screen_size.x - 1.0,
        1.0 - 2.0 * a_pos.y / u_screen_size.y,
        0.0,
        1.0);
    v_uv = a_uv;
    v_color = a_color;
}
`;

// language=glsl
const GUI_FRAG = `#version 300 es
precision mediump float;
uniform sampler2D u_texture;
in vec2 v_uv;
in vec4 v_color;
out vec4 out_color;
void main() {
    out_color = v_color * texture(u_texture, v_uv);
}
`;

const GUI_VERTEX_STRIDE = GUI_VERTEX_FLOATS * 4;

export class GuiProgram {
    private readonly program: WebGLProgram;
    private readonly vao: WebGLVertexArrayObject;
    private readonly vertexBuffer: WebGLBuffer;
    private readonly indexBuffer: WebGLBuffer;
    private readonly screenSizeLocation: WebGLUniformLocation | null;
    private readonly textureLocation: WebGLUniformLocation | null;
    private readonly textures = new Map<number, WebGLTexture>();

    constructor(private readonly gl: WebGL2RenderingContext) {
        this.program = linkProgram(gl, GUI_VERT, GUI_FRAG, 'gui');
        this.screenSizeLocation = gl.getUniformLocation(this.program, 'u_screen_size');
        this.textureLocation = gl.getUniformLocation(this.program, 'u_texture');

        this.vao = createVertexArray(gl, 'gui');
        gl.bindVertexArray(this.vao);

        this.vertexBuffer = createBuffer(gl, 'gui_vertices');
        gl.bindBuffer(gl.ARRAY_BUFFER, this.vertexBuffer);
        gl.enableVertexAttribArray(0);
        gl.vertexAttribPointer(0, 2, gl.FLOAT, false, GUI_VERTEX_STRIDE, 0);
        gl.enableVertexAttribArray(1);
        gl.vertexAttribPointer(1, 2, gl.FLOAT, false, GUI_VERTEX_STRIDE, 8);
        gl.enableVertexAttribArray(2);
        gl.vertexAttribPointer(2, 4, gl.FLOAT, false, GUI_VERTEX_STRIDE, 16);

        this.indexBuffer = createBuffer(gl, 'gui_indices');
        gl.bindBuffer(gl.ELEMENT_ARRAY_BUFFER, this.indexBuffer);

        gl.bindVertexArray(null);
    }

    updateTextures(delta: GuiTexturesDelta): void {
        const { gl } = this;
        for (const upload of delta.set) {
            let texture = this.textures.get(upload.id);
            if (!texture) {
                const created = gl.createTexture();
                if (!created) {
                    throw new Error(`[WebGL] 无法创建 GUI 纹理 ${upload.id}`);
                }
                texture = created;
                this.textures.set(upload.id, texture);
            }
            gl.bindTexture(gl.TEXTURE_2D, texture);
            gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.NEAREST);
            gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, gl.NEAREST);
            gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_S, gl.CLAMP_TO_EDGE);
            gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_T, gl.CLAMP_TO_EDGE);
            gl.texImage2D(
                gl.TEXTURE_2D, 0, gl.RGBA8, upload.width, upload.height, 0,
                gl.RGBA, gl.UNSIGNED_BYTE, upload.pixels
            );
        }
    }

    freeTextures(ids: readonly number[]): void {
        for (const id of ids) {
            const texture = this.textures.get(id);
            if (!texture) continue;
            this.gl.deleteTexture(texture);
            this.textures.delete(id);
        }
    }

    draw(output: GuiFrameOutput, target: SurfaceSize): void {
        const { gl } = this;
        this.updateTextures(output.texturesDelta);

        if (output.indices.length > 0) {
            const { pixelsPerPoint } = output.screen;

            gl.disable(gl.DEPTH_TEST);
            gl.depthMask(false);
            gl.enable(gl.BLEND);
            gl.blendFuncSeparate(gl.SRC_ALPHA, gl.ONE_MINUS_SRC_ALPHA, gl.ONE, gl.ONE_MINUS_SRC_ALPHA);
            gl.enable(gl.SCISSOR_TEST);

            gl.useProgram(this.program);
            gl.uniform2f(this.screenSizeLocation, target.width / pixelsPerPoint, target.height / pixelsPerPoint);
            gl.uniform1i(this.textureLocation, 0);
            gl.activeTexture(gl.TEXTURE0);

            gl.bindVertexArray(this.vao);
            gl.bindBuffer(gl.ARRAY_BUFFER, this.vertexBuffer);
            gl.bufferData(gl.ARRAY_BUFFER, output.vertices, gl.STREAM_DRAW);
            gl.bindBuffer(gl.ELEMENT_ARRAY_BUFFER, this.indexBuffer);
            gl.bufferData(gl.ELEMENT_ARRAY_BUFFER, output.indices, gl.STREAM_DRAW);

            for (const call of output.drawCalls) {
                const scissor = toPixelScissor(call.clipRect, pixelsPerPoint, target);
                if (!scissor) continue;
                const texture = this.textures.get(call.textureId);
                if (!texture) {
                    console.warn(`[GuiProgram] 未知纹理 id ${call.textureId}，跳过绘制`);
                    continue;
                }
                gl.scissor(scissor.x, target.height - scissor.y - scissor.height, scissor.width, scissor.height);
                gl.bindTexture(gl.TEXTURE_2D, texture);
                // 索引为 u32，偏移以字节计
                gl.drawElements(gl.TRIANGLES, call.indexCount, gl.UNSIGNED_INT, call.indexOffset * 4);
            }

            gl.bindVertexArray(null);
            gl.disable(gl.SCISSOR_TEST);
            gl.depthMask(true);
        }

        this.freeTextures(output.texturesDelta.free);
    }

    destroy(): void {
        this.freeTextures([...this.textures.keys()]);
        const { gl } = this;
        gl.deleteBuffer(this.vertexBuffer);
        gl.deleteBuffer(this.indexBuffer);
        gl.deleteVertexArray(this.vao);
        gl.deleteProgram(this.program);
    }
}
