/**
 * 三角形程序（GLSL ES 3.00）
 */

import { SCENE_VERTEX_STRIDE, TRIANGLE_INDICES, TRIANGLE_VERTICES, packSceneVertices } from '../data/triangle';
import { createBuffer, createVertexArray, linkProgram } from './glUtils';

// language=glsl
const TRIANGLE_VERT = `#version 300 es
uniform mat4 u_mvp;
layout(location = 0) in vec4 a_position;
layout(location = 1) in vec4 a_color;
out vec4 v_color;
void main() {
    v_color = a_color;
    gl_Position = u_mvp * a_position;
}
`;

// language=glsl
const TRIANGLE_FRAG = `#version 300 es
precision mediump float;
in vec4 v_color;
out vec4 out_color;
void main() {
    out_color = v_color;
}
`;

export class TriangleProgram {
    private readonly program: WebGLProgram;
    private readonly vao: WebGLVertexArrayObject;
    private readonly vertexBuffer: WebGLBuffer;
    private readonly indexBuffer: WebGLBuffer;
    private readonly mvpLocation: WebGLUniformLocation | null;

    constructor(private readonly gl: WebGL2RenderingContext) {
        this.program = linkProgram(gl, TRIANGLE_VERT, TRIANGLE_FRAG, 'triangle');
        this.mvpLocation = gl.getUniformLocation(this.program, 'u_mvp');

        this.vao = createVertexArray(gl, 'triangle');
        gl.bindVertexArray(this.vao);

        this.vertexBuffer = createBuffer(gl, 'triangle_vertices');
        gl.bindBuffer(gl.ARRAY_BUFFER, this.vertexBuffer);
        gl.bufferData(gl.ARRAY_BUFFER, packSceneVertices(TRIANGLE_VERTICES), gl.STATIC_DRAW);
        gl.enableVertexAttribArray(0);
        gl.vertexAttribPointer(0, 4, gl.FLOAT, false, SCENE_VERTEX_STRIDE, 0);
        gl.enableVertexAttribArray(1);
        gl.vertexAttribPointer(1, 4, gl.FLOAT, false, SCENE_VERTEX_STRIDE, 16);

        this.indexBuffer = createBuffer(gl, 'triangle_indices');
        gl.bindBuffer(gl.ELEMENT_ARRAY_BUFFER, this.indexBuffer);
        gl.bufferData(gl.ELEMENT_ARRAY_BUFFER, new Uint32Array(TRIANGLE_INDICES), gl.STATIC_DRAW);

        gl.bindVertexArray(null);
    }

    draw(mvp: Float32Array<ArrayBuffer>): void {
        const { gl } = this;
        gl.enable(gl.DEPTH_TEST);
        gl.depthFunc(gl.LESS);
        gl.depthMask(true);
        gl.enable(gl.BLEND);
        gl.blendFuncSeparate(gl.SRC_ALPHA, gl.ONE_MINUS_SRC_ALPHA, gl.ONE, gl.ONE_MINUS_SRC_ALPHA);
        gl.disable(gl.CULL_FACE);

        gl.useProgram(this.program);
        gl.uniformMatrix4fv(this.mvpLocation, false, mvp);
        gl.bindVertexArray(this.vao);
        gl.drawElements(gl.TRIANGLES, TRIANGLE_INDICES.length, gl.UNSIGNED_INT, 0);
        gl.bindVertexArray(null);
    }

    destroy(): void {
        const { gl } = this;
        gl.deleteBuffer(this.vertexBuffer);
        gl.deleteBuffer(this.indexBuffer);
        gl.deleteVertexArray(this.vao);
        gl.deleteProgram(this.program);
    }
}
