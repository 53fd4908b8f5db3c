/**
 * WebGL2 着色器编译/链接
 */

export function compileShader(gl: WebGL2RenderingContext, type: number, source: string, label: string): WebGLShader {
    const shader = gl.createShader(type);
    if (!shader) {
        throw new Error(`[WebGL] 无法创建着色器 ${label}`);
    }
    gl.shaderSource(shader, source);
    gl.compileShader(shader);
    if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
        const log = gl.getShaderInfoLog(shader) ?? '';
        gl.deleteShader(shader);
        throw new Error(`[WebGL] 着色器 ${label} 编译失败: ${log}`);
    }
    return shader;
}

export function linkProgram(gl: WebGL2RenderingContext, vertexSource: string, fragmentSource: string, label: string): WebGLProgram {
    const vertex = compileShader(gl, gl.VERTEX_SHADER, vertexSource, `${label}.vert`);
    const fragment = compileShader(gl, gl.FRAGMENT_SHADER, fragmentSource, `${label}.frag`);

    const program = gl.createProgram();
    if (!program) {
        throw new Error(`[WebGL] 无法创建程序 ${label}`);
    }
    gl.attachShader(program, vertex);
    gl.attachShader(program, fragment);
    gl.linkProgram(program);
    // 链接后着色器对象不再需要
    gl.deleteShader(vertex);
    gl.deleteShader(fragment);

    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
        const log = gl.getProgramInfoLog(program) ?? '';
        gl.deleteProgram(program);
        throw new Error(`[WebGL] 程序 ${label} 链接失败: ${log}`);
    }
    return program;
}

export function createBuffer(gl: WebGL2RenderingContext, label: string): WebGLBuffer {
    const buffer = gl.createBuffer();
    if (!buffer) {
        throw new Error(`[WebGL] 无法创建缓冲 ${label}`);
    }
    return buffer;
}

export function createVertexArray(gl: WebGL2RenderingContext, label: string): WebGLVertexArrayObject {
    const vao = gl.createVertexArray();
    if (!vao) {
        throw new Error(`[WebGL] 无法创建顶点数组 ${label}`);
    }
    return vao;
}
