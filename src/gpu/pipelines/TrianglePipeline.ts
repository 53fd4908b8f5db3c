/**
 * 三角形渲染管线 — 顶点/片元阶段 + 场景 uniform
 *
 * 绑定布局:
 *   group(0): uniform buffer — mvp
 *   vertex buffer 0: position vec4 + color vec4
 */

import { DEPTH_FORMAT, SCENE_UNIFORM_BYTES } from '../constants';
import { SCENE_VERTEX_STRIDE, TRIANGLE_INDICES, TRIANGLE_VERTICES, packSceneVertices } from '../data/triangle';

// language=wgsl
const TRIANGLE_SHADER = `
struct Uniform {
    mvp: mat4x4<f32>,
};

@group(0) @binding(0)
var<uniform> ubo: Uniform;

struct VertexInput {
    @location(0) position: vec4<f32>,
    @location(1) color: vec4<f32>,
};

struct VertexOutput {
    @builtin(position) position: vec4<f32>,
    @location(0) color: vec4<f32>,
};

@vertex
fn vertex_main(vert: VertexInput) -> VertexOutput {
    var out: VertexOutput;
    out.color = vert.color;
    out.position = ubo.mvp * vert.position;
    return out;
}

@fragment
fn fragment_main(in: VertexOutput) -> @location(0) vec4<f32> {
    return in.color;
}
`;

// ========== TrianglePipeline ==========

export class TrianglePipeline {
    private pipeline: GPURenderPipeline | null = null;
    private bindGroup: GPUBindGroup | null = null;
    private uniformBuffer: GPUBuffer | null = null;
    private vertexBuffer: GPUBuffer | null = null;
    private indexBuffer: GPUBuffer | null = null;

    constructor(
        private readonly device: GPUDevice,
        private readonly format: GPUTextureFormat
    ) {}

    /**
     * 编译管线并上传几何体
     */
    initialize(): void {
        const { device } = this;

        const shaderModule = device.createShaderModule({
            label: 'triangle',
            code: TRIANGLE_SHADER,
        });

        const bindGroupLayout = device.createBindGroupLayout({
            label: 'triangle_uniform_layout',
            entries: [
                {
                    binding: 0,
                    visibility: GPUShaderStage.VERTEX,
                    buffer: { type: 'uniform' },
                },
            ],
        });

        this.pipeline = device.createRenderPipeline({
            label: 'triangle_pipeline',
            layout: device.createPipelineLayout({
                label: 'triangle_layout',
                bindGroupLayouts: [bindGroupLayout],
            }),
            vertex: {
                module: shaderModule,
                entryPoint: 'vertex_main',
                buffers: [{
                    arrayStride: SCENE_VERTEX_STRIDE,
                    attributes: [
                        { shaderLocation: 0, offset: 0, format: 'float32x4' },
                        { shaderLocation: 1, offset: 16, format: 'float32x4' },
                    ],
                }],
            },
            fragment: {
                module: shaderModule,
                entryPoint: 'fragment_main',
                targets: [{
                    format: this.format,
                    blend: {
                        color: { srcFactor: 'src-alpha', dstFactor: 'one-minus-src-alpha', operation: 'add' },
                        alpha: { srcFactor: 'one', dstFactor: 'one-minus-src-alpha', operation: 'add' },
                    },
                }],
            },
            primitive: {
                topology: 'triangle-list',
                frontFace: 'cw',
                cullMode: 'none',
            },
            depthStencil: {
                format: DEPTH_FORMAT,
                depthWriteEnabled: true,
                depthCompare: 'less',
            },
        });

        this.uniformBuffer = device.createBuffer({
            label: 'scene_uniforms',
            size: SCENE_UNIFORM_BYTES,
            usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
        });

        this.bindGroup = device.createBindGroup({
            label: 'scene_uniform_bind_group',
            layout: bindGroupLayout,
            entries: [{ binding: 0, resource: { buffer: this.uniformBuffer } }],
        });

        const vertexData = packSceneVertices(TRIANGLE_VERTICES);
        this.vertexBuffer = device.createBuffer({
            label: 'triangle_vertices',
            size: vertexData.byteLength,
            usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
        });
        device.queue.writeBuffer(this.vertexBuffer, 0, vertexData);

        const indexData = new Uint32Array(TRIANGLE_INDICES);
        this.indexBuffer = device.createBuffer({
            label: 'triangle_indices',
            size: indexData.byteLength,
            usage: GPUBufferUsage.INDEX | GPUBufferUsage.COPY_DST,
        });
        device.queue.writeBuffer(this.indexBuffer, 0, indexData);
    }

    /**
     * 上传 MVP
     */
    updateUniforms(mvp: Float32Array<ArrayBuffer>): void {
        if (!this.uniformBuffer) return;
        this.device.queue.writeBuffer(this.uniformBuffer, 0, mvp);
    }

    /**
     * 编码绘制命令到 render pass
     */
    encode(passEncoder: GPURenderPassEncoder): void {
        if (!this.pipeline || !this.bindGroup || !this.vertexBuffer || !this.indexBuffer) return;

        passEncoder.setPipeline(this.pipeline);
        passEncoder.setBindGroup(0, this.bindGroup);
        passEncoder.setVertexBuffer(0, this.vertexBuffer);
        passEncoder.setIndexBuffer(this.indexBuffer, 'uint32');
        passEncoder.drawIndexed(TRIANGLE_INDICES.length);
    }

    /**
     * 销毁资源
     */
    destroy(): void {
        this.uniformBuffer?.destroy();
        this.vertexBuffer?.destroy();
        this.indexBuffer?.destroy();
        this.uniformBuffer = null;
        this.vertexBuffer = null;
        this.indexBuffer = null;
        this.bindGroup = null;
        this.pipeline = null;
    }
}
