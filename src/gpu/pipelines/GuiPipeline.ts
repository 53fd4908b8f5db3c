/**
 * GUI 覆盖层管线
 *
 * 绑定布局:
 *   group(0): screen uniform + sampler
 *   group(1): 纹理（按 GUI 纹理 id 各一个 bind group）
 *
 * 与场景共享同一 render pass：depthCompare 'always' 且不写深度，
 * 保证 GUI 始终绘制在三角形之上。
 */

import type { SurfaceSize } from '../../core/types';
import { toPixelScissor } from '../../gui/clip';
import type { GuiFrameOutput, GuiTexturesDelta } from '../../gui/types';
import { DEPTH_FORMAT, GUI_UNIFORM_BYTES, GUI_VERTEX_FLOATS } from '../constants';

// language=wgsl
const GUI_SHADER = `
struct Screen {
    size_points: vec2<f32>,
    _pad: vec2<f32>,
};

@group(0) @binding(0) var<uniform> screen: Screen;
@group(0) @binding(1) var gui_sampler: sampler;
@group(1) @binding(0) var gui_texture: texture_2d<f32>;

struct VertexInput {
    @location(0) pos: vec2<f32>,
    @location(1) uv: vec2<f32>,
    @location(2) color: vec4<f32>,
};

struct VertexOutput {
    @builtin(position) position: vec4<f32>,
    @location(0) uv: vec2<f32>,
    @location(1) color: vec4<f32>,
};

@vertex
fn vs_main(in: VertexInput) -> VertexOutput {
    var out: VertexOutput;
    out.position = vec4<f32>(
        2.0 * in.pos.x / screen.size_points.x - 1.0,
        1.0 - 2.0 * in.pos.y / screen.size_points.y,
        0.0,
        1.0,
    );
    out.uv = in.uv;
    out.color = in.color;
    return out;
}

@fragment
fn fs_main(in: VertexOutput) -> @location(0) vec4<f32> {
    return in.color * textureSample(gui_texture, gui_sampler, in.uv);
}
`;

const GUI_VERTEX_STRIDE = GUI_VERTEX_FLOATS * 4;

/** 缓冲初始容量 (bytes) */
const INITIAL_BUFFER_BYTES = 64 * 1024;

interface GuiTextureEntry {
    readonly texture: GPUTexture;
    readonly bindGroup: GPUBindGroup;
    readonly width: number;
    readonly height: number;
}

// ========== GuiPipeline ==========

export class GuiPipeline {
    private pipeline: GPURenderPipeline | null = null;
    private uniformBuffer: GPUBuffer | null = null;
    private screenBindGroup: GPUBindGroup | null = null;
    private textureLayout: GPUBindGroupLayout | null = null;
    private vertexBuffer: GPUBuffer | null = null;
    private indexBuffer: GPUBuffer | null = null;
    private readonly textures = new Map<number, GuiTextureEntry>();

    constructor(
        private readonly device: GPUDevice,
        private readonly format: GPUTextureFormat
    ) {}

    initialize(): void {
        const { device } = this;

        const shaderModule = device.createShaderModule({ label: 'gui', code: GUI_SHADER });

        const screenLayout = device.createBindGroupLayout({
            label: 'gui_screen_layout',
            entries: [
                { binding: 0, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } },
                { binding: 1, visibility: GPUShaderStage.FRAGMENT, sampler: { type: 'filtering' } },
            ],
        });

        this.textureLayout = device.createBindGroupLayout({
            label: 'gui_texture_layout',
            entries: [
                { binding: 0, visibility: GPUShaderStage.FRAGMENT, texture: { sampleType: 'float' } },
            ],
        });

        this.pipeline = device.createRenderPipeline({
            label: 'gui_pipeline',
            layout: device.createPipelineLayout({
                label: 'gui_layout',
                bindGroupLayouts: [screenLayout, this.textureLayout],
            }),
            vertex: {
                module: shaderModule,
                entryPoint: 'vs_main',
                buffers: [{
                    arrayStride: GUI_VERTEX_STRIDE,
                    attributes: [
                        { shaderLocation: 0, offset: 0, format: 'float32x2' },
                        { shaderLocation: 1, offset: 8, format: 'float32x2' },
                        { shaderLocation: 2, offset: 16, format: 'float32x4' },
                    ],
                }],
            },
            fragment: {
                module: shaderModule,
                entryPoint: 'fs_main',
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
                cullMode: 'none',
            },
            depthStencil: {
                format: DEPTH_FORMAT,
                depthWriteEnabled: false,
                depthCompare: 'always',
            },
        });

        this.uniformBuffer = device.createBuffer({
            label: 'gui_screen_uniforms',
            size: GUI_UNIFORM_BYTES,
            usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
        });

        const sampler = device.createSampler({
            label: 'gui_sampler',
            magFilter: 'nearest',
            minFilter: 'nearest',
            addressModeU: 'clamp-to-edge',
            addressModeV: 'clamp-to-edge',
        });

        this.screenBindGroup = device.createBindGroup({
            label: 'gui_screen_bind_group',
            layout: screenLayout,
            entries: [
                { binding: 0, resource: { buffer: this.uniformBuffer } },
                { binding: 1, resource: sampler },
            ],
        });

        this.vertexBuffer = this.createGeometryBuffer('gui_vertices', INITIAL_BUFFER_BYTES, GPUBufferUsage.VERTEX);
        this.indexBuffer = this.createGeometryBuffer('gui_indices', INITIAL_BUFFER_BYTES, GPUBufferUsage.INDEX);
    }

    /**
     * 应用纹理增量：先上传新增/更新，绘制结束后由调用方 free
     */
    updateTextures(delta: GuiTexturesDelta): void {
        const layout = this.textureLayout;
        if (!layout) return;

        for (const upload of delta.set) {
            let entry = this.textures.get(upload.id);
            if (!entry || entry.width !== upload.width || entry.height !== upload.height) {
                entry?.texture.destroy();
                const texture = this.device.createTexture({
                    label: `gui_texture_${upload.id}`,
                    size: { width: upload.width, height: upload.height },
                    format: 'rgba8unorm',
                    usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST,
                });
                entry = {
                    texture,
                    width: upload.width,
                    height: upload.height,
                    bindGroup: this.device.createBindGroup({
                        label: `gui_texture_bind_group_${upload.id}`,
                        layout,
                        entries: [{ binding: 0, resource: texture.createView() }],
                    }),
                };
                this.textures.set(upload.id, entry);
            }

            this.device.queue.writeTexture(
                { texture: entry.texture },
                upload.pixels,
                { bytesPerRow: upload.width * 4, rowsPerImage: upload.height },
                { width: upload.width, height: upload.height }
            );
        }
    }

    freeTextures(ids: readonly number[]): void {
        for (const id of ids) {
            const entry = this.textures.get(id);
            if (!entry) continue;
            entry.texture.destroy();
            this.textures.delete(id);
        }
    }

    /**
     * 上传几何体并逐绘制调用设置 scissor 编码
     *
     * @param target 当前帧物理像素尺寸
     */
    encode(passEncoder: GPURenderPassEncoder, output: GuiFrameOutput, target: SurfaceSize): void {
        this.updateTextures(output.texturesDelta);

        if (output.indices.length > 0 && this.pipeline && this.screenBindGroup && this.uniformBuffer) {
            const { pixelsPerPoint } = output.screen;
            this.device.queue.writeBuffer(
                this.uniformBuffer,
                0,
                new Float32Array([target.width / pixelsPerPoint, target.height / pixelsPerPoint, 0, 0])
            );

            const vertexBuffer = this.ensureVertexCapacity(output.vertices.byteLength);
            const indexBuffer = this.ensureIndexCapacity(output.indices.byteLength);
            this.device.queue.writeBuffer(vertexBuffer, 0, output.vertices);
            this.device.queue.writeBuffer(indexBuffer, 0, output.indices);

            passEncoder.setPipeline(this.pipeline);
            passEncoder.setBindGroup(0, this.screenBindGroup);
            passEncoder.setVertexBuffer(0, vertexBuffer);
            passEncoder.setIndexBuffer(indexBuffer, 'uint32');

            for (const call of output.drawCalls) {
                const scissor = toPixelScissor(call.clipRect, pixelsPerPoint, target);
                if (!scissor) continue;
                const texture = this.textures.get(call.textureId);
                if (!texture) {
                    console.warn(`[GuiPipeline] 未知纹理 id ${call.textureId}，跳过绘制`);
                    continue;
                }
                passEncoder.setScissorRect(scissor.x, scissor.y, scissor.width, scissor.height);
                passEncoder.setBindGroup(1, texture.bindGroup);
                passEncoder.drawIndexed(call.indexCount, 1, call.indexOffset, 0);
            }

            // 还原为整个目标，避免影响后续编码
            passEncoder.setScissorRect(0, 0, target.width, target.height);
        }

        this.freeTextures(output.texturesDelta.free);
    }

    destroy(): void {
        this.freeTextures([...this.textures.keys()]);
        this.uniformBuffer?.destroy();
        this.vertexBuffer?.destroy();
        this.indexBuffer?.destroy();
        this.uniformBuffer = null;
        this.vertexBuffer = null;
        this.indexBuffer = null;
        this.screenBindGroup = null;
        this.textureLayout = null;
        this.pipeline = null;
    }

    // ========== 缓冲管理 ==========

    private createGeometryBuffer(label: string, size: number, usage: GPUBufferUsageFlags): GPUBuffer {
        return this.device.createBuffer({ label, size, usage: usage | GPUBufferUsage.COPY_DST });
    }

    private ensureVertexCapacity(bytes: number): GPUBuffer {
        this.vertexBuffer = this.grow(this.vertexBuffer, 'gui_vertices', bytes, GPUBufferUsage.VERTEX);
        return this.vertexBuffer;
    }

    private ensureIndexCapacity(bytes: number): GPUBuffer {
        this.indexBuffer = this.grow(this.indexBuffer, 'gui_indices', bytes, GPUBufferUsage.INDEX);
        return this.indexBuffer;
    }

    /** 容量不足时按 2 倍扩容 */
    private grow(buffer: GPUBuffer | null, label: string, bytes: number, usage: GPUBufferUsageFlags): GPUBuffer {
        if (buffer && buffer.size >= bytes) return buffer;
        let size = buffer?.size ?? INITIAL_BUFFER_BYTES;
        while (size < bytes) size *= 2;
        buffer?.destroy();
        return this.createGeometryBuffer(label, size, usage);
    }
}
