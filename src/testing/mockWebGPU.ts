/**
 * 测试用 WebGPU 替身（仅记录调用，不做任何渲染）
 */

import { vi } from 'vitest';
import type { PresentMode, PresentationSurface, PresentationSurfaceConfig } from '../core/types';

/** jsdom 没有 WebGPU 常量，按规范值注入 */
export function stubWebGPUGlobals(): void {
    vi.stubGlobal('GPUShaderStage', { VERTEX: 0x1, FRAGMENT: 0x2, COMPUTE: 0x4 });
    vi.stubGlobal('GPUBufferUsage', {
        MAP_READ: 0x1, MAP_WRITE: 0x2, COPY_SRC: 0x4, COPY_DST: 0x8, INDEX: 0x10,
        VERTEX: 0x20, UNIFORM: 0x40, STORAGE: 0x80, INDIRECT: 0x100, QUERY_RESOLVE: 0x200,
    });
    vi.stubGlobal('GPUTextureUsage', {
        COPY_SRC: 0x1, COPY_DST: 0x2, TEXTURE_BINDING: 0x4, STORAGE_BINDING: 0x8, RENDER_ATTACHMENT: 0x10,
    });
}

export function createMockPass() {
    return {
        setPipeline: vi.fn(),
        setBindGroup: vi.fn(),
        setVertexBuffer: vi.fn(),
        setIndexBuffer: vi.fn(),
        setScissorRect: vi.fn(),
        drawIndexed: vi.fn(),
        end: vi.fn(),
    };
}

function extentOf(size: GPUExtent3D): { width: number; height: number } {
    if ('width' in size) {
        return { width: size.width, height: size.height ?? 1 };
    }
    const [width = 0, height = 1] = [...size];
    return { width, height };
}

export function createMockDevice(maxTextureDimension2D = 8192) {
    let destroyedTextures = 0;
    let resolveLost: (info: { reason: string; message: string }) => void = () => {};
    const lost = new Promise<{ reason: string; message: string }>((resolve) => {
        resolveLost = resolve;
    });
    const passes: MockPass[] = [];

    const createBuffer = vi.fn((descriptor: GPUBufferDescriptor) => ({
        size: descriptor.size,
        label: descriptor.label,
        destroy: vi.fn(),
    }));
    const createTexture = vi.fn((descriptor: GPUTextureDescriptor) => ({
        ...extentOf(descriptor.size),
        createView: vi.fn(() => ({})),
        destroy: vi.fn(() => {
            destroyedTextures++;
        }),
    }));
    const writeBuffer = vi.fn();
    const writeTexture = vi.fn();
    const submit = vi.fn();
    const destroy = vi.fn(() => {
        resolveLost({ reason: 'destroyed', message: 'device destroyed' });
    });

    const device = {
        lost,
        limits: { maxTextureDimension2D },
        queue: { writeBuffer, writeTexture, submit },
        createShaderModule: vi.fn(() => ({})),
        createBindGroupLayout: vi.fn(() => ({})),
        createPipelineLayout: vi.fn(() => ({})),
        createRenderPipeline: vi.fn(() => ({})),
        createBindGroup: vi.fn(() => ({})),
        createSampler: vi.fn(() => ({})),
        createBuffer,
        createTexture,
        createCommandEncoder: vi.fn(() => ({
            beginRenderPass: vi.fn(() => {
                const pass = createMockPass();
                passes.push(pass);
                return pass;
            }),
            finish: vi.fn(() => ({})),
        })),
        addEventListener: vi.fn(),
        destroy,
    } as unknown as GPUDevice;

    return {
        device,
        createBuffer,
        createTexture,
        writeBuffer,
        writeTexture,
        submit,
        destroy,
        destroyedTextures: () => destroyedTextures,
        passes,
        /** 触发 device.lost */
        loseDevice: (reason: string, message: string) => resolveLost({ reason, message }),
    };
}

export type MockPass = ReturnType<typeof createMockPass>;
export type MockDevice = ReturnType<typeof createMockDevice>;

export function createMockGpu(device: GPUDevice | null, options: { failDevice?: boolean } = {}): GPU {
    const adapter = {
        limits: { maxTextureDimension2D: 8192 },
        requestDevice: vi.fn(async () => {
            if (options.failDevice) throw new Error('mock-device-failure');
            return device;
        }),
    };
    return {
        requestAdapter: vi.fn(async () => (device ? adapter : null)),
        getPreferredCanvasFormat: vi.fn(() => 'bgra8unorm'),
    } as unknown as GPU;
}

/**
 * 记录调用的呈现表面；getCurrentTexture 返回配置尺寸的纹理，
 * 可通过 failNext 注入一次失败
 */
export class MockSurface implements PresentationSurface {
    readonly configure = vi.fn((config: PresentationSurfaceConfig) => {
        if (this.failConfigure) throw new Error('mock-configure-failure');
        this.size = config.size;
    });
    readonly unconfigure = vi.fn();
    readonly present = vi.fn();
    readonly discard = vi.fn();
    failConfigure = false;
    failNext: Error | null = null;
    private size = { width: 0, height: 0 };

    constructor(
        readonly formats: readonly GPUTextureFormat[] = ['bgra8unorm-srgb', 'bgra8unorm'],
        readonly presentModes: readonly PresentMode[] = ['fifo', 'immediate']
    ) {}

    getCurrentTexture(): GPUTexture {
        const failure = this.failNext;
        if (failure) {
            this.failNext = null;
            throw failure;
        }
        return {
            width: this.size.width,
            height: this.size.height,
            createView: vi.fn(() => ({})),
        } as unknown as GPUTexture;
    }
}
