import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { GuiFrameOutput } from '../../gui/types';
import { createMockDevice, createMockPass, stubWebGPUGlobals } from '../../testing/mockWebGPU';
import { GuiPipeline } from './GuiPipeline';

const TARGET = { width: 800, height: 600 };

function frameOutput(overrides: Partial<GuiFrameOutput> = {}): GuiFrameOutput {
    return {
        screen: { sizeInPixels: TARGET, pixelsPerPoint: 2 },
        vertices: new Float32Array(8 * 4),
        indices: new Uint32Array([0, 1, 2, 0, 2, 3]),
        drawCalls: [{ clipRect: { x: 0, y: 0, width: 100, height: 50 }, textureId: 0, indexOffset: 0, indexCount: 6 }],
        texturesDelta: {
            set: [{ id: 0, width: 2, height: 1, pixels: new Uint8Array(8) }],
            free: [],
        },
        ...overrides,
    };
}

describe('GuiPipeline', () => {
    beforeEach(() => {
        stubWebGPUGlobals();
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('上传纹理并按物理像素设置 scissor', () => {
        const mock = createMockDevice();
        const pipeline = new GuiPipeline(mock.device, 'bgra8unorm');
        pipeline.initialize();
        const pass = createMockPass();

        pipeline.encode(pass as unknown as GPURenderPassEncoder, frameOutput(), TARGET);

        expect(mock.writeTexture).toHaveBeenCalledTimes(1);
        expect(mock.writeTexture.mock.calls[0]?.[2]).toEqual({ bytesPerRow: 8, rowsPerImage: 1 });
        expect(pass.setScissorRect).toHaveBeenNthCalledWith(1, 0, 0, 200, 100);
        expect(pass.setScissorRect).toHaveBeenLastCalledWith(0, 0, 800, 600);
        expect(pass.drawIndexed).toHaveBeenCalledWith(6, 1, 0, 0);
    });

    it('屏幕 uniform 以 point 为单位', () => {
        const mock = createMockDevice();
        const pipeline = new GuiPipeline(mock.device, 'bgra8unorm');
        pipeline.initialize();

        pipeline.encode(createMockPass() as unknown as GPURenderPassEncoder, frameOutput(), TARGET);

        const screenWrite = mock.writeBuffer.mock.calls.find((call) => call[2] instanceof Float32Array && call[2].length === 4);
        expect(Array.from(screenWrite?.[2] ?? [])).toEqual([400, 300, 0, 0]);
    });

    it('零面积裁剪矩形跳过绘制', () => {
        const mock = createMockDevice();
        const pipeline = new GuiPipeline(mock.device, 'bgra8unorm');
        pipeline.initialize();
        const pass = createMockPass();

        pipeline.encode(
            pass as unknown as GPURenderPassEncoder,
            frameOutput({
                drawCalls: [{ clipRect: { x: 500, y: 0, width: 10, height: 10 }, textureId: 0, indexOffset: 0, indexCount: 6 }],
            }),
            TARGET
        );

        expect(pass.drawIndexed).not.toHaveBeenCalled();
    });

    it('没有索引时只处理纹理增量', () => {
        const mock = createMockDevice();
        const pipeline = new GuiPipeline(mock.device, 'bgra8unorm');
        pipeline.initialize();
        const pass = createMockPass();

        pipeline.encode(
            pass as unknown as GPURenderPassEncoder,
            frameOutput({ indices: new Uint32Array(0), drawCalls: [] }),
            TARGET
        );

        expect(mock.writeTexture).toHaveBeenCalledTimes(1);
        expect(pass.setPipeline).not.toHaveBeenCalled();
    });

    it('free 在绘制后销毁纹理', () => {
        const mock = createMockDevice();
        const pipeline = new GuiPipeline(mock.device, 'bgra8unorm');
        pipeline.initialize();

        pipeline.encode(createMockPass() as unknown as GPURenderPassEncoder, frameOutput(), TARGET);
        pipeline.encode(
            createMockPass() as unknown as GPURenderPassEncoder,
            frameOutput({ texturesDelta: { set: [], free: [0] } }),
            TARGET
        );

        expect(mock.destroyedTextures()).toBe(1);
    });

    it('几何超出容量时按倍数扩容', () => {
        const mock = createMockDevice();
        const pipeline = new GuiPipeline(mock.device, 'bgra8unorm');
        pipeline.initialize();

        const bigVertices = new Float32Array(40 * 1024);
        pipeline.encode(createMockPass() as unknown as GPURenderPassEncoder, frameOutput({ vertices: bigVertices }), TARGET);

        const vertexSizes = mock.createBuffer.mock.calls
            .map((call) => call[0])
            .filter((descriptor) => descriptor.label === 'gui_vertices')
            .map((descriptor) => descriptor.size);
        expect(vertexSizes).toEqual([64 * 1024, 256 * 1024]);
    });
});
