import { afterEach, describe, expect, it, vi } from 'vitest';
import { InitializationError } from '../errors';
import { CanvasSurface } from './CanvasSurface';

/** 替换 canvas.getContext，返回固定上下文 */
function stubContext(canvas: HTMLCanvasElement, context: object | null): void {
    Object.defineProperty(canvas, 'getContext', { value: vi.fn(() => context) });
}

function mockGpu(preferred: GPUTextureFormat): GPU {
    return { getPreferredCanvasFormat: vi.fn(() => preferred) } as unknown as GPU;
}

describe('CanvasSurface', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('没有 webgpu 上下文时抛出 surface-configuration', () => {
        const canvas = document.createElement('canvas');
        stubContext(canvas, null);

        let caught: unknown;
        try {
            new CanvasSurface(canvas, mockGpu('bgra8unorm'));
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(InitializationError);
        expect((caught as InitializationError).errorType).toBe('surface-configuration');
    });

    it('首选格式排在最前且去重', () => {
        const canvas = document.createElement('canvas');
        const context = { configure: vi.fn(), unconfigure: vi.fn(), getCurrentTexture: vi.fn() };
        stubContext(canvas, context);

        const surface = new CanvasSurface(canvas, mockGpu('rgba8unorm'));
        expect(surface.formats).toEqual(['rgba8unorm', 'bgra8unorm']);
        expect(surface.presentModes).toEqual(['fifo']);
    });

    it('configure 同步 canvas 像素尺寸', () => {
        const canvas = document.createElement('canvas');
        const context = { configure: vi.fn(), unconfigure: vi.fn(), getCurrentTexture: vi.fn() };
        stubContext(canvas, context);

        const surface = new CanvasSurface(canvas, mockGpu('bgra8unorm'));
        const device = {} as GPUDevice;
        surface.configure({ device, format: 'bgra8unorm', size: { width: 640, height: 480 }, presentMode: 'fifo' });

        expect(canvas.width).toBe(640);
        expect(canvas.height).toBe(480);
        expect(context.configure).toHaveBeenCalledWith({ device, format: 'bgra8unorm', alphaMode: 'opaque' });

        surface.unconfigure();
        surface.unconfigure();
        expect(context.unconfigure).toHaveBeenCalledTimes(1);
    });
});
