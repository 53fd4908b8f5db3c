/**
 * 浏览器 canvas 呈现表面
 *
 * 浏览器在任务结束时自动呈现 getCurrentTexture() 返回的纹理，
 * present/discard 只记录状态。
 */

import type { PresentMode, PresentationSurface, PresentationSurfaceConfig } from '../../core/types';
import { InitializationError } from '../errors';

export class CanvasSurface implements PresentationSurface {
    readonly formats: readonly GPUTextureFormat[];
    readonly presentModes: readonly PresentMode[] = ['fifo'];
    private readonly context: GPUCanvasContext;
    private configured = false;

    constructor(private readonly canvas: HTMLCanvasElement, gpu: GPU) {
        const context = canvas.getContext('webgpu');
        if (!context) {
            throw new InitializationError('无法从 canvas 获取 webgpu 上下文', 'surface-configuration');
        }
        this.context = context;

        const preferred = gpu.getPreferredCanvasFormat();
        this.formats = [...new Set<GPUTextureFormat>([preferred, 'bgra8unorm', 'rgba8unorm'])];
    }

    configure(config: PresentationSurfaceConfig): void {
        this.canvas.width = config.size.width;
        this.canvas.height = config.size.height;
        this.context.configure({
            device: config.device,
            format: config.format,
            alphaMode: 'opaque',
        });
        this.configured = true;
    }

    unconfigure(): void {
        if (!this.configured) return;
        this.context.unconfigure();
        this.configured = false;
    }

    getCurrentTexture(): GPUTexture {
        return this.context.getCurrentTexture();
    }

    present(): void {}

    discard(): void {}
}
