/**
 * 测试用后端变体：记录调用顺序，可按需注入失败
 */

import type { BackendProfile, ClearColor, SurfaceHandle, SurfaceSize } from '../core/types';
import type { FramePass, FrameState, GpuSession, SurfaceBackend, SurfaceOptions } from '../gpu/backends/types';
import { nextSessionGeneration } from '../gpu/backends/types';
import type { TransientFrameError } from '../gpu/errors';
import { allowedPresentModes, choosePresentMode } from '../gpu/surface';
import type { GuiFrameOutput } from '../gui/types';

class FakeFrame implements FrameState {
    constructor(
        private readonly backend: FakeBackend,
        readonly index: number,
        readonly size: SurfaceSize
    ) {}

    writeSceneUniforms(mvp: Float32Array): void {
        this.backend.lastMvp = Float32Array.from(mvp);
    }

    beginPass(clearColor: ClearColor): FramePass {
        const backend = this.backend;
        backend.calls.push('beginPass');
        backend.lastClear = clearColor;
        return {
            drawScene: () => {
                backend.calls.push('drawScene');
            },
            drawGui: (output: GuiFrameOutput) => {
                backend.calls.push('drawGui');
                backend.lastGui = output;
            },
            end: () => {
                backend.calls.push('end');
                const failure = backend.failEnd;
                if (failure) {
                    backend.failEnd = null;
                    throw failure;
                }
            },
        };
    }
}

export class FakeBackend implements SurfaceBackend {
    readonly calls: string[] = [];
    /** 依次注入到 acquireFrame 的失败 */
    readonly acquireFailures: TransientFrameError[] = [];
    readonly presented: number[] = [];
    initError: Error | null = null;
    resizeError: Error | null = null;
    /** 下一次 end() 抛出 */
    failEnd: Error | null = null;
    options: SurfaceOptions | null = null;
    size: SurfaceSize = { width: 0, height: 0 };
    lastMvp: Float32Array | null = null;
    lastClear: ClearColor | null = null;
    lastGui: GuiFrameOutput | null = null;
    private frameIndex = 0;

    constructor(
        readonly profile: BackendProfile = 'webgpu',
        private readonly maxTextureDimension2D = 8192
    ) {}

    async initialize(_handle: SurfaceHandle, size: SurfaceSize, options: SurfaceOptions): Promise<GpuSession> {
        this.calls.push(`initialize ${size.width}x${size.height}`);
        if (this.initError) throw this.initError;
        this.options = options;
        this.size = size;
        return {
            generation: nextSessionGeneration(),
            profile: this.profile,
            format: 'bgra8unorm',
            presentMode: choosePresentMode(
                options.vsync,
                allowedPresentModes(['fifo', 'mailbox', 'immediate'], options.supportedPresentModes)
            ),
            maxTextureDimension2D: this.maxTextureDimension2D,
        };
    }

    resize(size: SurfaceSize): void {
        this.calls.push(`resize ${size.width}x${size.height}`);
        if (this.resizeError) throw this.resizeError;
        this.size = size;
    }

    acquireFrame(): FrameState {
        this.calls.push('acquire');
        const failure = this.acquireFailures.shift();
        if (failure) throw failure;
        this.frameIndex++;
        return new FakeFrame(this, this.frameIndex, this.size);
    }

    present(frame: FrameState): void {
        this.calls.push(`present ${frame.index}`);
        this.presented.push(frame.index);
    }

    discard(frame: FrameState): void {
        this.calls.push(`discard ${frame.index}`);
    }

    releaseSession(): void {
        this.calls.push('releaseSession');
    }

    releaseSurface(): void {
        this.calls.push('releaseSurface');
    }

    /** 模拟宿主触发设备丢失 */
    loseDevice(reason: string, message: string): void {
        this.options?.onDeviceLost?.({ reason, message });
    }
}
