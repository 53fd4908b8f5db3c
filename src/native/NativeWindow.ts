/**
 * 原生宿主窗口
 *
 * 宿主注入 GPU 入口；呈现表面是一组离屏纹理（深度 MAX_FRAME_LATENCY），
 * 每次 present 轮转到下一张，并通知宿主取走。
 */

import type {
    NativeWindowHandle,
    PresentationSurface,
    PresentationSurfaceConfig,
    PresentMode,
    SurfaceSize,
} from '../core/types';
import { MAX_FRAME_LATENCY } from '../gpu/constants';
import { TransientFrameError } from '../gpu/errors';

export interface PresentedFrame {
    /** 自配置起的呈现序号，从 1 开始 */
    readonly sequence: number;
    readonly texture: GPUTexture;
    readonly size: SurfaceSize;
}

export type PresentListener = (frame: PresentedFrame) => void;

// ========== OffscreenSurface ==========

export class OffscreenSurface implements PresentationSurface {
    readonly formats: readonly GPUTextureFormat[] = ['bgra8unorm', 'rgba8unorm'];
    readonly presentModes: readonly PresentMode[] = ['fifo', 'mailbox', 'immediate'];

    private config: PresentationSurfaceConfig | null = null;
    private ring: GPUTexture[] = [];
    private cursor = 0;
    private current: GPUTexture | null = null;
    private sequence = 0;

    constructor(private readonly onPresent: PresentListener | null = null) {}

    configure(config: PresentationSurfaceConfig): void {
        this.destroyRing();
        this.config = config;
        this.ring = Array.from({ length: MAX_FRAME_LATENCY }, (_, i) =>
            config.device.createTexture({
                label: `native-swapchain-${i}`,
                size: [config.size.width, config.size.height],
                format: config.format,
                usage: GPUTextureUsage.RENDER_ATTACHMENT | GPUTextureUsage.COPY_SRC,
            })
        );
    }

    unconfigure(): void {
        this.destroyRing();
        this.config = null;
    }

    getCurrentTexture(): GPUTexture {
        if (!this.config) {
            throw new TransientFrameError('原生表面未配置', 'surface-lost');
        }
        if (this.current) {
            throw new TransientFrameError('上一张纹理尚未呈现或丢弃', 'timeout');
        }
        const texture = this.ring[this.cursor];
        if (!texture) {
            throw new TransientFrameError('原生表面没有可用纹理', 'surface-lost');
        }
        this.cursor = (this.cursor + 1) % this.ring.length;
        this.current = texture;
        return texture;
    }

    present(): void {
        const texture = this.current;
        const config = this.config;
        if (!texture || !config) return;
        this.current = null;
        this.sequence++;
        this.onPresent?.({ sequence: this.sequence, texture, size: config.size });
    }

    discard(): void {
        this.current = null;
    }

    private destroyRing(): void {
        this.ring.forEach((texture) => texture.destroy());
        this.ring = [];
        this.cursor = 0;
        this.current = null;
    }
}

// ========== NativeWindow ==========

export class NativeWindow implements NativeWindowHandle {
    private _presentedFrames = 0;

    constructor(
        readonly title: string,
        readonly gpu: GPU,
        private readonly onPresent: PresentListener | null = null
    ) {}

    /** 累计呈现帧数（跨表面重配置） */
    get presentedFrames(): number {
        return this._presentedFrames;
    }

    createSurface(): PresentationSurface {
        return new OffscreenSurface((frame) => {
            this._presentedFrames++;
            this.onPresent?.(frame);
        });
    }
}
