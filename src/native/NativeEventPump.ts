/**
 * 原生事件泵 — 定时器驱动的 OS 风格消息循环
 *
 * vsync 开启时按显示器刷新间隔投递 redraw tick，关闭时在下一轮事件循环立即投递。
 * SIGINT 与帧数上限都转换为 close。
 */

import { EventQueue } from '../core/EventQueue';
import type { NativeWindowHandle, PlatformEvent, PlatformSource, SurfaceSize } from '../core/types';

export interface NativeEventPumpOptions {
    readonly size: SurfaceSize;
    readonly vsync: boolean;
    /** 投递该数量的 redraw tick 后关闭；null 表示不限 */
    readonly maxFrames?: number | null;
    /** vsync 间隔 (ms) */
    readonly refreshIntervalMs?: number;
}

const DEFAULT_REFRESH_INTERVAL_MS = 1000 / 60;

export class NativeEventPump implements PlatformSource {
    private readonly queue = new EventQueue();
    private cancelPending: (() => void) | null = null;
    private ticks = 0;
    private closePosted = false;
    private started = false;
    private disposed = false;
    private size: SurfaceSize;
    private readonly handleSigint = (): void => {
        console.info('[NativeEventPump] 收到 SIGINT，请求关闭');
        this.postClose();
    };

    constructor(private readonly options: NativeEventPumpOptions) {
        this.size = options.size;
    }

    /** 已投递的 redraw tick 数 */
    get ticksDelivered(): number {
        return this.ticks;
    }

    /**
     * 窗口就绪，投递 ready
     */
    start(window: NativeWindowHandle): void {
        if (this.started) {
            throw new Error('NativeEventPump 已启动');
        }
        this.started = true;
        process.on('SIGINT', this.handleSigint);
        this.queue.push({
            type: 'ready',
            handle: { kind: 'native', window },
            size: this.size,
            pixelsPerPoint: 1,
        });
    }

    next(): Promise<PlatformEvent> {
        return this.queue.next();
    }

    requestRedraw(): void {
        if (this.disposed || this.cancelPending) return;

        const maxFrames = this.options.maxFrames ?? null;
        if (maxFrames !== null && this.ticks >= maxFrames) {
            this.postClose();
            return;
        }

        const deliver = (): void => {
            this.cancelPending = null;
            this.ticks++;
            this.queue.push({ type: 'redraw-requested', timestamp: performance.now() });
        };

        if (this.options.vsync) {
            const timer = setTimeout(deliver, this.options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS);
            this.cancelPending = () => clearTimeout(timer);
        } else {
            const immediate = setImmediate(deliver);
            this.cancelPending = () => clearImmediate(immediate);
        }
    }

    /** 宿主窗口尺寸变化 */
    resize(size: SurfaceSize): void {
        if (size.width === this.size.width && size.height === this.size.height) return;
        this.size = size;
        this.queue.push({ type: 'resize', size, pixelsPerPoint: 1 });
    }

    /** 宿主窗口最小化 / 还原 */
    setVisible(visible: boolean): void {
        this.queue.push({ type: 'visibility', visible });
    }

    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        this.cancelPending?.();
        this.cancelPending = null;
        process.off('SIGINT', this.handleSigint);
    }

    private postClose(): void {
        if (this.closePosted) return;
        this.closePosted = true;
        this.queue.push({ type: 'close' });
    }
}
