/**
 * 浏览器平台事件源
 *
 * DOM 事件 → PlatformEvent，redraw tick 由 requestAnimationFrame 驱动。
 * 指针坐标使用 CSS 像素（即 point），表面尺寸为物理像素。
 */

import { EventQueue } from '../core/EventQueue';
import type { KeyModifiers, PlatformEvent, PlatformSource, PointerButton, SurfaceSize } from '../core/types';

/** 帧调度（默认取 window） */
export interface FrameScheduler {
    requestAnimationFrame(callback: (timestamp: number) => void): number;
    cancelAnimationFrame(handle: number): void;
}

const POINTER_BUTTONS: Record<number, PointerButton> = {
    0: 'primary',
    1: 'middle',
    2: 'secondary',
};

export class CanvasEventSource implements PlatformSource {
    private readonly queue = new EventQueue();
    private readonly removers: (() => void)[] = [];
    private resizeObserver: ResizeObserver | null = null;
    private frameHandle = 0;
    private started = false;
    private disposed = false;
    private lastSize: SurfaceSize = { width: 0, height: 0 };

    constructor(
        private readonly canvas: HTMLCanvasElement,
        private readonly scheduler: FrameScheduler = window
    ) {}

    /**
     * 绑定监听器并投递 ready
     */
    start(): void {
        if (this.started) return;
        this.started = true;

        this.lastSize = this.measure();
        this.queue.push({
            type: 'ready',
            handle: { kind: 'canvas', canvas: this.canvas },
            size: this.lastSize,
            pixelsPerPoint: this.pixelsPerPoint(),
        });

        this.setupInteraction();

        if (typeof ResizeObserver !== 'undefined') {
            this.resizeObserver = new ResizeObserver(() => this.handleResize());
            this.resizeObserver.observe(this.canvas);
        } else {
            this.listenWindow('resize', () => this.handleResize());
        }
        this.listenDocument('visibilitychange', () => {
            this.queue.push({ type: 'visibility', visible: document.visibilityState !== 'hidden' });
        });
        this.listenWindow('beforeunload', () => {
            this.queue.push({ type: 'close' });
        });
    }

    next(): Promise<PlatformEvent> {
        return this.queue.next();
    }

    requestRedraw(): void {
        if (this.disposed || this.frameHandle !== 0) return;
        this.frameHandle = this.scheduler.requestAnimationFrame((timestamp) => {
            this.frameHandle = 0;
            this.queue.push({ type: 'redraw-requested', timestamp });
        });
    }

    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        if (this.frameHandle !== 0) {
            this.scheduler.cancelAnimationFrame(this.frameHandle);
            this.frameHandle = 0;
        }
        this.resizeObserver?.disconnect();
        this.resizeObserver = null;
        this.removers.splice(0).forEach((remove) => remove());
    }

    // ========== DOM 事件 ==========

    private setupInteraction(): void {
        this.listenCanvas('mousemove', (e: MouseEvent) => {
            this.queue.push({ type: 'pointer-move', position: this.toPoint(e) });
        });
        this.listenCanvas('mousedown', (e: MouseEvent) => this.pushButton(e, true));
        // 在画布外松开也要结束按压
        this.listenWindow('mouseup', (e: MouseEvent) => this.pushButton(e, false));
        this.listenCanvas('contextmenu', (e: MouseEvent) => e.preventDefault());

        this.listenCanvas('wheel', (e: WheelEvent) => {
            e.preventDefault();
            this.queue.push({ type: 'scroll', delta: { x: e.deltaX, y: e.deltaY } });
        });

        this.listenWindow('keydown', (e: KeyboardEvent) => this.pushKey(e, true));
        this.listenWindow('keyup', (e: KeyboardEvent) => this.pushKey(e, false));
    }

    private pushButton(e: MouseEvent, pressed: boolean): void {
        const button = POINTER_BUTTONS[e.button];
        if (!button) return;
        this.queue.push({ type: 'pointer-button', button, pressed, position: this.toPoint(e) });
    }

    private pushKey(e: KeyboardEvent, pressed: boolean): void {
        const modifiers: KeyModifiers = {
            shift: e.shiftKey,
            ctrl: e.ctrlKey,
            alt: e.altKey,
            meta: e.metaKey,
        };
        this.queue.push({ type: 'key', key: e.key, pressed, modifiers });
    }

    private handleResize(): void {
        const size = this.measure();
        if (size.width === this.lastSize.width && size.height === this.lastSize.height) return;
        this.lastSize = size;
        this.queue.push({ type: 'resize', size, pixelsPerPoint: this.pixelsPerPoint() });
    }

    // ========== 工具 ==========

    private listenCanvas<K extends keyof HTMLElementEventMap>(
        type: K,
        handler: (event: HTMLElementEventMap[K]) => void
    ): void {
        // wheel 需要 preventDefault
        const options: AddEventListenerOptions | undefined = type === 'wheel' ? { passive: false } : undefined;
        this.canvas.addEventListener(type, handler, options);
        this.removers.push(() => this.canvas.removeEventListener(type, handler, options));
    }

    private listenWindow<K extends keyof WindowEventMap>(type: K, handler: (event: WindowEventMap[K]) => void): void {
        window.addEventListener(type, handler);
        this.removers.push(() => window.removeEventListener(type, handler));
    }

    private listenDocument<K extends keyof DocumentEventMap>(
        type: K,
        handler: (event: DocumentEventMap[K]) => void
    ): void {
        document.addEventListener(type, handler);
        this.removers.push(() => document.removeEventListener(type, handler));
    }

    private pixelsPerPoint(): number {
        return window.devicePixelRatio || 1;
    }

    /** 物理像素尺寸；布局尚未完成时退回 canvas 属性尺寸 */
    private measure(): SurfaceSize {
        const ppp = this.pixelsPerPoint();
        const cssWidth = this.canvas.clientWidth || this.canvas.width / ppp;
        const cssHeight = this.canvas.clientHeight || this.canvas.height / ppp;
        return {
            width: Math.floor(cssWidth * ppp),
            height: Math.floor(cssHeight * ppp),
        };
    }

    private toPoint(e: MouseEvent): { x: number; y: number } {
        const rect = this.canvas.getBoundingClientRect();
        return { x: e.clientX - rect.left, y: e.clientY - rect.top };
    }
}
