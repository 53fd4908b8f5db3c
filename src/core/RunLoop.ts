/**
 * 事件/运行循环 — 由单一拉取接口驱动的状态机
 *
 *   uninitialized ──ready──▶ running ⇄ suspended
 *         │                     │          │
 *         └──────── close / 致命错误 ───────┴──▶ terminated
 *
 * - 每个 redraw tick 恰好一帧
 * - redraw 请求合并：已有待处理请求时不再向平台请求
 * - 输入在消费它的那一帧之前应用
 */

import type { FrameRenderer } from '../gpu/FrameRenderer';
import type { GpuContext } from '../gpu/GpuContext';
import { InitializationError, describeError } from '../gpu/errors';
import type { GuiContext, GuiFrame } from '../gui/GuiContext';
import type { ScreenDescriptor } from '../gui/types';
import { eventBus, type EventBus } from './EventBus';
import type { Clock, LoopState, PlatformEvent, PlatformSource } from './types';

export interface RunLoopOptions {
    readonly source: PlatformSource;
    readonly gpu: GpuContext;
    readonly renderer: FrameRenderer;
    readonly gui: GuiContext;
    readonly buildGui: (frame: GuiFrame) => void;
    readonly clock: Clock;
    readonly vsync: boolean;
    readonly bus?: EventBus;
}

export type RunResult =
    | { readonly exitCode: 0 }
    | { readonly exitCode: 1; readonly error: Error };

export class RunLoop {
    private _state: LoopState = 'uninitialized';
    private started = false;
    private redrawPending = false;
    private closeRequested = false;
    private fatal: Error | null = null;
    private startTime = 0;
    private screen: ScreenDescriptor | null = null;
    private _framesRendered = 0;
    private readonly bus: EventBus;

    constructor(private readonly options: RunLoopOptions) {
        this.bus = options.bus ?? eventBus;
    }

    get state(): LoopState {
        return this._state;
    }

    /** 已处理的 redraw tick 数（含跳过的帧） */
    get framesRendered(): number {
        return this._framesRendered;
    }

    /**
     * 运行直到 terminated
     */
    async run(): Promise<RunResult> {
        if (this.started) {
            throw new Error('RunLoop 只能运行一次');
        }
        this.started = true;

        for (;;) {
            if (this.fatal) return this.terminate(this.fatal);
            if (this.closeRequested) return this.terminate(null);

            try {
                const event = await this.options.source.next();
                await this.handle(event);
            } catch (err) {
                const error = err instanceof Error ? err : new Error(String(err));
                console.error(`[RunLoop] 未处理的错误: ${describeError(err)}`);
                return this.terminate(error);
            }
        }
    }

    /**
     * 请求关闭；在当前事件处理完成后生效，未呈现的帧被丢弃
     */
    requestClose(): void {
        if (this.closeRequested) return;
        this.closeRequested = true;
        // 唤醒等待中的 next()
        this.options.source.requestRedraw();
    }

    // ========== 事件处理 ==========

    private async handle(event: PlatformEvent): Promise<void> {
        switch (event.type) {
            case 'ready':
                await this.handleReady(event);
                return;
            case 'resize':
                this.options.gpu.resize(event.size.width, event.size.height);
                this.screen = { sizeInPixels: event.size, pixelsPerPoint: event.pixelsPerPoint };
                break;
            case 'visibility':
                if (!event.visible && this._state === 'running') {
                    this.setState('suspended');
                } else if (event.visible && this._state === 'suspended') {
                    this.setState('running');
                }
                break;
            case 'close':
                this.closeRequested = true;
                return;
            case 'redraw-requested':
                this.redrawPending = false;
                if (this._state === 'running' && !this.closeRequested && !this.fatal) {
                    this.renderFrame();
                }
                break;
            case 'pointer-move':
            case 'pointer-button':
            case 'scroll':
            case 'key':
                if (this._state === 'uninitialized') return;
                if (event.type === 'key' && event.key === 'Escape' && event.pressed) {
                    this.requestClose();
                    return;
                }
                this.options.gui.pushInput(event);
                break;
        }

        this.requestRedraw();
    }

    private async handleReady(event: Extract<PlatformEvent, { type: 'ready' }>): Promise<void> {
        if (this._state !== 'uninitialized') {
            console.warn('[RunLoop] 重复的 ready 事件，已忽略');
            return;
        }
        this.screen = { sizeInPixels: event.size, pixelsPerPoint: event.pixelsPerPoint };

        try {
            await this.options.gpu.initialize(event.handle, event.size, {
                vsync: this.options.vsync,
                onDeviceLost: (info) => this.handleDeviceLost(info),
            });
        } catch (err) {
            console.error(`[RunLoop] 初始化失败: ${describeError(err)}`);
            this.fatal = err instanceof Error ? err : new Error(String(err));
            return;
        }

        this.startTime = this.options.clock.now();
        this.setState('running');
        this.requestRedraw();
    }

    private handleDeviceLost(info: { reason: string; message: string }): void {
        this.bus.emit('gpu:device-lost', info);
        if (this.fatal || this._state === 'terminated') return;
        this.fatal = new InitializationError(`GPU 设备丢失: ${info.message} (reason: ${info.reason})`, 'device-lost');
        this.options.source.requestRedraw();
    }

    private renderFrame(): void {
        const { gpu, gui, renderer, clock, buildGui } = this.options;
        const screen = this.screen;
        if (!screen) return;

        // 表面推迟期间不构建 GUI，输入留到下一帧
        const surfaceSize = gpu.surfaceSize;
        const guiOutput = surfaceSize
            ? gui.run({ sizeInPixels: surfaceSize, pixelsPerPoint: screen.pixelsPerPoint }, buildGui)
            : null;
        const elapsedSeconds = (clock.now() - this.startTime) / 1000;
        const report = renderer.render(elapsedSeconds, guiOutput, () => this.closeRequested);
        if (report.status === 'skipped' && guiOutput) {
            gui.restoreTexturesDelta(guiOutput.texturesDelta);
        }
        this._framesRendered++;
    }

    // ========== 状态 ==========

    /** 合并 redraw 请求：只在没有待处理请求且处于 running 时向平台请求 */
    private requestRedraw(): void {
        if (this._state !== 'running' || this.redrawPending || this.closeRequested) return;
        this.redrawPending = true;
        this.options.source.requestRedraw();
    }

    private setState(to: LoopState): void {
        const from = this._state;
        if (from === to) return;
        this._state = to;
        console.info(`[RunLoop] ${from} → ${to}`);
        this.bus.emit('loop:state', { from, to });
    }

    private terminate(error: Error | null): RunResult {
        this.redrawPending = false;
        console.info('[RunLoop] 帧统计', { ticks: this._framesRendered, ...this.options.gpu.stats });
        this.options.gpu.destroy();
        this.options.source.dispose();
        this.setState('terminated');
        return error ? { exitCode: 1, error } : { exitCode: 0 };
    }
}
