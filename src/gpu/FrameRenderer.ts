/**
 * 帧渲染器 — 每帧一条命令序列
 *
 * 角度 → MVP → 清屏 → 三角形 → GUI → 结束通道 → 呈现。
 * 编码中的任何异常只丢弃本帧，循环继续。
 */

import { eventBus, type EventBus } from '../core/EventBus';
import type { DepthRange, FrameSkipReason } from '../core/types';
import type { GuiFrameOutput } from '../gui/types';
import { CLEAR_COLOR } from './constants';
import { aspectRatio, rotationAngle, SceneTransform } from './data/transform';
import { TransientFrameError, describeError } from './errors';
import type { GpuContext } from './GpuContext';

export type FrameReport =
    | { readonly status: 'presented'; readonly frameIndex: number; readonly angle: number; readonly elapsedSeconds: number }
    | { readonly status: 'skipped'; readonly reason: FrameSkipReason };

export interface FrameRendererOptions {
    readonly depthRange: DepthRange;
    /** rad/s */
    readonly angularVelocity: number;
    readonly bus?: EventBus;
}

export class FrameRenderer {
    private readonly transform: SceneTransform;
    private readonly angularVelocity: number;
    private readonly bus: EventBus;

    constructor(
        private readonly gpu: GpuContext,
        options: FrameRendererOptions
    ) {
        this.transform = new SceneTransform(options.depthRange);
        this.angularVelocity = options.angularVelocity;
        this.bus = options.bus ?? eventBus;
    }

    /**
     * 渲染一帧
     *
     * @param elapsedSeconds 自循环开始的绝对时间
     * @param gui 本帧 GUI 输出；null 时只画场景
     * @param isCancelled 呈现前检查是否已请求关闭
     */
    render(elapsedSeconds: number, gui: GuiFrameOutput | null, isCancelled: () => boolean = () => false): FrameReport {
        const frame = this.gpu.acquireFrame();
        if (!frame) {
            return this.skipped(this.gpu.lastSkipReason ?? 'timeout');
        }

        const angle = rotationAngle(elapsedSeconds, this.angularVelocity);
        try {
            const mvp = this.transform.compute(angle, aspectRatio(frame.size.width, frame.size.height));
            frame.writeSceneUniforms(mvp);

            const pass = frame.beginPass(CLEAR_COLOR);
            pass.drawScene();
            if (gui) {
                pass.drawGui(gui);
            }
            pass.end();
        } catch (err) {
            this.gpu.discard(frame);
            const reason: FrameSkipReason = err instanceof TransientFrameError ? err.kind : 'validation';
            console.error(`[FrameRenderer] 帧 ${frame.index} 编码失败，已丢弃: ${describeError(err)}`);
            return this.skipped(reason, describeError(err));
        }

        if (isCancelled()) {
            this.gpu.discard(frame);
            console.debug(`[FrameRenderer] 呈现前收到关闭请求，丢弃帧 ${frame.index}`);
            return this.skipped('cancelled');
        }

        this.gpu.present(frame);
        this.bus.emit('frame:presented', { frameIndex: frame.index, angle, elapsedSeconds });
        return { status: 'presented', frameIndex: frame.index, angle, elapsedSeconds };
    }

    private skipped(reason: FrameSkipReason, message?: string): FrameReport {
        this.bus.emit('frame:skipped', message === undefined ? { reason } : { reason, message });
        return { status: 'skipped', reason };
    }
}
