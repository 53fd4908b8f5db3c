/**
 * GPU 上下文 — 表面/设备生命周期与逐帧获取
 *
 * 持有后端变体、GPU Session 与 Render Surface：
 * - resize 幂等；零面积推迟到下一次非零尺寸
 * - acquireFrame: surface-lost/outdated 重配置一次并重试一次；timeout 跳帧
 * - 逐帧错误只记录日志，不越过组件边界
 */

import type { FrameSkipReason, SurfaceHandle, SurfaceSize } from '../core/types';
import type { FrameState, GpuSession, SurfaceBackend, SurfaceLimits, SurfaceOptions } from './backends/types';
import { InitializationError, TransientFrameError, describeError } from './errors';
import { clampSurfaceSize, isZeroArea, sameSize } from './surface';

export interface GpuContextStats {
    presented: number;
    skipped: number;
    reconfigurations: number;
}

export class GpuContext {
    private _session: GpuSession | null = null;
    /** 最近一次请求的尺寸（可能为零） */
    private requestedSize: SurfaceSize = { width: 0, height: 0 };
    /** 表面当前实际配置的尺寸 */
    private configuredSize: SurfaceSize = { width: 0, height: 0 };
    private deferred = false;
    private lastPresentedIndex = -1;
    private _lastSkipReason: FrameSkipReason | null = null;
    private readonly _stats: GpuContextStats = { presented: 0, skipped: 0, reconfigurations: 0 };

    /** 当前生效的纹理边长上限：能力常量与设备上报值中较小者 */
    private maxDimension: number;

    constructor(
        private readonly backend: SurfaceBackend,
        private readonly limits?: SurfaceLimits
    ) {
        this.maxDimension = limits?.maxTextureDimension2D ?? Number.POSITIVE_INFINITY;
    }

    get session(): GpuSession | null {
        return this._session;
    }

    get stats(): Readonly<GpuContextStats> {
        return this._stats;
    }

    /** 最近一次 acquireFrame 返回 null 的原因 */
    get lastSkipReason(): FrameSkipReason | null {
        return this._lastSkipReason;
    }

    /** 表面当前配置尺寸；推迟中返回 null */
    get surfaceSize(): SurfaceSize | null {
        return this.deferred || !this._session ? null : this.configuredSize;
    }

    /**
     * 初始化 GPU Session
     *
     * @throws InitializationError
     */
    async initialize(handle: SurfaceHandle, size: SurfaceSize, options: SurfaceOptions): Promise<GpuSession> {
        if (this._session) {
            throw new Error('GpuContext 已初始化');
        }
        const requested = isZeroArea(this.requestedSize) ? size : this.requestedSize;
        const initial = clampSurfaceSize(requested, this.maxDimension);
        if (isZeroArea(initial)) {
            throw new InitializationError(
                `表面尺寸为 ${initial.width}×${initial.height}，无法配置`,
                'surface-configuration'
            );
        }

        const supportedPresentModes = this.limits?.supportedPresentModes;
        const session = await this.backend.initialize(
            handle,
            initial,
            supportedPresentModes ? { ...options, supportedPresentModes } : options
        );
        this._session = session;
        this.maxDimension = Math.min(this.maxDimension, session.maxTextureDimension2D);
        this.configuredSize = clampSurfaceSize(initial, this.maxDimension);
        this.requestedSize = this.configuredSize;
        this.deferred = false;

        console.info('[GpuContext] 初始化完成', {
            generation: session.generation,
            profile: session.profile,
            format: session.format,
            presentMode: session.presentMode,
            size: this.configuredSize,
        });
        return session;
    }

    /**
     * 重新配置表面（幂等）
     *
     * 零面积（最小化窗口）时推迟，直到下一次非零尺寸。
     */
    resize(width: number, height: number): void {
        if (!this._session) {
            this.requestedSize = { width, height };
            return;
        }

        const next = clampSurfaceSize({ width, height }, this.maxDimension);
        this.requestedSize = next;
        if (isZeroArea(next)) {
            if (!this.deferred) {
                console.debug('[GpuContext] 尺寸为零，推迟表面配置');
            }
            this.deferred = true;
            return;
        }
        if (!this.deferred && sameSize(next, this.configuredSize)) {
            return;
        }

        this.reconfigure(next);
    }

    /**
     * 获取下一帧；需要跳帧时返回 null
     */
    acquireFrame(): FrameState | null {
        if (!this._session) {
            throw new Error('GpuContext 未初始化');
        }
        if (this.deferred) {
            if (isZeroArea(this.requestedSize)) return this.skip('zero-size');
            // 上次重新配置失败：每帧重试，成功后照常获取
            if (!this.reconfigure(this.requestedSize)) return this.skip('surface-lost');
        }

        try {
            return this.backend.acquireFrame();
        } catch (err) {
            if (!(err instanceof TransientFrameError)) throw err;

            if (err.kind === 'surface-lost' || err.kind === 'outdated') {
                console.warn(`[GpuContext] 表面失效 (${err.kind})，重新配置后重试一次`);
                if (!this.reconfigure(this.configuredSize)) {
                    return this.skip(err.kind);
                }
                try {
                    return this.backend.acquireFrame();
                } catch (retryErr) {
                    if (!(retryErr instanceof TransientFrameError)) throw retryErr;
                    console.warn(`[GpuContext] 重试获取帧失败 (${retryErr.kind})，跳过本帧`);
                    return this.skip(retryErr.kind);
                }
            }

            console.warn(`[GpuContext] 获取帧失败 (${err.kind})，跳过本帧`);
            return this.skip(err.kind);
        }
    }

    /**
     * 提交命令缓冲并安排呈现（按获取顺序）
     */
    present(frame: FrameState): void {
        if (frame.index <= this.lastPresentedIndex) {
            throw new Error(`帧 ${frame.index} 晚于已呈现的帧 ${this.lastPresentedIndex}`);
        }
        this.backend.present(frame);
        this.lastPresentedIndex = frame.index;
        this._stats.presented++;
    }

    /**
     * 丢弃帧（不呈现）
     */
    discard(frame: FrameState): void {
        this.backend.discard(frame);
        this._stats.skipped++;
    }

    /**
     * 按获取的逆序释放：先 GPU Session，后 Render Surface
     */
    destroy(): void {
        if (!this._session) return;
        this.backend.releaseSession();
        this.backend.releaseSurface();
        console.info(`[GpuContext] 会话 ${this._session.generation} 已释放`);
        this._session = null;
    }

    private skip(reason: FrameSkipReason): null {
        this._stats.skipped++;
        this._lastSkipReason = reason;
        return null;
    }

    private reconfigure(size: SurfaceSize): boolean {
        this._stats.reconfigurations++;
        try {
            this.backend.resize(size);
        } catch (err) {
            // 下一次 resize 或 acquireFrame 再试
            console.error(`[GpuContext] 表面重新配置失败: ${describeError(err)}`);
            this.deferred = true;
            return false;
        }
        this.configuredSize = size;
        this.deferred = false;
        return true;
    }
}
