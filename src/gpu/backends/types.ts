/**
 * 后端变体的共享能力接口
 *
 * 封闭集合: WebGPUBackend（native / webgpu）与 WebGLBackend（webgl）。
 * 启动时选定一次，逐帧不再按后端分支。
 */

import type { BackendProfile, ClearColor, PresentMode, SurfaceHandle, SurfaceSize } from '../../core/types';
import type { GuiFrameOutput } from '../../gui/types';

/** 所选后端的表面限制（来自 BackendCapabilities） */
export interface SurfaceLimits {
    readonly maxTextureDimension2D: number;
    readonly supportedPresentModes: readonly PresentMode[];
}

export interface SurfaceOptions {
    readonly vsync: boolean;
    /** 允许的呈现模式，与表面报告的模式取交集；缺省时不限制 */
    readonly supportedPresentModes?: readonly PresentMode[];
    /** 设备丢失（非 destroy 引起）时回调一次 */
    readonly onDeviceLost?: (info: { reason: string; message: string }) => void;
}

/** GPU 会话（初始化后不可变） */
export interface GpuSession {
    /** 会话代次，用于身份检查 */
    readonly generation: number;
    readonly profile: BackendProfile;
    readonly format: string;
    readonly presentMode: PresentMode;
    readonly maxTextureDimension2D: number;
}

/** 单帧状态：纹理视图 + 命令缓冲，仅在一帧内有效 */
export interface FrameState {
    readonly index: number;
    readonly size: SurfaceSize;
    /** 写入场景 MVP uniform */
    writeSceneUniforms(mvp: Float32Array<ArrayBuffer>): void;
    /** 以清屏开始渲染通道 */
    beginPass(clearColor: ClearColor): FramePass;
}

/** 打开的渲染通道：先画场景，GUI 追加，最后结束 */
export interface FramePass {
    drawScene(): void;
    drawGui(output: GuiFrameOutput): void;
    end(): void;
}

export interface SurfaceBackend {
    readonly profile: BackendProfile;
    /**
     * 请求适配器/设备，协商格式并配置表面
     *
     * @throws InitializationError
     */
    initialize(handle: SurfaceHandle, size: SurfaceSize, options: SurfaceOptions): Promise<GpuSession>;
    /** 以非零尺寸重新配置表面 */
    resize(size: SurfaceSize): void;
    /** @throws TransientFrameError */
    acquireFrame(): FrameState;
    present(frame: FrameState): void;
    discard(frame: FrameState): void;
    releaseSession(): void;
    releaseSurface(): void;
}

let _generation = 0;

/** 分配新的会话代次 */
export function nextSessionGeneration(): number {
    _generation += 1;
    return _generation;
}
