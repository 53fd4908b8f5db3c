/**
 * GUI 覆盖层类型
 */

import type { PlatformEvent, Rect, SurfaceSize } from '../core/types';

/** GUI 接收的平台无关输入（平台事件的子集） */
export type GuiInputEvent = Extract<PlatformEvent, { type: 'pointer-move' | 'pointer-button' | 'scroll' | 'key' }>;

/** 屏幕描述 */
export interface ScreenDescriptor {
    readonly sizeInPixels: SurfaceSize;
    readonly pixelsPerPoint: number;
}

/** RGBA (0-1) */
export type Rgba = readonly [number, number, number, number];

/** RGBA8 纹理上传 */
export interface GuiTextureUpload {
    readonly id: number;
    readonly width: number;
    readonly height: number;
    readonly pixels: Uint8Array<ArrayBuffer>;
}

export interface GuiTexturesDelta {
    readonly set: readonly GuiTextureUpload[];
    readonly free: readonly number[];
}

/** 单次绘制：一个裁剪矩形 + 一段索引 */
export interface GuiDrawCall {
    /** 裁剪矩形 (point) */
    readonly clipRect: Rect;
    readonly textureId: number;
    readonly indexOffset: number;
    readonly indexCount: number;
}

/**
 * 一帧 GUI 输出，每帧从头重建
 *
 * 顶点布局: pos.xy (point) + uv + rgba，均为 f32，见 GUI_VERTEX_FLOATS。
 */
export interface GuiFrameOutput {
    readonly screen: ScreenDescriptor;
    readonly vertices: Float32Array<ArrayBuffer>;
    readonly indices: Uint32Array<ArrayBuffer>;
    readonly drawCalls: readonly GuiDrawCall[];
    readonly texturesDelta: GuiTexturesDelta;
}

/** 形状（细分前） */
export type GuiShape =
    | { readonly kind: 'rect'; readonly rect: Rect; readonly color: Rgba }
    | { readonly kind: 'text'; readonly x: number; readonly y: number; readonly text: string; readonly scale: number; readonly color: Rgba };

/** 同一裁剪区域内的形状层 */
export interface GuiLayer {
    readonly clipRect: Rect;
    readonly shapes: GuiShape[];
}
