/**
 * 裁剪矩形 → 物理像素 scissor
 */

import type { Rect, SurfaceSize } from '../core/types';

export interface PixelScissor {
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
}

/**
 * 将 point 单位的裁剪矩形换算为物理像素，并夹到目标尺寸内。
 * 面积为零时返回 null（该绘制调用应跳过）。
 *
 * 原点在左上角；WebGL 需要自行翻转 y。
 */
export function toPixelScissor(clipRect: Rect, pixelsPerPoint: number, target: SurfaceSize): PixelScissor | null {
    const minX = clamp(Math.round(clipRect.x * pixelsPerPoint), 0, target.width);
    const minY = clamp(Math.round(clipRect.y * pixelsPerPoint), 0, target.height);
    const maxX = clamp(Math.round((clipRect.x + clipRect.width) * pixelsPerPoint), minX, target.width);
    const maxY = clamp(Math.round((clipRect.y + clipRect.height) * pixelsPerPoint), minY, target.height);

    const width = maxX - minX;
    const height = maxY - minY;
    if (width <= 0 || height <= 0) return null;
    return { x: minX, y: minY, width, height };
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}
