/**
 * 表面协商 — 格式、呈现模式、尺寸
 */

import type { PresentMode, SurfaceSize } from '../core/types';
import { NO_VSYNC_PRESENT_MODES, VSYNC_PRESENT_MODES } from './constants';
import { InitializationError } from './errors';

/**
 * 选择表面格式：优先第一个非 sRGB 格式（GUI 在 shader 中按线性输出），
 * 否则取第一个可用格式。
 *
 * @throws InitializationError('surface-configuration') 没有任何可用格式
 */
export function chooseSurfaceFormat(formats: readonly GPUTextureFormat[]): GPUTextureFormat {
    const linear = formats.find((f) => !f.endsWith('-srgb'));
    const chosen = linear ?? formats[0];
    if (chosen === undefined) {
        throw new InitializationError('表面没有报告任何可用格式', 'surface-configuration');
    }
    return chosen;
}

/**
 * 选择呈现模式
 *
 * vsync 开: fifo；vsync 关: immediate → mailbox。
 * 偏好模式都不受支持时回退到表面报告的第一个模式并告警。
 */
export function choosePresentMode(vsync: boolean, supported: readonly PresentMode[]): PresentMode {
    const preferred = vsync ? VSYNC_PRESENT_MODES : NO_VSYNC_PRESENT_MODES;
    const match = preferred.find((mode) => supported.includes(mode));
    if (match) return match;

    const fallback = supported[0];
    if (fallback === undefined) {
        throw new InitializationError('表面没有报告任何呈现模式', 'surface-configuration');
    }
    console.warn(
        `[Surface] 请求的呈现模式 (${preferred.join('/')}) 不受支持，回退到 ${fallback}`
    );
    return fallback;
}

/** 表面报告的模式与后端允许的模式取交集，保持表面的顺序 */
export function allowedPresentModes(
    surfaceModes: readonly PresentMode[],
    supported?: readonly PresentMode[]
): PresentMode[] {
    return supported ? surfaceModes.filter((mode) => supported.includes(mode)) : [...surfaceModes];
}

export function isZeroArea(size: SurfaceSize): boolean {
    return size.width <= 0 || size.height <= 0;
}

/** 按设备上限钳制尺寸，取整 */
export function clampSurfaceSize(size: SurfaceSize, maxDimension: number): SurfaceSize {
    return {
        width: Math.min(Math.max(0, Math.floor(size.width)), maxDimension),
        height: Math.min(Math.max(0, Math.floor(size.height)), maxDimension),
    };
}

export function sameSize(a: SurfaceSize, b: SurfaceSize): boolean {
    return a.width === b.width && a.height === b.height;
}
