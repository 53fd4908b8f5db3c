/**
 * 表面后端选择器 — Fail-Fast
 *
 * 构建期配置决定唯一的 Backend Profile，在任何 GPU 调用之前解析。
 * 宿主不满足所选后端时直接启动失败，不做静默降级。
 */

import type { BackendProfile, DepthRange, PresentMode, RuntimeConfig } from '../core/types';
import { DEFAULT_MAX_TEXTURE_DIMENSION, DOWNLEVEL_MAX_TEXTURE_DIMENSION } from './constants';
import { InitializationError } from './errors';

// ========== 类型定义 ==========

/** 宿主能力探测结果 */
export interface HostEnvironment {
    /** navigator.gpu 可用 */
    readonly webgpu: boolean;
    /** WebGL2RenderingContext 可用 */
    readonly webgl2: boolean;
    /** 存在 DOM（浏览器页面） */
    readonly dom: boolean;
}

/** 所选后端的能力常量（供 GPU Session 使用） */
export interface BackendCapabilities {
    readonly profile: BackendProfile;
    readonly maxTextureDimension2D: number;
    readonly supportedPresentModes: readonly PresentMode[];
    readonly depthRange: DepthRange;
    readonly shaderLanguage: 'wgsl' | 'glsl-es-300';
}

// ========== 常量 ==========

const PROFILE_CAPABILITIES: Record<BackendProfile, BackendCapabilities> = {
    native: {
        profile: 'native',
        maxTextureDimension2D: DEFAULT_MAX_TEXTURE_DIMENSION,
        supportedPresentModes: ['fifo', 'mailbox', 'immediate'],
        depthRange: 'zero-to-one',
        shaderLanguage: 'wgsl',
    },
    webgpu: {
        profile: 'webgpu',
        maxTextureDimension2D: DEFAULT_MAX_TEXTURE_DIMENSION,
        // 浏览器 canvas 只提供与显示器同步的呈现
        supportedPresentModes: ['fifo'],
        depthRange: 'zero-to-one',
        shaderLanguage: 'wgsl',
    },
    webgl: {
        profile: 'webgl',
        maxTextureDimension2D: DOWNLEVEL_MAX_TEXTURE_DIMENSION,
        supportedPresentModes: ['fifo'],
        depthRange: 'negative-one-to-one',
        shaderLanguage: 'glsl-es-300',
    },
};

// ========== 探测 ==========

/**
 * 探测当前宿主
 */
export function detectHostEnvironment(): HostEnvironment {
    const hasNavigator = typeof navigator !== 'undefined';
    return {
        webgpu: hasNavigator && 'gpu' in navigator && navigator.gpu != null,
        webgl2: typeof WebGL2RenderingContext !== 'undefined',
        dom: typeof document !== 'undefined',
    };
}

// ========== 选择 ==========

let _selected: BackendCapabilities | null = null;

/**
 * 解析唯一的 Backend Profile 并写入全局能力常量
 *
 * @throws InitializationError('unsupported-backend') 宿主缺少所需能力
 * @throws Error 同一进程内尝试选择不同的后端
 */
export function selectBackend(config: RuntimeConfig, host: HostEnvironment): BackendCapabilities {
    if (_selected) {
        if (_selected.profile !== config.backend) {
            throw new Error(
                `后端已选定为 ${_selected.profile}，同一进程内不能切换到 ${config.backend}`
            );
        }
        return _selected;
    }

    switch (config.backend) {
        case 'webgpu':
            if (!host.webgpu) {
                throw new InitializationError(
                    'WebGPU 后端已选定，但当前浏览器没有 navigator.gpu。请使用支持 WebGPU 的浏览器，或以 VITE_BACKEND=webgl 重新构建。',
                    'unsupported-backend',
                    'navigator.gpu'
                );
            }
            break;
        case 'webgl':
            if (!host.webgl2) {
                throw new InitializationError(
                    'WebGL 后端已选定，但当前环境不支持 WebGL2。',
                    'unsupported-backend',
                    'WebGL2RenderingContext'
                );
            }
            break;
        case 'native':
            if (host.dom) {
                throw new InitializationError(
                    '原生后端不能在浏览器页面中运行。',
                    'unsupported-backend',
                    'native-window'
                );
            }
            if (!host.webgpu) {
                throw new InitializationError(
                    '原生后端需要宿主注入 GPU 入口（navigator.gpu），当前进程没有提供。',
                    'unsupported-backend',
                    'native-gpu'
                );
            }
            break;
    }

    _selected = Object.freeze({ ...PROFILE_CAPABILITIES[config.backend] });
    console.info(`[BackendSelector] 已选定后端: ${config.backend}`, _selected);
    return _selected;
}

/**
 * 获取已选定后端的能力常量（未选定时抛出异常）
 */
export function getBackendCapabilities(): BackendCapabilities {
    if (!_selected) {
        throw new Error('后端未选定。请先调用 selectBackend()。');
    }
    return _selected;
}

/**
 * 重置选择（仅用于测试）
 */
export function resetBackendSelection(): void {
    _selected = null;
}
