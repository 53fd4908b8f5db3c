import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RuntimeConfig } from '../core/types';
import {
    type HostEnvironment,
    detectHostEnvironment,
    getBackendCapabilities,
    resetBackendSelection,
    selectBackend,
} from './BackendSelector';
import { InitializationError } from './errors';

const BROWSER_WITH_WEBGPU: HostEnvironment = { webgpu: true, webgl2: true, dom: true };
const BROWSER_WEBGL_ONLY: HostEnvironment = { webgpu: false, webgl2: true, dom: true };
const NATIVE_HOST: HostEnvironment = { webgpu: true, webgl2: false, dom: false };

function config(backend: RuntimeConfig['backend']): RuntimeConfig {
    return { backend, vsync: true, angularVelocity: 1 };
}

function selectionError(cfg: RuntimeConfig, host: HostEnvironment): InitializationError {
    try {
        selectBackend(cfg, host);
    } catch (err) {
        if (err instanceof InitializationError) return err;
        throw err;
    }
    throw new Error('selectBackend 应当失败');
}

describe('BackendSelector', () => {
    beforeEach(() => {
        resetBackendSelection();
        vi.spyOn(console, 'info').mockImplementation(() => {});
    });

    afterEach(() => {
        resetBackendSelection();
        vi.restoreAllMocks();
    });

    describe('selectBackend', () => {
        it('webgpu: 0..1 深度、WGSL、只提供 fifo', () => {
            const caps = selectBackend(config('webgpu'), BROWSER_WITH_WEBGPU);

            expect(caps).toEqual({
                profile: 'webgpu',
                maxTextureDimension2D: 8192,
                supportedPresentModes: ['fifo'],
                depthRange: 'zero-to-one',
                shaderLanguage: 'wgsl',
            });
            expect(Object.isFrozen(caps)).toBe(true);
        });

        it('webgl: 降级纹理上限与 -1..1 深度', () => {
            const caps = selectBackend(config('webgl'), BROWSER_WEBGL_ONLY);

            expect(caps.maxTextureDimension2D).toBe(2048);
            expect(caps.depthRange).toBe('negative-one-to-one');
            expect(caps.shaderLanguage).toBe('glsl-es-300');
        });

        it('native: 支持全部呈现模式', () => {
            const caps = selectBackend(config('native'), NATIVE_HOST);
            expect(caps.supportedPresentModes).toEqual(['fifo', 'mailbox', 'immediate']);
        });

        it('浏览器没有 navigator.gpu 时 webgpu 直接失败，不降级到 WebGL', () => {
            const err = selectionError(config('webgpu'), BROWSER_WEBGL_ONLY);

            expect(err.errorType).toBe('unsupported-backend');
            expect(err.missingCapability).toBe('navigator.gpu');
            expect(() => getBackendCapabilities()).toThrow('后端未选定');
        });

        it('缺少 WebGL2 时 webgl 失败', () => {
            const err = selectionError(config('webgl'), { webgpu: true, webgl2: false, dom: true });
            expect(err.missingCapability).toBe('WebGL2RenderingContext');
        });

        it('native 不能在页面中运行', () => {
            const err = selectionError(config('native'), BROWSER_WITH_WEBGPU);
            expect(err.missingCapability).toBe('native-window');
        });

        it('native 需要宿主注入 GPU 入口', () => {
            const err = selectionError(config('native'), { webgpu: false, webgl2: false, dom: false });
            expect(err.missingCapability).toBe('native-gpu');
        });

        it('同一进程内重复选择同一后端返回相同能力', () => {
            const first = selectBackend(config('webgpu'), BROWSER_WITH_WEBGPU);
            expect(selectBackend(config('webgpu'), BROWSER_WITH_WEBGPU)).toBe(first);
            expect(getBackendCapabilities()).toBe(first);
        });

        it('同一进程内不能切换后端', () => {
            selectBackend(config('webgpu'), BROWSER_WITH_WEBGPU);
            expect(() => selectBackend(config('webgl'), BROWSER_WITH_WEBGPU)).toThrow(
                '后端已选定为 webgpu，同一进程内不能切换到 webgl'
            );
        });
    });

    describe('detectHostEnvironment', () => {
        it('jsdom 有 DOM，没有 navigator.gpu', () => {
            const host = detectHostEnvironment();
            expect(host.dom).toBe(true);
            expect(host.webgpu).toBe(false);
        });
    });
});
