import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { NativeWindowHandle, SurfaceHandle } from '../../core/types';
import { MockSurface, createMockDevice, createMockGpu, stubWebGPUGlobals } from '../../testing/mockWebGPU';
import { InitializationError, TransientFrameError } from '../errors';
import { WebGPUBackend } from './WebGPUBackend';

function nativeHandle(gpu: GPU, surface: MockSurface): SurfaceHandle {
    const window: NativeWindowHandle = {
        title: 'test',
        gpu,
        createSurface: () => surface,
    };
    return { kind: 'native', window };
}

async function initFailure(promise: Promise<unknown>): Promise<InitializationError> {
    try {
        await promise;
    } catch (err) {
        if (err instanceof InitializationError) return err;
        throw err;
    }
    throw new Error('expected InitializationError');
}

const SIZE = { width: 800, height: 600 };

describe('WebGPUBackend', () => {
    beforeEach(() => {
        stubWebGPUGlobals();
        vi.spyOn(console, 'info').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('没有适配器时抛出 no-adapter', async () => {
        const backend = new WebGPUBackend('native');
        const err = await initFailure(
            backend.initialize(nativeHandle(createMockGpu(null), new MockSurface()), SIZE, { vsync: true })
        );
        expect(err.errorType).toBe('no-adapter');
    });

    it('设备请求失败时抛出 device-failed', async () => {
        const mock = createMockDevice();
        const backend = new WebGPUBackend('native');
        const err = await initFailure(
            backend.initialize(
                nativeHandle(createMockGpu(mock.device, { failDevice: true }), new MockSurface()),
                SIZE,
                { vsync: true }
            )
        );
        expect(err.errorType).toBe('device-failed');
        expect(err.message).toContain('mock-device-failure');
    });

    it('表面配置失败时抛出 surface-configuration 并销毁设备', async () => {
        const mock = createMockDevice();
        const surface = new MockSurface();
        surface.failConfigure = true;
        const backend = new WebGPUBackend('native');

        const err = await initFailure(backend.initialize(nativeHandle(createMockGpu(mock.device), surface), SIZE, { vsync: true }));
        expect(err.errorType).toBe('surface-configuration');
        expect(mock.destroy).toHaveBeenCalledTimes(1);
    });

    it('句柄种类与 Profile 不符时抛出 unsupported-backend', async () => {
        const backend = new WebGPUBackend('native');
        const canvas = document.createElement('canvas');
        const err = await initFailure(backend.initialize({ kind: 'canvas', canvas }, SIZE, { vsync: true }));
        expect(err.errorType).toBe('unsupported-backend');
        expect(err.missingCapability).toBe('native-window');
    });

    it('协商非 sRGB 格式与呈现模式', async () => {
        const mock = createMockDevice();
        const surface = new MockSurface(['bgra8unorm-srgb', 'rgba8unorm'], ['fifo', 'mailbox']);
        const backend = new WebGPUBackend('native');

        const session = await backend.initialize(nativeHandle(createMockGpu(mock.device), surface), SIZE, { vsync: false });
        expect(session.format).toBe('rgba8unorm');
        expect(session.presentMode).toBe('mailbox');
        expect(session.profile).toBe('native');
        expect(session.maxTextureDimension2D).toBe(8192);
        expect(surface.configure).toHaveBeenCalledWith(
            expect.objectContaining({ format: 'rgba8unorm', presentMode: 'mailbox', size: SIZE })
        );
    });

    it('一帧：写 uniform、清屏、绘制、提交并呈现', async () => {
        const mock = createMockDevice();
        const surface = new MockSurface();
        const backend = new WebGPUBackend('native');
        await backend.initialize(nativeHandle(createMockGpu(mock.device), surface), SIZE, { vsync: true });

        const frame = backend.acquireFrame();
        expect(frame.index).toBe(1);
        expect(frame.size).toEqual(SIZE);

        const mvp = new Float32Array(16);
        frame.writeSceneUniforms(mvp);
        const pass = frame.beginPass({ r: 0.19, g: 0.24, b: 0.42, a: 1 });
        pass.drawScene();
        pass.end();
        backend.present(frame);

        const scenePass = mock.passes[0];
        expect(scenePass?.drawIndexed).toHaveBeenCalledWith(3);
        expect(scenePass?.end).toHaveBeenCalledTimes(1);
        expect(mock.writeBuffer).toHaveBeenCalledWith(expect.anything(), 0, mvp);
        expect(mock.submit).toHaveBeenCalledTimes(1);
        expect(surface.present).toHaveBeenCalledTimes(1);
    });

    it('获取纹理抛出 DOMException 时转换为 surface-lost', async () => {
        const mock = createMockDevice();
        const surface = new MockSurface();
        const backend = new WebGPUBackend('native');
        await backend.initialize(nativeHandle(createMockGpu(mock.device), surface), SIZE, { vsync: true });

        surface.failNext = new DOMException('lost', 'InvalidStateError');
        let caught: unknown;
        try {
            backend.acquireFrame();
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(TransientFrameError);
        expect((caught as TransientFrameError).kind).toBe('surface-lost');
    });

    it('resize 重新配置表面并重建深度缓冲', async () => {
        const mock = createMockDevice();
        const surface = new MockSurface();
        const backend = new WebGPUBackend('native');
        await backend.initialize(nativeHandle(createMockGpu(mock.device), surface), SIZE, { vsync: true });

        backend.resize({ width: 1024, height: 768 });
        expect(surface.configure).toHaveBeenLastCalledWith(expect.objectContaining({ size: { width: 1024, height: 768 } }));
        expect(mock.destroyedTextures()).toBe(1);
        expect(backend.acquireFrame().size).toEqual({ width: 1024, height: 768 });
    });

    it('非 destroy 引起的设备丢失回调 onDeviceLost', async () => {
        const mock = createMockDevice();
        const onDeviceLost = vi.fn();
        const backend = new WebGPUBackend('native');
        await backend.initialize(nativeHandle(createMockGpu(mock.device), new MockSurface()), SIZE, { vsync: true, onDeviceLost });

        mock.loseDevice('unknown', 'mock-lost');
        await Promise.resolve();
        await Promise.resolve();

        expect(onDeviceLost).toHaveBeenCalledWith({ reason: 'unknown', message: 'mock-lost' });
    });

    it('主动释放时不回调 onDeviceLost，先释放设备后释放表面', async () => {
        const mock = createMockDevice();
        const surface = new MockSurface();
        const onDeviceLost = vi.fn();
        const backend = new WebGPUBackend('native');
        await backend.initialize(nativeHandle(createMockGpu(mock.device), surface), SIZE, { vsync: true, onDeviceLost });

        backend.releaseSession();
        backend.releaseSurface();
        await Promise.resolve();
        await Promise.resolve();

        expect(mock.destroy).toHaveBeenCalledTimes(1);
        expect(surface.unconfigure).toHaveBeenCalledTimes(1);
        expect(mock.destroy.mock.invocationCallOrder[0]).toBeLessThan(surface.unconfigure.mock.invocationCallOrder[0] ?? 0);
        expect(onDeviceLost).not.toHaveBeenCalled();
    });
});
