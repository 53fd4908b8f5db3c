/**
 * WebGPU 后端变体 — 同时服务 native 与 webgpu 两个 Profile
 *
 * 两者只在表面来源上不同：
 * - webgpu: navigator.gpu + canvas context
 * - native: 宿主窗口注入的 GPU 入口 + 宿主表面
 *
 * Fail-Fast：适配器/设备/表面配置任一步失败即抛出 InitializationError。
 */

import type { ClearColor, PresentMode, PresentationSurface, SurfaceHandle, SurfaceSize } from '../../core/types';
import type { GuiFrameOutput } from '../../gui/types';
import { DEPTH_FORMAT } from '../constants';
import { InitializationError, TransientFrameError, describeError } from '../errors';
import { GuiPipeline, TrianglePipeline } from '../pipelines';
import { allowedPresentModes, choosePresentMode, chooseSurfaceFormat } from '../surface';
import { CanvasSurface } from '../surfaces/CanvasSurface';
import type { FramePass, FrameState, GpuSession, SurfaceBackend, SurfaceOptions } from './types';
import { nextSessionGeneration } from './types';

export type WebGPUProfile = 'native' | 'webgpu';

interface ResolvedHandle {
    readonly gpu: GPU;
    readonly surface: PresentationSurface;
}

/** 初始化后的设备资源 */
interface DeviceResources {
    readonly device: GPUDevice;
    readonly surface: PresentationSurface;
    readonly format: GPUTextureFormat;
    readonly presentMode: PresentMode;
    readonly triangle: TrianglePipeline;
    readonly gui: GuiPipeline;
}

// ========== 帧 ==========

class WebGPUFrame implements FrameState {
    readonly encoder: GPUCommandEncoder;
    private readonly view: GPUTextureView;

    constructor(
        readonly index: number,
        readonly size: SurfaceSize,
        texture: GPUTexture,
        private readonly resources: DeviceResources,
        private readonly depthView: GPUTextureView
    ) {
        this.view = texture.createView();
        this.encoder = resources.device.createCommandEncoder({ label: `frame_${index}` });
    }

    writeSceneUniforms(mvp: Float32Array<ArrayBuffer>): void {
        this.resources.triangle.updateUniforms(mvp);
    }

    beginPass(clearColor: ClearColor): FramePass {
        const pass = this.encoder.beginRenderPass({
            label: `frame_${this.index}_pass`,
            colorAttachments: [{
                view: this.view,
                clearValue: clearColor,
                loadOp: 'clear',
                storeOp: 'store',
            }],
            depthStencilAttachment: {
                view: this.depthView,
                depthClearValue: 1.0,
                depthLoadOp: 'clear',
                depthStoreOp: 'store',
            },
        });

        const { triangle, gui } = this.resources;
        const size = this.size;
        return {
            drawScene: () => triangle.encode(pass),
            drawGui: (output: GuiFrameOutput) => gui.encode(pass, output, size),
            end: () => pass.end(),
        };
    }
}

// ========== 后端 ==========

export class WebGPUBackend implements SurfaceBackend {
    private resources: DeviceResources | null = null;
    private depthTexture: GPUTexture | null = null;
    private depthView: GPUTextureView | null = null;
    private size: SurfaceSize = { width: 0, height: 0 };
    private frameIndex = 0;
    private releasing = false;

    constructor(readonly profile: WebGPUProfile) {}

    async initialize(handle: SurfaceHandle, size: SurfaceSize, options: SurfaceOptions): Promise<GpuSession> {
        const { gpu, surface } = this.resolveHandle(handle);

        // 1. 请求高性能适配器
        const adapter = await gpu.requestAdapter({ powerPreference: 'high-performance' });
        if (!adapter) {
            throw new InitializationError(
                '无法获取 GPU 适配器。请确认系统有可用的 GPU 与驱动。',
                'no-adapter'
            );
        }

        // 2. 请求设备，纹理上限取适配器报告值
        let device: GPUDevice;
        try {
            device = await adapter.requestDevice({
                label: `${this.profile}_device`,
                requiredLimits: {
                    maxTextureDimension2D: adapter.limits.maxTextureDimension2D,
                },
            });
        } catch (err) {
            throw new InitializationError(`GPU 设备创建失败: ${describeError(err)}`, 'device-failed');
        }

        // 3. 协商格式与呈现模式
        const format = chooseSurfaceFormat(surface.formats);
        const presentMode = choosePresentMode(
            options.vsync,
            allowedPresentModes(surface.presentModes, options.supportedPresentModes)
        );

        // 4. 配置表面
        try {
            surface.configure({ device, format, size, presentMode });
        } catch (err) {
            device.destroy();
            throw new InitializationError(`表面配置失败: ${describeError(err)}`, 'surface-configuration');
        }
        this.size = size;

        // 5. 设备丢失与未捕获错误
        void device.lost.then((info) => {
            if (info.reason === 'destroyed' || this.releasing) return;
            console.error(`[WebGPU] 设备丢失: ${info.message} (reason: ${info.reason})`);
            options.onDeviceLost?.({ reason: String(info.reason), message: info.message });
        });
        device.addEventListener('uncapturederror', (event) => {
            console.error(`[WebGPU] 未捕获错误: ${event.error.message}`);
        });

        // 6. 管线
        const triangle = new TrianglePipeline(device, format);
        triangle.initialize();
        const gui = new GuiPipeline(device, format);
        gui.initialize();

        this.resources = { device, surface, format, presentMode, triangle, gui };
        this.createDepthTexture(size);

        const maxTextureDimension2D = device.limits.maxTextureDimension2D;
        console.info('[WebGPU profile]', {
            profile: this.profile,
            adapter: adapter.info?.description ?? adapter.info?.vendor ?? 'unknown',
            limits: { maxTextureDimension2D },
            formats: surface.formats,
            format,
            presentModes: surface.presentModes,
            presentMode,
        });

        return Object.freeze({
            generation: nextSessionGeneration(),
            profile: this.profile,
            format,
            presentMode,
            maxTextureDimension2D,
        });
    }

    resize(size: SurfaceSize): void {
        const resources = this.requireResources();
        resources.surface.configure({
            device: resources.device,
            format: resources.format,
            size,
            presentMode: resources.presentMode,
        });
        this.size = size;
        this.createDepthTexture(size);
    }

    acquireFrame(): FrameState {
        const resources = this.requireResources();
        const depthView = this.depthView;
        if (!depthView) {
            throw new TransientFrameError('深度缓冲不存在', 'outdated');
        }

        let texture: GPUTexture;
        try {
            texture = resources.surface.getCurrentTexture();
        } catch (err) {
            if (err instanceof TransientFrameError) throw err;
            throw new TransientFrameError(`获取表面纹理失败: ${describeError(err)}`, 'surface-lost');
        }

        if (texture.width !== this.size.width || texture.height !== this.size.height) {
            resources.surface.discard();
            throw new TransientFrameError(
                `表面纹理 ${texture.width}×${texture.height} 与配置 ${this.size.width}×${this.size.height} 不一致`,
                'outdated'
            );
        }

        this.frameIndex++;
        return new WebGPUFrame(this.frameIndex, this.size, texture, resources, depthView);
    }

    present(frame: FrameState): void {
        const resources = this.requireResources();
        if (!(frame instanceof WebGPUFrame)) {
            throw new Error('帧不属于 WebGPU 后端');
        }
        resources.device.queue.submit([frame.encoder.finish()]);
        resources.surface.present();
    }

    discard(_frame: FrameState): void {
        this.resources?.surface.discard();
    }

    releaseSession(): void {
        const resources = this.resources;
        if (!resources) return;
        this.releasing = true;
        resources.triangle.destroy();
        resources.gui.destroy();
        this.depthTexture?.destroy();
        this.depthTexture = null;
        this.depthView = null;
        resources.device.destroy();
    }

    releaseSurface(): void {
        this.resources?.surface.unconfigure();
        this.resources = null;
    }

    // ========== 内部 ==========

    private resolveHandle(handle: SurfaceHandle): ResolvedHandle {
        if (this.profile === 'native') {
            if (handle.kind !== 'native') {
                throw new InitializationError('原生后端需要宿主窗口句柄', 'unsupported-backend', 'native-window');
            }
            return { gpu: handle.window.gpu, surface: handle.window.createSurface() };
        }

        if (handle.kind !== 'canvas') {
            throw new InitializationError('WebGPU 后端需要 canvas 句柄', 'unsupported-backend', 'canvas');
        }
        const gpu = navigator.gpu;
        if (!gpu) {
            throw new InitializationError('WebGPU API 不可用', 'unsupported-backend', 'navigator.gpu');
        }
        return { gpu, surface: new CanvasSurface(handle.canvas, gpu) };
    }

    private createDepthTexture(size: SurfaceSize): void {
        const resources = this.requireResources();
        this.depthTexture?.destroy();
        this.depthTexture = resources.device.createTexture({
            label: 'depth_buffer',
            size: { width: size.width, height: size.height },
            format: DEPTH_FORMAT,
            usage: GPUTextureUsage.RENDER_ATTACHMENT,
        });
        this.depthView = this.depthTexture.createView();
    }

    private requireResources(): DeviceResources {
        if (!this.resources) {
            throw new Error(`${this.profile} 后端未初始化`);
        }
        return this.resources;
    }
}
