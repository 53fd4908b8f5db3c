/**
 * WebGL2 降级后端变体
 *
 * 没有显式的表面配置：canvas 尺寸即绘制缓冲尺寸，呈现由浏览器合成。
 * 上下文丢失映射为 surface-lost；恢复后重建程序对象并重新上传 GUI 纹理。
 */

import type { ClearColor, SurfaceHandle, SurfaceSize } from '../../core/types';
import type { GuiFrameOutput, GuiTexturesDelta, GuiTextureUpload } from '../../gui/types';
import { InitializationError, TransientFrameError, describeError } from '../errors';
import { allowedPresentModes, choosePresentMode } from '../surface';
import { GuiProgram } from '../webgl/GuiProgram';
import { TriangleProgram } from '../webgl/TriangleProgram';
import type { FramePass, FrameState, GpuSession, SurfaceBackend, SurfaceOptions } from './types';
import { nextSessionGeneration } from './types';

interface GLPrograms {
    readonly triangle: TriangleProgram;
    readonly gui: GuiProgram;
}

// ========== 帧 ==========

class WebGLFrame implements FrameState {
    private mvp: Float32Array<ArrayBuffer> = new Float32Array(16);

    constructor(
        readonly index: number,
        readonly size: SurfaceSize,
        private readonly gl: WebGL2RenderingContext,
        private readonly programs: GLPrograms,
        private readonly onTextures: (delta: GuiTexturesDelta) => void
    ) {}

    writeSceneUniforms(mvp: Float32Array<ArrayBuffer>): void {
        this.mvp = mvp;
    }

    beginPass(clearColor: ClearColor): FramePass {
        const { gl, programs, size } = this;
        gl.bindFramebuffer(gl.FRAMEBUFFER, null);
        gl.viewport(0, 0, size.width, size.height);
        gl.disable(gl.SCISSOR_TEST);
        gl.clearColor(clearColor.r, clearColor.g, clearColor.b, clearColor.a);
        gl.clearDepth(1.0);
        gl.depthMask(true);
        gl.clear(gl.COLOR_BUFFER_BIT | gl.DEPTH_BUFFER_BIT);

        return {
            drawScene: () => programs.triangle.draw(this.mvp),
            drawGui: (output: GuiFrameOutput) => {
                this.onTextures(output.texturesDelta);
                programs.gui.draw(output, size);
            },
            end: () => {
                const error = gl.getError();
                if (error !== gl.NO_ERROR) {
                    throw new TransientFrameError(`WebGL 错误 0x${error.toString(16)}`, 'validation');
                }
            },
        };
    }
}

// ========== 后端 ==========

function drawingBufferSize(gl: WebGL2RenderingContext): SurfaceSize {
    return { width: gl.drawingBufferWidth, height: gl.drawingBufferHeight };
}

export class WebGLBackend implements SurfaceBackend {
    readonly profile = 'webgl' as const;
    private canvas: HTMLCanvasElement | null = null;
    private gl: WebGL2RenderingContext | null = null;
    private programs: GLPrograms | null = null;
    private size: SurfaceSize = { width: 0, height: 0 };
    private frameIndex = 0;
    /** 已上传的 GUI 纹理，上下文恢复后重新上传 */
    private readonly uploadedTextures = new Map<number, GuiTextureUpload>();

    private readonly handleContextLost = (event: Event): void => {
        // 阻止默认行为，浏览器才会尝试恢复上下文
        event.preventDefault();
        console.warn('[WebGL] 上下文丢失，等待恢复');
        this.programs = null;
    };

    private readonly handleContextRestored = (): void => {
        const gl = this.gl;
        if (!gl) return;
        try {
            const programs = this.createPrograms(gl);
            programs.gui.updateTextures({ set: [...this.uploadedTextures.values()], free: [] });
            this.programs = programs;
            console.info('[WebGL] 上下文已恢复，程序已重建', { textures: this.uploadedTextures.size });
        } catch (err) {
            console.error(`[WebGL] 上下文恢复后重建失败: ${describeError(err)}`);
        }
    };

    async initialize(handle: SurfaceHandle, size: SurfaceSize, options: SurfaceOptions): Promise<GpuSession> {
        if (handle.kind !== 'canvas') {
            throw new InitializationError('WebGL 后端需要 canvas 句柄', 'unsupported-backend', 'canvas');
        }
        const canvas = handle.canvas;
        canvas.width = size.width;
        canvas.height = size.height;

        const gl = canvas.getContext('webgl2', {
            antialias: false,
            depth: true,
            alpha: false,
            powerPreference: 'high-performance',
        });
        if (!gl) {
            throw new InitializationError('无法创建 WebGL2 上下文', 'no-adapter', 'webgl2');
        }

        // 呈现由浏览器合成器决定，vsync 关闭时同样按 fifo 呈现
        const presentMode = choosePresentMode(
            options.vsync,
            allowedPresentModes(['fifo'], options.supportedPresentModes)
        );

        let programs: GLPrograms;
        try {
            programs = this.createPrograms(gl);
        } catch (err) {
            throw new InitializationError(`WebGL 程序创建失败: ${describeError(err)}`, 'device-failed');
        }

        const maxTextureSize: unknown = gl.getParameter(gl.MAX_TEXTURE_SIZE);
        const maxTextureDimension2D = typeof maxTextureSize === 'number' ? maxTextureSize : 2048;

        canvas.addEventListener('webglcontextlost', this.handleContextLost);
        canvas.addEventListener('webglcontextrestored', this.handleContextRestored);

        this.canvas = canvas;
        this.gl = gl;
        this.programs = programs;
        this.size = drawingBufferSize(gl);

        console.info('[WebGL profile]', {
            renderer: gl.getParameter(gl.RENDERER),
            version: gl.getParameter(gl.VERSION),
            maxTextureDimension2D,
            presentMode,
        });

        return Object.freeze({
            generation: nextSessionGeneration(),
            profile: this.profile,
            format: 'rgba8unorm',
            presentMode,
            maxTextureDimension2D,
        });
    }

    resize(size: SurfaceSize): void {
        const canvas = this.requireCanvas();
        canvas.width = size.width;
        canvas.height = size.height;
        // 浏览器可能按自身上限缩小绘制缓冲，以实际尺寸为准
        this.size = this.gl ? drawingBufferSize(this.gl) : size;
    }

    acquireFrame(): FrameState {
        const gl = this.gl;
        if (!gl) {
            throw new Error('webgl 后端未初始化');
        }
        const programs = this.programs;
        if (gl.isContextLost() || !programs) {
            throw new TransientFrameError('WebGL 上下文已丢失', 'surface-lost');
        }
        if (gl.drawingBufferWidth !== this.size.width || gl.drawingBufferHeight !== this.size.height) {
            throw new TransientFrameError(
                `绘制缓冲 ${gl.drawingBufferWidth}×${gl.drawingBufferHeight} 与配置 ${this.size.width}×${this.size.height} 不一致`,
                'outdated'
            );
        }

        this.frameIndex++;
        return new WebGLFrame(this.frameIndex, this.size, gl, programs, (delta) => this.recordTextures(delta));
    }

    present(frame: FrameState): void {
        if (!(frame instanceof WebGLFrame)) {
            throw new Error('帧不属于 WebGL 后端');
        }
        this.gl?.flush();
    }

    discard(_frame: FrameState): void {}

    releaseSession(): void {
        const gl = this.gl;
        if (this.programs && gl && !gl.isContextLost()) {
            this.programs.triangle.destroy();
            this.programs.gui.destroy();
        }
        this.programs = null;
        this.gl = null;
        this.uploadedTextures.clear();
    }

    releaseSurface(): void {
        const canvas = this.canvas;
        if (!canvas) return;
        canvas.removeEventListener('webglcontextlost', this.handleContextLost);
        canvas.removeEventListener('webglcontextrestored', this.handleContextRestored);
        this.canvas = null;
    }

    private recordTextures(delta: GuiTexturesDelta): void {
        delta.set.forEach((upload) => this.uploadedTextures.set(upload.id, upload));
        delta.free.forEach((id) => this.uploadedTextures.delete(id));
    }

    private createPrograms(gl: WebGL2RenderingContext): GLPrograms {
        return {
            triangle: new TriangleProgram(gl),
            gui: new GuiProgram(gl),
        };
    }

    private requireCanvas(): HTMLCanvasElement {
        if (!this.canvas) {
            throw new Error('webgl 后端未初始化');
        }
        return this.canvas;
    }
}
