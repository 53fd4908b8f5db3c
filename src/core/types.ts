/**
 * 渲染宿主 - 核心类型定义
 */

// ============== 后端与配置 ==============

/** 图形后端（构建期选定，进程/页面生命周期内不可变） */
export type BackendProfile = 'native' | 'webgpu' | 'webgl';

/** 呈现模式 */
export type PresentMode = 'fifo' | 'mailbox' | 'immediate';

/** 裁剪空间深度范围 */
export type DepthRange = 'zero-to-one' | 'negative-one-to-one';

/** 运行时配置（构建期解析，运行中不可修改） */
export interface RuntimeConfig {
    readonly backend: BackendProfile;
    readonly vsync: boolean;
    /** 三角形角速度 (rad/s) */
    readonly angularVelocity: number;
}

// ============== 几何 ==============

/** 像素尺寸 */
export interface SurfaceSize {
    readonly width: number;
    readonly height: number;
}

/** 逻辑坐标点（GUI 单位 point） */
export interface Point2 {
    readonly x: number;
    readonly y: number;
}

/** 轴对齐矩形（point） */
export interface Rect {
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
}

/** 清屏颜色 */
export interface ClearColor {
    readonly r: number;
    readonly g: number;
    readonly b: number;
    readonly a: number;
}

// ============== 平台事件 ==============

export type PointerButton = 'primary' | 'secondary' | 'middle';

export interface KeyModifiers {
    readonly shift: boolean;
    readonly ctrl: boolean;
    readonly alt: boolean;
    readonly meta: boolean;
}

/**
 * 平台无关事件流（按时间顺序投递）
 *
 * 指针坐标单位为 point（CSS 像素 / 物理像素除以 pixelsPerPoint）。
 */
export type PlatformEvent =
    | { readonly type: 'ready'; readonly handle: SurfaceHandle; readonly size: SurfaceSize; readonly pixelsPerPoint: number }
    | { readonly type: 'resize'; readonly size: SurfaceSize; readonly pixelsPerPoint: number }
    | { readonly type: 'redraw-requested'; readonly timestamp: number }
    | { readonly type: 'visibility'; readonly visible: boolean }
    | { readonly type: 'close' }
    | { readonly type: 'pointer-move'; readonly position: Point2 }
    | { readonly type: 'pointer-button'; readonly button: PointerButton; readonly pressed: boolean; readonly position: Point2 }
    | { readonly type: 'scroll'; readonly delta: Point2 }
    | { readonly type: 'key'; readonly key: string; readonly pressed: boolean; readonly modifiers: KeyModifiers };

export type PlatformEventType = PlatformEvent['type'];

/**
 * 平台事件源 — "下一个事件或下一帧 tick" 的拉取接口
 *
 * 原生（OS 消息泵）与 Web（animation frame 回调）都实现此接口，
 * RunLoop 状态机不感知具体平台。
 */
export interface PlatformSource {
    /** 等待下一个平台事件 */
    next(): Promise<PlatformEvent>;
    /** 请求一次 redraw tick，平台在下一个时机投递 'redraw-requested' */
    requestRedraw(): void;
    /** 释放监听器与定时器 */
    dispose(): void;
}

/** 单调时钟（毫秒） */
export interface Clock {
    now(): number;
}

// ============== 表面句柄 ==============

/**
 * WebGPU 系后端的呈现表面
 *
 * 浏览器由 canvas context 实现，原生由宿主窗口提供。
 */
export interface PresentationSurface {
    /** 表面支持的格式（按偏好排序） */
    readonly formats: readonly GPUTextureFormat[];
    /** 表面支持的呈现模式 */
    readonly presentModes: readonly PresentMode[];
    configure(config: PresentationSurfaceConfig): void;
    unconfigure(): void;
    /** 获取下一张可呈现纹理；失败时抛出 TransientFrameError 或 DOMException */
    getCurrentTexture(): GPUTexture;
    /** 提交后呈现当前纹理 */
    present(): void;
    /** 放弃当前纹理，不呈现 */
    discard(): void;
}

export interface PresentationSurfaceConfig {
    readonly device: GPUDevice;
    readonly format: GPUTextureFormat;
    readonly size: SurfaceSize;
    readonly presentMode: PresentMode;
}

/** 宿主提供的原生窗口（核心只消费，不构造） */
export interface NativeWindowHandle {
    readonly title: string;
    /** 宿主注入的 GPU 入口（例如 Dawn 绑定） */
    readonly gpu: GPU;
    createSurface(): PresentationSurface;
}

export type SurfaceHandle =
    | { readonly kind: 'canvas'; readonly canvas: HTMLCanvasElement }
    | { readonly kind: 'native'; readonly window: NativeWindowHandle };

// ============== 运行循环 ==============

export type LoopState = 'uninitialized' | 'running' | 'suspended' | 'terminated';

export type FrameSkipReason = 'zero-size' | 'surface-lost' | 'outdated' | 'timeout' | 'validation' | 'cancelled';

// ============== 事件总线 ==============

/** 事件映射表 */
export interface EventMap {
    'loop:state': { from: LoopState; to: LoopState };
    'frame:presented': { frameIndex: number; angle: number; elapsedSeconds: number };
    'frame:skipped': { reason: FrameSkipReason; message?: string };
    'gpu:device-lost': { reason: string; message: string };
    'gui:button-clicked': { id: string };
}
