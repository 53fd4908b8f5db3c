/**
 * GPU 模块桶导出
 */

// 后端选择
export {
    detectHostEnvironment,
    getBackendCapabilities,
    resetBackendSelection,
    selectBackend,
} from './BackendSelector';

export type {
    BackendCapabilities,
    HostEnvironment,
} from './BackendSelector';

// 后端变体
export * from './backends';

// 上下文与帧渲染
export { GpuContext } from './GpuContext';
export type { GpuContextStats } from './GpuContext';
export { FrameRenderer } from './FrameRenderer';
export type { FrameReport, FrameRendererOptions } from './FrameRenderer';

// 错误
export { InitializationError, TransientFrameError, describeError } from './errors';
export type { InitializationErrorType, TransientFrameErrorKind } from './errors';

// 常量
export * from './constants';

// 数据模型
export * from './data';

// 渲染管线
export * from './pipelines';
