/**
 * 错误分类
 *
 * - InitializationError: 致命，启动阶段报告一次后终止
 * - TransientFrameError: 单帧可恢复（重配置 / 跳帧），循环继续
 *
 * 零面积 resize 不是错误，由 GpuContext 推迟处理。
 */

export type InitializationErrorType =
    | 'invalid-config'
    | 'unsupported-backend'
    | 'no-adapter'
    | 'device-failed'
    | 'surface-configuration'
    | 'device-lost';

/** 初始化错误，携带结构化错误类型与缺失能力 */
export class InitializationError extends Error {
    constructor(
        message: string,
        public readonly errorType: InitializationErrorType,
        public readonly missingCapability?: string
    ) {
        super(message);
        this.name = 'InitializationError';
    }
}

export type TransientFrameErrorKind = 'surface-lost' | 'outdated' | 'timeout' | 'validation';

/** 单帧瞬时错误 */
export class TransientFrameError extends Error {
    constructor(
        message: string,
        public readonly kind: TransientFrameErrorKind
    ) {
        super(message);
        this.name = 'TransientFrameError';
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
