/**
 * 构建期配置解析
 *
 * 所有变量通过 Vite 的 import.meta.env 注入（需 VITE_ 前缀），
 * 原生入口传入 process.env。运行中不可修改。
 */

import { z } from 'zod';
import { DEFAULT_ANGULAR_VELOCITY } from '../gpu/constants';
import { InitializationError } from '../gpu/errors';
import type { RuntimeConfig } from './types';

const envSchema = z.object({
    VITE_BACKEND: z.enum(['native', 'webgpu', 'webgl']).default('webgpu'),
    VITE_VSYNC: z.enum(['on', 'off']).default('on'),
    VITE_ANGULAR_VELOCITY: z.coerce
        .number()
        .finite('VITE_ANGULAR_VELOCITY must be a finite number')
        .optional(),
});

export type RawEnv = Readonly<Record<string, unknown>>;

/**
 * 解析并冻结运行时配置
 *
 * @throws InitializationError('invalid-config') 如果任一变量非法
 */
export function resolveRuntimeConfig(env: RawEnv): RuntimeConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new InitializationError(`配置无效: ${detail}`, 'invalid-config');
    }

    const { VITE_BACKEND, VITE_VSYNC, VITE_ANGULAR_VELOCITY } = parsed.data;
    return Object.freeze({
        backend: VITE_BACKEND,
        vsync: VITE_VSYNC === 'on',
        angularVelocity: VITE_ANGULAR_VELOCITY ?? DEFAULT_ANGULAR_VELOCITY,
    });
}

// ========== 原生宿主 ==========

const nativeEnvSchema = z.object({
    NATIVE_WIDTH: z.coerce.number().int().positive().default(800),
    NATIVE_HEIGHT: z.coerce.number().int().positive().default(600),
    /** 达到帧数后自动关闭；缺省时运行到 SIGINT */
    NATIVE_MAX_FRAMES: z.coerce.number().int().positive().optional(),
});

export interface NativeHostOptions {
    readonly width: number;
    readonly height: number;
    readonly maxFrames: number | null;
}

/**
 * 解析原生窗口参数（来自 process.env）
 *
 * @throws InitializationError('invalid-config')
 */
export function resolveNativeOptions(env: RawEnv): NativeHostOptions {
    const parsed = nativeEnvSchema.safeParse(env);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new InitializationError(`原生参数无效: ${detail}`, 'invalid-config');
    }
    return Object.freeze({
        width: parsed.data.NATIVE_WIDTH,
        height: parsed.data.NATIVE_HEIGHT,
        maxFrames: parsed.data.NATIVE_MAX_FRAMES ?? null,
    });
}
