/**
 * GPU 全局常量
 *
 * 所有数值均为构建期常量，不可运行时修改。
 */

import type { ClearColor, PresentMode } from '../core/types';

// ========== 场景 ==========

/** 默认角速度 (rad/s) — 30°/s */
export const DEFAULT_ANGULAR_VELOCITY = Math.PI / 6;

/** 清屏颜色 */
export const CLEAR_COLOR: ClearColor = { r: 0.19, g: 0.24, b: 0.42, a: 1.0 };

/** 垂直视场角 (rad) — 80° */
export const FOV_Y = (80 * Math.PI) / 180;

export const Z_NEAR = 0.1;
export const Z_FAR = 1000;

/** 相机位置（看向原点，Y 轴向上） */
export const CAMERA_EYE: readonly [number, number, number] = [0, 0, 3];

// ========== 表面 ==========

/** 深度缓冲格式 */
export const DEPTH_FORMAT: GPUTextureFormat = 'depth32float';

/** 最大帧延迟（原生离屏表面的纹理环大小） */
export const MAX_FRAME_LATENCY = 2;

/** vsync 开启时的呈现模式偏好 */
export const VSYNC_PRESENT_MODES: readonly PresentMode[] = ['fifo'];

/** vsync 关闭时的呈现模式偏好 */
export const NO_VSYNC_PRESENT_MODES: readonly PresentMode[] = ['immediate', 'mailbox'];

// ========== 设备限制 ==========

/** WebGPU / 原生默认 2D 纹理上限 */
export const DEFAULT_MAX_TEXTURE_DIMENSION = 8192;

/** WebGL2 降级上限（实际以 context 报告值为准） */
export const DOWNLEVEL_MAX_TEXTURE_DIMENSION = 2048;

// ========== 缓冲布局 ==========

/** 场景 uniform: mat4x4<f32> */
export const SCENE_UNIFORM_BYTES = 64;

/** 三角形顶点: position vec4 + color vec4 */
export const SCENE_VERTEX_FLOATS = 8;

/** GUI 顶点: pos vec2 + uv vec2 + color vec4 */
export const GUI_VERTEX_FLOATS = 8;

/** GUI uniform: screen_size vec2 + padding */
export const GUI_UNIFORM_BYTES = 16;
