/**
 * 场景变换 — 旋转角与 MVP 矩阵
 *
 * 旋转角每帧由绝对流逝时间重新计算，不做增量累加，
 * 长时间运行也不会积累浮点漂移。
 */

import { mat4 } from 'gl-matrix';
import type { DepthRange } from '../../core/types';
import { CAMERA_EYE, FOV_Y, Z_FAR, Z_NEAR } from '../constants';

const TWO_PI = Math.PI * 2;
const ORIGIN: readonly [number, number, number] = [0, 0, 0];
const UP: readonly [number, number, number] = [0, 1, 0];

/**
 * angle = (elapsed × ω) mod 2π，结果落在 [0, 2π)
 */
export function rotationAngle(elapsedSeconds: number, angularVelocity: number): number {
    const raw = (elapsedSeconds * angularVelocity) % TWO_PI;
    return raw < 0 ? raw + TWO_PI : raw;
}

/**
 * 场景 MVP 计算器
 *
 * 深度范围在构造时选定（WebGPU 0..1，WebGL -1..1），逐帧不再分支。
 */
export class SceneTransform {
    private readonly perspective: typeof mat4.perspectiveZO;
    private readonly projection = new Float32Array(16);
    private readonly view = new Float32Array(16);
    private readonly model = new Float32Array(16);
    private readonly mvp = new Float32Array(16);

    constructor(depthRange: DepthRange) {
        this.perspective = depthRange === 'zero-to-one' ? mat4.perspectiveZO : mat4.perspectiveNO;
        mat4.lookAt(this.view, CAMERA_EYE, ORIGIN, UP);
    }

    /**
     * projection × view × rotateY(angle)
     *
     * 返回内部缓冲，下一次调用前有效。
     */
    compute(angle: number, aspect: number): Float32Array<ArrayBuffer> {
        this.perspective(this.projection, FOV_Y, aspect, Z_NEAR, Z_FAR);
        mat4.fromYRotation(this.model, angle);
        mat4.multiply(this.mvp, this.projection, this.view);
        mat4.multiply(this.mvp, this.mvp, this.model);
        return this.mvp;
    }
}

/** 宽高比，高度为零时按 1 处理 */
export function aspectRatio(width: number, height: number): number {
    return width / Math.max(height, 1);
}
