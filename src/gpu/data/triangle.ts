/**
 * 三角形几何
 *
 * 顶点: position vec4<f32> + color vec4<f32>（32 字节），索引 u32，顺时针。
 */

import { SCENE_VERTEX_FLOATS } from '../constants';

export interface SceneVertex {
    position: [number, number, number, number];
    color: [number, number, number, number];
}

export const TRIANGLE_VERTICES: readonly SceneVertex[] = [
    { position: [1.0, -1.0, 0.0, 1.0], color: [1.0, 0.0, 0.0, 1.0] },
    { position: [-1.0, -1.0, 0.0, 1.0], color: [0.0, 1.0, 0.0, 1.0] },
    { position: [0.0, 1.0, 0.0, 1.0], color: [0.0, 0.0, 1.0, 1.0] },
];

export const TRIANGLE_INDICES: readonly number[] = [0, 1, 2];

/** 顶点步长 (bytes) */
export const SCENE_VERTEX_STRIDE = SCENE_VERTEX_FLOATS * 4;

/**
 * 交错打包顶点数据
 */
export function packSceneVertices(vertices: readonly SceneVertex[]): Float32Array<ArrayBuffer> {
    const data = new Float32Array(vertices.length * SCENE_VERTEX_FLOATS);
    vertices.forEach((v, i) => {
        data.set(v.position, i * SCENE_VERTEX_FLOATS);
        data.set(v.color, i * SCENE_VERTEX_FLOATS + 4);
    });
    return data;
}
