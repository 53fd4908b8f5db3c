/**
 * GPU 数据模块桶导出
 */

export {
    rotationAngle,
    aspectRatio,
    SceneTransform,
} from './transform';

export {
    TRIANGLE_VERTICES,
    TRIANGLE_INDICES,
    SCENE_VERTEX_STRIDE,
    packSceneVertices,
} from './triangle';

export type {
    SceneVertex,
} from './triangle';
