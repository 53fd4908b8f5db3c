/**
 * 按 Backend Profile 构造后端变体（启动时调用一次）
 */

import type { BackendProfile } from '../../core/types';
import type { SurfaceBackend } from './types';
import { WebGLBackend } from './WebGLBackend';
import { WebGPUBackend } from './WebGPUBackend';

export function createBackend(profile: BackendProfile): SurfaceBackend {
    switch (profile) {
        case 'native':
        case 'webgpu':
            return new WebGPUBackend(profile);
        case 'webgl':
            return new WebGLBackend();
    }
}
