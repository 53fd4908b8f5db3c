export { createBackend } from './createBackend';
export { WebGPUBackend } from './WebGPUBackend';
export type { WebGPUProfile } from './WebGPUBackend';
export { WebGLBackend } from './WebGLBackend';
export { nextSessionGeneration } from './types';
export type { FramePass, FrameState, GpuSession, SurfaceBackend, SurfaceOptions } from './types';
