import { type BackendCapabilities, type HostEnvironment, selectBackend } from '../gpu/BackendSelector';
import { createBackend } from '../gpu/backends/createBackend';
import type { SurfaceBackend } from '../gpu/backends/types';
import { FrameRenderer } from '../gpu/FrameRenderer';
import { GpuContext } from '../gpu/GpuContext';
import { DemoPanels, GuiContext } from '../gui';
import { eventBus, type EventBus } from './EventBus';
import { RunLoop } from './RunLoop';
import type { Clock, PlatformSource, RuntimeConfig } from './types';

export interface RenderRuntime {
    capabilities: BackendCapabilities;
    gpu: GpuContext;
    gui: GuiContext;
    demo: DemoPanels;
    loop: RunLoop;
}

export interface RenderRuntimeOptions {
    config: RuntimeConfig;
    host: HostEnvironment;
    source: PlatformSource;
    clock?: Clock;
    bus?: EventBus;
    /** 测试中替换后端变体 */
    backend?: SurfaceBackend;
}

const performanceClock: Clock = {
    now: () => performance.now(),
};

/**
 * 组装一次运行：选择后端 → GPU 上下文 → 帧渲染器 → GUI → 运行循环
 *
 * @throws InitializationError('unsupported-backend') 宿主不满足所选后端
 */
export function createRenderRuntime(options: RenderRuntimeOptions): RenderRuntime {
    const { config, host, source } = options;
    const bus = options.bus ?? eventBus;

    const capabilities = selectBackend(config, host);
    const gpu = new GpuContext(options.backend ?? createBackend(capabilities.profile), capabilities);
    const renderer = new FrameRenderer(gpu, {
        depthRange: capabilities.depthRange,
        angularVelocity: config.angularVelocity,
        bus,
    });
    const gui = new GuiContext();
    const demo = new DemoPanels(capabilities.profile, bus);

    const loop = new RunLoop({
        source,
        gpu,
        renderer,
        gui,
        buildGui: (frame) => demo.build(frame),
        clock: options.clock ?? performanceClock,
        vsync: config.vsync,
        bus,
    });

    return { capabilities, gpu, gui, demo, loop };
}
