/**
 * 原生入口（Node 宿主）
 *
 * 退出码: 0 正常退出，1 初始化失败，2 配置无效。
 * GPU 入口由宿主通过 navigator.gpu 注入。
 */

import { createRenderRuntime, type RenderRuntime } from '../core/createRenderRuntime';
import { resolveNativeOptions, resolveRuntimeConfig, type NativeHostOptions } from '../core/config';
import type { RuntimeConfig } from '../core/types';
import { detectHostEnvironment } from '../gpu/BackendSelector';
import { describeError } from '../gpu/errors';
import { NativeEventPump } from './NativeEventPump';
import { NativeWindow } from './NativeWindow';

const EXIT_OK = 0;
const EXIT_INIT_FAILURE = 1;
const EXIT_INVALID_CONFIG = 2;

async function runNative(env: NodeJS.ProcessEnv): Promise<number> {
    let config: RuntimeConfig;
    let nativeOptions: NativeHostOptions;
    try {
        config = resolveRuntimeConfig({ VITE_BACKEND: 'native', ...env });
        nativeOptions = resolveNativeOptions(env);
    } catch (err) {
        console.error(`[native] ${describeError(err)}`);
        return EXIT_INVALID_CONFIG;
    }

    const pump = new NativeEventPump({
        size: { width: nativeOptions.width, height: nativeOptions.height },
        vsync: config.vsync,
        maxFrames: nativeOptions.maxFrames,
    });

    let runtime: RenderRuntime;
    try {
        runtime = createRenderRuntime({ config, host: detectHostEnvironment(), source: pump });
    } catch (err) {
        console.error(`[native] 启动失败: ${describeError(err)}`);
        pump.dispose();
        return EXIT_INIT_FAILURE;
    }

    const window = new NativeWindow(`Triangle (${runtime.demo.title})`, navigator.gpu);
    pump.start(window);

    const result = await runtime.loop.run();
    if (result.exitCode !== EXIT_OK) {
        console.error(`[native] 启动失败: ${describeError(result.error)}`);
        return EXIT_INIT_FAILURE;
    }
    console.info(`[native] 正常退出，${pump.ticksDelivered} 个 tick，共呈现 ${window.presentedFrames} 帧`);
    return EXIT_OK;
}

runNative(process.env)
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.error(`[native] 未处理的错误: ${describeError(err)}`);
        process.exitCode = EXIT_INIT_FAILURE;
    });
