/**
 * 渲染宿主 - 浏览器入口
 *
 * 构建期配置 → 后端选择 → 运行循环；任何初始化错误都显示在页面上。
 */

import { resolveRuntimeConfig } from './core/config';
import { createRenderRuntime, type RenderRuntime } from './core/createRenderRuntime';
import { eventBus } from './core/EventBus';
import { InitializationError, describeError, detectHostEnvironment } from './gpu';
import { CanvasEventSource } from './platform/CanvasEventSource';

function showDiagnostic(err: unknown): void {
    const panel = document.getElementById('diagnostic');
    const title = err instanceof InitializationError ? `初始化失败 (${err.errorType})` : '运行失败';
    const detail = err instanceof InitializationError && err.missingCapability
        ? `\n缺少: ${err.missingCapability}`
        : '';
    if (!panel) {
        console.error(`[main] ${title}: ${describeError(err)}`);
        return;
    }
    panel.textContent = `${title}\n\n${describeError(err)}${detail}`;
    panel.style.display = 'flex';
}

async function initializeApp(): Promise<void> {
    const canvas = document.getElementById('canvas');
    if (!(canvas instanceof HTMLCanvasElement)) {
        showDiagnostic(new Error('页面缺少 #canvas 元素'));
        return;
    }

    let runtime: RenderRuntime;
    const source = new CanvasEventSource(canvas);
    try {
        const config = resolveRuntimeConfig(import.meta.env);
        runtime = createRenderRuntime({ config, host: detectHostEnvironment(), source });
    } catch (err) {
        console.error(`[main] ${describeError(err)}`);
        showDiagnostic(err);
        return;
    }

    document.title = `Triangle (${runtime.demo.title})`;
    eventBus.on('gpu:device-lost', ({ message }) => {
        console.error(`[main] GPU 设备丢失: ${message}`);
    });

    source.start();
    const result = await runtime.loop.run();
    if (result.exitCode !== 0) {
        showDiagnostic(result.error);
    }
}

// 启动
document.addEventListener('DOMContentLoaded', () => {
    void initializeApp();
});
