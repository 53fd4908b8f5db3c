import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventBus } from '../core/EventBus';
import { DemoPanels } from './DemoPanels';
import { GuiContext } from './GuiContext';
import type { GuiInputEvent, ScreenDescriptor } from './types';

const SCREEN: ScreenDescriptor = { sizeInPixels: { width: 800, height: 600 }, pixelsPerPoint: 1 };

function click(x: number, y: number): GuiInputEvent[] {
    return [
        { type: 'pointer-button', button: 'primary', pressed: true, position: { x, y } },
        { type: 'pointer-button', button: 'primary', pressed: false, position: { x, y } },
    ];
}

describe('DemoPanels', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('窗口以后端命名，默认只显示窗口', () => {
        const demo = new DemoPanels('webgl', new EventBus());
        const out = new GuiContext().run(SCREEN, (gui) => demo.build(gui));

        expect(demo.title).toBe('WebGL');
        expect(demo.showPanels).toBe(false);
        expect(out.drawCalls).toHaveLength(1);
    });

    it('勾选 Show Panels 后显示四个面板', () => {
        const demo = new DemoPanels('webgpu', new EventBus());
        const gui = new GuiContext();

        // 复选框位于窗口内容起点 (32, 98)
        click(40, 104).forEach((event) => gui.pushInput(event));
        gui.run(SCREEN, (frame) => demo.build(frame));
        expect(demo.showPanels).toBe(true);

        const out = gui.run(SCREEN, (frame) => demo.build(frame));
        expect(out.drawCalls.map((call) => call.clipRect)).toEqual([
            { x: 0, y: 0, width: 800, height: 38 },
            { x: 0, y: 562, width: 800, height: 38 },
            { x: 0, y: 38, width: 270, height: 524 },
            { x: 530, y: 38, width: 270, height: 524 },
            { x: 24, y: 64, width: 240, height: 56 },
        ]);
    });

    it('侧边面板按钮点击时发布事件', () => {
        const bus = new EventBus();
        const clicked = vi.fn();
        bus.on('gui:button-clicked', clicked);
        const demo = new DemoPanels('native', bus);
        const gui = new GuiContext();

        click(40, 104).forEach((event) => gui.pushInput(event));
        gui.run(SCREEN, (frame) => demo.build(frame));

        // 左侧面板：标题 21 高，按钮从 y = 46 + 21 + 6 = 73 开始
        click(20, 80).forEach((event) => gui.pushInput(event));
        gui.run(SCREEN, (frame) => demo.build(frame));

        expect(clicked).toHaveBeenCalledTimes(1);
        expect(clicked).toHaveBeenCalledWith({ id: 'scene-explorer' });
    });
});
