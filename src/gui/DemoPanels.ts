/**
 * 演示界面
 *
 * 一个以后端命名的浮动窗口，带 "Show Panels" 复选框；
 * 勾选后显示上/下/左/右四个面板。
 */

import { eventBus, type EventBus } from '../core/EventBus';
import type { BackendProfile } from '../core/types';
import type { GuiFrame } from './GuiContext';

const BACKEND_TITLES: Record<BackendProfile, string> = {
    native: 'Native',
    webgpu: 'WebGPU',
    webgl: 'WebGL',
};

export class DemoPanels {
    private _showPanels = false;
    readonly title: string;

    constructor(
        backend: BackendProfile,
        private readonly bus: EventBus = eventBus
    ) {
        this.title = BACKEND_TITLES[backend];
    }

    get showPanels(): boolean {
        return this._showPanels;
    }

    /** GUI 构建函数，每帧调用 */
    build(gui: GuiFrame): void {
        if (this._showPanels) {
            gui.topPanel((ui) => {
                ui.horizontal((row) => {
                    if (row.button('File')) this.clicked('file');
                    if (row.button('Edit')) this.clicked('edit');
                });
            });
            gui.bottomPanel((ui) => {
                ui.label('Assets');
            });
            gui.leftPanel((ui) => {
                ui.heading('Scene Explorer');
                if (ui.button('Click me!')) this.clicked('scene-explorer');
            });
            gui.rightPanel((ui) => {
                ui.heading('Inspector');
                if (ui.button('Click me!')) this.clicked('inspector');
            });
        }

        gui.window(this.title, (ui) => {
            this._showPanels = ui.checkbox(this._showPanels, 'Show Panels');
        });
    }

    private clicked(id: string): void {
        console.info(`[DemoPanels] 按钮被点击: ${id}`);
        this.bus.emit('gui:button-clicked', { id });
    }
}
