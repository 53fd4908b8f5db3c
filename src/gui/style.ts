/**
 * GUI 样式常量 (point)
 */

import type { Rgba } from './types';

export const GUI_STYLE = {
    textScale: 2,
    headingScale: 3,
    padding: 8,
    itemSpacing: 6,
    buttonPaddingX: 8,
    buttonPaddingY: 4,
    checkboxSize: 14,
    titleBarHeight: 26,
    windowWidth: 240,
    sidePanelWidth: 270,
    /** 顶部/底部面板高度：一行按钮 + 上下内边距 */
    barPanelHeight: 38,
} as const;

export const GUI_COLORS = {
    panel: [0.106, 0.106, 0.106, 0.96],
    window: [0.106, 0.106, 0.106, 0.96],
    titleBar: [0.2, 0.2, 0.2, 1],
    text: [0.85, 0.85, 0.85, 1],
    heading: [1, 1, 1, 1],
    widget: [0.235, 0.235, 0.235, 1],
    widgetHovered: [0.275, 0.275, 0.275, 1],
    widgetActive: [0.345, 0.345, 0.345, 1],
    accent: [0.35, 0.6, 0.95, 1],
} as const satisfies Record<string, Rgba>;
