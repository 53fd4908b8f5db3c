/**
 * 布局区域与控件
 *
 * 每个 Ui 在一个矩形内按方向（纵向/横向）顺序分配控件，
 * 形状写入所属图层；控件的交互在分配时立即判定（immediate mode）。
 */

import type { Rect } from '../core/types';
import type { FontAtlas } from './font';
import type { FrameInput } from './input';
import { GUI_COLORS, GUI_STYLE } from './style';
import type { GuiShape, Rgba } from './types';

export type UiDirection = 'vertical' | 'horizontal';

export class Ui {
    private cursorX: number;
    private cursorY: number;
    private usedWidth = 0;
    private usedHeight = 0;
    private itemCount = 0;

    constructor(
        private readonly input: FrameInput,
        private readonly font: FontAtlas,
        readonly rect: Rect,
        private readonly shapes: GuiShape[],
        readonly direction: UiDirection = 'vertical'
    ) {
        this.cursorX = rect.x;
        this.cursorY = rect.y;
    }

    /** 已占用的内容尺寸 */
    get contentSize(): { width: number; height: number } {
        return { width: this.usedWidth, height: this.usedHeight };
    }

    // ========== 控件 ==========

    label(text: string): void {
        this.text(text, GUI_STYLE.textScale, GUI_COLORS.text);
    }

    heading(text: string): void {
        this.text(text, GUI_STYLE.headingScale, GUI_COLORS.heading);
    }

    /**
     * 按钮；按下与释放都在按钮内的那一帧返回 true
     */
    button(text: string): boolean {
        const size = this.font.measure(text, GUI_STYLE.textScale);
        const rect = this.allocate(
            size.width + 2 * GUI_STYLE.buttonPaddingX,
            size.height + 2 * GUI_STYLE.buttonPaddingY
        );

        const clicked = this.input.clicked(rect);
        this.shapes.push({ kind: 'rect', rect, color: this.widgetColor(rect) });
        this.shapes.push({
            kind: 'text',
            x: rect.x + GUI_STYLE.buttonPaddingX,
            y: rect.y + GUI_STYLE.buttonPaddingY,
            text,
            scale: GUI_STYLE.textScale,
            color: GUI_COLORS.text,
        });
        return clicked;
    }

    /**
     * 复选框；返回本帧之后的勾选状态
     */
    checkbox(checked: boolean, text: string): boolean {
        const box = GUI_STYLE.checkboxSize;
        const textSize = this.font.measure(text, GUI_STYLE.textScale);
        const rect = this.allocate(box + GUI_STYLE.itemSpacing + textSize.width, Math.max(box, textSize.height));

        const next = this.input.clicked(rect) ? !checked : checked;
        const boxRect: Rect = { x: rect.x, y: rect.y, width: box, height: box };
        this.shapes.push({ kind: 'rect', rect: boxRect, color: this.widgetColor(rect) });
        if (next) {
            this.shapes.push({
                kind: 'rect',
                rect: { x: rect.x + 3, y: rect.y + 3, width: box - 6, height: box - 6 },
                color: GUI_COLORS.accent,
            });
        }
        this.shapes.push({
            kind: 'text',
            x: rect.x + box + GUI_STYLE.itemSpacing,
            y: rect.y,
            text,
            scale: GUI_STYLE.textScale,
            color: GUI_COLORS.text,
        });
        return next;
    }

    /**
     * 横向排列一组控件
     */
    horizontal(build: (ui: Ui) => void): void {
        const origin = this.peek();
        const child = new Ui(
            this.input,
            this.font,
            { x: origin.x, y: origin.y, width: this.rect.x + this.rect.width - origin.x, height: this.rect.y + this.rect.height - origin.y },
            this.shapes,
            'horizontal'
        );
        build(child);
        const used = child.contentSize;
        this.allocate(used.width, used.height);
    }

    // ========== 布局 ==========

    /** 分配一个控件矩形并推进游标 */
    allocate(width: number, height: number): Rect {
        const origin = this.peek();
        const rect: Rect = { x: origin.x, y: origin.y, width, height };

        if (this.direction === 'vertical') {
            this.cursorY = origin.y + height;
            this.usedWidth = Math.max(this.usedWidth, width);
            this.usedHeight = this.cursorY - this.rect.y;
        } else {
            this.cursorX = origin.x + width;
            this.usedWidth = this.cursorX - this.rect.x;
            this.usedHeight = Math.max(this.usedHeight, height);
        }
        this.itemCount++;
        return rect;
    }

    /** 下一个控件的左上角（含控件间距） */
    private peek(): { x: number; y: number } {
        const gap = this.itemCount > 0 ? GUI_STYLE.itemSpacing : 0;
        return this.direction === 'vertical'
            ? { x: this.rect.x, y: this.cursorY + gap }
            : { x: this.cursorX + gap, y: this.rect.y };
    }

    private text(text: string, scale: number, color: Rgba): void {
        const size = this.font.measure(text, scale);
        const rect = this.allocate(size.width, size.height);
        this.shapes.push({ kind: 'text', x: rect.x, y: rect.y, text, scale, color });
    }

    private widgetColor(rect: Rect): Rgba {
        if (this.input.held(rect)) return GUI_COLORS.widgetActive;
        if (this.input.hovered(rect)) return GUI_COLORS.widgetHovered;
        return GUI_COLORS.widget;
    }
}
