/**
 * 即时模式 GUI 上下文
 *
 * - pushInput: 平台无关输入排队（复制）
 * - run: 按到达顺序应用输入 → 运行构建函数 → 细分输出
 *
 * 控件树每帧重建；跨帧只保留窗口位置、拖拽与指针状态。
 * 相同的输入序列产生相同的输出。
 */

import type { Point2, Rect } from '../core/types';
import { getDefaultFont, type FontAtlas } from './font';
import { FrameInput, InputState } from './input';
import { GUI_COLORS, GUI_STYLE } from './style';
import { tessellate } from './tessellate';
import type { GuiFrameOutput, GuiInputEvent, GuiLayer, GuiShape, GuiTexturesDelta, GuiTextureUpload, ScreenDescriptor } from './types';
import { Ui } from './Ui';

interface DragState {
    readonly id: string;
    readonly offset: Point2;
}

/** 跨帧的窗口状态 */
interface WindowRegistry {
    readonly positions: Map<string, Point2>;
    drag: DragState | null;
}

// ========== GuiFrame ==========

/**
 * 一帧的构建入口：面板依次占用屏幕边缘，窗口浮在面板之上
 */
export class GuiFrame {
    readonly screenRect: Rect;
    private available: Rect;
    private readonly background: GuiLayer[] = [];
    private readonly foreground: GuiLayer[] = [];

    constructor(
        readonly input: FrameInput,
        private readonly font: FontAtlas,
        private readonly windows: WindowRegistry,
        screen: ScreenDescriptor
    ) {
        this.screenRect = {
            x: 0,
            y: 0,
            width: screen.sizeInPixels.width / screen.pixelsPerPoint,
            height: screen.sizeInPixels.height / screen.pixelsPerPoint,
        };
        this.available = this.screenRect;
    }

    /** 绘制顺序：面板在下，窗口在上 */
    get layers(): GuiLayer[] {
        return [...this.background, ...this.foreground];
    }

    // ========== 面板 ==========

    topPanel(build: (ui: Ui) => void): void {
        const { x, y, width, height } = this.available;
        const h = Math.min(GUI_STYLE.barPanelHeight, height);
        this.available = { x, y: y + h, width, height: height - h };
        this.panel({ x, y, width, height: h }, build);
    }

    bottomPanel(build: (ui: Ui) => void): void {
        const { x, y, width, height } = this.available;
        const h = Math.min(GUI_STYLE.barPanelHeight, height);
        this.available = { x, y, width, height: height - h };
        this.panel({ x, y: y + height - h, width, height: h }, build);
    }

    leftPanel(build: (ui: Ui) => void): void {
        const { x, y, width, height } = this.available;
        const w = Math.min(GUI_STYLE.sidePanelWidth, width);
        this.available = { x: x + w, y, width: width - w, height };
        this.panel({ x, y, width: w, height }, build);
    }

    rightPanel(build: (ui: Ui) => void): void {
        const { x, y, width, height } = this.available;
        const w = Math.min(GUI_STYLE.sidePanelWidth, width);
        this.available = { x, y, width: width - w, height };
        this.panel({ x: x + width - w, y, width: w, height }, build);
    }

    // ========== 窗口 ==========

    /**
     * 可拖拽的浮动窗口，以标题为 id；高度随内容
     */
    window(title: string, build: (ui: Ui) => void): void {
        const width = GUI_STYLE.windowWidth;
        const titleHeight = GUI_STYLE.titleBarHeight;
        const pad = GUI_STYLE.padding;

        let position = this.windows.positions.get(title) ?? this.defaultWindowPosition();
        const press = this.input.pressedIn({ ...position, width, height: titleHeight });
        if (press && !this.windows.drag) {
            this.windows.drag = { id: title, offset: { x: press.x - position.x, y: press.y - position.y } };
        }
        const drag = this.windows.drag;
        if (drag && drag.id === title) {
            if (this.input.pointer) {
                position = this.clampWindow({
                    x: this.input.pointer.x - drag.offset.x,
                    y: this.input.pointer.y - drag.offset.y,
                });
            }
            if (!this.input.down) {
                this.windows.drag = null;
            }
        }
        this.windows.positions.set(title, position);

        const shapes: GuiShape[] = [];
        const content = new Ui(
            this.input,
            this.font,
            {
                x: position.x + pad,
                y: position.y + titleHeight + pad,
                width: width - 2 * pad,
                height: Math.max(0, this.screenRect.height - position.y - titleHeight - 2 * pad),
            },
            shapes
        );
        build(content);

        const rect: Rect = {
            x: position.x,
            y: position.y,
            width,
            height: titleHeight + 2 * pad + content.contentSize.height,
        };
        this.foreground.push({
            clipRect: rect,
            shapes: [
                { kind: 'rect', rect, color: GUI_COLORS.window },
                { kind: 'rect', rect: { ...position, width, height: titleHeight }, color: GUI_COLORS.titleBar },
                {
                    kind: 'text',
                    x: position.x + pad,
                    y: position.y + (titleHeight - this.font.glyphHeight * GUI_STYLE.textScale) / 2,
                    text: title,
                    scale: GUI_STYLE.textScale,
                    color: GUI_COLORS.heading,
                },
                ...shapes,
            ],
        });
    }

    private panel(rect: Rect, build: (ui: Ui) => void): void {
        const pad = GUI_STYLE.padding;
        const shapes: GuiShape[] = [{ kind: 'rect', rect, color: GUI_COLORS.panel }];
        const ui = new Ui(
            this.input,
            this.font,
            {
                x: rect.x + pad,
                y: rect.y + pad,
                width: Math.max(0, rect.width - 2 * pad),
                height: Math.max(0, rect.height - 2 * pad),
            },
            shapes
        );
        build(ui);
        this.background.push({ clipRect: rect, shapes });
    }

    private defaultWindowPosition(): Point2 {
        const cascade = this.windows.positions.size * 24;
        return this.clampWindow({ x: 24 + cascade, y: 64 + cascade });
    }

    /** 标题栏始终留在屏幕内 */
    private clampWindow(position: Point2): Point2 {
        const maxX = Math.max(0, this.screenRect.width - GUI_STYLE.windowWidth);
        const maxY = Math.max(0, this.screenRect.height - GUI_STYLE.titleBarHeight);
        return {
            x: Math.min(Math.max(position.x, 0), maxX),
            y: Math.min(Math.max(position.y, 0), maxY),
        };
    }
}

// ========== GuiContext ==========

export class GuiContext {
    private readonly queue: GuiInputEvent[] = [];
    private readonly inputState = new InputState();
    private readonly windows: WindowRegistry = { positions: new Map(), drag: null };
    private fontUploaded = false;
    /** 未送达 GPU 的纹理增量，随下一帧重发 */
    private undeliveredSet: GuiTextureUpload[] = [];
    private undeliveredFree: number[] = [];

    constructor(private readonly font: FontAtlas = getDefaultFont()) {}

    pushInput(event: GuiInputEvent): void {
        this.queue.push({ ...event });
    }

    /**
     * 运行一帧
     */
    run(screen: ScreenDescriptor, build: (gui: GuiFrame) => void): GuiFrameOutput {
        const events = this.queue.splice(0, this.queue.length);
        const input = this.inputState.consume(events);

        const frame = new GuiFrame(input, this.font, this.windows, screen);
        build(frame);

        const layers = frame.layers;
        const { vertices, indices, drawCalls } = tessellate(layers, this.font);

        const set = this.undeliveredSet;
        const free = this.undeliveredFree;
        this.undeliveredSet = [];
        this.undeliveredFree = [];
        if (!this.fontUploaded) {
            set.push(this.font.toUpload());
            this.fontUploaded = true;
        }

        return {
            screen,
            vertices,
            indices,
            drawCalls,
            texturesDelta: { set, free },
        };
    }

    /**
     * 帧被跳过时归还其纹理增量，下一帧重发
     *
     * 重复上传与重复释放都是幂等的。
     */
    restoreTexturesDelta(delta: GuiTexturesDelta): void {
        const pendingIds = new Set(this.undeliveredSet.map((upload) => upload.id));
        for (const upload of delta.set) {
            if (!pendingIds.has(upload.id)) this.undeliveredSet.push(upload);
        }
        this.undeliveredFree.push(...delta.free);
    }
}
