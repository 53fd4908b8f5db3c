/**
 * GUI 输入状态
 *
 * 每帧按到达顺序消费排队的输入，得到该帧的指针快照：
 * 最终位置、本帧按下点、本帧完成的点击（按下点 + 释放点）。
 * 按下可以发生在之前的帧，释放时才形成点击。
 */

import type { Point2, Rect } from '../core/types';
import type { GuiInputEvent } from './types';

export interface Click {
    readonly press: Point2;
    readonly release: Point2;
}

export function containsPoint(rect: Rect, point: Point2): boolean {
    return point.x >= rect.x
        && point.x < rect.x + rect.width
        && point.y >= rect.y
        && point.y < rect.y + rect.height;
}

/** 一帧的输入快照（只读） */
export class FrameInput {
    constructor(
        /** 指针最终位置；从未进入时为 null */
        readonly pointer: Point2 | null,
        /** 主键当前是否按住 */
        readonly down: boolean,
        /** 当前按住的起点（跨帧保持） */
        readonly pressOrigin: Point2 | null,
        readonly presses: readonly Point2[],
        readonly clicks: readonly Click[],
        readonly scroll: Point2
    ) {}

    hovered(rect: Rect): boolean {
        return this.pointer !== null && containsPoint(rect, this.pointer);
    }

    /** 按住且按下点在矩形内 */
    held(rect: Rect): boolean {
        return this.down && this.pressOrigin !== null && containsPoint(rect, this.pressOrigin);
    }

    /** 按下与释放都在矩形内 */
    clicked(rect: Rect): boolean {
        return this.clicks.some((click) => containsPoint(rect, click.press) && containsPoint(rect, click.release));
    }

    /** 本帧第一次落在矩形内的按下点 */
    pressedIn(rect: Rect): Point2 | null {
        return this.presses.find((press) => containsPoint(rect, press)) ?? null;
    }
}

/**
 * 跨帧的指针状态机
 */
export class InputState {
    private pointer: Point2 | null = null;
    private down = false;
    private pressOrigin: Point2 | null = null;

    /**
     * 消费一帧的事件（按到达顺序）
     */
    consume(events: readonly GuiInputEvent[]): FrameInput {
        const presses: Point2[] = [];
        const clicks: Click[] = [];
        let scrollX = 0;
        let scrollY = 0;

        for (const event of events) {
            switch (event.type) {
                case 'pointer-move':
                    this.pointer = event.position;
                    break;
                case 'pointer-button':
                    this.pointer = event.position;
                    if (event.button !== 'primary') break;
                    if (event.pressed && !this.down) {
                        this.down = true;
                        this.pressOrigin = event.position;
                        presses.push(event.position);
                    } else if (!event.pressed && this.down) {
                        this.down = false;
                        if (this.pressOrigin) {
                            clicks.push({ press: this.pressOrigin, release: event.position });
                        }
                        this.pressOrigin = null;
                    }
                    break;
                case 'scroll':
                    scrollX += event.delta.x;
                    scrollY += event.delta.y;
                    break;
                case 'key':
                    break;
            }
        }

        return new FrameInput(this.pointer, this.down, this.pressOrigin, presses, clicks, { x: scrollX, y: scrollY });
    }
}
