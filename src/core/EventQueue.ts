/**
 * 平台事件队列 — PlatformSource.next() 的共享实现
 *
 * 生产者（DOM 监听器 / 原生消息泵）同步 push，
 * 消费者（RunLoop）异步拉取，保持到达顺序。
 * 队列中最多保留一个 redraw-requested：新的 redraw 取代旧的并排到队尾。
 */

import type { PlatformEvent } from './types';

export class EventQueue {
    private readonly pending: PlatformEvent[] = [];
    private waiter: ((event: PlatformEvent) => void) | null = null;

    push(event: PlatformEvent): void {
        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve(event);
            return;
        }
        if (event.type === 'redraw-requested') {
            const queued = this.pending.findIndex((e) => e.type === 'redraw-requested');
            if (queued >= 0) this.pending.splice(queued, 1);
        }
        this.pending.push(event);
    }

    next(): Promise<PlatformEvent> {
        const head = this.pending.shift();
        if (head) {
            return Promise.resolve(head);
        }
        if (this.waiter) {
            return Promise.reject(new Error('EventQueue 只允许一个消费者'));
        }
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }
}
