/**
 * 进程内事件总线 - 运行循环、渲染器与 GUI 之间的通知
 */

import type { EventMap } from './types';

type EventCallback<T> = (data: T) => void;

export class EventBus {
    private readonly listeners: Map<keyof EventMap, Set<EventCallback<unknown>>> = new Map();

    /**
     * 订阅事件
     */
    on<K extends keyof EventMap>(event: K, callback: EventCallback<EventMap[K]>): () => void {
        let callbacks = this.listeners.get(event);
        if (!callbacks) {
            callbacks = new Set();
            this.listeners.set(event, callbacks);
        }
        callbacks.add(callback as EventCallback<unknown>);

        // 返回取消订阅函数
        return () => this.off(event, callback);
    }

    /**
     * 取消订阅
     */
    off<K extends keyof EventMap>(event: K, callback: EventCallback<EventMap[K]>): void {
        this.listeners.get(event)?.delete(callback as EventCallback<unknown>);
    }

    /**
     * 触发事件
     */
    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const callbacks = this.listeners.get(event);
        if (!callbacks) return;
        // 快照，回调中取消订阅不影响本轮分发
        for (const cb of [...callbacks]) {
            cb(data);
        }
    }

    /**
     * 一次性订阅
     */
    once<K extends keyof EventMap>(event: K, callback: EventCallback<EventMap[K]>): () => void {
        const wrapper: EventCallback<EventMap[K]> = (data) => {
            this.off(event, wrapper);
            callback(data);
        };
        return this.on(event, wrapper);
    }

    /**
     * 清除所有监听器
     */
    clear(): void {
        this.listeners.clear();
    }
}

// 单例导出
export const eventBus = new EventBus();
