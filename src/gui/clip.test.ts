import { describe, expect, it } from 'vitest';
import { toPixelScissor } from './clip';

describe('toPixelScissor', () => {
    const target = { width: 800, height: 600 };

    it('按 pixelsPerPoint 缩放', () => {
        expect(toPixelScissor({ x: 10, y: 20, width: 100, height: 50 }, 2, target))
            .toEqual({ x: 20, y: 40, width: 200, height: 100 });
    });

    it('夹到目标尺寸内', () => {
        expect(toPixelScissor({ x: -10, y: 500, width: 1000, height: 300 }, 1, target))
            .toEqual({ x: 0, y: 500, width: 800, height: 100 });
    });

    it('完全在目标外时返回 null', () => {
        expect(toPixelScissor({ x: 900, y: 0, width: 50, height: 50 }, 1, target)).toBeNull();
    });

    it('零面积返回 null', () => {
        expect(toPixelScissor({ x: 10, y: 10, width: 0, height: 40 }, 1, target)).toBeNull();
    });
});
