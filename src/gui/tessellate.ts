/**
 * 形状细分为三角形
 *
 * 每个图层产生一次绘制调用（图层裁剪矩形 + 连续索引段）；
 * 矩形与字形都是四边形，矩形采样图集的纯白格。
 */

import { GUI_VERTEX_FLOATS } from '../gpu/constants';
import { FONT_TEXTURE_ID, type FontAtlas } from './font';
import type { GuiDrawCall, GuiLayer, GuiShape, Rgba } from './types';

export interface TessellatedGui {
    readonly vertices: Float32Array<ArrayBuffer>;
    readonly indices: Uint32Array<ArrayBuffer>;
    readonly drawCalls: GuiDrawCall[];
}

function quadCount(shape: GuiShape, font: FontAtlas): number {
    if (shape.kind === 'rect') return 1;
    let count = 0;
    for (const ch of shape.text) {
        if (font.glyph(ch)) count++;
    }
    return count;
}

export function tessellate(layers: readonly GuiLayer[], font: FontAtlas): TessellatedGui {
    let totalQuads = 0;
    for (const layer of layers) {
        for (const shape of layer.shapes) totalQuads += quadCount(shape, font);
    }

    const vertices = new Float32Array(totalQuads * 4 * GUI_VERTEX_FLOATS);
    const indices = new Uint32Array(totalQuads * 6);
    const drawCalls: GuiDrawCall[] = [];
    let quad = 0;

    const pushQuad = (
        x0: number, y0: number, x1: number, y1: number,
        u0: number, v0: number, u1: number, v1: number,
        color: Rgba
    ): void => {
        const base = quad * 4;
        const corners: readonly [number, number, number, number][] = [
            [x0, y0, u0, v0],
            [x1, y0, u1, v0],
            [x1, y1, u1, v1],
            [x0, y1, u0, v1],
        ];
        corners.forEach(([x, y, u, v], i) => {
            vertices.set([x, y, u, v, color[0], color[1], color[2], color[3]], (base + i) * GUI_VERTEX_FLOATS);
        });
        indices.set([base, base + 1, base + 2, base, base + 2, base + 3], quad * 6);
        quad++;
    };

    for (const layer of layers) {
        const firstQuad = quad;
        for (const shape of layer.shapes) {
            if (shape.kind === 'rect') {
                const { rect, color } = shape;
                const { x: u, y: v } = font.whiteUv;
                pushQuad(rect.x, rect.y, rect.x + rect.width, rect.y + rect.height, u, v, u, v, color);
                continue;
            }

            const advance = font.advance * shape.scale;
            const glyphWidth = font.glyphWidth * shape.scale;
            const glyphHeight = font.glyphHeight * shape.scale;
            let x = shape.x;
            for (const ch of shape.text) {
                const uv = font.glyph(ch);
                if (uv) {
                    pushQuad(x, shape.y, x + glyphWidth, shape.y + glyphHeight, uv.u0, uv.v0, uv.u1, uv.v1, shape.color);
                }
                x += advance;
            }
        }

        const quads = quad - firstQuad;
        if (quads > 0) {
            drawCalls.push({
                clipRect: layer.clipRect,
                textureId: FONT_TEXTURE_ID,
                indexOffset: firstQuad * 6,
                indexCount: quads * 6,
            });
        }
    }

    return { vertices, indices, drawCalls };
}
