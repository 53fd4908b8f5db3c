/**
 * 5×7 位图字体图集
 *
 * 图集第 0 格为纯白（实心矩形采样该格中心），其余格按 JSON 中的字形顺序排列。
 * 小写字母映射到大写，未知字符使用 fallback 字形。
 */

import { z } from 'zod';
import type { Point2 } from '../core/types';
import fontDefinition from './font5x7.json';
import type { GuiTextureUpload } from './types';

/** 字体图集的 GUI 纹理 id */
export const FONT_TEXTURE_ID = 0;

const fontSchema = z
    .object({
        glyphWidth: z.number().int().positive(),
        glyphHeight: z.number().int().positive(),
        cellWidth: z.number().int().positive(),
        cellHeight: z.number().int().positive(),
        columns: z.number().int().positive(),
        fallback: z.string().length(1),
        glyphs: z.record(z.string().length(1), z.array(z.string().regex(/^[#.]+$/))),
    })
    .superRefine((font, ctx) => {
        if (font.cellWidth < font.glyphWidth || font.cellHeight < font.glyphHeight) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: '字形大于格子' });
        }
        if (!(font.fallback in font.glyphs)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `fallback 字形 "${font.fallback}" 不存在` });
        }
        for (const [ch, rows] of Object.entries(font.glyphs)) {
            if (rows.length !== font.glyphHeight || rows.some((row) => row.length !== font.glyphWidth)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['glyphs', ch], message: '字形尺寸不符' });
            }
        }
    });

export type FontDefinition = z.infer<typeof fontSchema>;

/** 图集内的归一化纹理坐标 */
export interface GlyphUv {
    readonly u0: number;
    readonly v0: number;
    readonly u1: number;
    readonly v1: number;
}

export class FontAtlas {
    readonly width: number;
    readonly height: number;
    readonly pixels: Uint8Array<ArrayBuffer>;
    readonly glyphWidth: number;
    readonly glyphHeight: number;
    /** 字符步进（未缩放） */
    readonly advance: number;
    /** 纯白格中心 */
    readonly whiteUv: Point2;
    private readonly uvs = new Map<string, GlyphUv>();
    private readonly fallback: string;

    private constructor(font: FontDefinition) {
        const chars = Object.keys(font.glyphs);
        const cellCount = chars.length + 1;
        const rows = Math.ceil(cellCount / font.columns);

        this.width = font.columns * font.cellWidth;
        this.height = rows * font.cellHeight;
        this.pixels = new Uint8Array(this.width * this.height * 4);
        this.glyphWidth = font.glyphWidth;
        this.glyphHeight = font.glyphHeight;
        this.advance = font.cellWidth;
        this.fallback = font.fallback;

        // 第 0 格：纯白
        for (let y = 0; y < font.cellHeight; y++) {
            for (let x = 0; x < font.cellWidth; x++) {
                this.setPixel(x, y, 255);
            }
        }
        this.whiteUv = {
            x: font.cellWidth / 2 / this.width,
            y: font.cellHeight / 2 / this.height,
        };

        chars.forEach((ch, i) => {
            const cell = i + 1;
            const cx = (cell % font.columns) * font.cellWidth;
            const cy = Math.floor(cell / font.columns) * font.cellHeight;
            const glyphRows = font.glyphs[ch] ?? [];

            glyphRows.forEach((row, y) => {
                for (let x = 0; x < row.length; x++) {
                    // 透明像素保留白色 RGB，便于线性过滤
                    this.setPixel(cx + x, cy + y, row[x] === '#' ? 255 : 0);
                }
            });

            this.uvs.set(ch, {
                u0: cx / this.width,
                v0: cy / this.height,
                u1: (cx + font.glyphWidth) / this.width,
                v1: (cy + font.glyphHeight) / this.height,
            });
        });
    }

    /**
     * 从未校验的定义构建图集
     *
     * @throws ZodError 定义不合法
     */
    static fromDefinition(data: unknown): FontAtlas {
        return new FontAtlas(fontSchema.parse(data));
    }

    /** 字符的纹理坐标；空格返回 null（不产生几何） */
    glyph(ch: string): GlyphUv | null {
        if (ch === ' ') return null;
        return this.uvs.get(ch) ?? this.uvs.get(ch.toUpperCase()) ?? this.uvs.get(this.fallback) ?? null;
    }

    /** 文本尺寸 (point) */
    measure(text: string, scale: number): { width: number; height: number } {
        const count = [...text].length;
        const width = count === 0 ? 0 : (count * this.advance - (this.advance - this.glyphWidth)) * scale;
        return { width, height: this.glyphHeight * scale };
    }

    toUpload(): GuiTextureUpload {
        return { id: FONT_TEXTURE_ID, width: this.width, height: this.height, pixels: this.pixels };
    }

    private setPixel(x: number, y: number, alpha: number): void {
        const offset = (y * this.width + x) * 4;
        this.pixels[offset] = 255;
        this.pixels[offset + 1] = 255;
        this.pixels[offset + 2] = 255;
        this.pixels[offset + 3] = alpha;
    }
}

let _defaultFont: FontAtlas | null = null;

/**
 * 内置 5×7 字体（首次调用时构建）
 */
export function getDefaultFont(): FontAtlas {
    if (!_defaultFont) {
        _defaultFont = FontAtlas.fromDefinition(fontDefinition);
    }
    return _defaultFont;
}
