import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RunLoop } from '../src/core/RunLoop';
import { EventBus } from '../src/core/EventBus';
import { FrameRenderer } from '../src/gpu/FrameRenderer';
import { GpuContext } from '../src/gpu/GpuContext';
import { rotationAngle } from '../src/gpu/data/transform';
import { DemoPanels } from '../src/gui/DemoPanels';
import { GuiContext } from '../src/gui/GuiContext';
import { FakeBackend } from '../src/testing/FakeBackend';
import { FakePlatformSource } from '../src/testing/FakePlatformSource';

const OMEGA = Math.PI / 6;
const FRAME_SECONDS = 1 / 60;

describe('Frame loop long-run verification', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        vi.spyOn(console, 'debug').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('angle stays in [0, 2π) and keeps the per-frame step after 30 days', () => {
        const start = 30 * 24 * 3600;
        let previous = rotationAngle(start, OMEGA);

        for (let i = 1; i <= 3600; i++) {
            const angle = rotationAngle(start + i * FRAME_SECONDS, OMEGA);
            expect(angle).toBeGreaterThanOrEqual(0);
            expect(angle).toBeLessThan(Math.PI * 2);

            let step = angle - previous;
            if (step < 0) step += Math.PI * 2;
            expect(step).toBeCloseTo(OMEGA * FRAME_SECONDS, 6);
            previous = angle;
        }
    });

    it('one full period later returns to the same angle', () => {
        const period = (Math.PI * 2) / OMEGA;
        for (const t of [0.5, 1000.25, 86400.5, 30 * 86400 + 0.75]) {
            expect(rotationAngle(t + period, OMEGA)).toBeCloseTo(rotationAngle(t, OMEGA), 6);
        }
    });

    it('GUI output size is stable across 1000 frames with all panels shown', () => {
        const demo = new DemoPanels('webgpu', new EventBus());
        const gui = new GuiContext();
        const screen = { sizeInPixels: { width: 1280, height: 720 }, pixelsPerPoint: 1 };

        gui.pushInput({ type: 'pointer-button', button: 'primary', pressed: true, position: { x: 40, y: 104 } });
        gui.pushInput({ type: 'pointer-button', button: 'primary', pressed: false, position: { x: 40, y: 104 } });
        gui.run(screen, (frame) => demo.build(frame));
        expect(demo.showPanels).toBe(true);

        const first = gui.run(screen, (frame) => demo.build(frame));
        for (let i = 0; i < 1000; i++) {
            const out = gui.run(screen, (frame) => demo.build(frame));
            expect(out.vertices.length).toBe(first.vertices.length);
            expect(out.indices.length).toBe(first.indices.length);
            expect(out.texturesDelta.set).toHaveLength(0);
        }
    });

    it('renders 600 consecutive frames with one redraw request per frame', async () => {
        const source = new FakePlatformSource(600);
        const backend = new FakeBackend();
        const gpu = new GpuContext(backend);
        const bus = new EventBus();
        let tick = 0;
        const loop = new RunLoop({
            source,
            gpu,
            renderer: new FrameRenderer(gpu, { depthRange: 'zero-to-one', angularVelocity: OMEGA, bus }),
            gui: new GuiContext(),
            buildGui: () => {},
            clock: { now: () => (tick++) * 1000 * FRAME_SECONDS },
            vsync: true,
            bus,
        });

        source.emit({
            type: 'ready',
            handle: { kind: 'canvas', canvas: document.createElement('canvas') },
            size: { width: 800, height: 600 },
            pixelsPerPoint: 1,
        });
        const result = await loop.run();

        expect(result).toEqual({ exitCode: 0 });
        expect(backend.presented).toHaveLength(600);
        expect(gpu.stats).toEqual({ presented: 600, skipped: 0, reconfigurations: 0 });
        expect(source.redrawRequests).toBe(601);
    });
});
