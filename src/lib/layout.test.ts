import { describe, it, expect } from 'vitest';
import { Hex, ORIGIN } from './hex';
import { range } from './traversal';
import { InvalidDirectionError, InvalidLayoutError } from './errors';
import {
    FLAT,
    Layout,
    POINTY,
    createLayout,
    customOrientation,
    flatLayout,
    pointyLayout,
    roundPoint,
} from './layout';

const SQRT3 = Math.sqrt(3);

describe('Layout', () => {
    describe('hex to pixel', () => {
        it('centers the origin hex on the layout origin', () => {
            expect(pointyLayout(10, { x: 100, y: 50 }).toPixel(ORIGIN)).toEqual({ x: 100, y: 50 });
        });

        it('places pointy neighbors', () => {
            const layout = pointyLayout(10, { x: 100, y: 50 });
            const east = layout.toPixel(new Hex(1, 0));
            expect(east.x).toBeCloseTo(100 + 10 * SQRT3);
            expect(east.y).toBeCloseTo(50);
            const southEast = layout.toPixel(new Hex(0, 1));
            expect(southEast.x).toBeCloseTo(100 + 5 * SQRT3);
            expect(southEast.y).toBeCloseTo(65);
        });

        it('places flat neighbors', () => {
            const p = flatLayout(10).toPixel(new Hex(1, 0));
            expect(p.x).toBeCloseTo(15);
            expect(p.y).toBeCloseTo(5 * SQRT3);
        });

        it('stretches with a non-uniform size', () => {
            const p = pointyLayout([2, 4]).toPixel(new Hex(0, 1));
            expect(p.x).toBeCloseTo(SQRT3);
            expect(p.y).toBeCloseTo(6);
        });
    });

    describe('pixel to hex', () => {
        for (const [name, layout] of [
            ['pointy', pointyLayout({ x: 12, y: 9 }, { x: -40, y: 25 })],
            ['flat', flatLayout(7, [3, 3])],
        ] as const) {
            it(`round-trips every cell (${name})`, () => {
                for (const h of range(new Hex(2, -1), 4)) {
                    expect(layout.hexAt(layout.toPixel(h)).equals(h)).toBe(true);
                    expect(layout.toHex(layout.toPixel(h)).equals(h)).toBe(true);
                }
            });
        }

        it('finds the cell containing a point near a center', () => {
            const layout = pointyLayout(10);
            const center = layout.toPixel(new Hex(2, -1));
            expect(layout.hexAt({ x: center.x + 3, y: center.y - 2 }).key).toBe('2,-1');
            expect(layout.hexAt([center.x - 4, center.y + 4]).key).toBe('2,-1');
        });

        it('returns fractional hexes from toHex', () => {
            const h = pointyLayout(1).toHex({ x: SQRT3 / 2, y: 0 });
            expect(h.q).toBeCloseTo(0.5);
            expect(h.r).toBeCloseTo(0);
            expect(h.isInteger).toBe(false);
        });

        it('rejects non-finite points', () => {
            expect(() => pointyLayout(1).toHex({ x: NaN, y: 0 })).toThrow(InvalidLayoutError);
        });
    });

    describe('corners', () => {
        it('puts pointy corner 0 at 30 degrees', () => {
            const c = pointyLayout(10).cornerOffset(0);
            expect(c.x).toBeCloseTo(5 * SQRT3);
            expect(c.y).toBeCloseTo(5);
        });

        it('puts flat corner 0 at 0 degrees and corner 1 at -60', () => {
            const layout = flatLayout(10);
            expect(layout.cornerOffset(0).x).toBeCloseTo(10);
            expect(layout.cornerOffset(0).y).toBeCloseTo(0);
            expect(layout.cornerOffset(1).x).toBeCloseTo(5);
            expect(layout.cornerOffset(1).y).toBeCloseTo(-5 * SQRT3);
        });

        it('gives six corners at distance size from the center', () => {
            const layout = flatLayout(8, { x: 20, y: 20 });
            const center = layout.toPixel(new Hex(1, 1));
            const corners = layout.polygonCorners(new Hex(1, 1));
            expect(corners).toHaveLength(6);
            for (const c of corners) expect(Math.hypot(c.x - center.x, c.y - center.y)).toBeCloseTo(8);
        });

        it('shrinks the polygon by a factor', () => {
            const corners = pointyLayout(10).polygonCorners(ORIGIN, 0.5);
            for (const c of corners) expect(Math.hypot(c.x, c.y)).toBeCloseTo(5);
        });

        it('rejects a corner index outside 0..5', () => {
            expect(() => pointyLayout(10).cornerOffset(6)).toThrow(InvalidDirectionError);
        });
    });

    describe('metrics', () => {
        it('measures pointy cells', () => {
            const layout = pointyLayout(10);
            expect(layout.width).toBeCloseTo(10 * SQRT3);
            expect(layout.height).toBe(20);
            expect(layout.horizontalSpacing).toBeCloseTo(10 * SQRT3);
            expect(layout.verticalSpacing).toBe(15);
        });

        it('measures flat cells', () => {
            const layout = flatLayout(10);
            expect(layout.width).toBe(20);
            expect(layout.height).toBeCloseTo(10 * SQRT3);
            expect(layout.horizontalSpacing).toBe(15);
            expect(layout.verticalSpacing).toBeCloseTo(10 * SQRT3);
        });

        it('matches the distance between neighbor centers', () => {
            const layout = pointyLayout(6);
            const a = layout.toPixel(ORIGIN);
            const b = layout.toPixel(new Hex(1, 0));
            expect(b.x - a.x).toBeCloseTo(layout.horizontalSpacing);
        });
    });

    describe('custom orientation', () => {
        it('derives the inverse matrix', () => {
            const layout = new Layout(customOrientation([2, 0, 0, 2]));
            const h = new Hex(3, -1);
            expect(layout.toPixel(h)).toEqual({ x: 6, y: -2 });
            expect(layout.hexAt(layout.toPixel(h)).equals(h)).toBe(true);
        });

        it('rejects a singular matrix', () => {
            expect(() => customOrientation([1, 2, 2, 4])).toThrow(InvalidLayoutError);
        });

        it('has no preset metrics', () => {
            const layout = new Layout(customOrientation([1, 0, 0, 1]));
            expect(() => layout.width).toThrow('width is only defined for pointy and flat layouts');
        });
    });

    it('rejects a zero size', () => {
        expect(() => pointyLayout(0)).toThrow(InvalidLayoutError);
        expect(() => flatLayout({ x: 1, y: 0 })).toThrow('Layout size must be non-zero, got (1, 0)');
    });

    it('is frozen', () => {
        expect(Object.isFrozen(pointyLayout(1))).toBe(true);
    });

    it('prints its settings', () => {
        expect(pointyLayout(10, { x: 1, y: 2 }).toString()).toBe('Layout(pointy, size=(10, 10), origin=(1, 2))');
    });

    it('rounds points', () => {
        expect(roundPoint({ x: 1.4, y: 2.6 })).toEqual({ x: 1, y: 3 });
    });
});

describe('createLayout', () => {
    it('defaults to a unit pointy layout at the origin', () => {
        const layout = createLayout();
        expect(layout.orientation).toBe(POINTY);
        expect(layout.size).toEqual({ x: 1, y: 1 });
        expect(layout.origin).toEqual({ x: 0, y: 0 });
    });

    it('reads orientation, size and origin', () => {
        const layout = createLayout({ orientation: 'flat', size: [2, 3], origin: { x: 5, y: 6 } });
        expect(layout.orientation).toBe(FLAT);
        expect(layout.size).toEqual({ x: 2, y: 3 });
        expect(layout.origin).toEqual({ x: 5, y: 6 });
    });

    it('rejects a zero size', () => {
        expect(() => createLayout({ size: 0 })).toThrow(InvalidLayoutError);
        expect(() => createLayout({ size: 0 })).toThrow(/^Invalid layout config: size: /);
    });

    it('rejects an unknown orientation', () => {
        expect(() => createLayout(JSON.parse('{"orientation":"diagonal"}'))).toThrow(
            /^Invalid layout config: orientation: /,
        );
    });

    it('rejects unknown keys', () => {
        expect(() => createLayout(JSON.parse('{"scale":2}'))).toThrow(
            "Invalid layout config: config: Unrecognized key(s) in object: 'scale'",
        );
    });
});
