import { describe, it, expect } from 'vitest';
import {
    Hex,
    HexMap,
    ORIGIN,
    createLayout,
    flatLayout,
    hexAtPixel,
    hexToPixel,
    pointyLayout,
    range,
    ring,
    shapes,
    spiral,
} from './hexlib';

describe('hexlib', () => {
    describe('worked scenario', () => {
        it('adds, scales, divides, measures and rotates', () => {
            expect(new Hex(1, 0).add(new Hex(1, 2)).equals(new Hex(2, 2, -4))).toBe(true);
            expect(new Hex(4, -3).scale(2).equals(new Hex(8, -6, -2))).toBe(true);
            expect(new Hex(4, -3).divide(2).round().equals(new Hex(2, -2, 0))).toBe(true);
            expect(new Hex(10, -15, 5).distanceTo(new Hex(4, -3, -1))).toBe(12);
            expect(new Hex(-1, -2, 3).rotateLeft().equals(new Hex(-3, 1, 2))).toBe(true);
        });
    });

    describe('rings and spirals', () => {
        it('generates ring 0', () => {
            expect(ring(ORIGIN, 0).map((h) => h.key)).toEqual(['0,0']);
        });

        it('generates ring 1', () => {
            const cells = ring(ORIGIN, 1);
            expect(cells.length).toBe(6);
            for (const h of cells) expect(ORIGIN.distanceTo(h)).toBe(1);
        });

        it('generates spiral of radius 1', () => {
            expect(spiral(ORIGIN, 1).length).toBe(7); // 1 center + 6 ring
        });
    });

    describe('pixel round trip', () => {
        const layouts = [
            pointyLayout(10, { x: 200, y: 150 }),
            flatLayout({ x: 8, y: 5 }),
            createLayout({ orientation: 'flat', size: 3 }),
        ];

        it('maps every cell back to itself', () => {
            for (const layout of layouts) {
                for (const h of range(new Hex(-3, 1), 3)) {
                    expect(hexAtPixel(hexToPixel(h, layout), layout).equals(h)).toBe(true);
                }
            }
        });
    });

    describe('HexMap', () => {
        it('builds a radius 2 hexagon with 19 cells', () => {
            const board = HexMap.hexagon(2, 'empty');
            expect(board.size).toBe(19);
            expect(board.contains(new Hex(2, -2))).toBe(true);
            expect(board.contains(new Hex(3, -3))).toBe(false);
        });

        it('stores game state keyed by cell', () => {
            const board = HexMap.fromHexes(shapes.hexagon(1), 'empty');
            board.insert(ORIGIN.neighbor(2), 'stone');
            expect(board.hexesWithValue('stone').map((h) => h.key)).toEqual(['0,-1']);
        });
    });
});
