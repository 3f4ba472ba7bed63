import { describe, test, expect } from 'vitest';
import {
    Shape2DType, createCircle, createPolygon, createRegularPolygon,
    createTriangle, createSquare, createPentagon, createHexagon,
    shapeWorldPoints, shapeWorldEdges, pointsToEdges, shapeBoundingRadius
} from './shapes';
import { vec2 } from '../../math/vec';

const UNIT_SQUARE = [vec2(-1, -1), vec2(1, -1), vec2(1, 1), vec2(-1, 1)];

describe('shape factories', () => {
    test('circle keeps its radius', () => {
        const c = createCircle(2.5);
        expect(c.type).toBe(Shape2DType.Circle);
        expect(c.radius).toBe(2.5);
        expect(createCircle(0).radius).toBe(0);
    });

    test('circle rejects a negative radius', () => {
        expect(() => createCircle(-1)).toThrow('Circle radius must be a finite number >= 0, got -1');
    });

    test('regular polygon rejects fewer than 3 sides', () => {
        expect(() => createRegularPolygon(2, 1)).toThrow('Regular polygon needs an integer number of sides >= 3, got 2');
        expect(() => createRegularPolygon(3.5, 1)).toThrow(/integer number of sides/);
        expect(() => createRegularPolygon(3, -2)).toThrow(/radius/);
    });

    test('regular polygon places vertex k at k * 360/sides', () => {
        const t = createTriangle(2);
        expect(t.vertices).toHaveLength(3);
        expect(t.vertices[0]).toEqual({ x: 2, y: 0 });
        expect(t.vertices[1].x).toBeCloseTo(-1, 10);
        expect(t.vertices[1].y).toBeCloseTo(Math.sqrt(3), 10);
        expect(t.vertices[2].x).toBeCloseTo(-1, 10);
        expect(t.vertices[2].y).toBeCloseTo(-Math.sqrt(3), 10);
    });

    test('square is turned an eighth so its top edge is flat', () => {
        const s = createSquare(Math.SQRT2);
        const expected = [[1, 1], [-1, 1], [-1, -1], [1, -1]];
        expect(s.vertices).toHaveLength(4);
        s.vertices.forEach((v, i) => {
            expect(v.x).toBeCloseTo(expected[i][0], 10);
            expect(v.y).toBeCloseTo(expected[i][1], 10);
        });
        expect(s.vertices[0].y).toBeCloseTo(s.vertices[1].y, 10);
    });

    test('pentagon and hexagon vertex counts, no offset', () => {
        expect(createPentagon(1).vertices).toHaveLength(5);
        const h = createHexagon(3);
        expect(h.vertices).toHaveLength(6);
        expect(h.vertices[0]).toEqual({ x: 3, y: 0 });
    });

    test('custom polygon is copied verbatim and frozen', () => {
        const input = [vec2(0, 0), vec2(4, 0), vec2(0, 3)];
        const p = createPolygon(input);
        expect(p.type).toBe(Shape2DType.Polygon);
        expect(p.vertices).toEqual(input);
        expect(p.vertices).not.toBe(input);
        expect(Object.isFrozen(p)).toBe(true);
        expect(Object.isFrozen(p.vertices)).toBe(true);
    });
});

describe('world-space geometry', () => {
    test('translates vertices by position', () => {
        const square = createPolygon(UNIT_SQUARE);
        expect(shapeWorldPoints(square, vec2(10, 5), 0)).toEqual([
            { x: 9, y: 4 }, { x: 11, y: 4 }, { x: 11, y: 6 }, { x: 9, y: 6 }
        ]);
    });

    test('rotates about the local origin before translating', () => {
        const p = createPolygon([vec2(1, 0)]);
        const [point] = shapeWorldPoints(p, vec2(5, 0), Math.PI / 2);
        expect(point.x).toBeCloseTo(5, 10);
        expect(point.y).toBeCloseTo(1, 10);
    });

    test('edges include the closing edge', () => {
        const square = createPolygon(UNIT_SQUARE);
        const edges = shapeWorldEdges(square, vec2(10, 5), 0);
        expect(edges).toHaveLength(4);
        expect(edges[0]).toEqual({ start: { x: 9, y: 4 }, end: { x: 11, y: 4 } });
        expect(edges[3]).toEqual({ start: { x: 9, y: 6 }, end: { x: 9, y: 4 } });
    });

    test('circles have no vertices or edges', () => {
        const c = createCircle(1);
        expect(shapeWorldPoints(c, vec2(1, 1), 0)).toEqual([]);
        expect(shapeWorldEdges(c, vec2(1, 1), 0)).toEqual([]);
    });

    test('pointsToEdges on degenerate inputs', () => {
        expect(pointsToEdges([])).toEqual([]);
        expect(pointsToEdges([vec2(2, 2)])).toEqual([{ start: { x: 2, y: 2 }, end: { x: 2, y: 2 } }]);
    });

    test('bounding radius', () => {
        expect(shapeBoundingRadius(createCircle(3))).toBe(3);
        expect(shapeBoundingRadius(createPolygon([vec2(3, 4), vec2(1, 0)]))).toBe(5);
    });
});
