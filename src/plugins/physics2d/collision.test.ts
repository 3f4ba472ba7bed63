import { describe, test, expect, vi, afterEach } from 'vitest';
import {
    areColliding, edgeNormal, projectPoints, intervalsSeparated,
    findSeparatingAxis, enableCollisionDebug
} from './collision';
import { createBody2D } from './rigid-body';
import { createCircle, createPolygon, createSquare, createTriangle, pointsToEdges } from './shapes';
import { vec2, Vec2 } from '../../math/vec';

// Side 2, centered on the origin, axis-aligned
const SQUARE = createPolygon([vec2(-1, -1), vec2(1, -1), vec2(1, 1), vec2(-1, 1)]);

function square(x: number, y: number, heading: number = 0) {
    return createBody2D(SQUARE, vec2(x, y), heading);
}

function circle(radius: number, x: number, y: number) {
    return createBody2D(createCircle(radius), vec2(x, y));
}

describe('circle vs circle', () => {
    test('touching circles collide', () => {
        expect(areColliding(circle(1, 0, 0), circle(1, 2, 0))).toBe(true);
    });

    test('circles just past touching do not collide', () => {
        expect(areColliding(circle(1, 0, 0), circle(1, 2.0001, 0))).toBe(false);
    });

    test('concentric and overlapping circles collide', () => {
        expect(areColliding(circle(1, 5, 5), circle(3, 5, 5))).toBe(true);
        expect(areColliding(circle(2, 0, 0), circle(1, 1, 2))).toBe(true);
    });
});

describe('polygon vs polygon (SAT)', () => {
    test('distant squares do not collide', () => {
        expect(areColliding(square(0, 0), square(10, 0))).toBe(false);
    });

    test('overlapping squares collide', () => {
        expect(areColliding(square(0, 0), square(1, 0))).toBe(true);
    });

    test('squares sharing an edge collide', () => {
        expect(areColliding(square(0, 0), square(2, 0))).toBe(true);
    });

    test('squares sharing a corner collide', () => {
        expect(areColliding(square(0, 0), square(2, 2))).toBe(true);
    });

    test('rotation is taken into account', () => {
        // A diamond reaches x = sqrt(2) ~ 1.414
        expect(areColliding(square(0, 0, Math.PI / 4), square(2.5, 0))).toBe(false);
        expect(areColliding(square(0, 0, Math.PI / 4), square(2.3, 0))).toBe(true);
        // Unrotated, the same gap would still be clear
        expect(areColliding(square(0, 0), square(2.3, 0))).toBe(false);
    });

    test('regular polygons of different sizes', () => {
        const tri = createBody2D(createTriangle(1), vec2(0, 0));
        const big = createBody2D(createSquare(10), vec2(3, 0));
        expect(areColliding(tri, big)).toBe(true);
        expect(areColliding(big, tri)).toBe(true);
    });

    test('zero-length edges are skipped', () => {
        const repeated = createPolygon([vec2(-1, -1), vec2(1, -1), vec2(1, -1), vec2(1, 1), vec2(-1, 1)]);
        const a = createBody2D(repeated, vec2(0, 0));
        expect(areColliding(a, square(10, 0))).toBe(false);
        expect(areColliding(a, square(1, 0))).toBe(true);
    });
});

describe('polygon vs circle', () => {
    test('is not tested and always reports no collision', () => {
        const poly = square(0, 0);
        const round = circle(5, 0, 0);
        expect(areColliding(poly, round)).toBe(false);
        expect(areColliding(round, poly)).toBe(false);
    });
});

describe('SAT building blocks', () => {
    test('edge normal is the unit perpendicular', () => {
        const n = edgeNormal({ start: vec2(0, 0), end: vec2(2, 0) });
        expect(n?.x).toBeCloseTo(0, 12);
        expect(n?.y).toBe(1);
        expect(edgeNormal({ start: vec2(0, 0), end: vec2(0, -3) })).toEqual({ x: 1, y: 0 });
    });

    test('zero-length edge has no normal', () => {
        expect(edgeNormal({ start: vec2(1, 1), end: vec2(1, 1) })).toBeNull();
    });

    test('projection returns min and max along the axis', () => {
        expect(projectPoints([vec2(1, 2), vec2(3, -1), vec2(2, 0)], vec2(1, 0))).toEqual({ min: 1, max: 3 });
        expect(projectPoints([], vec2(1, 0))).toBeNull();
    });

    test('shared endpoints do not separate', () => {
        expect(intervalsSeparated({ min: 0, max: 1 }, { min: 1, max: 2 })).toBe(false);
        expect(intervalsSeparated({ min: 0, max: 1 }, { min: 1.5, max: 2 })).toBe(true);
        expect(intervalsSeparated({ min: 3, max: 4 }, { min: 0, max: 2 })).toBe(true);
    });

    test('an empty point set never separates', () => {
        const points: Vec2[] = [vec2(0, 0), vec2(1, 0), vec2(0, 1)];
        const far: Vec2[] = points.map(p => vec2(p.x + 10, p.y));
        expect(findSeparatingAxis([], [], points, pointsToEdges(points))).toBeNull();
        expect(findSeparatingAxis(far, pointsToEdges(far), points, pointsToEdges(points))).not.toBeNull();
    });
});

describe('collision debug logging', () => {
    afterEach(() => {
        enableCollisionDebug(false);
        vi.restoreAllMocks();
    });

    test('logs the separating axis when enabled', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        enableCollisionDebug(true);
        areColliding(square(0, 0), square(10, 0));
        expect(log).toHaveBeenCalledWith('[physics2d] SAT separated on axis (-1.0000, 0.0000)');
    });

    test('logs skipped polygon-circle pairs', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        enableCollisionDebug(true);
        areColliding(square(0, 0), circle(1, 0, 0));
        expect(log).toHaveBeenCalledWith('[physics2d] polygon-circle pair skipped: reported as not colliding');
    });

    test('stays quiet when disabled', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        areColliding(square(0, 0), square(10, 0));
        expect(log).not.toHaveBeenCalled();
    });
});
