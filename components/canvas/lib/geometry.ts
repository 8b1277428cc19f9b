/**
 * Geometry utilities for scene operations
 */

import { EDGE_EPSILON } from "./constants";

export interface Point {
	x: number;
	y: number;
}

export interface Rect {
	x: number;
	y: number;
	width: number;
	height: number;
}

/**
 * Calculate the distance between two points
 */
export function distance(p1: Point, p2: Point): number {
	return Math.hypot(p2.x - p1.x, p2.y - p1.y);
}

export function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

/**
 * Wrap an angle into [0, 360)
 */
export function normalizeDegrees(degrees: number): number {
	const wrapped = degrees % 360;
	// `+ 0` turns -0 into 0
	return wrapped < 0 ? (wrapped + 360) % 360 : wrapped + 0;
}

/**
 * Rotate a point about the origin. Positive angles turn clockwise on a y-down surface.
 */
export function rotatePoint(point: Point, angleDeg: number): Point {
	if (angleDeg === 0) return { x: point.x, y: point.y };
	const radians = (angleDeg * Math.PI) / 180;
	const cos = Math.cos(radians);
	const sin = Math.sin(radians);
	return {
		x: point.x * cos - point.y * sin,
		y: point.x * sin + point.y * cos,
	};
}

/**
 * Translate a point by a delta
 */
export function translatePoint(point: Point, dx: number, dy: number): Point {
	return { x: point.x + dx, y: point.y + dy };
}

/**
 * Even-odd ray cast. Points exactly on an edge may land either way.
 */
export function pointInPolygon(point: Point, polygon: Point[]): boolean {
	let inside = false;
	for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
		const a = polygon[i];
		const b = polygon[j];
		const crosses =
			a.y > point.y !== b.y > point.y &&
			point.x < ((b.x - a.x) * (point.y - a.y)) / (b.y - a.y + EDGE_EPSILON) + a.x;
		if (crosses) inside = !inside;
	}
	return inside;
}

/**
 * Distance from a point to the segment a-b. A zero-length segment
 * degrades to point-to-point distance.
 */
export function distanceToSegment(point: Point, a: Point, b: Point): number {
	const dx = b.x - a.x;
	const dy = b.y - a.y;
	const lengthSquared = dx * dx + dy * dy;
	if (lengthSquared === 0) return distance(point, a);

	const t = clamp(((point.x - a.x) * dx + (point.y - a.y) * dy) / lengthSquared, 0, 1);
	return distance(point, { x: a.x + t * dx, y: a.y + t * dy });
}

/**
 * Calculate bounding box from a set of points
 */
export function boundingBox(points: Point[]): Rect {
	if (points.length === 0) {
		return { x: 0, y: 0, width: 0, height: 0 };
	}
	const xs = points.map((p) => p.x);
	const ys = points.map((p) => p.y);
	const minX = Math.min(...xs);
	const minY = Math.min(...ys);
	const maxX = Math.max(...xs);
	const maxY = Math.max(...ys);
	return {
		x: minX,
		y: minY,
		width: maxX - minX,
		height: maxY - minY,
	};
}
