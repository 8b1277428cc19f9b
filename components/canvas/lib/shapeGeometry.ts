/**
 * Per-kind shape geometry: outlines, hit-testing and anchor points.
 *
 * Every shape is centered on (x, y). Base dimensions are stored unscaled;
 * the functions here apply `scale` and `rotationDeg` on the way out.
 */

import type { PolygonShape, SceneShape } from "../types";
import { SIZES } from "./constants";
import {
	distance,
	pointInPolygon,
	rotatePoint,
	translatePoint,
	type Point,
} from "./geometry";

/**
 * Corners of a polygonal shape around the origin, clockwise on a y-down surface
 */
function polygonOutline(shape: PolygonShape): Point[] {
	const halfHeight = (shape.height * shape.scale) / 2;

	switch (shape.kind) {
		case "rectangle": {
			const halfWidth = (shape.width * shape.scale) / 2;
			return [
				{ x: -halfWidth, y: -halfHeight },
				{ x: halfWidth, y: -halfHeight },
				{ x: halfWidth, y: halfHeight },
				{ x: -halfWidth, y: halfHeight },
			];
		}

		case "trapezoid": {
			const halfTop = (shape.topWidth * shape.scale) / 2;
			const halfBottom = (shape.bottomWidth * shape.scale) / 2;
			return [
				{ x: -halfTop, y: -halfHeight },
				{ x: halfTop, y: -halfHeight },
				{ x: halfBottom, y: halfHeight },
				{ x: -halfBottom, y: halfHeight },
			];
		}
	}
}

/**
 * Outline of a shape in its own unrotated frame, centered on the origin
 */
export function getLocalVertices(
	shape: SceneShape,
	segments: number = SIZES.circleSegments,
): Point[] {
	if (shape.kind !== "circle") return polygonOutline(shape);

	const radius = shape.radius * shape.scale;
	const points: Point[] = [];
	for (let i = 0; i < segments; i++) {
		const angle = (2 * Math.PI * i) / segments;
		points.push({ x: radius * Math.cos(angle), y: radius * Math.sin(angle) });
	}
	return points;
}

/**
 * World-space outline used by the renderer
 */
export function getShapeVertices(
	shape: SceneShape,
	segments: number = SIZES.circleSegments,
): Point[] {
	return getLocalVertices(shape, segments).map((p) =>
		translatePoint(rotatePoint(p, shape.rotationDeg), shape.x, shape.y),
	);
}

/**
 * Map a world point into the shape's unrotated frame (origin at the center)
 */
export function toLocalPoint(shape: SceneShape, x: number, y: number): Point {
	return rotatePoint({ x: x - shape.x, y: y - shape.y }, -shape.rotationDeg);
}

export function shapeContainsPoint(shape: SceneShape, x: number, y: number): boolean {
	switch (shape.kind) {
		case "circle":
			return distance(shape, { x, y }) <= shape.radius * shape.scale;

		case "rectangle": {
			const local = toLocalPoint(shape, x, y);
			return (
				Math.abs(local.x) <= (shape.width * shape.scale) / 2 &&
				Math.abs(local.y) <= (shape.height * shape.scale) / 2
			);
		}

		case "trapezoid":
			return pointInPolygon(toLocalPoint(shape, x, y), polygonOutline(shape));
	}
}

/**
 * Where connection lines attach. Always the center, whatever the geometry.
 */
export function getConnectionPoint(shape: SceneShape): Point {
	return { x: shape.x, y: shape.y };
}

/**
 * Topmost shape under a point. Later shapes are drawn on top, so search backwards.
 */
export function hitTestShapes(
	shapes: readonly SceneShape[],
	x: number,
	y: number,
): SceneShape | null {
	for (let i = shapes.length - 1; i >= 0; i--) {
		if (shapeContainsPoint(shapes[i], x, y)) return shapes[i];
	}
	return null;
}
