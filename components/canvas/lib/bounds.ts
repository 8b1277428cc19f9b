/**
 * Shape bounding box calculations
 */

import type { Corner, SceneShape } from "../types";
import { boundingBox, type Point, type Rect } from "./geometry";
import { getShapeVertices } from "./shapeGeometry";

/**
 * Axis-aligned world bounds of a shape, rotation included
 */
export function getShapeBounds(shape: SceneShape): Rect {
	switch (shape.kind) {
		case "circle": {
			const radius = shape.radius * shape.scale;
			return {
				x: shape.x - radius,
				y: shape.y - radius,
				width: radius * 2,
				height: radius * 2,
			};
		}

		default:
			return boundingBox(getShapeVertices(shape));
	}
}

/**
 * Calculate the combined bounding box for multiple shapes
 */
export function getCombinedBounds(shapes: readonly SceneShape[]): Rect {
	if (shapes.length === 0) {
		return { x: 0, y: 0, width: 0, height: 0 };
	}

	const bounds = shapes.map(getShapeBounds);
	const minX = Math.min(...bounds.map((b) => b.x));
	const minY = Math.min(...bounds.map((b) => b.y));
	const maxX = Math.max(...bounds.map((b) => b.x + b.width));
	const maxY = Math.max(...bounds.map((b) => b.y + b.height));

	return {
		x: minX,
		y: minY,
		width: maxX - minX,
		height: maxY - minY,
	};
}

export function getCornerPoints(rect: Rect): Record<Corner, Point> {
	return {
		nw: { x: rect.x, y: rect.y },
		ne: { x: rect.x + rect.width, y: rect.y },
		sw: { x: rect.x, y: rect.y + rect.height },
		se: { x: rect.x + rect.width, y: rect.y + rect.height },
	};
}
