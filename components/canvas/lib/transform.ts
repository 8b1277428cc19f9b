/**
 * Shape transformation utilities (move, scale, rotate, resize)
 *
 * Shapes are immutable: every function returns a new shape.
 */

import type { EngineConfig } from "@/lib/scene-config";
import type { Corner, SceneShape } from "../types";
import { getCornerPoints, getShapeBounds } from "./bounds";
import { LIMITS } from "./constants";
import { clamp, distance, normalizeDegrees } from "./geometry";

export type ScaleLimits = Pick<EngineConfig, "scaleMin" | "scaleMax">;

const DEFAULT_SCALE_LIMITS: ScaleLimits = {
	scaleMin: LIMITS.scaleMin,
	scaleMax: LIMITS.scaleMax,
};

const CORNERS: readonly Corner[] = ["nw", "ne", "sw", "se"];

export function setPosition<T extends SceneShape>(shape: T, x: number, y: number): T {
	return { ...shape, x, y };
}

/**
 * Move a shape by a delta, returning a new shape
 */
export function moveShape<T extends SceneShape>(shape: T, dx: number, dy: number): T {
	return setPosition(shape, shape.x + dx, shape.y + dy);
}

export function setScale<T extends SceneShape>(
	shape: T,
	scale: number,
	limits: ScaleLimits = DEFAULT_SCALE_LIMITS,
): T {
	return { ...shape, scale: clamp(scale, limits.scaleMin, limits.scaleMax) };
}

export function scaleShape<T extends SceneShape>(
	shape: T,
	delta: number,
	limits: ScaleLimits = DEFAULT_SCALE_LIMITS,
): T {
	return setScale(shape, shape.scale + delta, limits);
}

export function rotateShape<T extends SceneShape>(shape: T, deltaDeg: number): T {
	return { ...shape, rotationDeg: normalizeDegrees(shape.rotationDeg + deltaDeg) };
}

/**
 * Nearest bounding-box corner within `threshold` of the point, if any
 */
export function findResizeHandle(
	shape: SceneShape,
	x: number,
	y: number,
	threshold: number,
): Corner | null {
	const corners = getCornerPoints(getShapeBounds(shape));
	let best: Corner | null = null;
	let bestDistance = threshold;

	for (const corner of CORNERS) {
		const d = distance(corners[corner], { x, y });
		if (d <= bestDistance) {
			best = corner;
			bestDistance = d;
		}
	}
	return best;
}

/**
 * Uniform resize: scale grows with the pointer's distance from the center,
 * relative to where the handle was grabbed.
 */
export function resizeToPoint<T extends SceneShape>(
	shape: T,
	startScale: number,
	startDistance: number,
	x: number,
	y: number,
	limits: ScaleLimits = DEFAULT_SCALE_LIMITS,
): T {
	if (startDistance <= 0) return shape;
	const ratio = distance(shape, { x, y }) / startDistance;
	return setScale(shape, startScale * ratio, limits);
}
