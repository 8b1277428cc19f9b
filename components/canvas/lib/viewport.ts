// ============================================================
// VIEWPORT TRANSFORM UTILITIES
// ============================================================
// Pure functions. No side effects.
//
// Shapes live in world coordinates. The viewport offset is
// expressed in world units and applied before the zoom:
//
//   screen = (world + offset) * zoom
//   world  = screen / zoom - offset
// ============================================================

import type { EngineConfig } from "@/lib/scene-config";
import type { ViewportState } from "../types";
import { LIMITS } from "./constants";
import { clamp, type Point } from "./geometry";

export type ZoomLimits = Pick<
	EngineConfig,
	"zoomMin" | "zoomMax" | "zoomInFactor" | "zoomOutFactor"
>;

/** Default viewport: no zoom, no pan */
export const VIEWPORT_INITIAL: ViewportState = {
	zoom: 1,
	offsetX: 0,
	offsetY: 0,
};

const DEFAULT_ZOOM_LIMITS: ZoomLimits = {
	zoomMin: LIMITS.zoomMin,
	zoomMax: LIMITS.zoomMax,
	zoomInFactor: LIMITS.zoomInFactor,
	zoomOutFactor: LIMITS.zoomOutFactor,
};

export function worldToScreen(
	worldX: number,
	worldY: number,
	viewport: ViewportState,
): Point {
	return {
		x: (worldX + viewport.offsetX) * viewport.zoom,
		y: (worldY + viewport.offsetY) * viewport.zoom,
	};
}

/**
 * Exact inverse of worldToScreen.
 */
export function screenToWorld(
	screenX: number,
	screenY: number,
	viewport: ViewportState,
): Point {
	return {
		x: screenX / viewport.zoom - viewport.offsetX,
		y: screenY / viewport.zoom - viewport.offsetY,
	};
}

/**
 * Convert a screen-space delta (mouse movement) to a world-space delta.
 */
export function screenDeltaToWorld(
	dx: number,
	dy: number,
	zoom: number,
): { dx: number; dy: number } {
	return {
		dx: dx / zoom,
		dy: dy / zoom,
	};
}

/**
 * Step the zoom in or out around a screen point.
 *
 * The world point under the cursor stays under the cursor: it is
 * captured with the old zoom, then the offset is solved for the new one.
 * Returns the same object when the zoom is already at its limit.
 *
 * @param delta - Wheel direction; positive zooms in
 */
export function zoomViewport(
	viewport: ViewportState,
	delta: number,
	screenX: number,
	screenY: number,
	limits: ZoomLimits = DEFAULT_ZOOM_LIMITS,
): ViewportState {
	const factor = delta > 0 ? limits.zoomInFactor : limits.zoomOutFactor;
	const zoom = clamp(viewport.zoom * factor, limits.zoomMin, limits.zoomMax);
	if (zoom === viewport.zoom) return viewport;

	const anchor = screenToWorld(screenX, screenY, viewport);
	return {
		zoom,
		offsetX: screenX / zoom - anchor.x,
		offsetY: screenY / zoom - anchor.y,
	};
}

/**
 * Shift the view by a screen-space delta.
 */
export function panViewport(
	viewport: ViewportState,
	dx: number,
	dy: number,
): ViewportState {
	const delta = screenDeltaToWorld(dx, dy, viewport.zoom);
	return {
		...viewport,
		offsetX: viewport.offsetX + delta.dx,
		offsetY: viewport.offsetY + delta.dy,
	};
}
