/**
 * Raw pointer input -> engine calls.
 *
 * Everything here takes screen coordinates (relative to the render
 * surface) and converts through the engine's viewport. Buttons follow the
 * DOM numbering: 0 primary, 1 middle, 2 secondary.
 */

import type { SceneEngine } from "./engine";
import type { Tool } from "./types";

export const POINTER_BUTTONS = {
	primary: 0,
	middle: 1,
	secondary: 2,
} as const;

export interface PointerInput {
	x: number;
	y: number;
	button: number;
}

export interface WheelInput {
	x: number;
	y: number;
	deltaY: number;
}

export type CursorStyle = "default" | "grabbing" | "nwse-resize" | "nesw-resize";

/**
 * Resize handles keep the same on-screen size at every zoom level
 */
function handleThreshold(engine: SceneEngine): number {
	return engine.config.resizeHandlePx / engine.viewport.zoom;
}

/**
 * @returns Whether the press started a gesture or picked a connection endpoint
 */
export function handlePointerDown(
	engine: SceneEngine,
	input: PointerInput,
	tool: Tool,
): boolean {
	if (input.button === POINTER_BUTTONS.middle) {
		return engine.startPan(input.x, input.y);
	}

	const world = engine.screenToWorld(input.x, input.y);
	engine.recordLastClick(world.x, world.y);
	if (input.button !== POINTER_BUTTONS.primary) return false;

	if (tool === "connect") {
		return engine.startConnectionAt(world.x, world.y);
	}

	if (engine.startResize(world.x, world.y, handleThreshold(engine))) return true;
	if (engine.startDrag(world.x, world.y)) return true;
	engine.deselectAll();
	return false;
}

export function handlePointerMove(engine: SceneEngine, input: { x: number; y: number }): boolean {
	if (engine.isPanning()) {
		return engine.updatePan(input.x, input.y);
	}

	const world = engine.screenToWorld(input.x, input.y);
	if (engine.isResizing()) return engine.updateResize(world.x, world.y);
	if (engine.isDragging()) return engine.updateDrag(world.x, world.y);
	return false;
}

export function handlePointerUp(engine: SceneEngine, input: { button: number }): void {
	if (input.button === POINTER_BUTTONS.primary) {
		engine.stopResize();
		engine.stopDrag();
	} else if (input.button === POINTER_BUTTONS.middle) {
		engine.stopPan();
	}
}

/**
 * Wheel up (negative deltaY) zooms in around the cursor
 */
export function handleWheel(engine: SceneEngine, input: WheelInput): boolean {
	if (input.deltaY === 0) return false;
	return engine.zoomAt(-Math.sign(input.deltaY), input.x, input.y);
}

export function getCursor(engine: SceneEngine, input: { x: number; y: number }): CursorStyle {
	const state = engine.interaction;
	if (state.mode === "resizing") {
		return state.handle === "nw" || state.handle === "se" ? "nwse-resize" : "nesw-resize";
	}
	if (state.mode === "dragging" || state.mode === "panning") return "grabbing";

	const world = engine.screenToWorld(input.x, input.y);
	const hover = engine.resizeHandleAt(world.x, world.y, handleThreshold(engine));
	if (!hover) return "default";
	return hover.handle === "nw" || hover.handle === "se" ? "nwse-resize" : "nesw-resize";
}
