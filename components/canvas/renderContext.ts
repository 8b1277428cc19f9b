/**
 * Frame snapshot for the render layer.
 *
 * The renderer never computes geometry itself: it draws what this
 * snapshot resolves, in z-order, already mapped to screen space.
 */

import { getLineEndpoints } from "./connections";
import type { SceneEngine } from "./engine";
import {
	getCombinedBounds,
	getShapeVertices,
	worldToScreen,
	type Point,
	type Rect,
} from "./lib";
import type { Connection, SceneShape, ViewportState } from "./types";

export interface RenderShape {
	shape: SceneShape;
	vertices: Point[];
	screenVertices: Point[];
	selected: boolean;
}

export interface RenderConnection {
	connection: Connection;
	start: Point;
	end: Point;
	screenStart: Point;
	screenEnd: Point;
}

export interface RenderContext {
	shapes: RenderShape[];
	connections: RenderConnection[];
	preview: [Point, Point] | null;
	selectedId: string | null;
	viewport: ViewportState;
	sceneBounds: Rect;
	status: string;
}

/**
 * Resolve everything a frame needs to draw.
 *
 * @param mouseWorld - Current pointer position, used for the connection preview
 */
export function buildRenderContext(engine: SceneEngine, mouseWorld?: Point): RenderContext {
	const viewport = engine.viewport;
	const toScreen = (p: Point) => worldToScreen(p.x, p.y, viewport);

	const shapes = engine.shapes.map((shape) => {
		const vertices = getShapeVertices(shape, engine.config.circleSegments);
		return {
			shape,
			vertices,
			screenVertices: vertices.map(toScreen),
			selected: shape.id === engine.selectedId,
		};
	});

	const connections: RenderConnection[] = [];
	for (const connection of engine.connections) {
		const endpoints = getLineEndpoints(connection, engine.shapes);
		if (!endpoints) continue;
		const [start, end] = endpoints;
		connections.push({
			connection,
			start,
			end,
			screenStart: toScreen(start),
			screenEnd: toScreen(end),
		});
	}

	return {
		shapes,
		connections,
		preview: mouseWorld ? engine.connectionPreview(mouseWorld.x, mouseWorld.y) : null,
		selectedId: engine.selectedId,
		viewport,
		sceneBounds: getCombinedBounds(engine.shapes),
		status: engine.status,
	};
}
