/**
 * Connection model: edges between two shapes.
 *
 * Connections hold shape ids, never the shapes themselves, so endpoints
 * are always resolved against the current shape list.
 */

import { parseColor, parseLineWidth } from "@/lib/scene-config";
import { COLORS, SIZES } from "./lib/constants";
import { distanceToSegment, type Point } from "./lib/geometry";
import { getConnectionPoint } from "./lib/shapeGeometry";
import type { Connection, ConnectionFailure, SceneShape } from "./types";
import { createId } from "./utils";

export interface ConnectionStyle {
	color?: string;
	lineWidth?: number;
}

export type CreateConnectionResult =
	| { ok: true; connection: Connection; connections: Connection[] }
	| { ok: false; reason: ConnectionFailure };

/**
 * True when the connection links a and b, in either direction
 */
export function linksPair(connection: Connection, a: string, b: string): boolean {
	return (
		(connection.sourceId === a && connection.targetId === b) ||
		(connection.sourceId === b && connection.targetId === a)
	);
}

export function touchesShape(connection: Connection, shapeId: string): boolean {
	return connection.sourceId === shapeId || connection.targetId === shapeId;
}

/**
 * Append a connection between two distinct, not yet linked shapes.
 * The input list is left untouched.
 */
export function createConnection(
	connections: readonly Connection[],
	sourceId: string,
	targetId: string,
	style: ConnectionStyle = {},
): CreateConnectionResult {
	if (sourceId === targetId) {
		return { ok: false, reason: "self" };
	}
	if (connections.some((c) => linksPair(c, sourceId, targetId))) {
		return { ok: false, reason: "duplicate" };
	}

	const connection: Connection = {
		id: createId("connection"),
		sourceId,
		targetId,
		color: parseColor(style.color, COLORS.connection),
		lineWidth: parseLineWidth(style.lineWidth, SIZES.connectionLineWidth),
	};
	return { ok: true, connection, connections: [...connections, connection] };
}

/**
 * Start and end of the drawn line, or null if either shape is gone
 */
export function getLineEndpoints(
	connection: Connection,
	shapes: readonly SceneShape[],
): [Point, Point] | null {
	const source = shapes.find((s) => s.id === connection.sourceId);
	const target = shapes.find((s) => s.id === connection.targetId);
	if (!source || !target) return null;
	return [getConnectionPoint(source), getConnectionPoint(target)];
}

export function connectionContainsPoint(
	connection: Connection,
	shapes: readonly SceneShape[],
	x: number,
	y: number,
	threshold: number = SIZES.connectionHitThreshold,
): boolean {
	const endpoints = getLineEndpoints(connection, shapes);
	if (!endpoints) return false;
	return distanceToSegment({ x, y }, endpoints[0], endpoints[1]) <= threshold;
}

/**
 * Cascade helper: drop every connection that touches the shape
 */
export function removeShapeConnections(
	connections: readonly Connection[],
	shapeId: string,
): Connection[] {
	return connections.filter((c) => !touchesShape(c, shapeId));
}
