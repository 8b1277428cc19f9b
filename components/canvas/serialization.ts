/**
 * Scene <-> persisted document conversion.
 *
 * Connections are stored by positional index into the `shapes` array as
 * written, so the document carries no shape identity of its own. Fresh ids
 * are handed out on load.
 */

import {
	ConnectionRecordSchema,
	SceneDocumentSchema,
	SHAPE_KINDS,
	ShapeRecordSchema,
} from "@/lib/scene-config";
import { createConnection } from "./connections";
import type { ScaleLimits } from "./lib/transform";
import { createCircle, createRectangle, createTrapezoid } from "./shapeFactories";
import type {
	Connection,
	ConnectionRecord,
	Scene,
	SceneRecord,
	SceneShape,
	ShapeKind,
	ShapeRecord,
} from "./types";

export interface DeserializeResult {
	scene: Scene;
	droppedShapes: number;
	droppedConnections: number;
}

// =============================================================================
// Shapes
// =============================================================================

export function shapeToRecord(shape: SceneShape): ShapeRecord {
	const base = { x: shape.x, y: shape.y };
	const style = {
		color: shape.color,
		scale: shape.scale,
		rotation_deg: shape.rotationDeg,
	};

	switch (shape.kind) {
		case "circle":
			return { kind: "circle", ...base, radius: shape.radius, ...style };
		case "rectangle":
			return {
				kind: "rectangle",
				...base,
				width: shape.width,
				height: shape.height,
				...style,
			};
		case "trapezoid":
			return {
				kind: "trapezoid",
				...base,
				top_width: shape.topWidth,
				bottom_width: shape.bottomWidth,
				height: shape.height,
				...style,
			};
	}
}

/**
 * Build a live shape from a validated record. Scale is re-clamped and
 * rotation re-normalized, so hand-edited files cannot break the invariants.
 */
export function shapeFromRecord(record: ShapeRecord, limits?: ScaleLimits): SceneShape {
	const base = {
		x: record.x,
		y: record.y,
		color: record.color,
		scale: record.scale,
		rotationDeg: record.rotation_deg,
	};

	switch (record.kind) {
		case "circle":
			return createCircle({ ...base, radius: record.radius }, limits);
		case "rectangle":
			return createRectangle(
				{ ...base, width: record.width, height: record.height },
				limits,
			);
		case "trapezoid":
			return createTrapezoid(
				{
					...base,
					topWidth: record.top_width,
					bottomWidth: record.bottom_width,
					height: record.height,
				},
				limits,
			);
	}
}

function isShapeKind(value: unknown): value is ShapeKind {
	return SHAPE_KINDS.some((kind) => kind === value);
}

function readKind(raw: unknown): unknown {
	return typeof raw === "object" && raw !== null && "kind" in raw ? raw.kind : undefined;
}

/**
 * Validate a single shape entry. Unknown kinds and malformed records are
 * logged and skipped.
 */
export function parseShapeRecord(raw: unknown): ShapeRecord | null {
	const kind = readKind(raw);
	if (!isShapeKind(kind)) {
		console.warn("Unknown shape kind, skipping record:", kind);
		return null;
	}

	const result = ShapeRecordSchema.safeParse(raw);
	if (result.success) {
		return result.data;
	}
	console.warn(`Invalid ${kind} record, skipping:`, result.error.format());
	return null;
}

// =============================================================================
// Scene
// =============================================================================

export function serializeScene(scene: Scene): SceneRecord {
	const indexById = new Map(scene.shapes.map((shape, index) => [shape.id, index]));
	const connections: ConnectionRecord[] = [];

	for (const connection of scene.connections) {
		const source = indexById.get(connection.sourceId);
		const target = indexById.get(connection.targetId);
		if (source === undefined || target === undefined) continue;
		connections.push({
			source,
			target,
			color: connection.color,
			line_width: connection.lineWidth,
		});
	}

	return {
		shapes: scene.shapes.map(shapeToRecord),
		connections,
	};
}

/**
 * Rebuild a scene from a document. Never throws for bad content: dropped
 * entries are counted instead.
 *
 * Connection indices point into the `shapes` array as stored. An index that
 * is out of range, or that names a shape record which was itself dropped,
 * drops the connection.
 */
export function deserializeScene(data: unknown, limits?: ScaleLimits): DeserializeResult {
	const document = SceneDocumentSchema.safeParse(data);
	if (!document.success) {
		console.warn("Invalid scene document, using empty scene:", document.error.format());
		return {
			scene: { shapes: [], connections: [] },
			droppedShapes: 0,
			droppedConnections: 0,
		};
	}

	const slots: Array<SceneShape | null> = document.data.shapes.map((raw) => {
		const record = parseShapeRecord(raw);
		return record ? shapeFromRecord(record, limits) : null;
	});
	const shapes = slots.filter((shape): shape is SceneShape => shape !== null);

	let connections: Connection[] = [];
	for (const raw of document.data.connections) {
		const parsed = ConnectionRecordSchema.safeParse(raw);
		if (!parsed.success) continue;

		const { source, target, color, line_width } = parsed.data;
		const sourceShape = source >= 0 && source < slots.length ? slots[source] : null;
		const targetShape = target >= 0 && target < slots.length ? slots[target] : null;
		if (!sourceShape || !targetShape) continue;

		const result = createConnection(connections, sourceShape.id, targetShape.id, {
			color,
			lineWidth: line_width,
		});
		if (result.ok) connections = result.connections;
	}

	return {
		scene: { shapes, connections },
		droppedShapes: slots.length - shapes.length,
		droppedConnections: document.data.connections.length - connections.length,
	};
}
