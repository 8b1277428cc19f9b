import type { z } from "zod";
import type {
	CircleShapeSchema,
	ConnectionRecordSchema,
	ConnectionSchema,
	RectangleShapeSchema,
	SceneShapeSchema,
	ShapeRecordSchema,
	TrapezoidShapeSchema,
} from "@/lib/scene-config";
import type { Point } from "./lib/geometry";

// =============================================================================
// Shape Types - Derived from Zod schemas in lib/scene-config.ts
// This keeps the live scene and the persisted document in sync
// =============================================================================

export type ShapeKind = SceneShape["kind"];

export type CircleShape = z.infer<typeof CircleShapeSchema>;
export type RectangleShape = z.infer<typeof RectangleShapeSchema>;
export type TrapezoidShape = z.infer<typeof TrapezoidShapeSchema>;
export type PolygonShape = RectangleShape | TrapezoidShape;

export type SceneShape = z.infer<typeof SceneShapeSchema>;

export type Connection = z.infer<typeof ConnectionSchema>;

export interface Scene {
	shapes: SceneShape[];
	connections: Connection[];
}

// =============================================================================
// Record Types - the persisted scene document
// =============================================================================

export type ShapeRecord = z.infer<typeof ShapeRecordSchema>;
export type ConnectionRecord = z.infer<typeof ConnectionRecordSchema>;

export interface SceneRecord {
	shapes: ShapeRecord[];
	connections: ConnectionRecord[];
}

// =============================================================================
// Interaction Types
// =============================================================================

export type Corner = "nw" | "ne" | "sw" | "se";

export type InteractionState =
	| { mode: "idle" }
	| { mode: "dragging"; shapeId: string; grabOffset: Point }
	| {
			mode: "resizing";
			shapeId: string;
			handle: Corner;
			startScale: number;
			startDistance: number;
	  }
	| { mode: "panning"; anchor: Point }
	| { mode: "connecting"; sourceId: string };

export type Tool = "select" | "connect";

export interface ViewportState {
	zoom: number;
	offsetX: number;
	offsetY: number;
}

export type ConnectionFailure = "self" | "duplicate";
