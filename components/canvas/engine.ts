/**
 * Scene interaction engine.
 *
 * Owns the shape and connection lists, the viewport and the single
 * interaction state. The input layer feeds it world (or, for panning and
 * zooming, screen) coordinates; the renderer reads its state between calls.
 *
 * Expected misses ("nothing under the pointer", "nothing selected",
 * duplicate links) return false/null and update `status`; they never throw.
 */

import {
	parseEngineConfig,
	type EngineConfig,
	type EngineOptions,
} from "@/lib/scene-config";
import { readSceneFile, writeSceneFile, type ReadSceneResult } from "@/lib/scene-file";
import {
	connectionContainsPoint,
	createConnection,
	removeShapeConnections,
	type ConnectionStyle,
} from "./connections";
import { distance, type Point } from "./lib/geometry";
import { getConnectionPoint, hitTestShapes } from "./lib/shapeGeometry";
import {
	findResizeHandle,
	resizeToPoint,
	rotateShape,
	scaleShape,
	setPosition,
} from "./lib/transform";
import {
	panViewport,
	screenToWorld,
	VIEWPORT_INITIAL,
	worldToScreen,
	zoomViewport,
} from "./lib/viewport";
import { deserializeScene, serializeScene } from "./serialization";
import { createShape, type ShapeOptions } from "./shapeFactories";
import type {
	Connection,
	Corner,
	InteractionState,
	Scene,
	SceneRecord,
	SceneShape,
	ShapeKind,
	ViewportState,
} from "./types";

const IDLE: InteractionState = { mode: "idle" };

const KIND_LABELS: Record<ShapeKind, string> = {
	circle: "Circle",
	rectangle: "Rectangle",
	trapezoid: "Trapezoid",
};

export interface ResizeHandleHit {
	shape: SceneShape;
	handle: Corner;
}

export interface ImportSummary {
	droppedShapes: number;
	droppedConnections: number;
}

export class SceneEngine {
	readonly config: EngineConfig;

	private shapeList: SceneShape[] = [];
	private connectionList: Connection[] = [];
	private selection: string | null = null;
	private state: InteractionState = IDLE;
	private view: ViewportState = VIEWPORT_INITIAL;
	private lastClick: Point | null = null;
	private statusMessage = "";
	private currentFilePath: string | null = null;

	constructor(options: EngineOptions = {}) {
		this.config = parseEngineConfig(options);
	}

	// =========================================================================
	// Queries
	// =========================================================================

	get shapes(): readonly SceneShape[] {
		return this.shapeList;
	}

	get connections(): readonly Connection[] {
		return this.connectionList;
	}

	get selectedId(): string | null {
		return this.selection;
	}

	get selectedShape(): SceneShape | null {
		return this.selection ? this.getShape(this.selection) : null;
	}

	get interaction(): InteractionState {
		return this.state;
	}

	get viewport(): ViewportState {
		return this.view;
	}

	get lastClickPoint(): Point | null {
		return this.lastClick;
	}

	get status(): string {
		return this.statusMessage;
	}

	get filePath(): string | null {
		return this.currentFilePath;
	}

	getShape(id: string): SceneShape | null {
		return this.shapeList.find((s) => s.id === id) ?? null;
	}

	/**
	 * Topmost shape under a world point, without touching the selection
	 */
	shapeAt(x: number, y: number): SceneShape | null {
		return hitTestShapes(this.shapeList, x, y);
	}

	connectionAt(
		x: number,
		y: number,
		threshold: number = this.config.connectionHitThreshold,
	): Connection | null {
		for (let i = this.connectionList.length - 1; i >= 0; i--) {
			const connection = this.connectionList[i];
			if (connectionContainsPoint(connection, this.shapeList, x, y, threshold)) {
				return connection;
			}
		}
		return null;
	}

	/**
	 * Resize handle under a world point. Topmost shape wins; within a shape
	 * the nearest corner wins.
	 *
	 * @param worldThreshold - Usually a fixed pixel radius divided by zoom
	 */
	resizeHandleAt(x: number, y: number, worldThreshold: number): ResizeHandleHit | null {
		for (let i = this.shapeList.length - 1; i >= 0; i--) {
			const shape = this.shapeList[i];
			const handle = findResizeHandle(shape, x, y, worldThreshold);
			if (handle) return { shape, handle };
		}
		return null;
	}

	isDragging(): boolean {
		return this.state.mode === "dragging";
	}

	isResizing(): boolean {
		return this.state.mode === "resizing";
	}

	isPanning(): boolean {
		return this.state.mode === "panning";
	}

	isConnecting(): boolean {
		return this.state.mode === "connecting";
	}

	// =========================================================================
	// Shape creation
	// =========================================================================

	addShape(kind: ShapeKind, x: number, y: number, options?: ShapeOptions): SceneShape {
		const shape = createShape(kind, x, y, options, this.config);
		this.shapeList = [...this.shapeList, shape];
		this.statusMessage = `${KIND_LABELS[kind]} created`;
		return shape;
	}

	recordLastClick(x: number, y: number): void {
		this.lastClick = { x, y };
	}

	/**
	 * Insert at the last recorded click, or at `fallback` if there is none
	 */
	insertShapeAtLastClick(kind: ShapeKind, fallback: Point, options?: ShapeOptions): SceneShape {
		const at = this.lastClick ?? fallback;
		return this.addShape(kind, at.x, at.y, options);
	}

	// =========================================================================
	// Selection
	// =========================================================================

	selectAt(x: number, y: number): SceneShape | null {
		const hit = this.shapeAt(x, y);
		this.selection = hit?.id ?? null;
		return hit;
	}

	deselectAll(): void {
		this.selection = null;
	}

	// =========================================================================
	// Drag
	// =========================================================================

	/**
	 * Grab the topmost shape under the point. The offset between the shape
	 * center and the grab point is kept for the whole drag.
	 */
	startDrag(x: number, y: number): boolean {
		if (this.state.mode !== "idle") return false;
		const hit = this.shapeAt(x, y);
		if (!hit) return false;

		this.selection = hit.id;
		this.state = {
			mode: "dragging",
			shapeId: hit.id,
			grabOffset: { x: hit.x - x, y: hit.y - y },
		};
		return true;
	}

	updateDrag(x: number, y: number): boolean {
		if (this.state.mode !== "dragging") return false;
		const { shapeId, grabOffset } = this.state;
		return this.updateShape(shapeId, (shape) =>
			setPosition(shape, x + grabOffset.x, y + grabOffset.y),
		);
	}

	stopDrag(): void {
		if (this.state.mode === "dragging") this.state = IDLE;
	}

	// =========================================================================
	// Resize
	// =========================================================================

	startResize(
		x: number,
		y: number,
		worldThreshold: number = this.config.resizeHandlePx / this.view.zoom,
	): boolean {
		if (this.state.mode !== "idle") return false;
		const hit = this.resizeHandleAt(x, y, worldThreshold);
		if (!hit) return false;

		const startDistance = distance(hit.shape, { x, y });
		if (startDistance <= 0) return false;

		this.selection = hit.shape.id;
		this.state = {
			mode: "resizing",
			shapeId: hit.shape.id,
			handle: hit.handle,
			startScale: hit.shape.scale,
			startDistance,
		};
		return true;
	}

	updateResize(x: number, y: number): boolean {
		if (this.state.mode !== "resizing") return false;
		const { shapeId, startScale, startDistance } = this.state;
		return this.updateShape(shapeId, (shape) =>
			resizeToPoint(shape, startScale, startDistance, x, y, this.config),
		);
	}

	stopResize(): void {
		if (this.state.mode === "resizing") this.state = IDLE;
	}

	// =========================================================================
	// Viewport
	// =========================================================================

	screenToWorld(screenX: number, screenY: number): Point {
		return screenToWorld(screenX, screenY, this.view);
	}

	worldToScreen(worldX: number, worldY: number): Point {
		return worldToScreen(worldX, worldY, this.view);
	}

	/**
	 * @returns Whether the zoom changed (false once clamped at a limit)
	 */
	zoomAt(delta: number, screenX: number, screenY: number): boolean {
		const next = zoomViewport(this.view, delta, screenX, screenY, this.config);
		if (next === this.view) return false;
		this.view = next;
		return true;
	}

	resetViewport(): void {
		this.view = VIEWPORT_INITIAL;
		this.statusMessage = "View reset";
	}

	startPan(screenX: number, screenY: number): boolean {
		if (this.state.mode !== "idle") return false;
		this.state = { mode: "panning", anchor: { x: screenX, y: screenY } };
		return true;
	}

	/**
	 * Incremental: each call pans by the movement since the previous call.
	 */
	updatePan(screenX: number, screenY: number): boolean {
		if (this.state.mode !== "panning") return false;
		const { anchor } = this.state;
		this.view = panViewport(this.view, screenX - anchor.x, screenY - anchor.y);
		this.state = { mode: "panning", anchor: { x: screenX, y: screenY } };
		return true;
	}

	stopPan(): void {
		if (this.state.mode === "panning") this.state = IDLE;
	}

	// =========================================================================
	// Connections
	// =========================================================================

	connect(sourceId: string, targetId: string, style?: ConnectionStyle): Connection | null {
		if (!this.getShape(sourceId) || !this.getShape(targetId)) {
			this.statusMessage = "Connection endpoint not found";
			return null;
		}

		const result = createConnection(this.connectionList, sourceId, targetId, style);
		if (!result.ok) {
			this.statusMessage =
				result.reason === "self"
					? "Cannot connect a shape to itself"
					: "Connection already exists";
			return null;
		}

		this.connectionList = result.connections;
		this.statusMessage = "Connection created";
		return result.connection;
	}

	/**
	 * Two-click connection gesture. The first hit picks the source; the
	 * second hit attempts the link and always ends the gesture, whether or
	 * not a connection was made.
	 *
	 * @returns True when a source was picked or a connection was created
	 */
	startConnectionAt(x: number, y: number): boolean {
		if (this.state.mode !== "idle" && this.state.mode !== "connecting") return false;
		const hit = this.shapeAt(x, y);
		if (!hit) return false;

		if (this.state.mode === "idle") {
			this.state = { mode: "connecting", sourceId: hit.id };
			this.statusMessage = "Connection start selected";
			return true;
		}

		const { sourceId } = this.state;
		this.state = IDLE;
		return this.connect(sourceId, hit.id) !== null;
	}

	cancelConnection(): boolean {
		if (this.state.mode !== "connecting") return false;
		this.state = IDLE;
		this.statusMessage = "Connection cancelled";
		return true;
	}

	/**
	 * Abort whatever gesture is in progress
	 */
	cancelGesture(): boolean {
		if (this.state.mode === "idle") return false;
		if (this.state.mode === "connecting") return this.cancelConnection();
		this.state = IDLE;
		return true;
	}

	/**
	 * Rubber-band line from the pending source to the mouse, for the renderer
	 */
	connectionPreview(mouseX: number, mouseY: number): [Point, Point] | null {
		if (this.state.mode !== "connecting") return null;
		const source = this.getShape(this.state.sourceId);
		if (!source) return null;
		return [getConnectionPoint(source), { x: mouseX, y: mouseY }];
	}

	// =========================================================================
	// Editing
	// =========================================================================

	/**
	 * Remove a shape and every connection touching it. Any selection or
	 * gesture that referenced the shape is dropped as well.
	 */
	deleteShape(id: string): boolean {
		if (!this.getShape(id)) return false;

		this.shapeList = this.shapeList.filter((s) => s.id !== id);
		this.connectionList = removeShapeConnections(this.connectionList, id);
		if (this.selection === id) this.selection = null;
		if (this.referencesShape(this.state, id)) this.state = IDLE;
		this.statusMessage = "Shape deleted";
		return true;
	}

	deleteSelected(): boolean {
		if (!this.selection) return false;
		return this.deleteShape(this.selection);
	}

	rotateSelected(deltaDeg: number): boolean {
		if (!this.selection) return false;
		return this.updateShape(this.selection, (shape) => rotateShape(shape, deltaDeg));
	}

	scaleSelected(delta: number): boolean {
		if (!this.selection) return false;
		return this.updateShape(this.selection, (shape) => scaleShape(shape, delta, this.config));
	}

	clearScene(): void {
		this.replaceScene({ shapes: [], connections: [] });
		this.statusMessage = "Scene cleared";
	}

	clearStatus(): void {
		this.statusMessage = "";
	}

	// =========================================================================
	// Persistence
	// =========================================================================

	exportScene(): SceneRecord {
		return serializeScene({ shapes: this.shapeList, connections: this.connectionList });
	}

	/**
	 * Replace the scene with the contents of a document. The viewport is
	 * left alone; selection and gestures are reset.
	 */
	importScene(data: unknown): ImportSummary {
		const { scene, droppedShapes, droppedConnections } = deserializeScene(data, this.config);
		this.replaceScene(scene);
		return { droppedShapes, droppedConnections };
	}

	/**
	 * Save to `path`, or to the remembered path of the last save/load.
	 * File system errors are reported in `status` and rethrown.
	 */
	saveToFile(path?: string): boolean {
		const target = path ?? this.currentFilePath;
		if (!target) {
			this.statusMessage = "No file path to save to";
			return false;
		}

		try {
			writeSceneFile(target, this.exportScene());
		} catch (error) {
			this.statusMessage = `Failed to save: ${errorMessage(error)}`;
			throw error;
		}
		this.currentFilePath = target;
		this.statusMessage = `Saved to ${target}`;
		return true;
	}

	/**
	 * Load from `path`, or from the remembered path. A missing or malformed
	 * file leaves an empty scene and a status explaining why.
	 */
	loadFromFile(path?: string): boolean {
		const target = path ?? this.currentFilePath;
		if (!target) {
			this.statusMessage = "No file path to load from";
			return false;
		}

		let result: ReadSceneResult;
		try {
			result = readSceneFile(target);
		} catch (error) {
			this.statusMessage = `Failed to load: ${errorMessage(error)}`;
			throw error;
		}

		if (!result.ok) {
			this.replaceScene({ shapes: [], connections: [] });
			this.statusMessage =
				result.reason === "not-found"
					? `File ${target} not found. Starting with empty scene.`
					: `Failed to load ${target}: ${result.message}`;
			console.warn(this.statusMessage);
			return false;
		}

		const { droppedShapes, droppedConnections } = this.importScene(result.document);
		this.currentFilePath = target;
		this.statusMessage =
			droppedShapes + droppedConnections > 0
				? `Loaded from ${target} (skipped ${droppedShapes} shapes, ${droppedConnections} connections)`
				: `Loaded from ${target}`;
		return true;
	}

	// =========================================================================
	// Internals
	// =========================================================================

	private updateShape(id: string, update: (shape: SceneShape) => SceneShape): boolean {
		const index = this.shapeList.findIndex((s) => s.id === id);
		if (index === -1) return false;
		const next = this.shapeList.slice();
		next[index] = update(next[index]);
		this.shapeList = next;
		return true;
	}

	private replaceScene(scene: Scene): void {
		this.shapeList = scene.shapes;
		this.connectionList = scene.connections;
		this.selection = null;
		this.state = IDLE;
	}

	private referencesShape(state: InteractionState, id: string): boolean {
		switch (state.mode) {
			case "dragging":
			case "resizing":
				return state.shapeId === id;
			case "connecting":
				return state.sourceId === id;
			default:
				return false;
		}
	}
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
