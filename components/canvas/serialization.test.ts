import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createConnection } from "./connections";
import { deserializeScene, serializeScene } from "./serialization";
import { createCircle, createRectangle } from "./shapeFactories";
import type { Scene } from "./types";

function sampleScene(): Scene {
	const circle = createCircle({ x: 10, y: 20, radius: 30 });
	const rect = createRectangle({ x: 100, y: 50, width: 60, height: 40, rotationDeg: 45 });
	const result = createConnection([], circle.id, rect.id);
	if (!result.ok) throw new Error("sample connection rejected");
	return { shapes: [circle, rect], connections: result.connections };
}

describe("serializeScene", () => {
	it("writes records with positional connection indices", () => {
		expect(serializeScene(sampleScene())).toEqual({
			shapes: [
				{
					kind: "circle",
					x: 10,
					y: 20,
					radius: 30,
					color: "#6464ff",
					scale: 1,
					rotation_deg: 0,
				},
				{
					kind: "rectangle",
					x: 100,
					y: 50,
					width: 60,
					height: 40,
					color: "#ff6464",
					scale: 1,
					rotation_deg: 45,
				},
			],
			connections: [{ source: 0, target: 1, color: "#c8c8c8", line_width: 2 }],
		});
	});

	it("writes trapezoid dimensions in snake case", () => {
		const [record] = serializeScene({
			shapes: [
				{
					id: "t",
					kind: "trapezoid",
					x: 0,
					y: 0,
					topWidth: 20,
					bottomWidth: 40,
					height: 30,
					color: "#78c88c",
					scale: 1.5,
					rotationDeg: 10,
				},
			],
			connections: [],
		}).shapes;
		expect(record).toEqual({
			kind: "trapezoid",
			x: 0,
			y: 0,
			top_width: 20,
			bottom_width: 40,
			height: 30,
			color: "#78c88c",
			scale: 1.5,
			rotation_deg: 10,
		});
	});
});

describe("deserializeScene", () => {
	beforeEach(() => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("round-trips through JSON", () => {
		const record = serializeScene(sampleScene());
		const { scene, droppedShapes, droppedConnections } = deserializeScene(
			JSON.parse(JSON.stringify(record)),
		);

		expect(droppedShapes).toBe(0);
		expect(droppedConnections).toBe(0);
		expect(scene.shapes).toHaveLength(2);
		expect(scene.connections).toHaveLength(1);
		expect(scene.connections[0].sourceId).toBe(scene.shapes[0].id);
		expect(scene.connections[0].targetId).toBe(scene.shapes[1].id);
		expect(serializeScene(scene)).toEqual(record);
	});

	it("defaults missing scale and rotation", () => {
		const { scene } = deserializeScene({
			shapes: [{ kind: "circle", x: 1, y: 2, radius: 5, color: "#010203" }],
			connections: [],
		});
		expect(scene.shapes[0]).toMatchObject({ scale: 1, rotationDeg: 0 });
	});

	it("clamps scale and normalizes rotation from hand-edited files", () => {
		const { scene } = deserializeScene({
			shapes: [
				{
					kind: "rectangle",
					x: 0,
					y: 0,
					width: 10,
					height: 10,
					color: "#000000",
					scale: 10,
					rotation_deg: -90,
				},
			],
		});
		expect(scene.shapes[0]).toMatchObject({ scale: 4, rotationDeg: 270 });
	});

	it("keeps small dimensions and fractional angles unchanged", () => {
		const record = {
			kind: "trapezoid",
			x: 0,
			y: 0,
			top_width: 0.5,
			bottom_width: 0.75,
			height: 0.25,
			color: "#000000",
			scale: 1,
			rotation_deg: 0.1,
		};
		const { scene } = deserializeScene({ shapes: [record], connections: [] });
		expect(serializeScene(scene).shapes).toEqual([record]);
	});

	it("accepts legacy RGB triples", () => {
		const { scene } = deserializeScene({
			shapes: [{ kind: "circle", x: 0, y: 0, radius: 5, color: [100, 150, 200] }],
			connections: [],
		});
		expect(scene.shapes[0].color).toBe("#6496c8");
	});

	it("drops connections with out-of-range indices", () => {
		const record = serializeScene(sampleScene());
		const { scene, droppedConnections } = deserializeScene({
			shapes: record.shapes,
			connections: [
				{ source: 0, target: 1 },
				{ source: 0, target: 5 },
				{ source: -1, target: 0 },
			],
		});

		expect(scene.connections).toHaveLength(1);
		expect(droppedConnections).toBe(2);
	});

	it("skips unknown kinds and the connections that point at them", () => {
		const { scene, droppedShapes, droppedConnections } = deserializeScene({
			shapes: [
				{ kind: "hexagon", x: 0, y: 0, color: "#000000" },
				{ kind: "circle", x: 5, y: 5, radius: 10, color: "#000000" },
				{ kind: "circle", x: 50, y: 5, radius: 10, color: "#000000" },
			],
			connections: [
				{ source: 0, target: 1 },
				{ source: 1, target: 2 },
			],
		});

		expect(scene.shapes.map((s) => s.x)).toEqual([5, 50]);
		expect(droppedShapes).toBe(1);
		expect(droppedConnections).toBe(1);
		expect(scene.connections[0].sourceId).toBe(scene.shapes[0].id);
		expect(scene.connections[0].targetId).toBe(scene.shapes[1].id);
		expect(console.warn).toHaveBeenCalledWith("Unknown shape kind, skipping record:", "hexagon");
	});

	it("skips malformed records of a known kind", () => {
		const { scene, droppedShapes } = deserializeScene({
			shapes: [
				{ kind: "circle", x: 0, y: 0, radius: -3, color: "#000000" },
				{ kind: "rectangle", x: "left", y: 0, width: 1, height: 1, color: "#000000" },
			],
		});
		expect(scene.shapes).toEqual([]);
		expect(droppedShapes).toBe(2);
	});

	it("drops self and duplicate connection records", () => {
		const record = serializeScene(sampleScene());
		const { scene, droppedConnections } = deserializeScene({
			shapes: record.shapes,
			connections: [
				{ source: 0, target: 0 },
				{ source: 0, target: 1 },
				{ source: 1, target: 0 },
			],
		});
		expect(scene.connections).toHaveLength(1);
		expect(droppedConnections).toBe(2);
	});

	it("keeps connection styling", () => {
		const record = serializeScene(sampleScene());
		const { scene } = deserializeScene({
			shapes: record.shapes,
			connections: [{ source: 0, target: 1, color: [255, 0, 0], line_width: 3 }],
		});
		expect(scene.connections[0]).toMatchObject({ color: "#ff0000", lineWidth: 3 });
	});

	it("returns an empty scene for a non-object document", () => {
		expect(deserializeScene("not a scene")).toEqual({
			scene: { shapes: [], connections: [] },
			droppedShapes: 0,
			droppedConnections: 0,
		});
		expect(deserializeScene({ shapes: 5 }).scene.shapes).toEqual([]);
	});

	it("loads an empty document", () => {
		expect(deserializeScene({}).scene).toEqual({ shapes: [], connections: [] });
	});
});
