import { describe, expect, it } from "vitest";
import { createCircle, createRectangle } from "../shapeFactories";
import { getCombinedBounds, getShapeBounds } from "./bounds";
import {
	findResizeHandle,
	moveShape,
	resizeToPoint,
	rotateShape,
	scaleShape,
	setScale,
} from "./transform";

describe("shape transforms", () => {
	const rect = createRectangle({ id: "r", x: 0, y: 0, width: 60, height: 40 });

	it("moves by a delta without mutating", () => {
		const moved = moveShape(rect, 15, -5);
		expect(moved).toMatchObject({ id: "r", x: 15, y: -5 });
		expect(rect).toMatchObject({ x: 0, y: 0 });
	});

	it("clamps scale into [0.25, 4]", () => {
		expect(scaleShape(rect, 0.5).scale).toBe(1.5);
		expect(scaleShape(rect, 10).scale).toBe(4);
		expect(scaleShape(rect, -5).scale).toBe(0.25);
		expect(setScale(rect, 3, { scaleMin: 0.5, scaleMax: 2 }).scale).toBe(2);
	});

	it("normalizes rotation into [0, 360)", () => {
		expect(rotateShape(rect, -90).rotationDeg).toBe(270);
		expect(rotateShape(rect, 370).rotationDeg).toBe(10);
		expect(rotateShape(rotateShape(rect, 300), 60).rotationDeg).toBe(0);
	});
});

describe("findResizeHandle", () => {
	const rect = createRectangle({ x: 0, y: 0, width: 60, height: 40 });

	it("finds the corner nearest the point", () => {
		expect(findResizeHandle(rect, 29, 19, 8)).toBe("se");
		expect(findResizeHandle(rect, -33, -24, 8)).toBe("nw");
		expect(findResizeHandle(rect, 31, -21, 8)).toBe("ne");
		expect(findResizeHandle(rect, -30, 22, 8)).toBe("sw");
	});

	it("includes points exactly at the threshold", () => {
		expect(findResizeHandle(rect, 38, 20, 8)).toBe("se");
		expect(findResizeHandle(rect, 39, 20, 8)).toBeNull();
	});

	it("ignores the interior", () => {
		expect(findResizeHandle(rect, 0, 0, 8)).toBeNull();
	});
});

describe("resizeToPoint", () => {
	const rect = createRectangle({ x: 0, y: 0, width: 60, height: 40 });
	const startDistance = Math.hypot(30, 20);

	it("scales with the distance from the center", () => {
		expect(resizeToPoint(rect, 1, startDistance, 60, 40).scale).toBeCloseTo(2);
		expect(resizeToPoint(rect, 1, startDistance, -45, -30).scale).toBeCloseTo(1.5);
	});

	it("clamps the result", () => {
		expect(resizeToPoint(rect, 1, startDistance, 3000, 2000).scale).toBe(4);
		expect(resizeToPoint(rect, 1, startDistance, 3, 2).scale).toBe(0.25);
	});

	it("leaves the shape alone for a zero start distance", () => {
		expect(resizeToPoint(rect, 1, 0, 60, 40)).toBe(rect);
	});
});

describe("bounds", () => {
	it("uses the exact circle extent", () => {
		const circle = createCircle({ x: 10, y: 20, radius: 30, scale: 2 });
		expect(getShapeBounds(circle)).toEqual({ x: -50, y: -40, width: 120, height: 120 });
	});

	it("accounts for rotation", () => {
		const upright = createRectangle({ x: 0, y: 0, width: 60, height: 40, rotationDeg: 90 });
		const bounds = getShapeBounds(upright);
		expect(bounds.x).toBeCloseTo(-20);
		expect(bounds.y).toBeCloseTo(-30);
		expect(bounds.width).toBeCloseTo(40);
		expect(bounds.height).toBeCloseTo(60);
	});

	it("combines several shapes", () => {
		const shapes = [
			createCircle({ x: 0, y: 0, radius: 10 }),
			createRectangle({ x: 100, y: 50, width: 60, height: 40 }),
		];
		expect(getCombinedBounds(shapes)).toEqual({ x: -10, y: -10, width: 140, height: 80 });
		expect(getCombinedBounds([])).toEqual({ x: 0, y: 0, width: 0, height: 0 });
	});
});
