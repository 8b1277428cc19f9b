import { describe, expect, it } from "vitest";
import {
	boundingBox,
	clamp,
	distanceToSegment,
	normalizeDegrees,
	pointInPolygon,
	rotatePoint,
} from "./geometry";

describe("normalizeDegrees", () => {
	it("wraps angles into [0, 360)", () => {
		expect(normalizeDegrees(0)).toBe(0);
		expect(normalizeDegrees(360)).toBe(0);
		expect(normalizeDegrees(725)).toBe(5);
		expect(normalizeDegrees(-90)).toBe(270);
		expect(normalizeDegrees(-720)).toBe(0);
	});

	it("leaves in-range angles exact", () => {
		expect(normalizeDegrees(0.1)).toBe(0.1);
		expect(normalizeDegrees(359.9)).toBe(359.9);
		expect(normalizeDegrees(-0)).toBe(0);
		expect(normalizeDegrees(-360)).toBe(0);
	});
});

describe("clamp", () => {
	it("limits a value to the range", () => {
		expect(clamp(5, 0.25, 4)).toBe(4);
		expect(clamp(0.1, 0.25, 4)).toBe(0.25);
		expect(clamp(1.5, 0.25, 4)).toBe(1.5);
	});
});

describe("rotatePoint", () => {
	it("turns clockwise on a y-down surface", () => {
		const p = rotatePoint({ x: 10, y: 0 }, 90);
		expect(p.x).toBeCloseTo(0);
		expect(p.y).toBeCloseTo(10);
	});

	it("returns a copy for a zero angle", () => {
		const original = { x: 3, y: 4 };
		const p = rotatePoint(original, 0);
		expect(p).toEqual({ x: 3, y: 4 });
		expect(p).not.toBe(original);
	});
});

describe("pointInPolygon", () => {
	const square = [
		{ x: 0, y: 0 },
		{ x: 10, y: 0 },
		{ x: 10, y: 10 },
		{ x: 0, y: 10 },
	];

	it("detects inside and outside points", () => {
		expect(pointInPolygon({ x: 5, y: 5 }, square)).toBe(true);
		expect(pointInPolygon({ x: 15, y: 5 }, square)).toBe(false);
		expect(pointInPolygon({ x: 5, y: -1 }, square)).toBe(false);
	});
});

describe("distanceToSegment", () => {
	const a = { x: 0, y: 0 };
	const b = { x: 10, y: 0 };

	it("measures perpendicular distance inside the segment", () => {
		expect(distanceToSegment({ x: 5, y: 5 }, a, b)).toBeCloseTo(5);
	});

	it("clamps to the nearest endpoint past the ends", () => {
		expect(distanceToSegment({ x: -3, y: 4 }, a, b)).toBeCloseTo(5);
		expect(distanceToSegment({ x: 13, y: -4 }, a, b)).toBeCloseTo(5);
	});

	it("falls back to point distance for a zero-length segment", () => {
		const p = { x: 1, y: 1 };
		expect(distanceToSegment({ x: 4, y: 5 }, p, p)).toBeCloseTo(5);
	});
});

describe("boundingBox", () => {
	it("spans all points", () => {
		expect(
			boundingBox([
				{ x: -2, y: 3 },
				{ x: 4, y: -1 },
				{ x: 1, y: 7 },
			]),
		).toEqual({ x: -2, y: -1, width: 6, height: 8 });
	});

	it("is empty for no points", () => {
		expect(boundingBox([])).toEqual({ x: 0, y: 0, width: 0, height: 0 });
	});
});
