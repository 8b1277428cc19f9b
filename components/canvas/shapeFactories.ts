import { parseColor } from "@/lib/scene-config";
import { COLORS, SHAPE_DEFAULTS } from "./lib/constants";
import { normalizeDegrees } from "./lib/geometry";
import { setScale, type ScaleLimits } from "./lib/transform";
import type {
	CircleShape,
	RectangleShape,
	SceneShape,
	ShapeKind,
	TrapezoidShape,
} from "./types";
import { createId } from "./utils";

interface BaseShapeArgs {
	id?: string;
	x: number;
	y: number;
	color?: string;
	scale?: number;
	rotationDeg?: number;
}

/**
 * Base dimensions must be positive and finite; anything else takes the default
 */
function dimension(value: number | undefined, fallback: number): number {
	return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

export interface ShapeOptions {
	id?: string;
	color?: string;
	scale?: number;
	rotationDeg?: number;
	radius?: number;
	width?: number;
	height?: number;
	topWidth?: number;
	bottomWidth?: number;
}

export function createCircle(
	args: BaseShapeArgs & { radius?: number },
	limits?: ScaleLimits,
): CircleShape {
	const shape: CircleShape = {
		id: args.id ?? createId("circle"),
		kind: "circle",
		x: args.x,
		y: args.y,
		radius: dimension(args.radius, SHAPE_DEFAULTS.circle.radius),
		color: parseColor(args.color, COLORS.circle),
		scale: args.scale ?? 1,
		rotationDeg: normalizeDegrees(args.rotationDeg ?? 0),
	};
	return setScale(shape, shape.scale, limits);
}

export function createRectangle(
	args: BaseShapeArgs & { width?: number; height?: number },
	limits?: ScaleLimits,
): RectangleShape {
	const shape: RectangleShape = {
		id: args.id ?? createId("rectangle"),
		kind: "rectangle",
		x: args.x,
		y: args.y,
		width: dimension(args.width, SHAPE_DEFAULTS.rectangle.width),
		height: dimension(args.height, SHAPE_DEFAULTS.rectangle.height),
		color: parseColor(args.color, COLORS.rectangle),
		scale: args.scale ?? 1,
		rotationDeg: normalizeDegrees(args.rotationDeg ?? 0),
	};
	return setScale(shape, shape.scale, limits);
}

export function createTrapezoid(
	args: BaseShapeArgs & { topWidth?: number; bottomWidth?: number; height?: number },
	limits?: ScaleLimits,
): TrapezoidShape {
	const shape: TrapezoidShape = {
		id: args.id ?? createId("trapezoid"),
		kind: "trapezoid",
		x: args.x,
		y: args.y,
		topWidth: dimension(args.topWidth, SHAPE_DEFAULTS.trapezoid.topWidth),
		bottomWidth: dimension(args.bottomWidth, SHAPE_DEFAULTS.trapezoid.bottomWidth),
		height: dimension(args.height, SHAPE_DEFAULTS.trapezoid.height),
		color: parseColor(args.color, COLORS.trapezoid),
		scale: args.scale ?? 1,
		rotationDeg: normalizeDegrees(args.rotationDeg ?? 0),
	};
	return setScale(shape, shape.scale, limits);
}

/**
 * Create any shape kind centered on (x, y). Options that do not apply to
 * the kind are ignored.
 */
export function createShape(
	kind: ShapeKind,
	x: number,
	y: number,
	options: ShapeOptions = {},
	limits?: ScaleLimits,
): SceneShape {
	const base = {
		id: options.id,
		x,
		y,
		color: options.color,
		scale: options.scale,
		rotationDeg: options.rotationDeg,
	};

	switch (kind) {
		case "circle":
			return createCircle({ ...base, radius: options.radius }, limits);
		case "rectangle":
			return createRectangle(
				{ ...base, width: options.width, height: options.height },
				limits,
			);
		case "trapezoid":
			return createTrapezoid(
				{
					...base,
					topWidth: options.topWidth,
					bottomWidth: options.bottomWidth,
					height: options.height,
				},
				limits,
			);
	}
}
