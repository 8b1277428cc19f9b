import { z } from "zod";
import { COLORS, LIMITS, SIZES } from "@/components/canvas/lib/constants";

// =============================================================================
// Shape Schemas - Single source of truth for live scene entities
// Types are derived from these schemas using z.infer<>
// =============================================================================

export const HexColorSchema = z
	.string()
	.regex(/^#[0-9a-fA-F]{6}$/, "Expected a #rrggbb color");

export const BaseShapeSchema = z.object({
	id: z.string(),
	x: z.number(),
	y: z.number(),
	color: HexColorSchema,
	scale: z.number(),
	rotationDeg: z.number(),
});

export const CircleShapeSchema = BaseShapeSchema.extend({
	kind: z.literal("circle"),
	radius: z.number().positive(),
});

export const RectangleShapeSchema = BaseShapeSchema.extend({
	kind: z.literal("rectangle"),
	width: z.number().positive(),
	height: z.number().positive(),
});

export const TrapezoidShapeSchema = BaseShapeSchema.extend({
	kind: z.literal("trapezoid"),
	topWidth: z.number().positive(),
	bottomWidth: z.number().positive(),
	height: z.number().positive(),
});

export const SceneShapeSchema = z.discriminatedUnion("kind", [
	CircleShapeSchema,
	RectangleShapeSchema,
	TrapezoidShapeSchema,
]);

export const SHAPE_KINDS = ["circle", "rectangle", "trapezoid"] as const;

export const LineWidthSchema = z.number().positive().finite();

export const ConnectionSchema = z.object({
	id: z.string(),
	sourceId: z.string(),
	targetId: z.string(),
	color: HexColorSchema,
	lineWidth: LineWidthSchema,
});

// =============================================================================
// Persisted Record Schemas - the on-disk scene document
// =============================================================================

function toHexChannel(value: number): string {
	return value.toString(16).padStart(2, "0");
}

export function rgbToHex([r, g, b]: readonly [number, number, number]): string {
	return `#${toHexChannel(r)}${toHexChannel(g)}${toHexChannel(b)}`;
}

const RgbChannelSchema = z.number().int().min(0).max(255);

// Older scene files store colors as [r, g, b] triples
export const RecordColorSchema = z.union([
	HexColorSchema,
	z
		.tuple([RgbChannelSchema, RgbChannelSchema, RgbChannelSchema])
		.transform(rgbToHex),
]);

const BaseShapeRecordSchema = z.object({
	x: z.number(),
	y: z.number(),
	color: RecordColorSchema,
	scale: z.number().default(1),
	rotation_deg: z.number().default(0),
});

export const CircleRecordSchema = BaseShapeRecordSchema.extend({
	kind: z.literal("circle"),
	radius: z.number().positive(),
});

export const RectangleRecordSchema = BaseShapeRecordSchema.extend({
	kind: z.literal("rectangle"),
	width: z.number().positive(),
	height: z.number().positive(),
});

export const TrapezoidRecordSchema = BaseShapeRecordSchema.extend({
	kind: z.literal("trapezoid"),
	top_width: z.number().positive(),
	bottom_width: z.number().positive(),
	height: z.number().positive(),
});

export const ShapeRecordSchema = z.discriminatedUnion("kind", [
	CircleRecordSchema,
	RectangleRecordSchema,
	TrapezoidRecordSchema,
]);

export const ConnectionRecordSchema = z.object({
	source: z.number().int(),
	target: z.number().int(),
	color: RecordColorSchema.default(COLORS.connection),
	line_width: LineWidthSchema.default(SIZES.connectionLineWidth),
});

/**
 * Resolve a caller-supplied color to the stored hex form, or the fallback
 * when it would not load back
 */
export function parseColor(value: unknown, fallback: string): string {
	if (value === undefined) return fallback;
	const result = RecordColorSchema.safeParse(value);
	if (result.success) {
		return result.data;
	}
	console.warn("Invalid color, using default:", value);
	return fallback;
}

export function parseLineWidth(value: unknown, fallback: number): number {
	if (value === undefined) return fallback;
	const result = LineWidthSchema.safeParse(value);
	if (result.success) {
		return result.data;
	}
	console.warn("Invalid line width, using default:", value);
	return fallback;
}

// Entries are validated one by one so a bad record never sinks the whole scene
export const SceneDocumentSchema = z.object({
	shapes: z.array(z.unknown()).default([]),
	connections: z.array(z.unknown()).default([]),
});

// =============================================================================
// Engine Configuration
// =============================================================================

export const EngineConfigSchema = z
	.object({
		scaleMin: z.number().positive().default(LIMITS.scaleMin),
		scaleMax: z.number().positive().default(LIMITS.scaleMax),
		zoomMin: z.number().positive().default(LIMITS.zoomMin),
		zoomMax: z.number().positive().default(LIMITS.zoomMax),
		zoomInFactor: z.number().gt(1).default(LIMITS.zoomInFactor),
		zoomOutFactor: z.number().positive().lt(1).default(LIMITS.zoomOutFactor),
		resizeHandlePx: z.number().positive().default(SIZES.resizeHandlePx),
		connectionHitThreshold: z
			.number()
			.positive()
			.default(SIZES.connectionHitThreshold),
		circleSegments: z.number().int().min(3).default(SIZES.circleSegments),
	})
	.refine((config) => config.scaleMin <= config.scaleMax, {
		message: "scaleMin must not exceed scaleMax",
		path: ["scaleMin"],
	})
	.refine((config) => config.zoomMin <= config.zoomMax, {
		message: "zoomMin must not exceed zoomMax",
		path: ["zoomMin"],
	});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineOptions = z.input<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

// Parse and validate engine options, returning the defaults if invalid
export function parseEngineConfig(config: unknown): EngineConfig {
	const result = EngineConfigSchema.safeParse(config ?? {});
	if (result.success) {
		return result.data;
	}
	console.warn("Invalid engine config, using defaults:", result.error.format());
	return DEFAULT_ENGINE_CONFIG;
}
