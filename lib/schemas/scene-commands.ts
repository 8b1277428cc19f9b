/**
 * Discrete editor commands (menus, shortcuts, toolbar buttons).
 *
 * The input layer may build these from untrusted sources (key maps,
 * scripted sessions), so they are validated before reaching the engine.
 */

import { z } from "zod";
import { HexColorSchema, SHAPE_KINDS } from "../scene-config";

// ============================================================================
// Command Schemas
// ============================================================================

export const createShapeCommandSchema = z.object({
	tool: z.literal("createShape"),
	kind: z.enum(SHAPE_KINDS),
	// Omitted coordinates insert at the last click
	x: z.number().optional(),
	y: z.number().optional(),
	color: HexColorSchema.optional(),
	scale: z.number().positive().optional(),
	rotationDeg: z.number().optional(),
});

export const rotateSelectedCommandSchema = z.object({
	tool: z.literal("rotateSelected"),
	degrees: z.number().default(90),
});

export const scaleSelectedCommandSchema = z.object({
	tool: z.literal("scaleSelected"),
	delta: z.number(),
});

export const fileCommandSchema = z.object({
	tool: z.enum(["save", "load"]),
	path: z.string().min(1).optional(),
});

export const sceneCommandSchema = z.union([
	createShapeCommandSchema,
	rotateSelectedCommandSchema,
	scaleSelectedCommandSchema,
	fileCommandSchema,
	z.object({
		tool: z.enum(["deleteSelected", "resetViewport", "cancelGesture", "clearScene"]),
	}),
]);

export type SceneCommand = z.infer<typeof sceneCommandSchema>;
export type SceneCommandInput = z.input<typeof sceneCommandSchema>;

/**
 * Validate a command, returning null if invalid.
 */
export function parseCommand(data: unknown): SceneCommand | null {
	const result = sceneCommandSchema.safeParse(data);
	if (result.success) {
		return result.data;
	}
	console.warn("Invalid scene command:", result.error.format());
	return null;
}
