/**
 * Scene constants and default values
 */

// Default fill and stroke colors
export const COLORS = {
	circle: "#6464ff",
	rectangle: "#ff6464",
	trapezoid: "#78c88c",
	connection: "#c8c8c8",
} as const;

// Default dimensions and sizes
export const SIZES = {
	connectionLineWidth: 2,
	connectionHitThreshold: 5,
	resizeHandlePx: 8,
	circleSegments: 32,
} as const;

// Clamp ranges for shape scale and viewport zoom
export const LIMITS = {
	scaleMin: 0.25,
	scaleMax: 4,
	zoomMin: 0.25,
	zoomMax: 4,
	zoomInFactor: 1.1,
	zoomOutFactor: 0.9,
} as const;

// Base (unscaled) shape dimensions
export const SHAPE_DEFAULTS = {
	circle: {
		radius: 30,
	},
	rectangle: {
		width: 60,
		height: 40,
	},
	trapezoid: {
		topWidth: 50,
		bottomWidth: 90,
		height: 50,
	},
} as const;

// Added to ray-cast edge slope denominators so horizontal edges never divide by zero
export const EDGE_EPSILON = 1e-9;
