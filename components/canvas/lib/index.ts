/**
 * Scene library - core utilities for scene operations
 *
 * This module provides pure, testable functions for:
 * - Geometry calculations (distances, rotation, polygons, bounding boxes)
 * - Per-kind shape outlines and hit-testing
 * - Shape transformations (move, scale, rotate, resize)
 * - Viewport transforms (world/screen mapping, pan, cursor-anchored zoom)
 * - Constants and defaults
 */

export * from "./constants";
export * from "./geometry";
export * from "./shapeGeometry";
export * from "./bounds";
export * from "./transform";
export * from "./viewport";
