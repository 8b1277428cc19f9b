import { parseCommand } from "@/lib/schemas/scene-commands";
import type { SceneEngine } from "./engine";
import type { Point } from "./lib/geometry";

export interface CommandContext {
	/**
	 * Screen point used for insertion when no click has been recorded yet,
	 * typically the middle of the render surface.
	 */
	screenCenter?: Point;
}

/**
 * Validate a discrete command and run it against the engine.
 *
 * @returns Whether the command changed anything
 */
export function applyCommand(
	engine: SceneEngine,
	input: unknown,
	context: CommandContext = {},
): boolean {
	const cmd = parseCommand(input);
	if (!cmd) return false;

	switch (cmd.tool) {
		case "createShape": {
			const options = {
				color: cmd.color,
				scale: cmd.scale,
				rotationDeg: cmd.rotationDeg,
			};
			if (cmd.x !== undefined && cmd.y !== undefined) {
				engine.addShape(cmd.kind, cmd.x, cmd.y, options);
			} else {
				const center = context.screenCenter ?? { x: 0, y: 0 };
				engine.insertShapeAtLastClick(
					cmd.kind,
					engine.screenToWorld(center.x, center.y),
					options,
				);
			}
			return true;
		}

		case "deleteSelected":
			return engine.deleteSelected();

		case "rotateSelected":
			return engine.rotateSelected(cmd.degrees);

		case "scaleSelected":
			return engine.scaleSelected(cmd.delta);

		case "resetViewport":
			engine.resetViewport();
			return true;

		case "cancelGesture":
			return engine.cancelGesture();

		case "clearScene":
			engine.clearScene();
			return true;

		case "save":
			return engine.saveToFile(cmd.path);

		case "load":
			return engine.loadFromFile(cmd.path);
	}
}
