import { describe, expect, it } from "vitest";
import {
	applyCommand,
	buildRenderContext,
	DEFAULT_ENGINE_CONFIG,
	SceneEngine,
	serializeScene,
	VIEWPORT_INITIAL,
} from "./index";

describe("public entry point", () => {
	it("drives an engine end to end", () => {
		const engine = new SceneEngine();
		expect(engine.config).toEqual(DEFAULT_ENGINE_CONFIG);
		expect(engine.viewport).toEqual(VIEWPORT_INITIAL);

		applyCommand(engine, { tool: "createShape", kind: "circle", x: 0, y: 0 });
		applyCommand(engine, { tool: "createShape", kind: "rectangle", x: 120, y: 0 });
		engine.startConnectionAt(0, 0);
		engine.startConnectionAt(120, 0);

		const frame = buildRenderContext(engine);
		expect(frame.shapes).toHaveLength(2);
		expect(frame.connections).toHaveLength(1);
		expect(serializeScene({ shapes: [...engine.shapes], connections: [...engine.connections] }))
			.toEqual(engine.exportScene());
	});
});
