export * from "./lib";
export * from "./types";
export * from "./shapeFactories";
export * from "./connections";
export * from "./serialization";
export * from "./engine";
export * from "./pointerHandlers";
export * from "./commands";
export * from "./renderContext";
export { createId } from "./utils";
export {
	DEFAULT_ENGINE_CONFIG,
	EngineConfigSchema,
	parseEngineConfig,
	type EngineConfig,
	type EngineOptions,
} from "@/lib/scene-config";
export { readSceneFile, writeSceneFile, type ReadSceneResult, type SceneDocument } from "@/lib/scene-file";
export { parseCommand, sceneCommandSchema, type SceneCommand, type SceneCommandInput } from "@/lib/schemas/scene-commands";
