export { HstackEngine, createEngine, createEngineForDirectory, type RunOperationOptions } from "./engine";
export { locateBuildTool } from "./tool";
