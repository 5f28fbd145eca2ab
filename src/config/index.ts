export { defaultEngineConfig, findConfigFile, loadEngineConfig } from "./config";
