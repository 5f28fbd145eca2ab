export { getLogger, rootLogger } from "./logger";
