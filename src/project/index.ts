/**
 * Project module
 *
 * Root discovery, manifest enumeration and the cached project session.
 */

export * from "./project.types";
export {
  hasProjectMarker,
  compoundMarkerPath,
  locateRoot,
  findRootManifests,
  findManifests,
} from "./locator";
export { ProjectSession } from "./session";
