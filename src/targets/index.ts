export {
  parseTarget,
  targetsOfKind,
  targetCandidates,
  resolveTarget,
  type ParsedTarget,
  type ResolveTargetOptions,
} from "./targets";
