export * from "./ir";
export * as language from "./language";
export {
  NoTargetMeshError,
  InvalidMeshShapeError,
  CoreOutOfRangeError,
} from "./language/errors";
