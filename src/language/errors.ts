export class NoTargetMeshError extends Error {
  name = "NoTargetMeshError";
}

export class InvalidMeshShapeError extends Error {
  name = "InvalidMeshShapeError";
}

export class CoreOutOfRangeError extends Error {
  name = "CoreOutOfRangeError";
}
