import { InvalidMeshShapeError, NoTargetMeshError } from "./errors";

/** Grid of cores: `x` rows by `y` columns. */
export type MeshShape = {
  x: number;
  y: number;
};

export type CoreCoord = readonly [row: number, col: number];

let targetMesh: MeshShape | null = null;

/** Largest core count a target mesh may have. */
export const MAX_MESH_CORES = 65536;

function validateMeshShape(shape: MeshShape): MeshShape {
  if (!Number.isSafeInteger(shape.x) || !Number.isSafeInteger(shape.y) || shape.x < 1 || shape.y < 1) {
    throw new InvalidMeshShapeError(`invalid mesh shape ${shape.x}x${shape.y}`);
  }
  if (shape.x * shape.y > MAX_MESH_CORES) {
    throw new InvalidMeshShapeError(
      `mesh shape ${shape.x}x${shape.y} exceeds ${MAX_MESH_CORES} cores`,
    );
  }
  return { x: shape.x, y: shape.y };
}

/**
 * Parse a mesh written as `<rows>x<cols>`, e.g. `"4x2"`.
 */
export function parseMeshShape(text: string): MeshShape {
  const match = /^\s*(\d+)\s*[xX]\s*(\d+)\s*$/.exec(text);
  if (!match) {
    throw new InvalidMeshShapeError(`cannot parse mesh shape "${text}", expected <rows>x<cols>`);
  }
  return validateMeshShape({ x: parseInt(match[1], 10), y: parseInt(match[2], 10) });
}

export function setTargetMesh(shape: MeshShape | null): void {
  targetMesh = shape ? validateMeshShape(shape) : null;
}

/**
 * The mesh set with {@link setTargetMesh}, else TILEMESH_TARGET_MESH.
 */
export function getTargetMesh(): MeshShape {
  if (targetMesh) {
    return targetMesh;
  }
  const fromEnv =
    typeof process !== "undefined" ? process.env?.TILEMESH_TARGET_MESH : undefined;
  if (fromEnv) {
    return parseMeshShape(fromEnv);
  }
  throw new NoTargetMeshError(
    "no target mesh: call setTargetMesh() or set TILEMESH_TARGET_MESH",
  );
}

export function withTargetMesh<T>(shape: MeshShape, fn: () => T): T {
  const previous = targetMesh;
  setTargetMesh(shape);
  try {
    return fn();
  } finally {
    targetMesh = previous;
  }
}
