import { afterEach, describe, expect, it, vi } from "vitest";

import { InvalidMeshShapeError, NoTargetMeshError } from "../src";
import {
  MAX_MESH_CORES,
  getTargetMesh,
  parseMeshShape,
  setTargetMesh,
  withTargetMesh,
} from "../src/language/mesh";

describe("target mesh", () => {
  afterEach(() => {
    setTargetMesh(null);
    vi.unstubAllEnvs();
  });

  it("parses <rows>x<cols>", () => {
    expect(parseMeshShape("4x2")).toEqual({ x: 4, y: 2 });
    expect(parseMeshShape(" 3 X 5 ")).toEqual({ x: 3, y: 5 });
  });

  it("rejects malformed and empty meshes", () => {
    expect(() => parseMeshShape("4by2")).toThrow(
      'cannot parse mesh shape "4by2", expected <rows>x<cols>',
    );
    expect(() => parseMeshShape("0x2")).toThrow(InvalidMeshShapeError);
    expect(() => setTargetMesh({ x: 2, y: 1.5 })).toThrow("invalid mesh shape 2x1.5");
  });

  it("throws when no mesh is configured", () => {
    vi.stubEnv("TILEMESH_TARGET_MESH", "");
    expect(() => getTargetMesh()).toThrow(NoTargetMeshError);
  });

  it("falls back to TILEMESH_TARGET_MESH", () => {
    vi.stubEnv("TILEMESH_TARGET_MESH", "2x3");
    expect(getTargetMesh()).toEqual({ x: 2, y: 3 });
  });

  it("prefers an explicitly set mesh over the environment", () => {
    vi.stubEnv("TILEMESH_TARGET_MESH", "2x3");
    setTargetMesh({ x: 8, y: 8 });
    expect(getTargetMesh()).toEqual({ x: 8, y: 8 });
  });

  it("withTargetMesh restores the previous mesh, even on throw", () => {
    setTargetMesh({ x: 1, y: 1 });
    expect(withTargetMesh({ x: 2, y: 2 }, () => getTargetMesh())).toEqual({ x: 2, y: 2 });
    expect(() =>
      withTargetMesh({ x: 4, y: 4 }, () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(getTargetMesh()).toEqual({ x: 1, y: 1 });
  });

  it("rejects shapes that overflow or exceed the core limit", () => {
    expect(() => parseMeshShape("99999999999999999999x1")).toThrow(InvalidMeshShapeError);
    expect(() => parseMeshShape("99999999999999999999x1")).toThrow(
      "invalid mesh shape 100000000000000000000x1",
    );
    expect(() => parseMeshShape("300x300")).toThrow(
      "mesh shape 300x300 exceeds 65536 cores",
    );
    expect(() => setTargetMesh({ x: 65537, y: 1 })).toThrow(InvalidMeshShapeError);
  });

  it("accepts a mesh at the core limit", () => {
    expect(MAX_MESH_CORES).toBe(65536);
    expect(parseMeshShape("256x256")).toEqual({ x: 256, y: 256 });
  });
});
