export {
  type AllReduceOptions,
  type BufferLike,
  type CoreRef,
  allGather,
  allReduce,
  barrier,
  broadcast,
  coreId,
  currentCore,
  fence,
  linearCoreId,
  put,
} from "./comm";
export {
  type CoreCoord,
  type MeshShape,
  MAX_MESH_CORES,
  getTargetMesh,
  parseMeshShape,
  setTargetMesh,
  withTargetMesh,
} from "./mesh";
