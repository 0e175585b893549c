export {
  type Op,
  OpRegistry,
  OpRegistration,
  getOpRegistry,
} from "./op-registry";
export {
  type Arity,
  type AttrKey,
  type CallEffectKind,
  type CallParam,
  CALL_EFFECT_KIND,
  CALL_EFFECT_KINDS,
  CALL_SIGNATURE,
  DESCRIPTION,
  NUM_INPUTS,
  PRINTER_NAME,
  VARIADIC,
  defineAttr,
  formatArity,
  formatSignature,
  isArity,
  isCallEffectKind,
  requiredParamCount,
} from "./op-attrs";
export {
  ConflictingOpRegistrationError,
  FrozenOpRegistryError,
  InvalidOpAttrError,
  UnknownOpError,
  CallArityError,
} from "./errors";
export {
  getCallEffectKind,
  isDuplicable,
  isEliminable,
  isPureCall,
  mayReorder,
} from "./effects";
export {
  type Buffer,
  type BufferRegion,
  type Call,
  type CallArg,
  type DType,
  type Expr,
  type IntImm,
  type Range,
  type StringImm,
  bufferRegion,
  declBuffer,
  intImm,
  isCall,
  regionSize,
  stringImm,
  toBufferRegion,
  toExpr,
} from "./expr";
export {
  type CallDiagnostic,
  type CallIntrinsicOptions,
  callIntrinsic,
  checkCallArity,
} from "./call";
export { formatExpr } from "./printer";
export {
  type CommIntrinsicDef,
  type CommIntrinsicName,
  COMM_INTRINSICS,
  COMM_OP_PREFIX,
  commAllgatherOp,
  commBarrierOp,
  commBroadcastOp,
  commCurrentCoreOp,
  commFenceOp,
  commOpName,
  commPutOp,
  commReduceOp,
  coreIdOp,
  getCommIntrinsic,
  registerCommIntrinsics,
} from "./comm";
