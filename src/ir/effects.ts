/**
 * Effect queries for optimization passes.
 *
 * Passes read the `TCallEffectKind` attribute through these helpers rather
 * than keeping their own op lists. An op that was never annotated is treated
 * as opaque.
 */

import type { Call } from "./expr";
import { CALL_EFFECT_KIND, type CallEffectKind } from "./op-attrs";
import { getOpRegistry, type Op, type OpRegistry } from "./op-registry";

type OpOrCall = Op | Call;

function opOf(target: OpOrCall): Op {
  return "kind" in target ? target.op : target;
}

// 0: freely movable, 1: reads state, 2: writes or hides effects.
const EFFECT_RANK: Record<CallEffectKind, 0 | 1 | 2> = {
  exprAnnotation: 0,
  pure: 0,
  readState: 1,
  updateState: 2,
  opaque: 2,
  specialCallArg: 2,
  embedded: 2,
  controlJump: 2,
};

export function getCallEffectKind(
  target: OpOrCall,
  registry: OpRegistry = getOpRegistry(),
): CallEffectKind {
  return registry.getAttr(opOf(target), CALL_EFFECT_KIND) ?? "opaque";
}

/**
 * Pure calls may be CSE'd, hoisted and duplicated.
 */
export function isPureCall(
  target: OpOrCall,
  registry: OpRegistry = getOpRegistry(),
): boolean {
  return EFFECT_RANK[getCallEffectKind(target, registry)] === 0;
}

/**
 * Whether an unused call may be dropped. Reading state is droppable;
 * anything that writes or communicates is not.
 */
export function isEliminable(
  target: OpOrCall,
  registry: OpRegistry = getOpRegistry(),
): boolean {
  return EFFECT_RANK[getCallEffectKind(target, registry)] <= 1;
}

export function isDuplicable(
  target: OpOrCall,
  registry: OpRegistry = getOpRegistry(),
): boolean {
  return isPureCall(target, registry);
}

/**
 * Whether two calls may swap places. Pure calls move across anything, two
 * readers commute, and nothing moves across a writer or an opaque call.
 */
export function mayReorder(
  a: OpOrCall,
  b: OpOrCall,
  registry: OpRegistry = getOpRegistry(),
): boolean {
  const rankA = EFFECT_RANK[getCallEffectKind(a, registry)];
  const rankB = EFFECT_RANK[getCallEffectKind(b, registry)];
  if (rankA === 0 || rankB === 0) return true;
  return rankA === 1 && rankB === 1;
}
