/**
 * Op Registry
 *
 * Interns op names into identities and holds the attributes bound to them.
 * An identity is created once per name and lives as long as its registry, so
 * passes compare ops with `===` and never by name.
 *
 * Attributes are write-once: binding an identical value again is a no-op,
 * binding a different one is a configuration error. Separate registration
 * sites may contribute different attribute kinds to the same op.
 */

import {
  ConflictingOpRegistrationError,
  FrozenOpRegistryError,
  InvalidOpAttrError,
  UnknownOpError,
} from "./errors";
import { traceOp } from "./debug";
import { type Arity, type AttrKey, DESCRIPTION, NUM_INPUTS } from "./op-attrs";

export interface Op {
  readonly name: string;
  /** Interning slot, dense from 0 in registration order. */
  readonly index: number;
}

export class OpRegistry {
  private readonly opsByName = new Map<string, Op>();
  private readonly ops: Op[] = [];
  private readonly attrKinds = new Map<string, object>();
  private readonly attrTables = new Map<string, Map<Op, unknown>>();
  private frozen = false;

  get size(): number {
    return this.ops.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Return the identity for `name`, creating it on first use.
   */
  registerOrGet(name: string): Op {
    const existing = this.opsByName.get(name);
    if (existing) {
      return existing;
    }
    if (name.length === 0) {
      throw new Error("op name must be non-empty");
    }
    if (this.frozen) {
      throw new FrozenOpRegistryError(
        `cannot register op ${name}: registry is frozen`,
      );
    }
    const op: Op = Object.freeze({ name, index: this.ops.length });
    this.ops.push(op);
    this.opsByName.set(name, op);
    traceOp(`registered ${name} (#${op.index})`);
    return op;
  }

  /**
   * Register (or reopen) `name` and return a handle for chaining attributes.
   */
  register(name: string): OpRegistration {
    return new OpRegistration(this, this.registerOrGet(name));
  }

  lookup(name: string): Op | undefined {
    return this.opsByName.get(name);
  }

  has(name: string): boolean {
    return this.opsByName.has(name);
  }

  get(name: string): Op {
    const op = this.opsByName.get(name);
    if (!op) {
      throw new UnknownOpError(`unknown op: ${name}`);
    }
    return op;
  }

  listOpNames(): string[] {
    return this.ops.map((op) => op.name);
  }

  setAttr<T>(op: Op, key: AttrKey<T>, value: T): void {
    this.assertOwned(op);
    if (!key.is(value)) {
      throw new InvalidOpAttrError(
        `op ${op.name}: invalid value for attribute ${key.name}: ${String(value)}`,
      );
    }
    const current =
      this.attrKinds.get(key.name) === key
        ? this.attrTables.get(key.name)?.get(op)
        : undefined;
    if (current !== undefined) {
      if (key.is(current) && key.equals(current, value)) {
        return;
      }
      const shown = key.is(current) ? key.format(current) : String(current);
      throw new ConflictingOpRegistrationError(
        `op ${op.name}: attribute ${key.name} is already bound to ${shown}, cannot rebind to ${key.format(value)}`,
      );
    }
    if (this.frozen) {
      throw new FrozenOpRegistryError(
        `cannot bind attribute ${key.name} on op ${op.name}: registry is frozen`,
      );
    }
    this.tableFor(key).set(op, key.snapshot(value));
    traceOp(`${op.name}.${key.name} = ${key.format(value)}`);
  }

  /**
   * Bound value, or `undefined` when the op was never annotated with `key`.
   */
  getAttr<T>(op: Op, key: AttrKey<T>): T | undefined {
    if (this.attrKinds.get(key.name) !== key) {
      return undefined;
    }
    const value = this.attrTables.get(key.name)?.get(op);
    return value !== undefined && key.is(value) ? value : undefined;
  }

  hasAttr<T>(op: Op, key: AttrKey<T>): boolean {
    return this.getAttr(op, key) !== undefined;
  }

  /** Ops annotated with `key`, in registration order. */
  opsWithAttr<T>(key: AttrKey<T>): Op[] {
    return this.ops.filter((op) => this.hasAttr(op, key));
  }

  /**
   * Make the registry read-only. Lookups and identical re-registrations keep
   * working; new names and new attribute bindings throw.
   */
  freeze(): void {
    this.frozen = true;
  }

  private assertOwned(op: Op): void {
    if (this.ops[op.index] !== op) {
      throw new UnknownOpError(`op ${op.name} is not registered in this registry`);
    }
  }

  private tableFor<T>(key: AttrKey<T>): Map<Op, unknown> {
    const known = this.attrKinds.get(key.name);
    if (known !== undefined && known !== key) {
      throw new InvalidOpAttrError(
        `attribute kind ${key.name} is defined more than once`,
      );
    }
    let table = this.attrTables.get(key.name);
    if (!table) {
      table = new Map();
      this.attrKinds.set(key.name, key);
      this.attrTables.set(key.name, table);
    }
    return table;
  }
}

/**
 * Chaining handle returned by {@link OpRegistry.register}.
 */
export class OpRegistration {
  constructor(
    private readonly registry: OpRegistry,
    readonly op: Op,
  ) {}

  setAttr<T>(key: AttrKey<T>, value: T): this {
    this.registry.setAttr(this.op, key, value);
    return this;
  }

  setNumInputs(arity: Arity): this {
    return this.setAttr(NUM_INPUTS, arity);
  }

  describe(text: string): this {
    return this.setAttr(DESCRIPTION, text);
  }
}

// ============================================================================
// Process-wide registry
// ============================================================================

let defaultRegistry: OpRegistry | undefined;

/**
 * The registry shared by the whole process, created on first use. Code that
 * needs isolation (tests, embedders) passes its own `OpRegistry` instead.
 */
export function getOpRegistry(): OpRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new OpRegistry();
  }
  return defaultRegistry;
}
