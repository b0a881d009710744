// registry.ts

import { UnboundModelError } from "./errors.js";
import { logger } from "./utils/logger.js";
import type { ModelShape } from "./model.js";

export interface Binding {
  model: ModelShape;
  table: string;
  pkField: string;
}

/** Record types bound to one connection, in binding order. */
export class TableRegistry {
  private bindings = new Map<ModelShape, Binding>();

  /** Rebinding a table name replaces the model previously bound to it. */
  register(model: ModelShape): Binding {
    const current = this.bindings.get(model);
    if (current) return current;

    for (const other of this.bindings.keys()) {
      if (other.table === model.table) {
        this.bindings.delete(other);
        logger.info("REGISTRY", "Replaced", `${other.name} -> ${model.name} (${model.table})`);
      }
    }

    const binding: Binding = { model, table: model.table, pkField: model.pkField };
    this.bindings.set(model, binding);
    logger.info("REGISTRY", "Bound", `${model.name} (${model.table})`);
    return binding;
  }

  has(model: ModelShape): boolean {
    return this.bindings.has(model);
  }

  require(model: ModelShape): Binding {
    const binding = this.bindings.get(model);
    if (!binding) throw new UnboundModelError(model.name);
    return binding;
  }

  byTable(table: string): Binding | undefined {
    for (const binding of this.bindings.values()) {
      if (binding.table === table) return binding;
    }
    return undefined;
  }

  models(): ModelShape[] {
    return [...this.bindings.keys()];
  }

  get size(): number {
    return this.bindings.size;
  }
}
