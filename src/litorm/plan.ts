// plan.ts

import { MigrationError } from "./errors.js";
import { logger } from "./utils/logger.js";
import { SerialWorker } from "./worker.js";
import type { Connection, Cursor, Executor, Instruction } from "./executor.js";
import type { Mode, Out, SqlValue, Stream } from "./model-types.js";

/**
 * An operation written once for both modes: it yields instructions, receives
 * each result back, and returns its value. A failing instruction is thrown
 * back into the plan at the yield.
 */
export type Plan<R> = Generator<Instruction, R, Cursor>;

export function* statement(
  sql: string,
  params: readonly SqlValue[] = []
): Plan<Cursor> {
  return yield { kind: "statement", sql, params };
}

export function* task(
  label: string,
  run: (connection: Connection) => unknown
): Plan<void> {
  yield { kind: "task", label, run };
}

/* ===================================================== */
/* DRIVERS                                               */
/* ===================================================== */

/** Runs a plan to completion on the calling stack. */
export function drive<R>(plan: Plan<R>, executor: Executor): R {
  let step = plan.next();

  for (;;) {
    if (step.done) return step.value;
    const instruction = step.value;

    let cursor: Cursor;
    try {
      const result = executor.dispatch(instruction);
      if (result instanceof Promise) {
        void result.catch((err: unknown) =>
          logger.error("TASK", "Failed", `${describe(instruction)}: ${String(err)}`)
        );
        throw new MigrationError(
          `${describe(instruction)} is asynchronous; run it through an async connection.`
        );
      }
      cursor = result;
    } catch (err) {
      step = plan.throw(err);
      continue;
    }
    step = plan.next(cursor);
  }
}

/** Runs a plan with every instruction queued on the worker. */
export async function driveAsync<R>(
  plan: Plan<R>,
  executor: Executor,
  worker: SerialWorker
): Promise<R> {
  let step = plan.next();

  for (;;) {
    if (step.done) return step.value;
    const instruction = step.value;

    let cursor: Cursor;
    try {
      cursor = await worker.submit(() => executor.dispatch(instruction));
    } catch (err) {
      step = plan.throw(err);
      continue;
    }
    step = plan.next(cursor);
  }
}

function describe(instruction: Instruction): string {
  return instruction.kind === "task" ? instruction.label : instruction.sql;
}

/* ===================================================== */
/* STRATEGIES                                            */
/* ===================================================== */

export interface Strategy<M extends Mode> {
  readonly mode: M;
  readonly executor: Executor;
  run<R>(plan: Plan<R>): Out<M, R>;
  /** Same as run, always as a promise. */
  settle<R>(plan: Plan<R>): Promise<R>;
  /** Lazy, restartable sequence over a plan's results. */
  stream<R>(factory: () => Plan<R[]>): Stream<M, R>;
}

export class DirectStrategy implements Strategy<"sync"> {
  readonly mode = "sync";

  constructor(readonly executor: Executor) {}

  run<R>(plan: Plan<R>): R {
    return drive(plan, this.executor);
  }

  async settle<R>(plan: Plan<R>): Promise<R> {
    return drive(plan, this.executor);
  }

  stream<R>(factory: () => Plan<R[]>): Iterable<R> {
    const executor = this.executor;
    return {
      *[Symbol.iterator]() {
        yield* drive(factory(), executor);
      },
    };
  }
}

export class DeferredStrategy implements Strategy<"async"> {
  readonly mode = "async";

  constructor(
    readonly executor: Executor,
    readonly worker: SerialWorker = new SerialWorker()
  ) {}

  run<R>(plan: Plan<R>): Promise<R> {
    return driveAsync(plan, this.executor, this.worker);
  }

  settle<R>(plan: Plan<R>): Promise<R> {
    return this.run(plan);
  }

  stream<R>(factory: () => Plan<R[]>): AsyncIterable<R> {
    const run = (plan: Plan<R[]>) => this.run(plan);
    return {
      async *[Symbol.asyncIterator]() {
        yield* await run(factory());
      },
    };
  }
}
