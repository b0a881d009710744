import { describe, expect, it } from "vitest";

import { Executor, connect } from "../executor.js";
import { drive, driveAsync, statement } from "../plan.js";
import { SerialWorker } from "../worker.js";
import type { Plan } from "../plan.js";

function* recovering(): Plan<string> {
  try {
    yield* statement("SELECT * FROM missing");
    return "ran";
  } catch (err) {
    return err instanceof Error ? `recovered: ${err.message}` : "recovered";
  }
}

function* twoStatements(): Plan<number> {
  yield* statement(`CREATE TABLE "t" ("a" integer)`);
  const cursor = yield* statement(`INSERT INTO "t" ("a") VALUES (?), (?)`, [1, 2]);
  return cursor.rowCount;
}

describe("drivers", () => {
  it("feeds each result back into the plan", () => {
    const executor = new Executor(connect(":memory:"));
    expect(drive(twoStatements(), executor)).toBe(2);
    executor.close();
  });

  it("throws engine errors back into the plan", async () => {
    const executor = new Executor(connect(":memory:"));
    expect(drive(recovering(), executor)).toBe("recovered: no such table: missing");
    expect(await driveAsync(recovering(), executor, new SerialWorker())).toBe(
      "recovered: no such table: missing"
    );
    executor.close();
  });
});

describe("SerialWorker", () => {
  it("runs jobs one at a time in submission order", async () => {
    const worker = new SerialWorker();
    const log: string[] = [];

    const a = worker.submit(async () => {
      log.push("a:start");
      await new Promise((resolve) => setTimeout(resolve, 5));
      log.push("a:end");
      return 1;
    });
    const b = worker.submit(() => {
      log.push("b");
      return 2;
    });

    expect(log).toEqual([]);
    expect(worker.pending).toBe(2);
    expect(await Promise.all([a, b])).toEqual([1, 2]);
    expect(log).toEqual(["a:start", "a:end", "b"]);
  });

  it("keeps going after a job fails", async () => {
    const worker = new SerialWorker();
    const failing = worker.submit(() => {
      throw new Error("nope");
    });
    const next = worker.submit(() => 3);
    await expect(failing).rejects.toThrow("nope");
    expect(await next).toBe(3);
  });
});
