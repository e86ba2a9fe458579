import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RunState } from "../types.js";
import { InMemoryRunStateStore, SQLiteRunStateStore, openRunStateStore, type RunStateStore } from "./run-state-store.js";

function runState(environment: string, runId: string): RunState {
  return {
    runId,
    environment,
    startedAt: "2026-03-01T10:00:00.000Z",
    updatedAt: "2026-03-01T10:05:00.000Z",
    phases: [
      {
        phase: "credentials_resolved",
        outcome: "success",
        startedAt: "2026-03-01T10:00:00.000Z",
        completedAt: "2026-03-01T10:00:01.000Z",
      },
      {
        phase: "provisioned",
        outcome: "failure",
        startedAt: "2026-03-01T10:00:01.000Z",
        completedAt: "2026-03-01T10:05:00.000Z",
        error: "Provisioning apply failed (exit code 1)",
      },
    ],
    targets: [
      {
        id: "app:10.0.1.5",
        role: "app",
        name: "app-server",
        group: "app",
        address: "10.0.1.5",
        privateAddress: "172.31.0.5",
        status: "unknown",
      },
    ],
  };
}

const stores: Array<[string, () => Promise<RunStateStore>]> = [
  ["InMemoryRunStateStore", async () => new InMemoryRunStateStore()],
  [
    "SQLiteRunStateStore",
    async () => {
      const store = new SQLiteRunStateStore(":memory:");
      await store.initialize();
      return store;
    },
  ],
];

describe.each(stores)("%s", (_name, open) => {
  let store: RunStateStore;

  afterEach(async () => {
    await store.close();
  });

  it("returns null for an environment never saved", async () => {
    store = await open();
    await expect(store.load("staging")).resolves.toBeNull();
  });

  it("keeps one state per environment, replacing older runs", async () => {
    store = await open();
    await store.save(runState("staging", "run-1"));
    await store.save(runState("prod", "run-2"));
    await store.save(runState("staging", "run-3"));

    expect((await store.load("staging"))?.runId).toBe("run-3");
    expect(await store.load("prod")).toEqual(runState("prod", "run-2"));
  });

  it("clears one environment", async () => {
    store = await open();
    await store.save(runState("staging", "run-1"));

    await expect(store.clear("staging")).resolves.toBe(true);
    await expect(store.clear("staging")).resolves.toBe(false);
    await expect(store.load("staging")).resolves.toBeNull();
  });

  it("hands out copies", async () => {
    store = await open();
    const state = runState("staging", "run-1");
    await store.save(state);
    state.phases.length = 0;

    const loaded = await store.load("staging");
    expect(loaded?.phases).toHaveLength(2);
  });
});

describe("openRunStateStore", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("creates the database directory and persists across opens", async () => {
    dir = await mkdtemp(join(tmpdir(), "fleet-state-test-"));
    const file = join(dir, "nested", "state.db");

    const first = await openRunStateStore(file);
    await first.save(runState("staging", "run-1"));
    await first.close();

    const second = await openRunStateStore(file);
    expect((await second.load("staging"))?.runId).toBe("run-1");
    await second.close();
  });
});
