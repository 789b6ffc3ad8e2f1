import { describe, expect, it } from "vitest";
import { createTaskStore, DEFAULT_SEED } from "../store";

describe("createTaskStore - seed", () => {
  it("should start with the default seed", () => {
    const store = createTaskStore();
    expect(store.size()).toBe(1);
    expect(store.find(1)).toEqual({
      Id: 1,
      Title: "Complete Lab Activity",
      Description: "Finish Lab Activity 2",
      done: false,
    });
  });

  it("should accept an empty seed", () => {
    const store = createTaskStore({ seed: [] });
    expect(store.size()).toBe(0);
    expect(store.find(1)).toBeUndefined();
  });

  it("should not share records with the seed it was given", () => {
    const store = createTaskStore();
    store.update(1, { done: true });
    expect(DEFAULT_SEED[0]?.done).toBe(false);
  });
});

describe("createTaskStore - snapshots", () => {
  it("should hand out copies that do not write back", () => {
    const store = createTaskStore();
    const copy = store.find(1);
    if (!copy) {
      expect.fail("seed task should exist");
      return;
    }
    copy.Title = "Mutated outside";
    expect(store.find(1)?.Title).toBe("Complete Lab Activity");
  });
});

describe("createTaskStore - add", () => {
  it("should give each new task the store size as Id", () => {
    const store = createTaskStore({ seed: [] });
    const first = store.add({ Title: "a", Description: null, done: false });
    expect(first.Id).toBe(store.size());
    const second = store.add({ Title: "b", Description: "x", done: true });
    expect(second.Id).toBe(store.size());
    expect(second).toEqual({ Id: 2, Title: "b", Description: "x", done: true });
  });

  it("should never reuse an Id with the sequential strategy", () => {
    const store = createTaskStore();
    store.add({ Title: "second", Description: null, done: false });
    store.remove(1);
    const next = store.add({ Title: "third", Description: null, done: false });
    expect(next.Id).toBe(3);
  });

  it("should reuse count + 1 with the size strategy", () => {
    const store = createTaskStore({ idStrategy: "size" });
    store.add({ Title: "second", Description: null, done: false });
    store.remove(1);
    const next = store.add({ Title: "third", Description: null, done: false });
    expect(next.Id).toBe(2);
  });

  it("should continue after the highest seeded Id", () => {
    const store = createTaskStore({
      seed: [{ Id: 7, Title: "seeded", Description: null, done: false }],
    });
    expect(store.add({ Title: "n", Description: null, done: false }).Id).toBe(8);
  });
});

describe("createTaskStore - update", () => {
  it("should apply only supplied fields", () => {
    const store = createTaskStore();
    const updated = store.update(1, { done: true });
    expect(updated).toEqual({
      Id: 1,
      Title: "Complete Lab Activity",
      Description: "Finish Lab Activity 2",
      done: true,
    });
  });

  it("should apply zero values but skip nulls", () => {
    const store = createTaskStore();
    store.update(1, { done: true });
    const updated = store.update(1, {
      done: false,
      Description: "",
      Title: null,
    });
    expect(updated).toEqual({
      Id: 1,
      Title: "Complete Lab Activity",
      Description: "",
      done: false,
    });
  });

  it("should return undefined for a missing task", () => {
    const store = createTaskStore();
    expect(store.update(42, { done: true })).toBeUndefined();
  });
});

describe("createTaskStore - remove", () => {
  it("should remove permanently", () => {
    const store = createTaskStore();
    expect(store.remove(1)).toBe(true);
    expect(store.find(1)).toBeUndefined();
    expect(store.remove(1)).toBe(false);
    expect(store.size()).toBe(0);
  });
});
