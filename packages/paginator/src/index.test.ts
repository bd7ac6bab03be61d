import type { PaginatorState, Topic } from "@featuretour/core";
import { canAdvance, canRetreat, currentTopic } from "@featuretour/core";
import { describe, expect, it, vi } from "vitest";
import { FeaturePaginator } from "./index";

function makeTopics(count: number): Topic[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `t${i}`,
    title: `Topic ${i}`,
    summary: `Summary ${i}`,
    highlights: [],
    codeHint: "",
  }));
}

function createTestLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("FeaturePaginator construction", () => {
  it("starts on the first topic", () => {
    const topics = makeTopics(3);
    const state = new FeaturePaginator({ topics }).getSnapshot();

    expect(state.currentIndex).toBe(0);
    expect(currentTopic(state)).toBe(topics[0]);
    expect(canRetreat(state)).toBe(false);
  });

  it("handles an empty catalog without throwing", () => {
    const paginator = new FeaturePaginator({ topics: [] });

    paginator.advance();
    paginator.retreat();
    paginator.selectById("t0");

    const state = paginator.getSnapshot();
    expect(state.currentIndex).toBe(0);
    expect(currentTopic(state)).toBeNull();
  });

  it("builds from a catalog source", () => {
    const topics = makeTopics(2);
    const paginator = FeaturePaginator.fromSource({
      loadTopics: () => topics,
    });
    expect(paginator.getSnapshot().topics).toEqual(topics);
  });

  it("keeps its catalog when the caller later changes the array", () => {
    const topics = makeTopics(3);
    const paginator = new FeaturePaginator({ topics });
    paginator.advance();
    paginator.advance();

    topics.splice(1);
    topics.push({ ...topics[0], id: "late" });

    const state = paginator.getSnapshot();
    expect(state.topics.map((t) => t.id)).toEqual(["t0", "t1", "t2"]);
    expect(state.currentIndex).toBe(2);
    expect(currentTopic(state)?.id).toBe("t2");
    expect(Object.isFrozen(state.topics)).toBe(true);

    paginator.retreat();
    expect(paginator.getSnapshot().topics).toBe(state.topics);
  });
});

describe("FeaturePaginator navigation", () => {
  it("walks the documented five-topic scenario", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(5) });

    paginator.selectById("t2");
    let state = paginator.getSnapshot();
    expect(state.currentIndex).toBe(2);
    expect(currentTopic(state)?.id).toBe("t2");
    expect(canRetreat(state)).toBe(true);
    expect(canAdvance(state)).toBe(true);

    paginator.advance();
    expect(paginator.getSnapshot().currentIndex).toBe(3);

    paginator.advance();
    state = paginator.getSnapshot();
    expect(state.currentIndex).toBe(4);
    expect(canAdvance(state)).toBe(false);

    paginator.advance();
    expect(paginator.getSnapshot().currentIndex).toBe(4);

    paginator.selectById("unknown");
    expect(paginator.getSnapshot().currentIndex).toBe(4);

    for (let i = 0; i < 4; i += 1) paginator.retreat();
    state = paginator.getSnapshot();
    expect(state.currentIndex).toBe(0);
    expect(canRetreat(state)).toBe(false);

    paginator.retreat();
    expect(paginator.getSnapshot().currentIndex).toBe(0);
  });

  it("reaches the last topic after count - 1 advances and stays there", () => {
    const count = 7;
    const paginator = new FeaturePaginator({ topics: makeTopics(count) });

    for (let i = 0; i < count - 1; i += 1) paginator.advance();
    expect(paginator.getSnapshot().currentIndex).toBe(count - 1);

    paginator.advance();
    expect(paginator.getSnapshot().currentIndex).toBe(count - 1);
  });

  it("keeps the identical snapshot for boundary moves", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(2) });
    const first = paginator.getSnapshot();

    paginator.retreat();
    expect(paginator.getSnapshot()).toBe(first);

    paginator.advance();
    const last = paginator.getSnapshot();
    paginator.advance();
    expect(paginator.getSnapshot()).toBe(last);
  });

  it("keeps the index when re-selecting the current topic", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(4) });
    paginator.selectById("t3");
    const before = paginator.getSnapshot();

    const current = currentTopic(before);
    if (!current) throw new Error("expected a current topic");
    paginator.selectById(current.id);

    expect(paginator.getSnapshot()).toBe(before);
    expect(paginator.getSnapshot().currentIndex).toBe(3);
  });

  it("selects the first match when ids collide", () => {
    const topics = [...makeTopics(2), { ...makeTopics(1)[0], title: "dup" }];
    const paginator = new FeaturePaginator({ topics });
    paginator.advance();

    paginator.selectById("t0");
    expect(paginator.getSnapshot().currentIndex).toBe(0);
  });

  it("applies intents through dispatch", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(3) });

    paginator.dispatch({ type: "select", id: "t2" });
    paginator.dispatch({ type: "retreat" });
    expect(paginator.getSnapshot().currentIndex).toBe(1);

    paginator.dispatch({ type: "advance" });
    expect(paginator.getSnapshot().currentIndex).toBe(2);
  });

  it("never leaves the catalog range", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(3) });
    const moves = ["advance", "advance", "advance", "retreat", "retreat", "retreat", "retreat"] as const;

    for (const type of moves) {
      paginator.dispatch({ type });
      const { currentIndex } = paginator.getSnapshot();
      expect(currentIndex).toBeGreaterThanOrEqual(0);
      expect(currentIndex).toBeLessThan(3);
    }
  });
});

describe("FeaturePaginator subscriptions", () => {
  it("emits the current snapshot immediately on subscribe", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(3) });
    paginator.advance();

    const listener = vi.fn();
    paginator.subscribe(listener);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(paginator.getSnapshot());
  });

  it("notifies on changes and stops after unsubscribe", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(3) });
    const seen: number[] = [];
    const unsubscribe = paginator.subscribe((s) => seen.push(s.currentIndex));

    paginator.advance();
    paginator.advance();
    unsubscribe();
    paginator.retreat();

    expect(seen).toEqual([0, 1, 2]);
  });

  it("does not notify for ignored intents", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(2) });
    const listener = vi.fn();
    paginator.subscribe(listener);

    paginator.retreat();
    paginator.selectById("missing");
    paginator.selectById("t0");

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("gives every observer the same snapshot object", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(3) });
    const received: PaginatorState[] = [];
    paginator.subscribe((s) => received.push(s));
    paginator.subscribe((s) => received.push(s));

    paginator.advance();

    expect(received[2]).toBe(received[3]);
    expect(received[2]).toBe(paginator.getSnapshot());
  });

  it("tracks the same function subscribed twice independently", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(3) });
    const listener = vi.fn();
    const first = paginator.subscribe(listener);
    paginator.subscribe(listener);

    first();
    first();
    paginator.advance();

    expect(listener).toHaveBeenCalledTimes(3);
  });

  it("skips a listener removed earlier in the same notification", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(3) });
    const second = vi.fn();
    let unsubscribeSecond: () => void = () => {};

    paginator.subscribe((s) => {
      if (s.currentIndex === 1) unsubscribeSecond();
    });
    unsubscribeSecond = paginator.subscribe(second);
    paginator.advance();

    expect(second).toHaveBeenCalledTimes(1);
  });

  it("applies an intent issued by a listener after the current pass", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(4) });
    const seenByFirst: number[] = [];
    const seenBySecond: number[] = [];

    paginator.subscribe((s) => {
      seenByFirst.push(s.currentIndex);
      if (s.currentIndex === 1) paginator.advance();
    });
    paginator.subscribe((s) => seenBySecond.push(s.currentIndex));

    paginator.advance();

    expect(paginator.getSnapshot().currentIndex).toBe(2);
    expect(seenByFirst).toEqual([0, 1, 2]);
    expect(seenBySecond).toEqual([0, 1, 2]);
  });

  it("applies an intent issued during the initial delivery", () => {
    const paginator = new FeaturePaginator({ topics: makeTopics(3) });
    const other = vi.fn();
    paginator.subscribe(other);

    paginator.subscribe((s) => {
      if (s.currentIndex === 0) paginator.selectById("t2");
    });

    expect(paginator.getSnapshot().currentIndex).toBe(2);
    expect(other).toHaveBeenLastCalledWith(paginator.getSnapshot());
  });

    it("reports a throwing listener and keeps notifying the others", () => {
    const logger = createTestLogger();
    const paginator = new FeaturePaginator({ topics: makeTopics(3), logger });
    const healthy = vi.fn();

    paginator.subscribe((s) => {
      if (s.currentIndex > 0) throw new Error("render failed");
    });
    paginator.subscribe(healthy);

    expect(() => paginator.advance()).not.toThrow();
    expect(healthy).toHaveBeenCalledTimes(2);
    expect(paginator.getSnapshot().currentIndex).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      "paginator listener failed: render failed",
    );
  });
});

describe("FeaturePaginator logging", () => {
  it("logs the reason an intent was ignored", () => {
    const logger = createTestLogger();
    const paginator = new FeaturePaginator({ topics: makeTopics(2), logger });

    paginator.retreat();
    paginator.selectById("nope");
    paginator.advance();
    paginator.advance();

    expect(logger.log.mock.calls).toEqual([
      ["ignored retreat: already at first topic"],
      ['ignored select: unknown topic id "nope"'],
      ["ignored advance: already at last topic"],
    ]);
  });

  it("stays silent for applied intents", () => {
    const logger = createTestLogger();
    const paginator = new FeaturePaginator({ topics: makeTopics(2), logger });

    paginator.advance();
    paginator.selectById("t0");

    expect(logger.log).not.toHaveBeenCalled();
  });
});
