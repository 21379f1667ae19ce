import { describe, it, expect, vi } from "vitest";
import { derived, effect, signal, untracked } from "@lib/store/signals";

describe(signal, () => {
  it("reads and writes the current value", () => {
    expect.hasAssertions();

    const count = signal(1);
    count.setValue(2);

    expect(count.getValue()).toBe(2);
    expect(count.peekValue()).toBe(2);
  });

  it("notifies subscribers only when the value changes", () => {
    expect.hasAssertions();

    const count = signal(0);
    const listener = vi.fn();
    count.subscribe(listener);

    count.setValue(0);

    expect(listener).not.toHaveBeenCalled();

    count.setValue(1);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("uses the comparator passed to setValue", () => {
    expect.hasAssertions();

    const point = signal({ x: 1 });
    const listener = vi.fn();
    point.subscribe(listener);

    point.setValue({ x: 1 }, (a, b) => a.x === b.x);

    expect(listener).not.toHaveBeenCalled();
  });

  it("lets a subscriber unsubscribe another one mid-notification", () => {
    expect.hasAssertions();

    const count = signal(0);
    const second = vi.fn();
    let unsubscribeSecond = () => {};
    count.subscribe(() => {
      unsubscribeSecond();
    });
    unsubscribeSecond = count.subscribe(second);

    count.setValue(1);
    count.setValue(2);

    // the pass in progress still reaches it; later passes do not
    expect(second).toHaveBeenCalledTimes(1);
  });
});

describe(effect, () => {
  it("runs once immediately and again on tracked changes", () => {
    expect.hasAssertions();

    const count = signal(0);
    const seen: number[] = [];

    effect(() => {
      seen.push(count.getValue());
    });
    count.setValue(1);

    expect(seen).toStrictEqual([0, 1]);
  });

  it("subscribes once even when a signal is read repeatedly", () => {
    expect.hasAssertions();

    const count = signal(0);
    let runs = 0;

    effect(() => {
      count.getValue();
      count.getValue();
      runs += 1;
    });
    count.setValue(1);

    expect(runs).toBe(2);
  });

  it("does not track peeked or untracked reads", () => {
    expect.hasAssertions();

    const a = signal(1);
    const b = signal(1);
    let runs = 0;

    effect(() => {
      a.peekValue();
      untracked(() => b.getValue());
      runs += 1;
    });
    a.setValue(2);
    b.setValue(2);

    expect(runs).toBe(1);
  });

  it("stops running after dispose", () => {
    expect.hasAssertions();

    const count = signal(0);
    const spy = vi.fn<(value: number) => void>();

    const dispose = effect(() => {
      spy(count.getValue());
    });
    dispose();
    count.setValue(1);

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(0);
  });
});

describe(derived, () => {
  it("computes from its dependencies and follows them", () => {
    expect.hasAssertions();

    const base = signal(2);
    const double = derived(() => base.getValue() * 2);

    expect(double.getValue()).toBe(4);

    base.setValue(3);

    expect(double.peekValue()).toBe(6);
  });

  it("chains", () => {
    expect.hasAssertions();

    const a = signal(1);
    const b = derived(() => a.getValue() + 1);
    const c = derived(() => b.getValue() * 3);

    a.setValue(3);

    expect(c.getValue()).toBe(12);
  });

  it("skips notifications the comparator rejects", () => {
    expect.hasAssertions();

    const list = signal([1, 2, 3]);
    const size = derived(
      () => ({ size: list.getValue().length }),
      (x, y) => x.size === y.size,
    );
    const listener = vi.fn();
    size.subscribe(listener);

    list.setValue([4, 5, 6]);

    expect(listener).not.toHaveBeenCalled();

    list.setValue([1]);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(size.peekValue()).toStrictEqual({ size: 1 });
  });

  it("keeps its last value after dispose", () => {
    expect.hasAssertions();

    const base = signal(1);
    const double = derived(() => base.getValue() * 2);

    double.dispose();
    base.setValue(10);

    expect(double.peekValue()).toBe(2);
  });
});
