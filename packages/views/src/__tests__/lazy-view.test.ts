import { describe, it, expect } from "vitest";
import { LazyView } from "../lazy-view.js";
import { iota, lazy, range } from "../lazy-entry.js";

const DATA = [1, 19, 4, 2, 5, -1, 5];

// ---------------------------------------------------------------------------
// Helper: counts how many elements a source hands out
// ---------------------------------------------------------------------------

function counted<T>(data: T[]): { view: LazyView<T, true, true>; reads: () => number } {
  let reads = 0;
  const view = lazy(data).inspect(() => {
    reads++;
  });
  return { view, reads: () => reads };
}

// ===========================================================================
// Worked scenarios
// ===========================================================================

describe("LazyView — scenarios", () => {
  it("two filters keep 19, 5, 5", () => {
    const view = lazy(DATA)
      .filter((x) => x > 2)
      .filter((x) => x >= 5);
    expect(view.size()).toBe(3);
    expect(view.first()).toBe(19);
    expect(view.count((x) => x === 5)).toBe(2);
  });

  it("sort orders ascending by value", () => {
    const sorted = lazy(DATA).sort();
    expect(sorted.first()).toBe(-1);
    expect(sorted.elementAt(1)).toBe(1);
    expect(sorted.reverse().first()).toBe(19);
    expect(sorted.toArray()).toEqual([-1, 1, 2, 4, 5, 5, 19]);
  });

  it("max and min hold the extreme element", () => {
    expect(lazy(DATA).max().toArray()).toEqual([19]);
    expect(lazy(DATA).min().toArray()).toEqual([-1]);
  });

  it("chain concatenates and reverse starts from the end of the second", () => {
    const chained = lazy([1, 19, 4, 2]).chain(lazy([5, -1, 3]));
    expect(chained.size()).toBe(7);
    expect(chained.reverse().first()).toBe(3);
  });
});

// ===========================================================================
// Laws
// ===========================================================================

describe("LazyView — laws", () => {
  it("filter then map keeps order and applies the mapping", () => {
    expect(
      lazy(DATA)
        .filter((x) => x % 2 !== 0)
        .map((x) => x * 10)
        .toArray()
    ).toEqual([10, 190, 50, -10, 50]);
  });

  it("take(n) followed by skip(n) reproduces the source", () => {
    for (let n = 0; n <= DATA.length; n++) {
      const view = lazy(DATA);
      expect([...view.take(n).toArray(), ...view.skip(n).toArray()]).toEqual(DATA);
    }
  });

  it("reverse is an involution", () => {
    expect(lazy(DATA).reverse().reverse().toArray()).toEqual(DATA);
  });

  it("staged views replay the same elements", () => {
    const staged = lazy(DATA).filter((x) => x > 0).stage();
    expect(staged.toArray()).toEqual([1, 19, 4, 2, 5, 5]);
    expect(staged.toArray()).toEqual(staged.toArray());
    expect(staged.stage().toArray()).toEqual(staged.toArray());
  });

  it("chain leaves the second view untouched when stopped inside the first", () => {
    let touched = 0;
    const second = lazy([7, 8]).inspect(() => {
      touched++;
    });
    const chained = lazy([1, 2]).chain(second);
    expect(chained.firstOf((x) => x === 2)).toBe(2);
    expect(chained.take(1).toArray()).toEqual([1]);
    expect(touched).toBe(0);
    expect(chained.firstOf((x) => x === 8)).toBe(8);
    expect(touched).toBe(2);
  });

  it("chain sizes add up", () => {
    const a = lazy([1, 2]);
    const b = lazy([3]);
    const c = lazy<number>([]);
    expect(a.chain(b).chain(c).size()).toBe(a.size() + b.size() + c.size());
    expect(a.chain(b).chain(c).size()).toBe(3);
  });

  it("every terminal call traverses again", () => {
    const { view, reads } = counted([1, 2]);
    expect(view.sum()).toBe(3);
    expect(view.sum()).toBe(3);
    expect(reads()).toBe(4);
  });
});

// ===========================================================================
// Empty sequences
// ===========================================================================

describe("LazyView — empty sequences", () => {
  const empty = lazy<number>([]);

  it("all() over nothing is false", () => {
    expect(empty.all(() => true)).toBe(false);
  });

  it("contains and firstOf find nothing", () => {
    expect(empty.contains(1)).toBe(false);
    expect(empty.firstOf(() => true)).toBeNull();
    expect(empty.firstOfIndex(() => true)).toBeNull();
  });

  it("size and isEmpty agree", () => {
    expect(empty.size()).toBe(0);
    expect(empty.isEmpty()).toBe(true);
    expect(lazy([0]).isEmpty()).toBe(false);
  });

  it("min and max of nothing are empty views", () => {
    expect(empty.max().isEmpty()).toBe(true);
    expect(empty.min().first()).toBeNull();
  });
});

// ===========================================================================
// Selection
// ===========================================================================

describe("LazyView — take and skip", () => {
  it("take keeps every stride-th of the first n", () => {
    expect(range(0, 7).take(5, 2).toArray()).toEqual([0, 2, 4]);
  });

  it("take stops the upstream right after the n-th element", () => {
    let visited = 0;
    const firstThree = iota()
      .inspect(() => {
        visited++;
      })
      .take(3)
      .toArray();
    expect(firstThree).toEqual([0, 1, 2]);
    expect(visited).toBe(3);
  });

  it("take(0) never starts the upstream", () => {
    const { view, reads } = counted([1, 2, 3]);
    expect(view.take(0).toArray()).toEqual([]);
    expect(reads()).toBe(0);
  });

  it("skip applies the stride to the upstream position", () => {
    expect(range(0, 10).skip(3, 2).toArray()).toEqual([4, 6, 8]);
  });

  it("takeWhile stops at the first failure", () => {
    expect(lazy(DATA).takeWhile((x) => x < 10).toArray()).toEqual([1]);
  });

  it("skipWhile yields everything from the first failure", () => {
    expect(lazy(DATA).skipWhile((x) => x < 10).toArray()).toEqual([19, 4, 2, 5, -1, 5]);
  });

  it("skipWhile does not consult the predicate once it yields", () => {
    let calls = 0;
    lazy(DATA)
      .skipWhile((x) => {
        calls++;
        return x < 10;
      })
      .toArray();
    expect(calls).toBe(2);
  });

  it("takeWhile bounds an infinite series", () => {
    expect(iota(1).takeWhile((x) => x <= 4).sum()).toBe(10);
  });
});

// ===========================================================================
// Ordering
// ===========================================================================

describe("LazyView — sort, min, max", () => {
  const items = [
    { k: 1, id: "a" },
    { k: 2, id: "b" },
    { k: 2, id: "c" },
    { k: 1, id: "d" },
  ];

  it("sort is stable", () => {
    expect(
      lazy(items)
        .sort((item) => item.k)
        .map((item) => item.id)
        .toArray()
    ).toEqual(["a", "d", "b", "c"]);
  });

  it("sort orders strings", () => {
    expect(lazy(["pear", "apple", "fig"]).sort().toArray()).toEqual(["apple", "fig", "pear"]);
  });

  it("later ties win for max, earlier ties win for min", () => {
    expect(lazy(items).max((item) => item.k).first()?.id).toBe("c");
    expect(lazy(items).min((item) => item.k).first()?.id).toBe("a");
  });
});

// ===========================================================================
// Combination
// ===========================================================================

describe("LazyView — zip, cartesian, enumerate", () => {
  it("zip pairs by position up to the shorter side", () => {
    expect(lazy([1, 2, 3]).zip(lazy(["a", "b"])).toArray()).toEqual([
      [1, "a"],
      [2, "b"],
    ]);
  });

  it("zip walks a transient side and indexes the permanent one", () => {
    expect(
      lazy([1, 2, 3])
        .map((x) => x * 2)
        .zip(lazy(["a", "b", "c", "d"]))
        .toArray()
    ).toEqual([
      [2, "a"],
      [4, "b"],
      [6, "c"],
    ]);
    expect(
      lazy(["a", "b"])
        .zip(lazy([1, 2, 3]).filter((x) => x > 1))
        .toArray()
    ).toEqual([
      ["a", 2],
      ["b", 3],
    ]);
  });

  it("zip refuses when neither side answers lookups in constant time", () => {
    let keyed = 0;
    const sorted = lazy([3, 1, 2]).sort((x) => {
      keyed++;
      return x;
    });
    expect(() => sorted.zip(lazy(["a", "b", "c"]).map((x) => x))).toThrow(
      "Neither view offers constant-time positional access, consider calling stage()"
    );
    expect(keyed).toBe(0);
    expect(
      sorted
        .stage()
        .zip(lazy(["a", "b", "c"]).map((x) => x))
        .toArray()
    ).toEqual([
      [1, "a"],
      [2, "b"],
      [3, "c"],
    ]);
    expect(keyed).toBe(3);
  });

  it("zip walks a sorted side once when the other is indexed", () => {
    let keyed = 0;
    const sorted = lazy([3, 1, 2]).sort((x) => {
      keyed++;
      return x;
    });
    expect(sorted.zip(lazy(["a", "b", "c"])).size()).toBe(3);
    expect(keyed).toBe(3);
  });

  it("zip with an infinite side is finite", () => {
    const zipped = iota().zip(lazy(["x", "y"]));
    expect(zipped.isFinite).toBe(true);
    expect(zipped.isPermanent).toBe(false);
    expect(zipped.toArray()).toEqual([
      [0, "x"],
      [1, "y"],
    ]);
  });

  it("cartesian loops over the first view outermost", () => {
    expect(lazy([1, 2]).cartesian(lazy(["x", "y"])).toArray()).toEqual([
      [1, "x"],
      [1, "y"],
      [2, "x"],
      [2, "y"],
    ]);
  });

  it("cartesian honors an early stop from the inner loop", () => {
    expect(lazy([1, 2]).cartesian(lazy(["x", "y"])).take(3).toArray()).toEqual([
      [1, "x"],
      [1, "y"],
      [2, "x"],
    ]);
  });

  it("enumerate counts from the offset", () => {
    expect(lazy(["a", "b"]).enumerate(1).toArray()).toEqual([
      [1, "a"],
      [2, "b"],
    ]);
  });
});

// ===========================================================================
// Grouping
// ===========================================================================

describe("LazyView — group", () => {
  it("non-overlapping windows", () => {
    expect(range(0, 4).group(2).toArray()).toEqual([
      [0, 1],
      [2, 3],
    ]);
  });

  it("overlapping windows", () => {
    expect(range(0, 4).group(2, 1).toArray()).toEqual([
      [0, 1],
      [1, 2],
      [2, 3],
    ]);
  });

  it("drops a trailing partial window", () => {
    expect(range(0, 5).group(2).toArray()).toEqual([
      [0, 1],
      [2, 3],
    ]);
  });

  it("windows kept by forEach stay intact", () => {
    const seen: (readonly number[])[] = [];
    range(0, 4)
      .group(2)
      .forEach((window) => seen.push(window));
    expect(seen).toEqual([
      [0, 1],
      [2, 3],
    ]);
  });

  it("windows kept by accumulate stay intact", () => {
    const kept = range(0, 4)
      .group(2)
      .accumulate((acc: (readonly number[])[], window) => [...acc, window], []);
    expect(kept).toEqual([
      [0, 1],
      [2, 3],
    ]);
  });

  it("overlapping windows kept through enumerate stay intact", () => {
    const kept = range(0, 6)
      .group(2, 1)
      .enumerate()
      .accumulate((acc: (readonly number[])[], [, window]) => [...acc, window], []);
    expect(kept).toEqual([
      [0, 1],
      [1, 2],
      [2, 3],
      [3, 4],
      [4, 5],
    ]);
  });

  it("windows kept by a mapping stay intact", () => {
    const sizes: (readonly number[])[] = [];
    const total = range(0, 4)
      .group(2)
      .map((window) => {
        sizes.push(window);
        return window.length;
      })
      .sum();
    expect(total).toBe(4);
    expect(sizes).toEqual([
      [0, 1],
      [2, 3],
    ]);
  });

  it("window contents are correct at the time of each emission", () => {
    const joined: string[] = [];
    range(0, 6)
      .group(3, 2)
      .forEach((window) => joined.push(window.join("-")));
    expect(joined).toEqual(["0-1-2", "2-3-4"]);
  });

  it("staging a grouped view keeps each window", () => {
    const windows = range(0, 4).group(2).stage();
    expect(windows.elementAt(0)).toEqual([0, 1]);
    expect(windows.elementAt(1)).toEqual([2, 3]);
  });
});

// ===========================================================================
// Terminal operations
// ===========================================================================

describe("LazyView — terminal operations", () => {
  it("sum with and without a projection", () => {
    expect(lazy([1, 2, 3]).sum()).toBe(6);
    expect(lazy(["a", "bb"]).sum((s) => s.length)).toBe(3);
  });

  it("accumulate folds left to right", () => {
    expect(lazy([1, 2, 3]).accumulate((total, x) => total + x * x, 0)).toBe(14);
    expect(lazy([1, 2, 3]).accumulate((total, x) => total + String(x), ">")).toBe(">123");
  });

  it("stat collects count, sum and sum of squares", () => {
    const info = lazy([2, 4, 4, 4, 5, 5, 7, 9]).stat();
    expect(info.count).toBe(8);
    expect(info.sum).toBe(40);
    expect(info.sum2).toBe(232);
    expect(info.mean()).toBe(5);
    expect(info.variance()).toBe(4);
    expect(info.sigma()).toBe(2);
  });

  it("stat of nothing has no mean", () => {
    expect(lazy<number>([]).stat().mean()).toBeNaN();
  });

  it("contains accepts a value or a predicate", () => {
    expect(lazy(DATA).contains(5)).toBe(true);
    expect(lazy(DATA).contains(7)).toBe(false);
    expect(lazy(DATA).contains((x) => x < 0)).toBe(true);
  });

  it("contains stops at the first match", () => {
    const { view, reads } = counted(DATA);
    expect(view.contains(19)).toBe(true);
    expect(reads()).toBe(2);
  });

  it("all stops at the first failure", () => {
    const { view, reads } = counted([2, 4, 5, 6]);
    expect(view.all((x) => x % 2 === 0)).toBe(false);
    expect(reads()).toBe(3);
    expect(lazy([2, 4]).all((x) => x % 2 === 0)).toBe(true);
  });

  it("firstOf and firstOfIndex", () => {
    expect(lazy(DATA).firstOf((x) => x > 4)).toBe(19);
    expect(lazy(DATA).firstOfIndex((x) => x < 0)).toBe(5);
    expect(lazy(DATA).firstOfIndex((x) => x > 100)).toBeNull();
  });

  it("elementAt reads by position", () => {
    expect(lazy(DATA).elementAt(3)).toBe(2);
    expect(lazy(DATA).elementAt(7)).toBeNull();
    expect(
      lazy(DATA)
        .filter((x) => x > 2)
        .elementAt(2)
    ).toBe(5);
  });

  it("count without a predicate counts everything", () => {
    expect(lazy(DATA).count()).toBe(7);
  });

  it("forEach visits everything and returns the view", () => {
    const view = lazy([1, 2, 3]);
    const seen: number[] = [];
    expect(view.forEach((x) => seen.push(x))).toBe(view);
    expect(seen).toEqual([1, 2, 3]);
  });

  it("pushTo appends to an existing array", () => {
    expect(lazy([1, 2]).pushTo([0])).toEqual([0, 1, 2]);
  });

  it("isSame compares only the overlap", () => {
    expect(lazy([1, 2, 3]).isSame(lazy([1, 2]))).toBe(true);
    expect(lazy([1, 2, 3]).isSame(lazy([1, 5, 3]))).toBe(false);
  });

  it("isSame takes a comparator", () => {
    expect(lazy(["a", "b"]).isSame(lazy(["A", "B"]), ([a, b]) => a.toUpperCase() === b)).toBe(
      true
    );
  });

  it("caller exceptions propagate unchanged", () => {
    const boom = new Error("boom");
    const view = lazy([1, 2]).map((x) => {
      if (x === 2) throw boom;
      return x;
    });
    expect(() => view.toArray()).toThrow(boom);
  });
});

// ===========================================================================
// Traits
// ===========================================================================

describe("LazyView — finite and permanent traits", () => {
  it("transformations computed on the fly are not permanent", () => {
    const source = lazy(DATA);
    expect(source.isPermanent).toBe(true);
    expect(source.filter((x) => x > 0).isPermanent).toBe(false);
    expect(source.map((x) => x).isPermanent).toBe(false);
    expect(source.take(2).isPermanent).toBe(true);
    expect(source.stage().isPermanent).toBe(true);
  });

  it("take bounds an infinite view, skip does not", () => {
    expect(iota().isFinite).toBe(false);
    expect(iota().take(2).isFinite).toBe(true);
    expect(iota().skip(2).isFinite).toBe(false);
  });

  it("chain and zip are permanent only when both sides are", () => {
    expect(lazy([1]).chain(lazy([2])).isPermanent).toBe(true);
    expect(
      lazy([1])
        .chain(lazy([2]).map((x) => x))
        .isPermanent
    ).toBe(false);
    expect(lazy([1]).zip(lazy([2])).isPermanent).toBe(true);
  });
});
