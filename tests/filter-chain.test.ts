import { describe, it, expect } from "vitest";
import { applyFilters, filterItems } from "../src/filter/chain.js";
import type { Filter, FilterAction } from "../src/filter/types.js";
import { FilterExecutionError } from "../src/pipeline/errors.js";
import { item } from "./helpers.js";


function constant(action: FilterAction, name?: string): Filter {
  return { name, apply: () => action };
}


describe("applyFilters", () => {
  const sample = item({ id: "1", title: "Hello" });

  it("过滤器列表缺省或为空时默认 include", () => {
    expect(applyFilters(undefined, sample)).toBe("include");
    expect(applyFilters([], sample)).toBe("include");
  });

  it("全部 abstain 不改变默认 include", () => {
    expect(applyFilters([constant("abstain"), constant("abstain")], sample)).toBe("include");
  });

  it("后面非 abstain 的结果覆盖前面的", () => {
    expect(applyFilters([constant("exclude"), constant("include")], sample)).toBe("include");
    expect(applyFilters([constant("include"), constant("exclude")], sample)).toBe("exclude");
  });

  it("abstain 保留之前的决定", () => {
    expect(applyFilters([constant("exclude"), constant("abstain")], sample)).toBe("exclude");
  });

  it("按定义顺序逐个调用", () => {
    const order: string[] = [];
    const track = (name: string): Filter => ({ name, apply: () => { order.push(name); return "abstain"; } });
    applyFilters([track("a"), track("b"), track("c")], sample);
    expect(order).toEqual(["a", "b", "c"]);
  });

  it("过滤器抛错时包装为 FilterExecutionError", () => {
    const boom: Filter = { name: "boom", apply: () => { throw new Error("bad regex"); } };
    let caught: unknown;
    try {
      applyFilters([constant("include"), boom], sample);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FilterExecutionError);
    if (!(caught instanceof FilterExecutionError)) return;
    expect(caught.filterName).toBe("boom");
    expect(caught.itemId).toBe("1");
    expect(caught.cause).toBeInstanceOf(Error);
  });

  it("未命名的过滤器用下标标识", () => {
    const boom: Filter = { apply: () => { throw new Error("x"); } };
    expect(() => applyFilters([constant("abstain"), boom], sample)).toThrow(/#1/);
  });
});


describe("filterItems", () => {
  it("只产出最终决定为 include 的条目并保持顺序", () => {
    const items = [item({ id: "a", title: "keep" }), item({ id: "b", title: "drop" }), item({ id: "c", title: "keep too" })];
    const dropB: Filter = { apply: (i) => (i.id === "b" ? "exclude" : "abstain") };
    expect(Array.from(filterItems(items, [dropB])).map((i) => i.id)).toEqual(["a", "c"]);
  });

  it("宽泛排除后由更具体的过滤器放回", () => {
    const items = [item({ id: "a", title: "TypeScript 5" }), item({ id: "b", title: "Rust 2" })];
    const excludeAll = constant("exclude");
    const includeTs: Filter = { apply: (i) => (i.title?.includes("TypeScript") ? "include" : "abstain") };
    expect(Array.from(filterItems(items, [excludeAll, includeTs])).map((i) => i.id)).toEqual(["a"]);
  });
});
