import { describe, expect, it } from "vitest";
import { Mempool } from "../mempool";
import type { Transaction } from "../types";

function tx(id: string): Transaction {
  return { id, type: "inc", payload: {} };
}

describe("Mempool", () => {
  it("dedupes by id and keeps arrival order", () => {
    const pool = new Mempool();
    expect(pool.add(tx("a"))).toBe("added");
    expect(pool.add(tx("b"))).toBe("added");
    expect(pool.add(tx("a"))).toBe("duplicate");
    expect(pool.all().map((t) => t.id)).toEqual(["a", "b"]);
    expect(pool.size()).toBe(2);
  });

  it("refuses new transactions at capacity", () => {
    const pool = new Mempool(2);
    pool.add(tx("a"));
    pool.add(tx("b"));
    expect(pool.add(tx("c"))).toBe("full");
    expect(pool.add(tx("a"))).toBe("duplicate");
    expect(pool.has("c")).toBe(false);
  });

  it("takes the oldest transactions first", () => {
    const pool = new Mempool();
    ["a", "b", "c"].forEach((id) => pool.add(tx(id)));
    expect(pool.take(2).map((t) => t.id)).toEqual(["a", "b"]);
    expect(pool.all().map((t) => t.id)).toEqual(["c"]);
    expect(pool.take(5).map((t) => t.id)).toEqual(["c"]);
    expect(pool.size()).toBe(0);
  });

  it("requeues transactions ahead of newer arrivals", () => {
    const pool = new Mempool();
    ["a", "b", "c"].forEach((id) => pool.add(tx(id)));
    const taken = pool.take(2);
    pool.add(tx("d"));
    pool.requeue(taken);
    expect(pool.all().map((t) => t.id)).toEqual(["a", "b", "c", "d"]);
    pool.requeue([tx("c"), tx("e")]);
    expect(pool.all().map((t) => t.id)).toEqual(["e", "a", "b", "c", "d"]);
  });

  it("drops what the predicate refuses and reports it", () => {
    const pool = new Mempool();
    ["a", "b", "c", "d"].forEach((id) => pool.add(tx(id)));
    const seen: string[] = [];
    const dropped = pool.retain((t) => {
      seen.push(t.id);
      return t.id !== "b" && t.id !== "d";
    });
    expect(seen).toEqual(["a", "b", "c", "d"]);
    expect(dropped.map((t) => t.id)).toEqual(["b", "d"]);
    expect(pool.all().map((t) => t.id)).toEqual(["a", "c"]);
  });
});
