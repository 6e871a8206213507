import { describe, it, expect } from "vitest";
import { translateTargets } from "./target-translator.js";

describe("translateTargets", () => {
  it("emits an empty group for an empty target list", () => {
    expect(translateTargets("scrape.a", [])).toEqual({
      "scrape.a": [{ source: "scrape.a", labels: {}, targets: [] }],
    });
  });

  it("keeps every target, in order, under one source", () => {
    const sets = translateTargets("scrape.a", [
      { __address__: "10.0.0.1:9100" },
      { __address__: "10.0.0.2:9100", env: "prod" },
      { __address__: "10.0.0.3:9100" },
    ]);

    expect(Object.keys(sets)).toEqual(["scrape.a"]);
    expect(sets["scrape.a"]).toHaveLength(1);
    expect(sets["scrape.a"][0].source).toBe("scrape.a");
    expect(sets["scrape.a"][0].targets).toEqual([
      { __address__: "10.0.0.1:9100" },
      { __address__: "10.0.0.2:9100", env: "prod" },
      { __address__: "10.0.0.3:9100" },
    ]);
  });

  it("copies targets so later changes to the input do not leak", () => {
    const target = { __address__: "10.0.0.1:9100" };
    const sets = translateTargets("scrape.a", [target]);

    target.__address__ = "changed:1";

    expect(sets["scrape.a"][0].targets[0]).toEqual({ __address__: "10.0.0.1:9100" });
  });
});
