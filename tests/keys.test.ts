import { describe, expect, test } from "vitest";
import { KEY_AXES, UNTITLED_TOKEN, deriveKeys, firstTitleToken, isValidKey, priceBucket } from "../src/domain/keys.js";

describe("deriveKeys", () => {
  test("derives a source key and a lower-cased first-term key", () => {
    expect(deriveKeys({ source: "gumtree", title: "  Vintage Road Bike", price: null })).toEqual([
      "source:gumtree",
      "term:vintage",
    ]);
  });

  test("adds a price bucket when the price is known", () => {
    expect(deriveKeys({ source: "fb", title: "Desk", price: 45 })).toEqual([
      "source:fb",
      "term:desk",
      "price:lt100",
    ]);
  });

  test("falls back to the sentinel token for empty titles", () => {
    expect(deriveKeys({ source: "fb", title: "   ", price: null })).toEqual([
      "source:fb",
      `term:${UNTITLED_TOKEN}`,
    ]);
    expect(firstTitleToken("")).toBe(UNTITLED_TOKEN);
  });

  test("is deterministic for the same listing", () => {
    const listing = { source: "gumtree", title: "Sofa bed", price: 120 };
    expect(deriveKeys(listing)).toEqual(deriveKeys({ ...listing }));
  });

  test("namespaces axes so a source and a term with the same text never collide", () => {
    const keys = deriveKeys({ source: "bike", title: "bike", price: null });
    expect(keys).toEqual(["source:bike", "term:bike"]);
    expect(new Set(keys).size).toBe(2);
  });

  test("splits on any whitespace", () => {
    expect(firstTitleToken("Kayak\twith paddle")).toBe("kayak");
  });
});

describe("priceBucket", () => {
  test("buckets by order of magnitude", () => {
    expect(priceBucket(0)).toBe("free");
    expect(priceBucket(9.99)).toBe("lt10");
    expect(priceBucket(10)).toBe("lt100");
    expect(priceBucket(999)).toBe("lt1000");
    expect(priceBucket(5000)).toBe("lt10000");
    expect(priceBucket(25000)).toBe("gte10000");
  });
});

describe("isValidKey", () => {
  test("accepts namespaced keys only", () => {
    expect(isValidKey("source:gumtree")).toBe(true);
    expect(isValidKey("term:sofa")).toBe(true);
    expect(isValidKey("price:free")).toBe(true);
    expect(isValidKey("gumtree")).toBe(false);
    expect(isValidKey("source:")).toBe(false);
    expect(isValidKey("colour:red")).toBe(false);
  });

  test("accepts every derivable axis and nothing that merely contains one", () => {
    for (const axis of KEY_AXES) {
      expect(isValidKey(`${axis}:x`)).toBe(true);
    }
    expect(isValidKey("subsource:x")).toBe(false);
    expect(isValidKey("source|term:x")).toBe(false);
  });
});
