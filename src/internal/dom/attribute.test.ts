import { describe, expect, it } from "vitest";

import { Attribute } from "./attribute.js";

describe("Attribute", () => {
  it("should render a bare name when no values remain", () => {
    expect(new Attribute("required").render()).toBe("required");
    expect(new Attribute("required", [null, "", undefined]).render()).toBe("required");
  });

  it("should keep distinct values in first-seen order", () => {
    const attribute = new Attribute("class", ["a", null, "b", "", "a", undefined, "c"]);

    expect(attribute.values).toEqual(["a", "b", "c"]);
    expect(attribute.render()).toBe('class="a b c"');
  });

  it("should replace values with set and drop them with clear", () => {
    const attribute = new Attribute("class", ["a", "b"]);

    attribute.set(["c", "c"]);
    expect(attribute.values).toEqual(["c"]);

    attribute.clear();
    expect(attribute.render()).toBe("class");
  });

  it("should merge extra values after its own without changing either attribute", () => {
    const own = new Attribute("class", ["a"]);
    const extra = new Attribute("class", ["b", "a"]);

    expect(own.render(extra)).toBe('class="a b"');
    expect(own.values).toEqual(["a"]);
    expect(extra.values).toEqual(["b", "a"]);
  });

  it("should escape each value", () => {
    const attribute = new Attribute("title", [`say "hi" & <bye>`, "it's"]);

    expect(attribute.render()).toBe('title="say &quot;hi&quot; &amp; &lt;bye&gt; it&#x27;s"');
  });

  it("should clone values independently", () => {
    const original = new Attribute("class", ["a"]);
    const copy = original.clone().add("b");

    expect(original.values).toEqual(["a"]);
    expect(copy.values).toEqual(["a", "b"]);
  });
});
