import { describe, expect, it } from "vitest";
import { flatten } from "./flatten.js";
import { findUnresolved, renderPattern, substitute } from "./renderer.js";

describe("substitute", () => {
  it("renders a nested key", () => {
    const result = substitute("<p>{{a.b}}</p>", flatten({ a: { b: "hello" } }));

    expect(result).toEqual({ html: "<p>hello</p>", unresolved: [] });
  });

  it("leaves unknown tokens and reports them", () => {
    const result = substitute("{{x}} {{y}}", { x: "1" });

    expect(result.html).toBe("1 {{y}}");
    expect(result.unresolved).toEqual(["{{y}}"]);
  });

  it("replaces every occurrence of a token", () => {
    expect(substitute("{{n}}-{{n}}-{{n}}", { n: "7" }).html).toBe("7-7-7");
  });

  it("does not re-substitute tokens introduced by a value", () => {
    const result = substitute("{{a}} {{b}}", { a: "{{b}}", b: "B" });

    expect(result.html).toBe("{{b}} B");
    expect(result.unresolved).toEqual(["{{b}}"]);
  });

  it("gives the same output whatever the key order", () => {
    const template = "{{first}}/{{second}}";

    expect(substitute(template, { first: "1", second: "2" }).html).toBe("1/2");
    expect(substitute(template, { second: "2", first: "1" }).html).toBe("1/2");
  });

  it("is idempotent when values carry no tokens", () => {
    const mapping = { x: "1" };
    const once = substitute("{{x}} {{y}}", mapping);
    const twice = substitute(once.html, mapping);

    expect(twice).toEqual(once);
  });

  it("treats regex characters in keys and values literally", () => {
    const result = substitute("{{price.$usd}} {{a+b}}", { "price.$usd": "$&10", "a+b": "(sum)" });

    expect(result.html).toBe("$&10 (sum)");
  });

  it("does not tolerate whitespace inside the braces", () => {
    const result = substitute("{{ a }}", { a: "1" });

    expect(result.html).toBe("{{ a }}");
    expect(result.unresolved).toEqual(["{{ a }}"]);
  });

  it("finds a token nested in extra braces", () => {
    expect(substitute("{{{x}}}", { x: "v" })).toEqual({ html: "{v}", unresolved: [] });
  });

  it("fills a __proto__ placeholder from the config", () => {
    const result = substitute("{{__proto__}} {{ok}}", flatten(JSON.parse('{"__proto__":"P","ok":"1"}')));

    expect(result).toEqual({ html: "P 1", unresolved: [] });
  });

  it("returns the template unchanged for an empty mapping", () => {
    expect(substitute("<p>{{a}}</p>", {})).toEqual({ html: "<p>{{a}}</p>", unresolved: ["{{a}}"] });
  });
});

describe("findUnresolved", () => {
  it("returns distinct tokens in sorted order", () => {
    expect(findUnresolved("{{z}} {{m}} {{z}} {{a.b}}")).toEqual(["{{a.b}}", "{{m}}", "{{z}}"]);
  });

  it("ignores empty braces", () => {
    expect(findUnresolved("{{}} {x}")).toEqual([]);
  });
});

describe("renderPattern", () => {
  it("fills known names and keeps unknown ones", () => {
    expect(renderPattern("http://localhost:8080/clients/{slug}/{page}", { slug: "acme" })).toBe(
      "http://localhost:8080/clients/acme/{page}",
    );
  });
});
