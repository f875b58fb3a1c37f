import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { resolve, resolveModel } from "../src/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// Path evaluation
//
// A path is a sequence of segments picked out by their leading sigil. One
// segment keeps its native type; several are rendered as text and joined.
// ═══════════════════════════════════════════════════════════════════════════

const person = {
  Name: "Alice",
  Age: 30,
  Active: true,
  Score: 2.5,
  Address: { City: "NYC" },
  Tags: ["developer", "gopher"],
};

// ── Model references ──────────────────────────────────────────────────────

describe("model references", () => {
  test("empty path returns the data unchanged", () => {
    assert.equal(resolve("", person), person);
  });

  test("path of only spaces returns the data unchanged", () => {
    assert.equal(resolve("   ", person), person);
  });

  test("top-level field", () => {
    assert.equal(resolve(".Name", person), "Alice");
  });

  test("a single segment keeps its native type", () => {
    assert.equal(resolve(".Age", person), 30);
    assert.equal(resolve(".Active", person), true);
    assert.equal(resolve(".Tags", person), person.Tags);
  });

  test("nested field", () => {
    assert.equal(resolve(".Address.City", person), "NYC");
  });

  test("array index", () => {
    assert.equal(resolve(".Tags[0]", person), "developer");
    assert.equal(resolve(".Tags[1]", person), "gopher");
  });

  test("out-of-bounds and malformed indexes are undefined", () => {
    assert.equal(resolve(".Tags[5]", person), undefined);
    assert.equal(resolve(".Tags[-1]", person), undefined);
    assert.equal(resolve(".Tags[x]", person), undefined);
  });

  test("missing field is undefined", () => {
    assert.equal(resolve(".Missing", person), undefined);
    assert.equal(resolve(".Address.Zip", person), undefined);
  });

  test("absent data makes every model reference undefined", () => {
    assert.equal(resolve(".Name", null), undefined);
    assert.equal(resolve(".Name", undefined), undefined);
  });

  test("literals still resolve without data", () => {
    assert.equal(resolve("'lit'", null), "lit");
  });
});

// ── String literals ───────────────────────────────────────────────────────

describe("string literals", () => {
  test("single and double quotes", () => {
    assert.equal(resolve("'hello'", person), "hello");
    assert.equal(resolve('"hello"', person), "hello");
  });

  test("backslash escapes the next character", () => {
    assert.equal(resolve("'It\\'s'", person), "It's");
    assert.equal(resolve('"say \\"hi\\""', person), 'say "hi"');
    assert.equal(resolve("'a\\\\b'", person), "a\\b");
  });

  test("the other quote needs no escaping", () => {
    assert.equal(resolve(`"It's"`, person), "It's");
  });

  test("unterminated literal runs to the end", () => {
    assert.equal(resolve("'abc", person), "abc");
  });

  test("empty literal", () => {
    assert.equal(resolve("''", person), "");
  });
});

// ── Concatenation ─────────────────────────────────────────────────────────

describe("concatenation", () => {
  test("segments are joined as text", () => {
    assert.equal(resolve(".Name ' is ' .Age", person), "Alice is 30");
  });

  test("end-to-end greeting", () => {
    assert.equal(
      resolve("'Hello, ' .Name ' from ' .Address.City", person),
      "Hello, Alice from NYC",
    );
  });

  test("missing values contribute nothing", () => {
    assert.equal(resolve("'x' .Missing 'y'", person), "xy");
  });

  test("containers render as JSON", () => {
    assert.equal(resolve("'tags: ' .Tags", person), 'tags: ["developer","gopher"]');
    assert.equal(resolve(".Address ''", person), '{"City":"NYC"}');
  });

  test("booleans and floats render canonically", () => {
    assert.equal(resolve(".Active ' ' .Score", person), "true 2.5");
  });

  test("characters outside any segment are skipped", () => {
    assert.equal(resolve("hello .Name", person), "Alice");
  });
});

// ── Negation ──────────────────────────────────────────────────────────────

describe("negation", () => {
  test("booleans are complemented", () => {
    assert.equal(resolve("!.Active", { Active: true }), false);
    assert.equal(resolve("!.Active", { Active: false }), true);
  });

  test("double negation", () => {
    assert.equal(resolve("!!.Active", { Active: true }), true);
  });

  test("text is true only when it reads false, in any case", () => {
    assert.equal(resolve("!'false'", person), true);
    assert.equal(resolve("!'FALSE'", person), true);
    assert.equal(resolve("!'yes'", person), false);
  });

  test("a missing value negates to false", () => {
    assert.equal(resolve("!.Missing", person), false);
  });

  test("non-boolean values are matched by their text", () => {
    assert.equal(resolve("!.Flag", { Flag: "False" }), true);
    assert.equal(resolve("!.Age", person), false);
  });
});

// ── Comparison ────────────────────────────────────────────────────────────

describe("comparison", () => {
  test("equality compares text forms", () => {
    assert.equal(resolve("?.Age=='30'", person), true);
    assert.equal(resolve("?.Name=='Bob'", person), false);
  });

  test("inequality", () => {
    assert.equal(resolve("?.Age!='30'", person), false);
    assert.equal(resolve("?.Name!='Bob'", person), true);
  });

  test("floats and booleans compare by canonical text", () => {
    assert.equal(resolve("?.Score=='2.5'", person), true);
    assert.equal(resolve("?.Active=='true'", person), true);
  });

  test("model on both sides", () => {
    assert.equal(resolve("?.A==.B", { A: 1, B: "1" }), true);
  });

  test("negation as an operand", () => {
    assert.equal(resolve("?!.Active=='false'", person), true);
  });

  test("missing operator evaluates to false", () => {
    assert.equal(resolve("?.Age", person), false);
  });

  test("operator must follow the left operand directly", () => {
    // the comparison gives false and scanning resumes, picking up the literal
    assert.equal(resolve("?.Age '30'", person), "false30");
  });

  test("missing value compares as empty text", () => {
    assert.equal(resolve("?.Missing==''", person), true);
  });
});

// ── References ────────────────────────────────────────────────────────────

describe("references", () => {
  const references = (name: string) => (name === "greeting" ? "hi" : undefined);

  test("resolved through the callback", () => {
    assert.equal(resolve(":greeting", person, references), "hi");
  });

  test("unknown reference is undefined", () => {
    assert.equal(resolve(":other", person, references), undefined);
  });

  test("without a resolver every reference is undefined", () => {
    assert.equal(resolve(":greeting", person), undefined);
  });

  test("the resolver receives the root data", () => {
    assert.equal(
      resolve(":who", person, (_name, data) => (data === person ? "root" : "other")),
      "root",
    );
  });

  test("references concatenate with other segments", () => {
    assert.equal(resolve(":greeting ', ' .Name", person, references), "hi, Alice");
  });

  test("references as comparison operands", () => {
    assert.equal(resolve("?:role=='admin'", person, () => "admin"), true);
  });

  test("the resolver is called once per reference", () => {
    const calls: string[] = [];
    resolve(":a :b :a", person, (name) => {
      calls.push(name);
      return name;
    });
    assert.deepEqual(calls, ["a", "b", "a"]);
  });

  test("errors from the resolver propagate", () => {
    assert.throws(
      () =>
        resolve(":boom", person, () => {
          throw new Error("resolver failed");
        }),
      { message: "resolver failed" },
    );
  });
});

// ── resolveModel ──────────────────────────────────────────────────────────

describe("resolveModel", () => {
  test("returns the value and where scanning resumes", () => {
    assert.deepEqual(resolveModel(".Name rest", person, 0), { value: "Alice", index: 5 });
  });

  test("starts at the given offset", () => {
    assert.deepEqual(resolveModel("'x' .Address.City", person, 4), { value: "NYC", index: 17 });
  });

  test("stops at an operator", () => {
    assert.deepEqual(resolveModel(".Age=='30'", person, 0), { value: 30, index: 4 });
  });
});
