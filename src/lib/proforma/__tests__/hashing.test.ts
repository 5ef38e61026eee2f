/**
 * Pro Forma — Deterministic hashing tests
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { deterministicHash } from "../hashing";

describe("deterministicHash", () => {
  it("is a 64-char hex SHA-256", () => {
    assert.match(deterministicHash({ a: 1 }), /^[0-9a-f]{64}$/);
  });

  it("ignores key order at every depth", () => {
    const a = { noi: 1, rows: [{ period: 0, date: "2026-01-31" }], exit: { gross: 2, net: 1 } };
    const b = { exit: { net: 1, gross: 2 }, rows: [{ date: "2026-01-31", period: 0 }], noi: 1 };
    assert.equal(deterministicHash(a), deterministicHash(b));
  });

  it("changes when a value changes", () => {
    assert.notEqual(deterministicHash({ irr: 0.1 }), deterministicHash({ irr: 0.1000001 }));
  });

  it("treats an undefined key as absent", () => {
    assert.equal(deterministicHash({ irr: 0.1, npv: undefined }), deterministicHash({ irr: 0.1 }));
  });

  it("keeps array order significant", () => {
    assert.notEqual(deterministicHash([1, 2]), deterministicHash([2, 1]));
  });
});
