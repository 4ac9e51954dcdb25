import { strict as assert } from "node:assert";
import test from "node:test";

import { canonicalSymbol, fromSourceSymbol, toSourceSymbol } from "../src/symbols.js";

test("toSourceSymbol maps market suffixes to the source convention", () => {
  assert.equal(toSourceSymbol("7203.T"), "7203.jp");
  assert.equal(toSourceSymbol("VOD.L"), "vod.uk");
  assert.equal(toSourceSymbol("SAP.DE"), "sap.de");
  assert.equal(toSourceSymbol("0700.HK"), "0700.hk");
});

test("identifiers without a known suffix are treated as US listings", () => {
  assert.equal(toSourceSymbol("AAPL"), "aapl.us");
  assert.equal(toSourceSymbol("BRK.B"), "brk.b.us");
  assert.equal(toSourceSymbol(" msft "), "msft.us");
});

test("fromSourceSymbol reverses every mapping", () => {
  for (const symbol of ["7203.T", "VOD.L", "SAP.DE", "0700.HK", "AAPL", "BRK.B"]) {
    assert.equal(fromSourceSymbol(toSourceSymbol(symbol)), symbol);
  }
});

test("fromSourceSymbol rejects unknown or missing suffixes", () => {
  assert.throws(() => fromSourceSymbol("abc.xx"), /unknown market suffix "\.xx"/u);
  assert.throws(() => fromSourceSymbol("abc"), /has no market suffix/u);
});

test("canonicalSymbol rejects blank identifiers", () => {
  assert.throws(() => canonicalSymbol("   "), /must not be empty/u);
});
