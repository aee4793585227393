import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test, { after, before, mock } from "node:test";
import { Ledger } from "../ledger/ledger.js";
import { setLogLevel } from "../observability/logger.js";
import { LedgerStore } from "./ledger-store.js";

let root = "";

before(() => {
  setLogLevel("silent");
  root = mkdtempSync(join(tmpdir(), "finance-store-"));
});

after(() => {
  setLogLevel("warn");
  rmSync(root, { recursive: true, force: true });
});

function storeIn(name: string) {
  const dir = join(root, name);
  return {
    dir,
    store: new LedgerStore({
      transactionsFile: join(dir, "transactions.csv"),
      budgetsFile: join(dir, "budgets.json")
    })
  };
}

test("saved ledger loads back into a fresh ledger", () => {
  const { store } = storeIn("round-trip");
  const ledger = new Ledger();
  ledger.addBudget({ category: "Food", allocatedAmount: 500, period: "June 2025" });
  ledger.addTransaction({ date: "2025-06-25", type: "income", category: "Salary", amount: 1000, description: "Paycheck" });
  ledger.addTransaction({ date: "2025-06-25", type: "expense", category: "Food", amount: 50, description: "Groceries" });

  const saved = store.saveAll(ledger);
  assert.deepEqual(saved, {
    transactions: { ok: true, count: 2 },
    budgets: { ok: true, count: 1 }
  });

  const reloaded = new Ledger();
  const loaded = store.loadAll(reloaded);
  assert.deepEqual(loaded, {
    transactions: { ok: true, count: 2, warnings: [] },
    budgets: { ok: true, count: 1, warnings: [] }
  });
  assert.deepEqual(
    reloaded.transactions.map((transaction) => transaction.details()),
    ledger.transactions.map((transaction) => transaction.details())
  );
  assert.deepEqual(reloaded.findBudget("Food")?.details(), {
    category: "Food",
    allocated_amount: 500,
    spent_amount: 50,
    remaining: 450,
    period: "June 2025"
  });
});

test("missing files load as empty collections", () => {
  const { store } = storeIn("missing");
  const ledger = new Ledger();
  ledger.addBudget({ category: "Food", allocatedAmount: 500 });
  ledger.addTransaction({ date: "2025-06-25", type: "expense", category: "Food", amount: 5 });

  const loaded = store.loadAll(ledger);

  assert.deepEqual(loaded, {
    transactions: { ok: true, count: 0, warnings: [] },
    budgets: { ok: true, count: 0, warnings: [] }
  });
  assert.equal(ledger.transactions.length, 0);
  assert.equal(ledger.budgets.length, 0);
});

test("malformed rows are skipped and reported", () => {
  const { dir, store } = storeIn("malformed");
  mkdirSync(dir, { recursive: true });
  writeFileSync(
    join(dir, "transactions.csv"),
    [
      "date,transaction_type,category,amount,description",
      "2025-06-25,expense,Food,50.0,Groceries",
      "2025-06-26,expense,Food,abc,Snacks",
      ""
    ].join("\n")
  );

  const ledger = new Ledger();
  const loaded = store.loadTransactions(ledger);

  assert.deepEqual(loaded, {
    ok: true,
    count: 1,
    warnings: ["Skipping invalid transaction row 2: Amount must be a number"]
  });
  assert.equal(ledger.transactions[0]?.description, "Groceries");
});

test("skipped rows are not logged again at the default level", () => {
  const { dir, store } = storeIn("quiet-skips");
  mkdirSync(dir, { recursive: true });
  writeFileSync(
    join(dir, "transactions.csv"),
    "date,transaction_type,category,amount,description\n2025-06-26,expense,Food,abc,Snacks\n"
  );
  writeFileSync(join(dir, "budgets.json"), JSON.stringify([{ category: "Food" }]));

  const lines: string[] = [];
  const spy = mock.method(console, "error", (line: string) => {
    lines.push(line);
  });
  setLogLevel("warn");
  let loaded: ReturnType<LedgerStore["loadAll"]>;
  try {
    loaded = store.loadAll(new Ledger());
  } finally {
    setLogLevel("silent");
    spy.mock.restore();
  }

  assert.deepEqual(loaded.transactions, {
    ok: true,
    count: 0,
    warnings: ["Skipping invalid transaction row 1: Amount must be a number"]
  });
  assert.equal(loaded.budgets.ok && loaded.budgets.warnings.length, 1);
  assert.deepEqual(lines, []);
});

test("unreadable files leave the ledger unchanged", () => {
  const { dir, store } = storeIn("unreadable");
  // Directories exist but cannot be read as files.
  mkdirSync(join(dir, "transactions.csv"), { recursive: true });
  writeFileSync(join(dir, "budgets.json"), "{ broken");

  const ledger = new Ledger();
  ledger.addBudget({ category: "Food", allocatedAmount: 500 });
  ledger.addTransaction({ date: "2025-06-25", type: "expense", category: "Food", amount: 5 });

  const loaded = store.loadAll(ledger);

  assert.equal(loaded.transactions.ok, false);
  if (!loaded.transactions.ok) {
    assert.match(loaded.transactions.error, /^Error loading transactions: /);
  }
  assert.equal(loaded.budgets.ok, false);
  if (!loaded.budgets.ok) {
    assert.match(loaded.budgets.error, /^Error loading budgets: /);
  }
  assert.equal(ledger.transactions.length, 1);
  assert.equal(ledger.findBudget("Food")?.spentAmount, 5);
});

test("failed writes are reported", () => {
  const { dir } = storeIn("blocked");
  mkdirSync(dir, { recursive: true });
  const blocker = join(dir, "not-a-dir");
  writeFileSync(blocker, "");
  const store = new LedgerStore({
    transactionsFile: join(blocker, "transactions.csv"),
    budgetsFile: join(blocker, "budgets.json")
  });

  const saved = store.saveAll(new Ledger());

  assert.equal(saved.transactions.ok, false);
  if (!saved.transactions.ok) {
    assert.match(saved.transactions.error, /^Error saving transactions: /);
  }
  assert.equal(saved.budgets.ok, false);
});

test("saved budget file uses the documented record keys", () => {
  const { dir, store } = storeIn("keys");
  const ledger = new Ledger();
  ledger.addBudget({ category: "Rent", allocatedAmount: 900 });

  store.saveBudgets(ledger);

  const records: unknown = JSON.parse(readFileSync(join(dir, "budgets.json"), "utf8"));
  assert.deepEqual(records, [
    { category: "Rent", allocated_amount: 900, spent_amount: 0, remaining: 900, period: "" }
  ]);
});
