import assert from "node:assert/strict";
import test from "node:test";
import { Budget } from "../ledger/budget.js";
import { parseBudgetsJson, serializeBudgets } from "./budgets-json.js";

function restored(category: string, allocatedAmount: number, spentAmount: number, period = "") {
  const result = Budget.restore({ category, allocatedAmount, spentAmount, period });
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

test("serialize writes an indented array of budget details", () => {
  const json = serializeBudgets([restored("Food", 500, 50, "June 2025")]);

  assert.equal(
    json,
    [
      "[",
      "    {",
      "        \"category\": \"Food\",",
      "        \"allocated_amount\": 500,",
      "        \"spent_amount\": 50,",
      "        \"remaining\": 450,",
      "        \"period\": \"June 2025\"",
      "    }",
      "]"
    ].join("\n")
  );
});

test("budgets round-trip with their spent amounts", () => {
  const originals = [restored("Food", 500, 50, "June 2025"), restored("Rent", 900, 0)];

  const parsed = parseBudgetsJson(serializeBudgets(originals));

  assert.deepEqual(parsed.warnings, []);
  assert.deepEqual(
    parsed.budgets.map((budget) => budget.details()),
    originals.map((budget) => budget.details())
  );
});

test("stored remaining is ignored and recomputed", () => {
  const parsed = parseBudgetsJson(
    JSON.stringify([
      { category: "Food", allocated_amount: 500, spent_amount: 50, remaining: 12345, period: "" }
    ])
  );

  assert.equal(parsed.budgets[0]?.remaining(), 450);
});

test("invalid entries are skipped with one warning each", () => {
  const parsed = parseBudgetsJson(
    JSON.stringify([
      { category: "Food", allocated_amount: 500, spent_amount: 50, remaining: 450, period: "" },
      { category: "Rent", allocated_amount: 900, spent_amount: 0 },
      { category: "Fun", allocated_amount: 0, spent_amount: 0, period: "" },
      { category: "Food", allocated_amount: 100, spent_amount: 0, period: "" },
      { category: "Travel", allocated_amount: "lots", spent_amount: 0, period: "" }
    ])
  );

  assert.deepEqual(
    parsed.budgets.map((budget) => budget.category),
    ["Food"]
  );
  assert.deepEqual(parsed.warnings, [
    "Skipping invalid budget entry 2: period: Required",
    "Skipping invalid budget entry 3: Allocated amount must be positive",
    "Skipping invalid budget entry 4: duplicate category 'Food'",
    "Skipping invalid budget entry 5: allocated_amount: Expected number, received string"
  ]);
});

test("malformed files are rejected as a whole", () => {
  assert.throws(() => parseBudgetsJson("{ not json"), SyntaxError);
  assert.throws(() => parseBudgetsJson("{\"category\":\"Food\"}"), {
    message: "Budget file must contain a JSON array"
  });
});
