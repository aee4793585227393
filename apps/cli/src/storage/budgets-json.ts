import { z } from "zod";
import { Budget } from "../ledger/budget.js";

export interface ParsedBudgets {
  budgets: Budget[];
  warnings: string[];
}

// `remaining` is derived, so it is neither required nor read back.
const budgetRecordSchema = z.object({
  category: z.string(),
  allocated_amount: z.number(),
  spent_amount: z.number(),
  period: z.string()
});

export function serializeBudgets(budgets: readonly Budget[]) {
  return JSON.stringify(
    budgets.map((budget) => budget.details()),
    null,
    4
  );
}

/** Throws on malformed JSON or a top level that is not an array. */
export function parseBudgetsJson(text: string): ParsedBudgets {
  const data: unknown = JSON.parse(text);
  if (!Array.isArray(data)) {
    throw new Error("Budget file must contain a JSON array");
  }

  const budgets: Budget[] = [];
  const seen = new Set<string>();
  const warnings: string[] = [];

  data.forEach((entry: unknown, index) => {
    const entryNumber = index + 1;
    const record = budgetRecordSchema.safeParse(entry);
    if (!record.success) {
      const reason = record.error.issues
        .map((issue) => `${issue.path.join(".") || "entry"}: ${issue.message}`)
        .join("; ");
      warnings.push(`Skipping invalid budget entry ${entryNumber}: ${reason}`);
      return;
    }

    const restored = Budget.restore({
      category: record.data.category,
      allocatedAmount: record.data.allocated_amount,
      spentAmount: record.data.spent_amount,
      period: record.data.period
    });
    if (!restored.ok) {
      warnings.push(`Skipping invalid budget entry ${entryNumber}: ${restored.error.message}`);
      return;
    }

    if (seen.has(restored.value.category)) {
      warnings.push(
        `Skipping invalid budget entry ${entryNumber}: duplicate category '${restored.value.category}'`
      );
      return;
    }
    seen.add(restored.value.category);
    budgets.push(restored.value);
  });

  return { budgets, warnings };
}
