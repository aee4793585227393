import type { BudgetDetails } from "@finance-tracker/shared";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { Transaction } from "./transaction.js";
import {
  categorySchema,
  freeTextSchema,
  positiveAmountSchema,
  unwrap,
  validate,
  type Result
} from "./validation.js";

export interface BudgetInput {
  category: string;
  allocatedAmount: number;
  period?: string;
}

export interface StoredBudget extends BudgetInput {
  spentAmount: number;
}

const budgetSchema = z.object({
  category: categorySchema,
  allocatedAmount: positiveAmountSchema,
  period: freeTextSchema("Period")
});

const spentAmountSchema = z
  .number({ invalid_type_error: "Spent amount must be a number" })
  .finite({ message: "Spent amount must be a number" })
  .nonnegative({ message: "Spent amount must be a non-negative number" });

/**
 * Allocation for one category. Spending accumulates through `addExpense` and
 * may exceed the allocation; `remaining()` then goes negative.
 */
export class Budget {
  private spent = 0;

  private constructor(
    readonly category: string,
    readonly allocatedAmount: number,
    readonly period: string
  ) {}

  static parse(input: BudgetInput): Result<Budget> {
    const parsed = validate(budgetSchema, input);
    if (!parsed.ok) {
      return parsed;
    }
    const { category, allocatedAmount, period } = parsed.value;
    return { ok: true, value: new Budget(category, allocatedAmount, period) };
  }

  static create(input: BudgetInput) {
    return unwrap(Budget.parse(input));
  }

  /** Rebuilds a saved budget together with its running spent amount. */
  static restore(stored: StoredBudget): Result<Budget> {
    const parsed = Budget.parse(stored);
    if (!parsed.ok) {
      return parsed;
    }
    const spent = validate(spentAmountSchema, stored.spentAmount);
    if (!spent.ok) {
      return spent;
    }
    parsed.value.spent = spent.value;
    return parsed;
  }

  get spentAmount() {
    return this.spent;
  }

  addExpense(transaction: Transaction) {
    if (transaction.type !== "expense") {
      throw new ValidationError(["Transaction must be an expense"]);
    }
    if (transaction.category !== this.category) {
      throw new ValidationError(["Transaction category must match budget category"]);
    }
    this.spent += transaction.amount;
  }

  remaining() {
    return this.allocatedAmount - this.spent;
  }

  details(): BudgetDetails {
    return {
      category: this.category,
      allocated_amount: this.allocatedAmount,
      spent_amount: this.spent,
      remaining: this.remaining(),
      period: this.period
    };
  }
}
