import type { MonthTotals, Totals } from "@finance-tracker/shared";
import { Budget, type BudgetInput } from "./budget.js";
import { DuplicateKeyError } from "./errors.js";
import { Transaction, type TransactionInput } from "./transaction.js";

export interface AddTransactionOutcome {
  transaction: Transaction;
  budget: Budget | null;
  /** Set when an expense has no budget tracking its category. */
  notice: string | null;
}

function duplicateBudget(category: string) {
  return new DuplicateKeyError(category, `Budget for category '${category}' already exists`);
}

/**
 * In-memory aggregate of one user's transactions and budgets. Expenses are
 * linked to budgets by exact category match at insertion time.
 */
export class Ledger {
  private entries: Transaction[] = [];
  private budgetsByCategory = new Map<string, Budget>();

  get transactions(): readonly Transaction[] {
    return this.entries;
  }

  get budgets(): readonly Budget[] {
    return [...this.budgetsByCategory.values()];
  }

  findBudget(category: string) {
    return this.budgetsByCategory.get(category) ?? null;
  }

  addTransaction(input: TransactionInput): AddTransactionOutcome {
    const transaction = Transaction.create(input);
    this.entries.push(transaction);

    if (transaction.type !== "expense") {
      return { transaction, budget: null, notice: null };
    }

    const budget = this.findBudget(transaction.category);
    if (!budget) {
      return {
        transaction,
        budget: null,
        notice: `No budget found for category '${transaction.category}'`
      };
    }
    budget.addExpense(transaction);
    return { transaction, budget, notice: null };
  }

  addBudget(input: BudgetInput) {
    if (this.budgetsByCategory.has(input.category)) {
      throw duplicateBudget(input.category);
    }
    const budget = Budget.create(input);
    this.budgetsByCategory.set(budget.category, budget);
    return budget;
  }

  replaceTransactions(transactions: readonly Transaction[]) {
    this.entries = [...transactions];
  }

  replaceBudgets(budgets: readonly Budget[]) {
    const next = new Map<string, Budget>();
    for (const budget of budgets) {
      if (next.has(budget.category)) {
        throw duplicateBudget(budget.category);
      }
      next.set(budget.category, budget);
    }
    this.budgetsByCategory = next;
  }

  /** `null` when there is nothing to report. */
  totals(): Totals | null {
    let income = 0;
    let expenses = 0;
    for (const transaction of this.entries) {
      if (transaction.type === "income") {
        income += transaction.amount;
      } else {
        expenses += transaction.amount;
      }
    }
    if (income === 0 && expenses === 0) {
      return null;
    }
    return { income, expenses, net: income - expenses };
  }

  spendingByCategory() {
    const totals = new Map<string, number>();
    for (const transaction of this.entries) {
      if (transaction.type !== "expense") {
        continue;
      }
      totals.set(transaction.category, (totals.get(transaction.category) ?? 0) + transaction.amount);
    }
    return totals;
  }

  monthlySummary() {
    const byMonth = new Map<string, MonthTotals>();
    for (const transaction of this.entries) {
      const bucket = byMonth.get(transaction.month) ?? { income: 0, expenses: 0 };
      if (transaction.type === "income") {
        bucket.income += transaction.amount;
      } else {
        bucket.expenses += transaction.amount;
      }
      byMonth.set(transaction.month, bucket);
    }

    // YYYY-MM sorts chronologically as plain text.
    const sorted = new Map<string, MonthTotals>();
    for (const month of [...byMonth.keys()].sort()) {
      const bucket = byMonth.get(month);
      if (bucket) {
        sorted.set(month, bucket);
      }
    }
    return sorted;
  }
}
