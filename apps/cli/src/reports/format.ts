import type { MonthTotals, Totals } from "@finance-tracker/shared";
import type { Budget } from "../ledger/budget.js";
import type { Transaction } from "../ledger/transaction.js";

export function formatMoney(amount: number) {
  const sign = amount < 0 ? "-" : "";
  return `${sign}$${Math.abs(amount).toFixed(2)}`;
}

export function formatTransaction(transaction: Transaction) {
  return [
    transaction.date,
    transaction.type,
    transaction.category,
    formatMoney(transaction.amount),
    transaction.description
  ].join(" | ");
}

export function formatBudget(budget: Budget) {
  const line =
    `${budget.category}: ${formatMoney(budget.allocatedAmount)} allocated, ` +
    `${formatMoney(budget.spentAmount)} spent, ${formatMoney(budget.remaining())} remaining`;
  return budget.period ? `${line}, Period: ${budget.period}` : line;
}

export function formatTransactionList(transactions: readonly Transaction[]) {
  if (transactions.length === 0) {
    return ["No transactions found"];
  }
  return transactions.map(formatTransaction);
}

export function formatBudgetList(budgets: readonly Budget[]) {
  if (budgets.length === 0) {
    return ["No budgets found"];
  }
  return budgets.map(formatBudget);
}

export function formatTotals(totals: Totals | null) {
  if (!totals) {
    return ["No transactions available for report"];
  }
  return [
    `Total Income: ${formatMoney(totals.income)}, ` +
      `Total Expenses: ${formatMoney(totals.expenses)}, Net: ${formatMoney(totals.net)}`
  ];
}

export function formatCategorySpending(spending: ReadonlyMap<string, number>) {
  if (spending.size === 0) {
    return ["No expenses available for report"];
  }
  const lines = ["Category Spending Breakdown:"];
  for (const [category, total] of spending) {
    lines.push(`${category}: ${formatMoney(total)}`);
  }
  return lines;
}

export function formatMonthlySummary(summary: ReadonlyMap<string, MonthTotals>) {
  if (summary.size === 0) {
    return ["No transactions available for report"];
  }
  const lines = ["Monthly Summary:"];
  for (const [month, totals] of summary) {
    lines.push(
      `${month}: Income: ${formatMoney(totals.income)}, Expenses: ${formatMoney(totals.expenses)}`
    );
  }
  return lines;
}
