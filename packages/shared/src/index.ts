export type TransactionType = "income" | "expense";

// Field names match the columns of the transaction file.
export interface TransactionDetails {
  date: string;
  transaction_type: TransactionType;
  category: string;
  amount: number;
  description: string;
}

// Field names match the keys of the budget file.
export interface BudgetDetails {
  category: string;
  allocated_amount: number;
  spent_amount: number;
  remaining: number;
  period: string;
}

export interface MonthTotals {
  income: number;
  expenses: number;
}

export interface Totals extends MonthTotals {
  net: number;
}
