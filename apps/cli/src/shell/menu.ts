import { DuplicateKeyError, ValidationError } from "../ledger/errors.js";
import type { Ledger } from "../ledger/ledger.js";
import { parseDecimal } from "../ledger/validation.js";
import {
  formatBudgetList,
  formatCategorySpending,
  formatMonthlySummary,
  formatTotals,
  formatTransactionList
} from "../reports/format.js";
import { renderCategoryPieChart } from "../reports/pie-chart.js";
import type { LedgerStore, LoadOutcome, SaveOutcome } from "../storage/ledger-store.js";

export interface ShellIO {
  /** Resolves `null` once input is closed. */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
}

export interface ShellOptions {
  ledger: Ledger;
  store: LedgerStore;
  chartFile: string;
  io: ShellIO;
}

export const MENU_LINES = [
  "",
  "--- Personal Finance Manager ---",
  "1. Add transaction",
  "2. Add budget",
  "3. View transactions",
  "4. View budgets",
  "5. Save data",
  "6. Load data",
  "7. Report: Total Income and Expenses",
  "8. Report: Category Spending Breakdown",
  "9. Report: Monthly Summary",
  "10. Visualize: Category Spending Pie Chart",
  "11. Exit"
] as const;

class InputClosed extends Error {
  constructor() {
    super("Input closed");
    this.name = "InputClosed";
  }
}

export class FinanceShell {
  constructor(private readonly options: ShellOptions) {}

  private print(lines: readonly string[]) {
    for (const line of lines) {
      this.options.io.print(line);
    }
  }

  private async ask(question: string) {
    const answer = await this.options.io.ask(question);
    if (answer === null) {
      throw new InputClosed();
    }
    return answer;
  }

  /** Prints load results; returns true when every file loaded. */
  reportLoad(outcome: { transactions: LoadOutcome; budgets: LoadOutcome }) {
    let ok = true;
    for (const result of [outcome.transactions, outcome.budgets]) {
      if (result.ok) {
        this.print(result.warnings);
      } else {
        ok = false;
        this.print([result.error]);
      }
    }
    return ok;
  }

  private reportSave(outcome: { transactions: SaveOutcome; budgets: SaveOutcome }) {
    let ok = true;
    for (const result of [outcome.transactions, outcome.budgets]) {
      if (!result.ok) {
        ok = false;
        this.print([result.error]);
      }
    }
    return ok;
  }

  private async addTransaction() {
    const date = (await this.ask("Enter date (YYYY-MM-DD): ")).trim();
    const type = (await this.ask("Enter type (income/expense): ")).trim().toLowerCase();
    const category = (await this.ask("Enter category: ")).trim();
    const amount = parseDecimal(await this.ask("Enter amount: "));
    const description = (await this.ask("Enter description (optional): ")).trim();

    const outcome = this.options.ledger.addTransaction({ date, type, category, amount, description });
    if (outcome.notice) {
      this.print([outcome.notice]);
    }
    this.print(["Transaction added"]);
  }

  private async addBudget() {
    const category = (await this.ask("Enter budget category: ")).trim();
    const allocatedAmount = parseDecimal(await this.ask("Enter allocated amount: "));
    const period = (await this.ask("Enter budget period (optional): ")).trim();

    this.options.ledger.addBudget({ category, allocatedAmount, period });
    this.print(["Budget added"]);
  }

  /** Runs one menu choice; returns false when the shell should stop. */
  async handle(choice: string) {
    const { ledger, store, chartFile } = this.options;

    try {
      switch (choice.trim()) {
        case "1":
          await this.addTransaction();
          break;
        case "2":
          await this.addBudget();
          break;
        case "3":
          this.print(formatTransactionList(ledger.transactions));
          break;
        case "4":
          this.print(formatBudgetList(ledger.budgets));
          break;
        case "5":
          if (this.reportSave(store.saveAll(ledger))) {
            this.print(["Data saved successfully"]);
          }
          break;
        case "6":
          if (this.reportLoad(store.loadAll(ledger))) {
            this.print(["Data loaded successfully"]);
          }
          break;
        case "7":
          this.print(formatTotals(ledger.totals()));
          break;
        case "8":
          this.print(formatCategorySpending(ledger.spendingByCategory()));
          break;
        case "9":
          this.print(formatMonthlySummary(ledger.monthlySummary()));
          break;
        case "10":
          this.print([renderCategoryPieChart(ledger.spendingByCategory(), chartFile).message]);
          break;
        case "11":
          this.print(["Exiting. Goodbye!"]);
          return false;
        default:
          this.print(["Invalid choice. Please try again."]);
      }
    } catch (error) {
      if (error instanceof ValidationError || error instanceof DuplicateKeyError) {
        this.print([`Invalid input: ${error.message}`]);
        return true;
      }
      throw error;
    }
    return true;
  }

  async run() {
    try {
      for (;;) {
        this.print(MENU_LINES);
        if (!(await this.handle(await this.ask("Enter your choice: ")))) {
          return;
        }
      }
    } catch (error) {
      if (error instanceof InputClosed) {
        this.print(["", "Exiting. Goodbye!"]);
        return;
      }
      throw error;
    }
  }
}
