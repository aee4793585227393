import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Ledger } from "../ledger/ledger.js";
import { logDebug, logError, logInfo } from "../observability/logger.js";
import { parseBudgetsJson, serializeBudgets } from "./budgets-json.js";
import { parseTransactionsCsv, serializeTransactions } from "./transactions-csv.js";

export type LoadOutcome =
  | { ok: true; count: number; warnings: string[] }
  | { ok: false; error: string };

export type SaveOutcome = { ok: true; count: number } | { ok: false; error: string };

export interface LedgerStorePaths {
  transactionsFile: string;
  budgetsFile: string;
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

function writeWholeFile(path: string, contents: string) {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, contents, "utf8");
}

/**
 * Whole-file persistence for a Ledger: transactions as CSV, budgets as JSON.
 * Failed reads and writes come back as `{ ok: false }` and leave the ledger
 * as it was.
 */
export class LedgerStore {
  constructor(private readonly paths: LedgerStorePaths) {}

  saveTransactions(ledger: Ledger): SaveOutcome {
    const path = this.paths.transactionsFile;
    try {
      writeWholeFile(path, serializeTransactions(ledger.transactions));
    } catch (error) {
      const message = errorMessage(error);
      logError("transactions.save.failed", { path, message });
      return { ok: false, error: `Error saving transactions: ${message}` };
    }
    logInfo("transactions.save", { path, count: ledger.transactions.length });
    return { ok: true, count: ledger.transactions.length };
  }

  loadTransactions(ledger: Ledger): LoadOutcome {
    const path = this.paths.transactionsFile;
    if (!existsSync(path)) {
      ledger.replaceTransactions([]);
      logInfo("transactions.load.missing", { path });
      return { ok: true, count: 0, warnings: [] };
    }

    let text: string;
    try {
      text = readFileSync(path, "utf8");
    } catch (error) {
      const message = errorMessage(error);
      logError("transactions.load.failed", { path, message });
      return { ok: false, error: `Error loading transactions: ${message}` };
    }

    const { transactions, warnings } = parseTransactionsCsv(text);
    for (const warning of warnings) {
      logDebug("transactions.load.skipped", { path, warning });
    }
    ledger.replaceTransactions(transactions);
    logInfo("transactions.load", { path, count: transactions.length, skipped: warnings.length });
    return { ok: true, count: transactions.length, warnings };
  }

  saveBudgets(ledger: Ledger): SaveOutcome {
    const path = this.paths.budgetsFile;
    try {
      writeWholeFile(path, serializeBudgets(ledger.budgets));
    } catch (error) {
      const message = errorMessage(error);
      logError("budgets.save.failed", { path, message });
      return { ok: false, error: `Error saving budgets: ${message}` };
    }
    logInfo("budgets.save", { path, count: ledger.budgets.length });
    return { ok: true, count: ledger.budgets.length };
  }

  loadBudgets(ledger: Ledger): LoadOutcome {
    const path = this.paths.budgetsFile;
    if (!existsSync(path)) {
      ledger.replaceBudgets([]);
      logInfo("budgets.load.missing", { path });
      return { ok: true, count: 0, warnings: [] };
    }

    let parsed: ReturnType<typeof parseBudgetsJson>;
    try {
      parsed = parseBudgetsJson(readFileSync(path, "utf8"));
    } catch (error) {
      const message = errorMessage(error);
      logError("budgets.load.failed", { path, message });
      return { ok: false, error: `Error loading budgets: ${message}` };
    }

    for (const warning of parsed.warnings) {
      logDebug("budgets.load.skipped", { path, warning });
    }
    ledger.replaceBudgets(parsed.budgets);
    logInfo("budgets.load", { path, count: parsed.budgets.length, skipped: parsed.warnings.length });
    return { ok: true, count: parsed.budgets.length, warnings: parsed.warnings };
  }

  saveAll(ledger: Ledger) {
    return {
      transactions: this.saveTransactions(ledger),
      budgets: this.saveBudgets(ledger)
    };
  }

  loadAll(ledger: Ledger) {
    return {
      transactions: this.loadTransactions(ledger),
      budgets: this.loadBudgets(ledger)
    };
  }
}
