import { Transaction } from "../ledger/transaction.js";
import { parseDecimal } from "../ledger/validation.js";

export const TRANSACTION_HEADERS = [
  "date",
  "transaction_type",
  "category",
  "amount",
  "description"
] as const;

export interface ParsedTransactions {
  transactions: Transaction[];
  warnings: string[];
}

function csvEscape(value: string | number) {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, "\"\"")}"`;
  }
  return text;
}

export function serializeTransactions(transactions: readonly Transaction[]) {
  const lines: string[] = [TRANSACTION_HEADERS.join(",")];
  for (const transaction of transactions) {
    const details = transaction.details();
    lines.push(TRANSACTION_HEADERS.map((header) => csvEscape(details[header])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Splits CSV text into records. Quoted fields may hold commas, doubled quotes
 * and line breaks. Blank lines produce no record.
 */
export function parseCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;
  let touched = false;

  const endRecord = () => {
    if (touched) {
      record.push(field);
      records.push(record);
    }
    record = [];
    field = "";
    touched = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === "\"") {
        if (text[i + 1] === "\"") {
          field += "\"";
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === "\"") {
      inQuotes = true;
      touched = true;
    } else if (char === ",") {
      record.push(field);
      field = "";
      touched = true;
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") {
        i++;
      }
      endRecord();
    } else {
      field += char;
      touched = true;
    }
  }
  endRecord();

  return records;
}

export function parseTransactionsCsv(text: string): ParsedTransactions {
  const [, ...rows] = parseCsvRecords(text);
  const transactions: Transaction[] = [];
  const warnings: string[] = [];

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    if (row.length !== TRANSACTION_HEADERS.length) {
      warnings.push(
        `Skipping invalid transaction row ${rowNumber}: expected ${TRANSACTION_HEADERS.length} fields, got ${row.length}`
      );
      return;
    }

    const [date = "", type = "", category = "", amount = "", description = ""] = row;
    const parsed = Transaction.parse({
      date,
      type,
      category,
      amount: parseDecimal(amount),
      description
    });
    if (!parsed.ok) {
      warnings.push(`Skipping invalid transaction row ${rowNumber}: ${parsed.error.message}`);
      return;
    }
    transactions.push(parsed.value);
  });

  return { transactions, warnings };
}
