import type { TransactionDetails, TransactionType } from "@finance-tracker/shared";
import { z } from "zod";
import {
  categorySchema,
  freeTextSchema,
  isoDateSchema,
  nonNegativeAmountSchema,
  transactionTypeSchema,
  unwrap,
  validate,
  type Result
} from "./validation.js";

export interface TransactionInput {
  date: string | Date;
  type: string;
  category: string;
  amount: number;
  description?: string;
}

const transactionSchema = z.object({
  date: isoDateSchema,
  type: transactionTypeSchema,
  category: categorySchema,
  amount: nonNegativeAmountSchema,
  description: freeTextSchema("Description")
});

/** One recorded income or expense. Immutable once built. */
export class Transaction {
  private constructor(
    readonly date: string,
    readonly type: TransactionType,
    readonly category: string,
    readonly amount: number,
    readonly description: string
  ) {}

  static parse(input: TransactionInput): Result<Transaction> {
    const parsed = validate(transactionSchema, input);
    if (!parsed.ok) {
      return parsed;
    }
    const { date, type, category, amount, description } = parsed.value;
    return {
      ok: true,
      value: new Transaction(date, type, category, amount, description)
    };
  }

  static create(input: TransactionInput) {
    return unwrap(Transaction.parse(input));
  }

  /** Calendar month as `YYYY-MM`. */
  get month() {
    return this.date.slice(0, 7);
  }

  details(): TransactionDetails {
    return {
      date: this.date,
      transaction_type: this.type,
      category: this.category,
      amount: this.amount,
      description: this.description
    };
  }
}
