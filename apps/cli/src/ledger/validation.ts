import { z } from "zod";
import { ValidationError } from "./errors.js";

export type Result<T> = { ok: true; value: T } | { ok: false; error: ValidationError };

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Number() alone also takes "", "0x1F", "0b11" and "Infinity"; those come back as NaN.
export function parseDecimal(raw: string) {
  const trimmed = raw.trim();
  return DECIMAL.test(trimmed) ? Number(trimmed) : Number.NaN;
}

export function toDateOnly(date: Date) {
  return date.toISOString().slice(0, 10);
}

export function isIsoCalendarDate(value: string) {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // Date.UTC maps years 0-99 onto 1900-1999.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

// Date objects are reduced to their UTC calendar day; an invalid Date falls
// through to the string check and fails there.
export const isoDateSchema = z.preprocess(
  (value) => (value instanceof Date && !Number.isNaN(value.getTime()) ? toDateOnly(value) : value),
  z
    .string({
      required_error: "Date must be a Date or a string in YYYY-MM-DD format",
      invalid_type_error: "Date must be a Date or a string in YYYY-MM-DD format"
    })
    .refine(isIsoCalendarDate, { message: "Invalid date format. Use YYYY-MM-DD" })
);

export const transactionTypeSchema = z.enum(["income", "expense"], {
  errorMap: () => ({ message: "Transaction type must be 'income' or 'expense'" })
});

export const categorySchema = z
  .string({
    required_error: "Category must be a non-empty string",
    invalid_type_error: "Category must be a non-empty string"
  })
  .refine((value) => value.trim().length > 0, {
    message: "Category must be a non-empty string"
  });

function amountSchema(label: string) {
  return z
    .number({
      required_error: `${label} must be a number`,
      invalid_type_error: `${label} must be a number`
    })
    .finite({ message: `${label} must be a number` });
}

export const nonNegativeAmountSchema = amountSchema("Amount").nonnegative({
  message: "Amount must be a non-negative number"
});

export const positiveAmountSchema = amountSchema("Allocated amount").positive({
  message: "Allocated amount must be positive"
});

export function freeTextSchema(label: string) {
  return z.string({ invalid_type_error: `${label} must be a string` }).default("");
}

export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      error: new ValidationError(parsed.error.issues.map((issue) => issue.message))
    };
  }
  return { ok: true, value: parsed.data };
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
