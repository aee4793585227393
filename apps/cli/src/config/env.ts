import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

function defaultDotEnvPath() {
  const configDir = dirname(fileURLToPath(import.meta.url));
  return resolve(configDir, "../../.env");
}

export function loadDotEnv(envPath = defaultDotEnvPath()) {
  if (!existsSync(envPath)) {
    return;
  }

  const lines = readFileSync(envPath, "utf8").split(/\r?\n/);
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const eq = trimmed.indexOf("=");
    if (eq <= 0) {
      continue;
    }

    const key = trimmed.slice(0, eq).trim();
    if (!key || process.env[key] !== undefined) {
      continue;
    }

    let value = trimmed.slice(eq + 1).trim();
    if (
      (value.startsWith("\"") && value.endsWith("\"")) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    process.env[key] = value;
  }
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  FINANCE_DATA_DIR: z.string().min(1).default("data"),
  FINANCE_TRANSACTIONS_FILE: z.string().min(1).default("transactions.csv"),
  FINANCE_BUDGETS_FILE: z.string().min(1).default("budgets.json"),
  FINANCE_CHART_FILE: z.string().min(1).default("category_spending_pie.svg"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn")
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

export function loadEnv(): Env {
  loadDotEnv();
  const parsed = parseEnv(process.env);

  if (!parsed.success) {
    console.error("Invalid environment configuration:");
    for (const issue of parsed.error.issues) {
      console.error(`- ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return parsed.data;
}

export interface DataPaths {
  dataDir: string;
  transactionsFile: string;
  budgetsFile: string;
  chartFile: string;
}

export function resolveDataPaths(env: Env, cwd = process.cwd()): DataPaths {
  const dataDir = resolve(cwd, env.FINANCE_DATA_DIR);
  return {
    dataDir,
    transactionsFile: resolve(dataDir, env.FINANCE_TRANSACTIONS_FILE),
    budgetsFile: resolve(dataDir, env.FINANCE_BUDGETS_FILE),
    chartFile: resolve(dataDir, env.FINANCE_CHART_FILE)
  };
}
