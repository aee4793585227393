#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import { loadEnv, resolveDataPaths } from "./config/env.js";
import { Ledger } from "./ledger/ledger.js";
import { logInfo, setLogLevel } from "./observability/logger.js";
import { FinanceShell, type ShellIO } from "./shell/menu.js";
import { LedgerStore } from "./storage/ledger-store.js";

function createTerminalIO() {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  const whenClosed = new Promise<null>((resolve) => {
    rl.once("close", () => {
      closed = true;
      resolve(null);
    });
  });
  rl.on("SIGINT", () => rl.close());

  const io: ShellIO = {
    async ask(question) {
      if (closed) {
        return null;
      }
      const answer = rl.question(question).catch((error: unknown) => {
        if (closed) {
          return null;
        }
        throw error;
      });
      return Promise.race([answer, whenClosed]);
    },
    print(line) {
      console.log(line);
    }
  };
  return { io, close: () => rl.close() };
}

async function main() {
  const env = loadEnv();
  setLogLevel(env.LOG_LEVEL);
  const paths = resolveDataPaths(env);

  const ledger = new Ledger();
  const store = new LedgerStore(paths);
  const terminal = createTerminalIO();
  const shell = new FinanceShell({ ledger, store, chartFile: paths.chartFile, io: terminal.io });

  logInfo("cli.start", { dataDir: paths.dataDir });
  shell.reportLoad(store.loadAll(ledger));

  try {
    await shell.run();
  } finally {
    terminal.close();
    logInfo("cli.exit");
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exitCode = 1;
});
