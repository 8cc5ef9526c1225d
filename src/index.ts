#!/usr/bin/env node
// src/index.ts
import chalk from "chalk";
import { Command } from "commander";
import fs from "fs-extra";
import inquirer from "inquirer";
import { createWhatsAppChannel } from "./channel.js";
import { clientsPath, configPath, logsPath, readConfig, writeConfig } from "./config.js";
import { packagesCatalog, pricesCatalog, serversCatalog } from "./domain/client-intake/catalog.js";
import { JsonlClientStore } from "./domain/client-intake/client-store.js";
import { localDate, suggestDueDates } from "./domain/client-intake/due-dates.js";
import type { DialogEngine } from "./domain/client-intake/engine.js";
import { createIntakeEngine } from "./domain/client-intake/index.js";
import type { Prompt, ReplyOutcome } from "./domain/client-intake/types.js";
import { appendLog, logConsole, tailLines } from "./logger.js";
import { MetaClient } from "./meta-client.js";
import { outcomeText } from "./outbound.js";
import { createWebhookServer } from "./webhook/server.js";

const TYPE_OWN = "__type_own__";

async function requireConfigured() {
  const cfg = await readConfig();
  if (!cfg.token || !cfg.phoneNumberId) {
    throw new Error("Missing config. Run: intake login --token ... --phone-number-id ...");
  }
  return cfg;
}

function printOutcome(outcome: ReplyOutcome): void {
  const color = outcome.status === "rejected" || outcome.status === "save_failed" ? chalk.yellow : chalk.green;
  console.log(color(`Bot: ${outcomeText(outcome)}`));
}

async function askReply(prompt: Prompt): Promise<string> {
  if (prompt.options?.length) {
    const picked = await inquirer.prompt<{ choice: string }>([
      {
        type: "list",
        name: "choice",
        message: "Resposta",
        choices: [...prompt.options.map((o) => ({ name: o, value: o })), { name: "✍️ Digitar resposta", value: TYPE_OWN }],
        pageSize: 12
      }
    ]);
    if (picked.choice !== TYPE_OWN) return picked.choice;
  }
  const typed = await inquirer.prompt<{ message: string }>([{ type: "input", name: "message", message: chalk.cyan("Você:") }]);
  return String(typed.message || "");
}

async function runChat(engine: DialogEngine, actorId: string): Promise<void> {
  let outcome = await engine.handleReply(actorId, "/novo");
  for (;;) {
    printOutcome(outcome);
    if (outcome.status === "saved" || outcome.status === "cancelled") return;
    if (outcome.status === "save_failed") {
      const { retry } = await inquirer.prompt<{ retry: boolean }>([
        { type: "confirm", name: "retry", message: "Tentar salvar novamente?", default: true }
      ]);
      if (!retry) return;
      const retried = await engine.retryFinalize(actorId);
      if (!retried) return;
      outcome = retried;
      continue;
    }
    outcome = await engine.handleReply(actorId, await askReply(outcome.prompt));
  }
}

async function run() {
  const p = new Command();
  p.name("intake").description("WhatsApp client intake assistant").option("--json", "json output", false);

  p.command("login")
    .description("save WhatsApp Cloud API credentials")
    .requiredOption("--token <token>")
    .requiredOption("--phone-number-id <id>")
    .option("--verify-token <token>", "webhook verify token")
    .option("--timezone <zone>", "IANA zone used for due dates")
    .action(async (opts) => {
      const out = await writeConfig({
        token: String(opts.token),
        phoneNumberId: String(opts.phoneNumberId),
        webhookVerifyToken: opts.verifyToken ? String(opts.verifyToken) : undefined,
        timezone: opts.timezone ? String(opts.timezone) : undefined
      });
      logConsole("INFO", `Saved config: ${out}`);
    });

  p.command("status").description("show local setup status").action(async () => {
    const cfg = await readConfig();
    const status = {
      token: cfg.token ? "***set***" : "(missing)",
      phoneNumberId: cfg.phoneNumberId || "(missing)",
      webhook: `:${cfg.webhookPort}${cfg.webhookPath}`,
      verifyToken: cfg.webhookVerifyToken ? "***set***" : "(missing)",
      timezone: cfg.timezone,
      sessionIdleMinutes: cfg.sessionIdleMinutes,
      configPath: configPath(),
      clientsPath: clientsPath(),
      logsPath: logsPath()
    };
    if (p.opts().json) console.log(JSON.stringify(status, null, 2));
    else logConsole("INFO", JSON.stringify(status, null, 2));
  });

  p.command("catalog").description("show the quick-pick options of every step").action(() => {
    const catalog = { packages: packagesCatalog(), prices: pricesCatalog(), servers: serversCatalog() };
    if (p.opts().json) {
      console.log(JSON.stringify({ ok: true, catalog }, null, 2));
      return;
    }
    logConsole("INFO", `Pacotes: ${catalog.packages.join(" | ")}`);
    logConsole("INFO", `Valores: ${catalog.prices.join(" | ")}`);
    logConsole("INFO", `Servidores: ${catalog.servers.join(" | ")}`);
  });

  p.command("suggest")
    .description("show the due dates suggested for a package")
    .requiredOption("--package <label>", "package label, e.g. \"📅 MENSAL\"")
    .option("--today <date>", "reference date (YYYY-MM-DD)")
    .action(async (opts) => {
      const cfg = await readConfig();
      const today = opts.today ? localDate(String(opts.today), cfg.timezone) : new Date();
      const dates = suggestDueDates(String(opts.package), today, { offsets: cfg.dueDateOffsets, timezone: cfg.timezone });
      if (p.opts().json) console.log(JSON.stringify({ ok: true, dates }, null, 2));
      else for (const d of dates) logConsole("INFO", d);
    });

  p.command("chat")
    .description("run the intake dialog locally in the terminal")
    .option("--as <actor>", "actor id recorded as the owner", "local")
    .action(async (opts) => {
      const cfg = await readConfig();
      const engine = createIntakeEngine(cfg, new JsonlClientStore(), appendLog);
      await runChat(engine, String(opts.as));
    });

  p.command("serve")
    .description("receive WhatsApp webhooks and drive the intake dialog")
    .option("--port <n>", "override webhook port")
    .action(async (opts) => {
      const cfg = await requireConfigured();
      if (!cfg.webhookVerifyToken) logConsole("WARN", "No webhook verify token set; GET verification will be refused.");
      const engine = createIntakeEngine(cfg, new JsonlClientStore(), appendLog);
      const onPost = createWhatsAppChannel(engine, new MetaClient(cfg), appendLog);
      const port = opts.port ? Number(opts.port) : cfg.webhookPort;
      await createWebhookServer({ port, path: cfg.webhookPath, verifyToken: cfg.webhookVerifyToken, onPost });
      await appendLog("INFO", "webhook.listening", { port, path: cfg.webhookPath });
      logConsole("INFO", `Listening on :${port}${cfg.webhookPath}`);
    });

  p.command("clients")
    .description("list registered clients, newest first")
    .option("--limit <n>", "max rows", "20")
    .action(async (opts) => {
      const rows = await new JsonlClientStore().list(Number(opts.limit || 20));
      if (p.opts().json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      if (!rows.length) {
        logConsole("WARN", "No clients yet.");
        return;
      }
      for (const r of rows) {
        logConsole("INFO", `${r.createdAt} ${r.name} ${r.phone} ${r.package} R$ ${r.price} vence ${r.dueDate} ${r.server}`);
      }
    });

  p.command("logs")
    .option("--tail <n>", "tail lines", "50")
    .action(async (opts) => {
      const lp = logsPath();
      if (!(await fs.pathExists(lp))) {
        logConsole("WARN", "No logs yet.");
        return;
      }
      const raw = await fs.readFile(lp, "utf8");
      const lines = tailLines(raw, Number(opts.tail));
      for (const line of lines) console.log(line);
    });

  await p.parseAsync(process.argv);
}

run().catch(async (err: unknown) => {
  await appendLog("ERROR", "cli.error", { message: err instanceof Error ? err.message : String(err) });
  logConsole("ERROR", err instanceof Error ? String(err.stack || err.message) : String(err));
  process.exitCode = 1;
});
