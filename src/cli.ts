#!/usr/bin/env node
/**
 * CLI entrypoint for spendline.
 *
 * Usage:
 *   spendline run --api-url https://api.example.com/transactions --db-path ./spendline.db
 *   spendline run --source-file ./export.json --start-date 2023-01-01 --end-date 2023-01-31
 *   spendline report top --limit 10
 */
import "dotenv/config";
import { parseArgs } from "node:util";

import { Spendline, configFromEnv, errorMessage, type RunSummary } from "./index.js";

const USAGE = `
spendline: batch ETL for transaction records

Usage:
  spendline init                      Create tables, view and amount bands
  spendline run  [options]            Extract, clean, categorize and load
  spendline report <customers|categories|top|monthly> [options]

Source (defaults from API_URL / API_KEY / SOURCE_FILE):
  --api-url <url>        Transactions API endpoint
  --api-key <key>        Sent as x-api-key
  --source-file <path>   JSON file holding an array of records

Store (defaults from DATABASE_URL / DB_* / SQLITE_PATH):
  --database-url <url>   PostgreSQL connection string
  --db-path <file>       SQLite database (default: ./spendline.db)

Run options:
  --start-date <date>    YYYY-MM-DD
  --end-date <date>      YYYY-MM-DD
  --page-size <n>        Records per page        (default: 100)
  --batch-size <n>       Records per transaction (default: 500)
  --json                 Print the run summary as JSON

Report options:
  --limit <n>            Rows for "top"           (default: 5)
  --since <date>         First day for "monthly"  (default: one year ago)

  --help                 Show this help
`.trim();

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    "api-url": { type: "string" },
    "api-key": { type: "string" },
    "source-file": { type: "string" },
    "database-url": { type: "string" },
    "db-path": { type: "string" },
    "start-date": { type: "string" },
    "end-date": { type: "string" },
    "page-size": { type: "string" },
    "batch-size": { type: "string" },
    limit: { type: "string" },
    since: { type: "string" },
    json: { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
  allowPositionals: true,
  strict: true,
});

const [command, reportName] = positionals;

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

if (command !== "init" && command !== "run" && command !== "report") {
  console.error(USAGE);
  process.exit(1);
}

function buildConfig(): Record<string, unknown> {
  const env = configFromEnv();
  const config: Record<string, unknown> = { ...env };

  if (values["api-url"]) {
    config.source = {
      provider: "http",
      config: { url: values["api-url"], apiKey: values["api-key"] },
    };
  } else if (values["source-file"]) {
    config.source = { provider: "file", config: { path: values["source-file"] } };
  }

  if (values["database-url"]) {
    config.db = { provider: "postgres", config: { connectionString: values["database-url"] } };
  } else if (values["db-path"] || !config.db) {
    config.db = { provider: "sqlite", config: { path: values["db-path"] ?? "./spendline.db" } };
  }

  const pipeline: Record<string, unknown> =
    typeof env.pipeline === "object" && env.pipeline !== null ? { ...env.pipeline } : {};
  if (values["start-date"]) pipeline.startDate = values["start-date"];
  if (values["end-date"]) pipeline.endDate = values["end-date"];
  if (values["page-size"]) pipeline.pageSize = Number(values["page-size"]);
  if (values["batch-size"]) pipeline.batchSize = Number(values["batch-size"]);
  config.pipeline = pipeline;

  return config;
}

function printSummary(summary: RunSummary): void {
  console.log(`\n=== Run ${summary.runId} (${summary.status}) ===`);
  console.log(`  Extracted:  ${summary.extracted}`);
  console.log(`  Accepted:   ${summary.accepted} (${summary.duplicates} duplicates dropped)`);
  console.log(`  Rejected:   ${summary.rejected}`);
  for (const [reason, count] of Object.entries(summary.rejectedByReason)) {
    console.log(`    ${reason}: ${count}`);
  }
  console.log(`  Loaded:     ${summary.loaded}`);
  console.log(
    `  Batches:    ${summary.batchesCommitted} committed, ${summary.batchesFailed} failed`,
  );
  console.log(`  Elapsed:    ${summary.elapsedMs} ms`);
  if (summary.errors.length > 0) {
    console.log(`  Errors:`);
    for (const e of summary.errors) console.log(`    - ${e}`);
  }
}

let app: Spendline;
try {
  app = await Spendline.fromConfig(buildConfig(), { logger: console });
} catch (err) {
  console.error(`Cannot start: ${errorMessage(err)}`);
  process.exit(1);
}

let exitCode = 0;
try {
  if (command === "init") {
    console.log("Schema ready.");
  } else if (command === "run") {
    const summary = await app.run();
    if (values.json) console.log(JSON.stringify(summary, null, 2));
    else printSummary(summary);
    if (summary.status === "failed") exitCode = 1;
  } else {
    const limit = values.limit ? Number(values.limit) : 5;
    switch (reportName) {
      case "customers":
        console.table(await app.customerTotals());
        break;
      case "categories":
        console.table(await app.productCategoryTotals());
        break;
      case "top":
        console.table(await app.topCustomers(limit));
        break;
      case "monthly":
        console.table(await app.monthlyTrends({ since: values.since }));
        break;
      default:
        console.error(USAGE);
        exitCode = 1;
    }
  }
} catch (err) {
  console.error(errorMessage(err));
  exitCode = 1;
} finally {
  await app.close();
}

process.exit(exitCode);
