import * as dotenv from "dotenv";
dotenv.config();

import chalk from "chalk";
import { loadConfig, parseArgs } from "./config";
import { describeError } from "./errors";
import { readQueries } from "./input";
import { createLogger } from "./logger";
import { createProxyBatchRunner } from "./pipeline";

async function main(): Promise<number> {
  const config = loadConfig(process.env, parseArgs(process.argv.slice(2)));
  const logger = createLogger(config.logLevel);

  const queries = await readQueries(config.queriesFile, config.queriesDelimiter);
  if (queries.length === 0) {
    console.log(chalk.yellow(`No queries found in ${config.queriesFile}.`));
    return 0;
  }

  console.log(chalk.blue(`\nScraping ${queries.length} queries, ${config.pages} pages each ...\n`));
  const report = await createProxyBatchRunner(config, logger).run(queries);

  for (const s of report.stored) {
    console.log(`${chalk.green("✓")} ${s.query} → ${s.location} (${s.records} results)`);
  }
  for (const f of report.failed) {
    console.log(`${chalk.red("✗")} ${f.query}: ${f.error}`);
  }

  return report.failed.length === 0 ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(chalk.red("Error:"), describeError(e));
    process.exitCode = 1;
  });
