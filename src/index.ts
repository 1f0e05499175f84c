#!/usr/bin/env node
import { BrowserSession } from "./cdp/client.js";
import { parseConfig, type HarnessConfig } from "./config.js";
import { HarnessError, errorMessage } from "./errors.js";
import { readerSuite } from "./reader/scenarios.js";
import { exitCodeFor, formatReport } from "./scenario/report.js";
import { ScenarioRunner } from "./scenario/runner.js";
import { waitForServer } from "./server.js";

function selectScenarios(config: HarnessConfig) {
  const all = readerSuite({ defaultFilter: config.defaultFilter, feedUrl: config.feedUrl });
  const picked = config.only ? all.filter((s) => s.name.includes(config.only ?? "")) : all;
  if (picked.length === 0) {
    throw new HarnessError("CONFIG_INVALID", `No scenario matches "${config.only}"`);
  }
  return picked;
}

async function main(): Promise<number> {
  const config = parseConfig(process.argv.slice(2));
  const scenarios = selectScenarios(config);

  const controller = new AbortController();
  const shutdown = () => {
    console.error("[settlecheck] Shutting down...");
    controller.abort();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  console.error(`[settlecheck] Waiting for ${config.baseUrl}...`);
  await waitForServer(config.baseUrl, { signal: controller.signal });

  console.error(`[settlecheck] Connecting to Chrome${config.cdpUrl ? ` at ${config.cdpUrl}` : " (launching)"}...`);
  const session = await BrowserSession.launch({ cdpUrl: config.cdpUrl, headless: config.headless });
  try {
    const runner = new ScenarioRunner({
      baseUrl: config.baseUrl,
      openContext: () => session.newContext(),
      artifactsDir: config.artifactsDir,
      signal: controller.signal,
    });
    const report = await runner.runSuite(scenarios, {
      viewports: config.viewports,
      concurrency: config.concurrency,
    });
    console.log(formatReport(report));
    return exitCodeFor(report);
  } finally {
    await session.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const prefix = err instanceof HarnessError ? `${err.code}: ` : "";
    console.error(`[settlecheck] Fatal: ${prefix}${errorMessage(err)}`);
    process.exitCode = 2;
  });
